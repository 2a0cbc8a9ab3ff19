/**
 * Migration Pipeline
 *
 * Drives one migration of a source snapshot into a target project. Stages
 * run strictly in order and every gateway call is awaited before the next.
 * A failing stage ends the run; what earlier stages did on the target stays.
 */

import type { SchemaDocument, SchemaPayload } from "../../build-project/models/schema.js";
import { RuleType, type ValidationPayload } from "../../build-project/models/validation.js";
import type {
  IMigrationPipeline,
  MigrationPipelineConfig,
  MigrationReport,
  PersistedRule,
  PipelineGateway,
  SourceSnapshot,
} from "../interfaces/IMigration.js";
import { MigrationStage } from "../interfaces/IMigration.js";
import type { FieldIdMapping } from "../../reconciliation/interfaces/IReconciliation.js";
import { nameMatchKey } from "../../reconciliation/impl/entity-index.js";
import { createUdfProvisioner } from "../../reconciliation/impl/UdfProvisioner.js";
import { SchemaReconciler } from "../../reconciliation/impl/SchemaReconciler.js";
import { mapFieldIds } from "../../reconciliation/impl/FieldIdMapper.js";
import { ValidationReconciler } from "../../reconciliation/impl/ValidationReconciler.js";
import { MigrationError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { sleep } from "../../../utils/async.js";

const logger = createLogger("migration-pipeline");

export const DEFAULT_MIGRATION_PIPELINE_CONFIG: MigrationPipelineConfig = {
  settleDelayMs: 10_000,
  matchKey: nameMatchKey,
  reuseUdfs: false,
};

export class MigrationPipeline implements IMigrationPipeline {
  private readonly config: MigrationPipelineConfig;

  constructor(
    private readonly gateway: PipelineGateway,
    config: Partial<MigrationPipelineConfig> = {}
  ) {
    this.config = { ...DEFAULT_MIGRATION_PIPELINE_CONFIG, ...config };
  }

  async run(
    snapshot: Pick<SourceSnapshot, "udfs" | "schema" | "validations">,
    targetProjectId: string
  ): Promise<MigrationReport> {
    const startTime = Date.now();
    const completed: MigrationStage[] = [];
    const { matchKey } = this.config;

    logger.info(
      { targetProjectId, matchKey: matchKey.name, reuseUdfs: this.config.reuseUdfs },
      "Starting migration"
    );

    const udfs = createUdfProvisioner({
      gateway: this.gateway,
      projectId: targetProjectId,
      catalog: snapshot.udfs,
      reuse: this.config.reuseUdfs,
    });

    const targetSchema = await this.stage(MigrationStage.FETCHED, completed, () =>
      this.gateway.fetchSchema(targetProjectId)
    );

    const schemaPayload = await this.stage(MigrationStage.SCHEMA_RECONCILED, completed, () =>
      new SchemaReconciler(
        udfs,
        this.config.idGenerator ? { matchKey, idGenerator: this.config.idGenerator } : { matchKey }
      ).reconcile(snapshot.schema, targetSchema)
    );

    const persistedSchema: SchemaDocument = await this.stage(MigrationStage.SCHEMA_PERSISTED, completed, () =>
      this.gateway.postSchema(targetProjectId, schemaPayload)
    );

    const mapping: FieldIdMapping = await this.stage(MigrationStage.IDS_MAPPED, completed, async () =>
      mapFieldIds(snapshot.schema, persistedSchema, matchKey)
    );

    const payloads = await this.stage(MigrationStage.VALIDATIONS_RECONCILED, completed, async () => {
      const targetValidations = await this.gateway.fetchValidations(targetProjectId);
      return new ValidationReconciler(this.gateway, udfs, targetProjectId).reconcile(
        targetValidations,
        snapshot.validations,
        mapping
      );
    });

    const persistedRules = await this.stage(MigrationStage.VALIDATIONS_PERSISTED, completed, () =>
      this.persistValidations(targetProjectId, payloads)
    );

    const report: MigrationReport = {
      targetProjectId,
      stages: completed,
      ...countSchemaChanges(schemaPayload),
      mappedIds: Object.keys(mapping).length,
      persistedRules,
      durationMs: Date.now() - startTime,
    };

    logger.info(
      {
        targetProjectId,
        updatedClasses: report.updatedClasses,
        newClasses: report.newClasses,
        rules: persistedRules.length,
        durationMs: report.durationMs,
      },
      "Migration complete"
    );

    return report;
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private async stage<T>(stage: MigrationStage, completed: MigrationStage[], fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      completed.push(stage);
      logger.debug({ stage }, "Stage complete");
      this.config.onStageComplete?.(stage);
      return result;
    } catch (error) {
      // Only fetching the target schema is free of side effects
      const partial = this.config.targetModified === true || stage !== MigrationStage.FETCHED;
      logger.error({ err: error, stage, completedStages: completed, partial }, "Migration stage failed");
      throw new MigrationError(stage, [...completed], partial, error);
    }
  }

  private async persistValidations(
    projectId: string,
    payloads: ValidationPayload[]
  ): Promise<PersistedRule[]> {
    const persisted: PersistedRule[] = [];

    for (const payload of payloads) {
      const { id } = await this.gateway.postValidation(projectId, payload);
      persisted.push({ name: payload.name, type: payload.type, id });

      if (payload.type === RuleType.PROMPT_UDF) {
        await this.generatePromptUdfCode(projectId, id);
      }
    }

    return persisted;
  }

  /**
   * Prompt-backed rules need examples and then code generated on the target.
   * The backend works on both asynchronously, so each request is followed by
   * the settle delay.
   */
  private async generatePromptUdfCode(projectId: string, ruleId: string | number): Promise<void> {
    const wait = this.config.sleep ?? sleep;

    logger.debug({ ruleId }, "Generating prompt UDF code");
    await this.gateway.triggerExamples(projectId, ruleId);
    await wait(this.config.settleDelayMs);
    await this.gateway.triggerCodeGeneration(projectId, ruleId);
    await wait(this.config.settleDelayMs);
  }
}

function countSchemaChanges(payload: SchemaPayload): Pick<MigrationReport, "updatedClasses" | "newClasses" | "newFields"> {
  let newFields = 0;
  for (const cls of [...Object.values(payload.classes), ...payload.new_classes]) {
    newFields += cls.new_fields.length;
  }
  return {
    updatedClasses: Object.keys(payload.classes).length,
    newClasses: payload.new_classes.length,
    newFields,
  };
}
