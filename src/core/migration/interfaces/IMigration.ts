/**
 * Migration Pipeline Interfaces
 */

import type { IBuildProjectGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { SchemaDocument } from "../../build-project/models/schema.js";
import type { UdfCatalog } from "../../build-project/models/udf.js";
import type { ValidationDocument } from "../../build-project/models/validation.js";
import type { ProjectSettingsDocument } from "../../build-project/models/settings.js";
import type { MatchKeyStrategy } from "../../reconciliation/interfaces/IReconciliation.js";
import type { IdGenerator } from "../../reconciliation/impl/identifier-minter.js";

// =============================================================================
// Stages
// =============================================================================

export const MigrationStage = {
  FETCHED: "FETCHED",
  SCHEMA_RECONCILED: "SCHEMA_RECONCILED",
  SCHEMA_PERSISTED: "SCHEMA_PERSISTED",
  IDS_MAPPED: "IDS_MAPPED",
  VALIDATIONS_RECONCILED: "VALIDATIONS_RECONCILED",
  VALIDATIONS_PERSISTED: "VALIDATIONS_PERSISTED",
} as const;

export type MigrationStage = (typeof MigrationStage)[keyof typeof MigrationStage];

/**
 * Stages in the order they run
 */
export const MIGRATION_STAGES: readonly MigrationStage[] = [
  MigrationStage.FETCHED,
  MigrationStage.SCHEMA_RECONCILED,
  MigrationStage.SCHEMA_PERSISTED,
  MigrationStage.IDS_MAPPED,
  MigrationStage.VALIDATIONS_RECONCILED,
  MigrationStage.VALIDATIONS_PERSISTED,
];

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Everything read from the source project by `fetch`
 */
export interface SourceSnapshot {
  settings: ProjectSettingsDocument;
  udfs: UdfCatalog;
  schema: SchemaDocument;
  validations: ValidationDocument;
}

// =============================================================================
// Report
// =============================================================================

export interface PersistedRule {
  name: string;
  type: string;
  id: string | number;
}

export interface MigrationReport {
  targetProjectId: string;
  stages: MigrationStage[];
  updatedClasses: number;
  newClasses: number;
  newFields: number;
  /** Entries in the source → target id mapping */
  mappedIds: number;
  persistedRules: PersistedRule[];
  durationMs: number;
}

// =============================================================================
// Pipeline
// =============================================================================

export type PipelineGateway = Pick<
  IBuildProjectGateway,
  | "fetchSchema"
  | "postSchema"
  | "fetchValidations"
  | "postValidation"
  | "deleteValidation"
  | "fetchUdfs"
  | "createUdf"
  | "triggerExamples"
  | "triggerCodeGeneration"
>;

export interface MigrationPipelineConfig {
  /** Wait after each prompt-UDF generation request */
  settleDelayMs: number;
  matchKey: MatchKeyStrategy;
  /** Reuse identical target UDFs instead of re-creating them */
  reuseUdfs: boolean;
  /** The target was changed before the run (created or settings applied) */
  targetModified?: boolean;
  idGenerator?: IdGenerator;
  sleep?: (ms: number) => Promise<void>;
  /** Called after each stage completes */
  onStageComplete?: (stage: MigrationStage) => void;
}

export interface IMigrationPipeline {
  /**
   * Reconcile the snapshot into the target project.
   *
   * @throws {MigrationError} naming the failed stage and whether the target
   * may already have been changed
   */
  run(snapshot: Pick<SourceSnapshot, "udfs" | "schema" | "validations">, targetProjectId: string): Promise<MigrationReport>;
}
