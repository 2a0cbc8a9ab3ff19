/**
 * Validation Reconciler
 *
 * Rewrites source validation rules for the target: field and class
 * references go through the id mapping, UDF-backed rules get a target UDF.
 * A target rule with the same name is deleted first, so the source rule
 * replaces it when posted.
 */

import type { ValidationGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { Identifier } from "../../build-project/models/schema.js";
import {
  RuleType,
  type RuleParams,
  type ValidationDocument,
  type ValidationPayload,
  type ValidationRule,
} from "../../build-project/models/validation.js";
import type {
  FieldIdMapping,
  IValidationReconciler,
  UdfProvisioner,
} from "../interfaces/IReconciliation.js";
import { MissingEntityError, UnmappedReferenceError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("validation-reconciler");

const UDF_RULE_TYPES: ReadonlySet<string> = new Set([RuleType.UDF, RuleType.PROMPT_UDF]);

/**
 * Rule references travel as numbers; ids that look numeric are sent as such
 */
export function toWireId(id: Identifier): Identifier {
  return typeof id === "string" && /^\d+$/.test(id) ? Number(id) : id;
}

export function mapReferences(
  references: readonly Identifier[],
  mapping: FieldIdMapping,
  ruleName: string,
  property: string
): Identifier[] {
  return references.map((reference) => {
    const key = String(reference);
    const mapped = Object.hasOwn(mapping, key) ? mapping[key] : undefined;
    if (mapped === undefined) {
      throw new UnmappedReferenceError(ruleName, property, reference);
    }
    return toWireId(mapped);
  });
}

export class ValidationReconciler implements IValidationReconciler {
  constructor(
    private readonly gateway: ValidationGateway,
    private readonly udfs: UdfProvisioner,
    private readonly projectId: string
  ) {}

  async reconcile(
    targetValidations: ValidationDocument,
    sourceValidations: ValidationDocument,
    fieldIdMapping: FieldIdMapping
  ): Promise<ValidationPayload[]> {
    const targetByName = new Map<string, ValidationRule>();
    for (const rule of targetValidations.rules) {
      targetByName.set(rule.name, rule);
    }

    const payloads: ValidationPayload[] = [];
    let replaced = 0;

    for (const rule of sourceValidations.rules) {
      const existing = targetByName.get(rule.name);
      if (existing) {
        const targetRuleId = existing.id;
        if (targetRuleId === undefined) {
          logger.warn({ rule: rule.name }, "Target rule with the same name has no id, leaving it in place");
        } else {
          await this.gateway.deleteValidation(this.projectId, targetRuleId);
          targetByName.delete(rule.name);
          replaced++;
          logger.debug({ rule: rule.name, targetRuleId }, "Deleted target rule with the same name");
        }
      }

      payloads.push(await this.buildPayload(rule, fieldIdMapping));
    }

    logger.info({ rules: payloads.length, replaced }, "Validations reconciled");
    return payloads;
  }

  private async buildPayload(rule: ValidationRule, mapping: FieldIdMapping): Promise<ValidationPayload> {
    const params = structuredClone<RuleParams>(rule.params ?? {});

    const payload: ValidationPayload = {
      projectId: this.projectId,
      name: rule.name,
      type: rule.type,
      affected_fields: mapReferences(rule.affected_fields ?? [], mapping, rule.name, "affected_fields"),
      alert_level: rule.alert_level,
      scope: rule.scope,
      description: rule.description ?? "",
      input_fields: mapReferences(rule.input_fields ?? [], mapping, rule.name, "input_fields"),
      params,
    };

    if (rule.type === RuleType.CLASS_CONFIDENCE && params.affected_classes) {
      params.affected_classes = mapReferences(
        params.affected_classes,
        mapping,
        rule.name,
        "params.affected_classes"
      );
    }

    if (UDF_RULE_TYPES.has(rule.type)) {
      if (params.udf_id === undefined) {
        throw new MissingEntityError("UDF", "(none)", { rule: rule.name });
      }
      const targetUdfId = await this.udfs.provision(params.udf_id);
      params.udf_id = toWireId(targetUdfId);
      await this.gateway.triggerExamples(this.projectId, targetUdfId);
    }

    return payload;
  }
}
