/**
 * Validation Rule Models
 *
 * @module
 */

import { z } from "zod";
import { IdentifierSchema, type Identifier } from "./schema.js";

/**
 * Rule kinds the reconciler treats specially. Other kinds pass through
 * with only their field references rewritten.
 */
export const RuleType = {
  FIELD_CONFIDENCE: "FIELD_CONFIDENCE",
  CLASS_CONFIDENCE: "CLASS_CONFIDENCE",
  UDF: "UDF",
  PROMPT_UDF: "PROMPT_UDF",
} as const;

export type KnownRuleType = (typeof RuleType)[keyof typeof RuleType];

export const RuleParamsSchema = z
  .object({
    affected_classes: z.array(IdentifierSchema).optional(),
    udf_id: IdentifierSchema.optional(),
  })
  .passthrough();

export type RuleParams = z.infer<typeof RuleParamsSchema>;

export const ValidationRuleSchema = z
  .object({
    id: IdentifierSchema.optional(),
    name: z.string(),
    type: z.string(),
    alert_level: z.unknown().optional(),
    scope: z.unknown().optional(),
    description: z.string().nullable().optional(),
    affected_fields: z.array(IdentifierSchema).optional(),
    input_fields: z.array(IdentifierSchema).optional(),
    params: RuleParamsSchema.optional(),
  })
  .passthrough();

export type ValidationRule = z.infer<typeof ValidationRuleSchema>;

export const ValidationDocumentSchema = z
  .object({
    rules: z.array(ValidationRuleSchema),
  })
  .passthrough();

export type ValidationDocument = z.infer<typeof ValidationDocumentSchema>;

/**
 * Body posted to the validations endpoint for one rule
 */
export interface ValidationPayload {
  projectId: string;
  name: string;
  type: string;
  affected_fields: Identifier[];
  alert_level: unknown;
  scope: unknown;
  description: string;
  input_fields: Identifier[];
  params: RuleParams;
}

export const PersistedValidationSchema = z.object({ id: IdentifierSchema }).passthrough();

export type PersistedValidation = z.infer<typeof PersistedValidationSchema>;
