/**
 * Reconciliation Interfaces
 *
 * Contracts for merging a source environment's schema and validation rules
 * into a target environment's definitions.
 */

import type { Identifier, SchemaDocument, SchemaPayload } from "../../build-project/models/schema.js";
import type { ValidationDocument, ValidationPayload } from "../../build-project/models/validation.js";

// =============================================================================
// Match Keys
// =============================================================================

/**
 * Anything that can be matched across environments. Classes, fields and
 * rules all carry a name; other properties are opaque.
 */
export interface MatchableEntity {
  name: string;
  [key: string]: unknown;
}

/**
 * Extracts the cross-environment identity key of an entity. Ids are never
 * compared across environments; only keys are.
 */
export interface MatchKeyStrategy {
  readonly name: string;

  /**
   * @returns the key, or undefined to leave the entity out of the index
   */
  keyOf(entity: MatchableEntity, id: string): string | undefined;
}

/**
 * Source id → target id, for classes and fields alike
 */
export type FieldIdMapping = Record<string, string>;

// =============================================================================
// UDF Provisioning
// =============================================================================

/**
 * Turns a source UDF id into the id of an equivalent UDF on the target
 */
export interface UdfProvisioner {
  provision(sourceUdfId: Identifier): Promise<Identifier>;
}

// =============================================================================
// Reconcilers
// =============================================================================

export interface ISchemaReconciler {
  reconcile(sourceSchema: SchemaDocument, targetSchema: SchemaDocument): Promise<SchemaPayload>;
}

export interface IValidationReconciler {
  /**
   * Deletes target rules that share a name with a source rule and returns the
   * rewritten payloads in source order. Nothing is posted.
   */
  reconcile(
    targetValidations: ValidationDocument,
    sourceValidations: ValidationDocument,
    fieldIdMapping: FieldIdMapping
  ): Promise<ValidationPayload[]>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationConfig {
  /** How classes and fields are matched (default: by name) */
  matchKey: MatchKeyStrategy;
}

/**
 * Volatile per-environment UDF properties dropped before re-creation
 */
export const VOLATILE_UDF_KEYS = [
  "docstring",
  "last_updated_at",
  "lambda_id",
  "lambda_udf_id",
  "lambda_end_of_life",
] as const;

/**
 * Return type every re-created UDF is given
 */
export const SANITIZED_UDF_RETURN_TYPE = "string";

/**
 * Length of ids minted for new fields
 */
export const MINTED_ID_LENGTH = 21;
