/**
 * Extraction Schema Models
 *
 * Wire shapes of a build project's class/field schema. Unknown keys are kept
 * so a merged payload carries every property the backend sent.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Environment-local, opaque identifier. Container keys are strings; rule
 * references and UDF ids travel as numbers on most endpoints.
 */
export const IdentifierSchema = z.union([z.string(), z.number()]);

export type Identifier = z.infer<typeof IdentifierSchema>;

/**
 * Keys that sit next to entities in a container but are not entities
 */
export const NON_ENTITY_KEYS: ReadonlySet<string> = new Set(["last_edited_at", "last_edited_class_at"]);

/**
 * Scalar values stored under non-entity keys
 */
const MetadataValueSchema = z.union([z.string(), z.number(), z.null()]);

// =============================================================================
// Fields
// =============================================================================

export const UDF_LINE_TYPE = "UDF";

export const ExtractionLineSchema = z
  .object({
    line_type: z.string(),
    function_id: IdentifierSchema.optional(),
  })
  .passthrough();

export type ExtractionLine = z.infer<typeof ExtractionLineSchema>;

export const FieldDefinitionSchema = z
  .object({
    name: z.string(),
    lines: z.array(ExtractionLineSchema).optional(),
  })
  .passthrough();

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;

export const FieldContainerSchema = z.record(
  z.string(),
  z.union([FieldDefinitionSchema, MetadataValueSchema])
);

export type FieldContainer = z.infer<typeof FieldContainerSchema>;

// =============================================================================
// Classes
// =============================================================================

export const ClassDefinitionSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    fields: FieldContainerSchema,
  })
  .passthrough();

export type ClassDefinition = z.infer<typeof ClassDefinitionSchema>;

/**
 * Class id → class, as returned by the schema endpoint (GET and POST)
 */
export const SchemaDocumentSchema = z.record(
  z.string(),
  z.union([ClassDefinitionSchema, MetadataValueSchema])
);

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;

// =============================================================================
// Reconciled Payload
// =============================================================================

/**
 * A field that does not exist on the target yet; `uuid` is the minted id
 */
export type NewFieldPayload = FieldDefinition & { uuid: string };

export interface ClassPayload {
  name: string;
  description: string;
  /** Existing target field id → merged field */
  fields: Record<string, FieldDefinition>;
  new_fields: NewFieldPayload[];
}

/**
 * Body posted to the schema endpoint
 */
export interface SchemaPayload {
  /** Existing target class id → merged class */
  classes: Record<string, ClassPayload>;
  /** Classes the target does not have; the backend assigns their ids */
  new_classes: ClassPayload[];
}
