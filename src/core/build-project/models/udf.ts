/**
 * User-Defined Function Models
 */

import { z } from "zod";
import { IdentifierSchema } from "./schema.js";

export const UdfSchema = z
  .object({
    name: z.string().optional(),
    return_type: z.string().optional(),
    docstring: z.string().nullable().optional(),
    last_updated_at: z.union([z.string(), z.number()]).nullable().optional(),
    lambda_id: IdentifierSchema.nullable().optional(),
    lambda_udf_id: IdentifierSchema.nullable().optional(),
    lambda_end_of_life: z.union([z.string(), z.number(), z.boolean()]).nullable().optional(),
  })
  .passthrough();

export type Udf = z.infer<typeof UdfSchema>;

/**
 * UDF id → UDF, as returned by the UDF listing endpoint
 */
export const UdfCatalogSchema = z.record(z.string(), UdfSchema);

export type UdfCatalog = z.infer<typeof UdfCatalogSchema>;

export const CreatedUdfSchema = z.object({ udf_id: IdentifierSchema }).passthrough();

export type CreatedUdf = z.infer<typeof CreatedUdfSchema>;
