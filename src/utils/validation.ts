/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Migration Configuration Schema
// =============================================================================

/**
 * One side of a migration: the build project and the org/workspace it lives in
 */
export const EnvironmentConfigSchema = z
  .object({
    /** Build project id (required for the source, created for the target if absent) */
    project_id: z.string().min(1).optional(),

    /** Organization the project belongs to, sent as request context */
    org: z.string().min(1),

    /** Workspace the project lives in */
    workspace: z.string().min(1),
  })
  .passthrough();

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;

/**
 * Migration configuration schema
 */
export const MigrationConfigSchema = z
  .object({
    source: EnvironmentConfigSchema.extend({ project_id: z.string().min(1) }),

    target: EnvironmentConfigSchema,

    /** Wait between prompt-UDF example generation and code generation */
    settleDelayMs: z.number().int().nonnegative().default(10_000),

    /** Per-request timeout for gateway calls */
    requestTimeoutMs: z.number().int().positive().default(30_000),

    /** Entity property used as the cross-environment match key (defaults to the name) */
    matchKey: z.string().min(1).optional(),

    /** Reuse identical target UDFs instead of re-creating them */
    reuseUdfs: z.boolean().default(false),
  })
  .passthrough();

export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
