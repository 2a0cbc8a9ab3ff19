/**
 * Snapshot Store
 *
 * JSON files holding what `fetch` read from the source project, one per
 * document.
 */

import * as path from "node:path";
import type { z } from "zod";
import { SchemaDocumentSchema } from "../../build-project/models/schema.js";
import { UdfCatalogSchema } from "../../build-project/models/udf.js";
import { ValidationDocumentSchema } from "../../build-project/models/validation.js";
import { ProjectSettingsDocumentSchema } from "../../build-project/models/settings.js";
import type { SourceSnapshot } from "../interfaces/IMigration.js";
import { ErrorCode, SnapshotError } from "../../errors.js";
import { fileExists, readJsonFile, writeJsonFile } from "../../../utils/fs.js";
import { formatZodError } from "../../../utils/validation.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("snapshot-store");

export const SNAPSHOT_FILES = {
  settings: "fetched_settings.json",
  udfs: "fetched_udfs.json",
  schema: "fetched_schema.json",
  validations: "fetched_validations.json",
} as const satisfies Record<keyof SourceSnapshot, string>;

export async function writeSnapshot(dir: string, snapshot: SourceSnapshot): Promise<string[]> {
  const written: string[] = [];
  for (const key of ["settings", "udfs", "schema", "validations"] as const) {
    const filePath = path.join(dir, SNAPSHOT_FILES[key]);
    await writeJsonFile(filePath, snapshot[key]);
    written.push(filePath);
  }
  logger.debug({ dir, files: written.length }, "Snapshot written");
  return written;
}

async function readDocument<T>(
  dir: string,
  fileName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const filePath = path.join(dir, fileName);
  if (!(await fileExists(filePath))) {
    throw new SnapshotError(
      `Snapshot file ${fileName} not found. Run \`build-migrate fetch\` first.`,
      ErrorCode.SNAPSHOT_NOT_FOUND,
      { filePath }
    );
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(`Snapshot file ${fileName} is not valid JSON: ${reason}`, ErrorCode.SNAPSHOT_INVALID, {
      filePath,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SnapshotError(
      `Snapshot file ${fileName} is invalid: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.SNAPSHOT_INVALID,
      { filePath }
    );
  }
  return result.data;
}

export async function readSnapshot(dir: string): Promise<SourceSnapshot> {
  return {
    settings: await readDocument(dir, SNAPSHOT_FILES.settings, ProjectSettingsDocumentSchema),
    udfs: await readDocument(dir, SNAPSHOT_FILES.udfs, UdfCatalogSchema),
    schema: await readDocument(dir, SNAPSHOT_FILES.schema, SchemaDocumentSchema),
    validations: await readDocument(dir, SNAPSHOT_FILES.validations, ValidationDocumentSchema),
  };
}
