/**
 * Reads everything a migration needs from the source project.
 */

import type { IBuildProjectGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { SourceSnapshot } from "../interfaces/IMigration.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("source-fetcher");

export type SourceGateway = Pick<
  IBuildProjectGateway,
  "fetchSettings" | "fetchUdfs" | "fetchSchema" | "fetchValidations"
>;

export async function fetchSourceSnapshot(gateway: SourceGateway, projectId: string): Promise<SourceSnapshot> {
  const settings = await gateway.fetchSettings(projectId);
  const udfs = await gateway.fetchUdfs(projectId);
  const schema = await gateway.fetchSchema(projectId);
  const validations = await gateway.fetchValidations(projectId);

  logger.info(
    { projectId, udfs: Object.keys(udfs).length, rules: validations.rules.length },
    "Fetched source project"
  );
  return { settings, udfs, schema, validations };
}
