/**
 * fetch command - Snapshot the source project to disk
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, getConfigPath, getSnapshotDir } from "../../utils/index.js";
import { createGateway, loadMigrationConfig } from "../../core/config/index.js";
import { fetchSourceSnapshot, writeSnapshot } from "../../core/migration/index.js";
import { wrapError } from "../../core/errors.js";

const logger = createLogger("fetch");

export interface FetchOptions {
  config?: string;
  snapshotDir?: string;
}

export async function fetchCommand(options: FetchOptions): Promise<void> {
  logger.info({ options }, "Fetching source project");

  const config = await loadMigrationConfig(options.config ?? getConfigPath());
  const snapshotDir = options.snapshotDir ?? getSnapshotDir();
  const gateway = createGateway("source", config);

  const spinner = ora(`Fetching project ${config.source.project_id}...`).start();
  try {
    const snapshot = await fetchSourceSnapshot(gateway, config.source.project_id);
    spinner.text = "Writing snapshot...";
    const files = await writeSnapshot(snapshotDir, snapshot);
    spinner.succeed(chalk.green("Source project fetched"));

    const classCount = Object.values(snapshot.schema).filter(
      (value) => typeof value === "object" && value !== null
    ).length;

    console.log();
    console.log(`  Classes:      ${classCount}`);
    console.log(`  UDFs:         ${Object.keys(snapshot.udfs).length}`);
    console.log(`  Validations:  ${snapshot.validations.rules.length}`);
    console.log();
    for (const file of files) {
      console.log(chalk.dim(`  ${file}`));
    }
  } catch (error) {
    spinner.fail(chalk.red("Fetch failed"));
    throw wrapError(error, "Could not fetch the source project");
  }
}
