/**
 * rebuild command - Reconcile the fetched snapshot into the target project
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, getConfigPath, getSnapshotDir } from "../../utils/index.js";
import { createGateway, loadMigrationConfig, recordTargetProject } from "../../core/config/index.js";
import {
  MigrationPipeline,
  prepareTargetProject,
  readSnapshot,
  type MigrationPipelineConfig,
  type MigrationReport,
} from "../../core/migration/index.js";
import { resolveMatchKey } from "../../core/reconciliation/index.js";
import {
  ErrorCode,
  MigrationError,
  MigrationToolError,
  TargetPreparationError,
  wrapError,
} from "../../core/errors.js";

const logger = createLogger("rebuild");

export interface RebuildOptions {
  config?: string;
  snapshotDir?: string;
  settleMs?: number;
  reuseUdfs?: boolean;
  matchKey?: string;
}

export async function rebuildCommand(options: RebuildOptions): Promise<void> {
  logger.info({ options }, "Rebuilding project");

  if (options.settleMs !== undefined && (!Number.isInteger(options.settleMs) || options.settleMs < 0)) {
    throw new MigrationToolError("--settle-ms must be a non-negative integer", ErrorCode.INVALID_ARGUMENT);
  }

  const configPath = options.config ?? getConfigPath();
  const config = await loadMigrationConfig(configPath);
  const snapshot = await readSnapshot(options.snapshotDir ?? getSnapshotDir());
  const gateway = createGateway("target", config);

  console.log();
  console.log(chalk.cyan.bold("Rebuilding Project"));
  console.log(chalk.dim("─".repeat(40)));

  const spinner = ora("Preparing target project...").start();

  const pipelineConfig: Partial<MigrationPipelineConfig> = {
    settleDelayMs: options.settleMs ?? config.settleDelayMs,
    matchKey: resolveMatchKey(options.matchKey ?? config.matchKey),
    reuseUdfs: options.reuseUdfs ?? config.reuseUdfs,
    onStageComplete: (stage) => {
      spinner.text = `Migrating... (${stage.toLowerCase().replace(/_/g, " ")})`;
    },
  };

  try {
    const target = await prepareTargetProject(gateway, {
      sourceProjectId: config.source.project_id,
      settings: snapshot.settings,
      target: config.target,
      onCreated: (projectId) => recordTargetProject(projectId, configPath),
    });

    spinner.text = "Migrating...";
    const pipeline = new MigrationPipeline(gateway, { ...pipelineConfig, targetModified: true });
    const report = await pipeline.run(snapshot, target.projectId);
    spinner.succeed(chalk.green("Rebuild complete!"));

    printReport(report, target.created);
  } catch (error) {
    spinner.fail(chalk.red("Rebuild failed"));
    if (error instanceof MigrationError && error.partial) {
      console.log(chalk.yellow("The target project was partially migrated."));
      console.log(chalk.dim(`  Completed stages: ${error.completedStages.join(", ") || "none"}`));
    }
    if (error instanceof TargetPreparationError && error.partial) {
      console.log(chalk.yellow("The target project was partially prepared."));
      if (error.projectId) {
        console.log(chalk.dim(`  Target project: ${error.projectId}${error.created ? " (created)" : ""}`));
      }
    }
    throw wrapError(error, "Could not rebuild the project");
  }
}

function printReport(report: MigrationReport, created: boolean): void {
  console.log();
  console.log(chalk.white.bold("Results"));
  console.log(`  Target project:   ${chalk.cyan(report.targetProjectId)}${created ? chalk.dim(" (created)") : ""}`);
  console.log(`  Updated classes:  ${report.updatedClasses}`);
  console.log(`  New classes:      ${report.newClasses}`);
  console.log(`  New fields:       ${report.newFields}`);
  console.log(`  Mapped ids:       ${report.mappedIds}`);
  console.log(`  Validations:      ${report.persistedRules.length}`);
  console.log(`  Duration:         ${(report.durationMs / 1000).toFixed(1)}s`);
  console.log();
  console.log(chalk.dim("─".repeat(40)));
}
