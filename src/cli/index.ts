#!/usr/bin/env node

/**
 * build-migrate CLI
 * Moves a build project's schema, UDFs and validations between environments
 */

import { Command } from "commander";
import chalk from "chalk";
import { fetchCommand } from "./commands/fetch.js";
import { rebuildCommand } from "./commands/rebuild.js";
import { createLogger } from "../utils/logger.js";
import { isMigrationToolError } from "../core/errors.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("build-migrate")
  .description("Migrate a build project between environments")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("fetch")
  .description("Fetch settings, UDFs, schema and validations of the source project")
  .option("-c, --config <path>", "Path to the configuration file")
  .option("-s, --snapshot-dir <dir>", "Directory the snapshot is written to")
  .action(fetchCommand);

program
  .command("rebuild")
  .description("Reconcile the fetched snapshot into the target project")
  .option("-c, --config <path>", "Path to the configuration file")
  .option("-s, --snapshot-dir <dir>", "Directory the snapshot is read from")
  .option("--settle-ms <ms>", "Wait after each prompt UDF generation request", (value) => Number(value))
  .option("--reuse-udfs", "Reuse identical target UDFs instead of re-creating them")
  .option("--match-key <property>", "Entity property used to match classes and fields (default: name)")
  .action(rebuildCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    const message = isMigrationToolError(error) ? error.toString() : error.message;
    console.error(chalk.red(`\nError: ${message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("SIGINT", () => {
  logger.info({ signal: "SIGINT" }, "Interrupted");
  console.log(chalk.dim("\nInterrupted. Target changes made so far are not rolled back."));
  process.exit(130);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
