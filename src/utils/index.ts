/**
 * Shared utilities
 */

import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export async helpers
export * from "./async.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".build-migrate";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getSnapshotDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "snapshots");
}
