/**
 * Migration Module
 *
 * Moves a build project between environments: fetch the source into a
 * snapshot, prepare the target, and reconcile the snapshot into it.
 */

// Interfaces
export * from "./interfaces/IMigration.js";

// Implementation
export * from "./impl/MigrationPipeline.js";
export * from "./impl/settings-cleaner.js";
export * from "./impl/snapshot-store.js";
export * from "./impl/source-fetcher.js";
export * from "./impl/target-project.js";
