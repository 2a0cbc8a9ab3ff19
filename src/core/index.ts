/**
 * Core module - Shared functionality behind the CLI
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./build-project/index.js";
export * from "./reconciliation/index.js";
export * from "./migration/index.js";
export * from "./config/index.js";
