/**
 * Reconciliation Module
 *
 * Merges a source build project's schema and validation rules into a
 * target project, reusing ids where match keys agree.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Implementation
export * from "./impl/entity-index.js";
export * from "./impl/udf-sanitizer.js";
export * from "./impl/identifier-minter.js";
export * from "./impl/UdfProvisioner.js";
export * from "./impl/SchemaReconciler.js";
export * from "./impl/FieldIdMapper.js";
export * from "./impl/ValidationReconciler.js";
