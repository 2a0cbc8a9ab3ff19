/**
 * Build Project Module
 *
 * Wire models and the gateway to a build-project environment.
 */

// Models
export * from "./models/schema.js";
export * from "./models/udf.js";
export * from "./models/validation.js";
export * from "./models/settings.js";

// Interfaces
export * from "./interfaces/IBuildProjectGateway.js";

// Implementation
export * from "./impl/HttpBuildProjectGateway.js";
