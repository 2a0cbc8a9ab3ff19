/**
 * Error Classes for build-migrate
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_NOT_FOUND = "E1000",
  CONFIG_INVALID = "E1001",
  CONFIG_ENV_MISSING = "E1002",
  SNAPSHOT_NOT_FOUND = "E1003",
  SNAPSHOT_INVALID = "E1004",

  // Reconciliation errors (2xxx)
  MISSING_ENTITY = "E2000",
  UNMAPPED_REFERENCE = "E2001",

  // Gateway errors (3xxx)
  GATEWAY_REQUEST_FAILED = "E3000",
  GATEWAY_TIMEOUT = "E3001",
  GATEWAY_INVALID_RESPONSE = "E3002",

  // Pipeline errors (4xxx)
  MIGRATION_STAGE_FAILED = "E4000",
  TARGET_PREPARATION_FAILED = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
}

/**
 * Base error class for all build-migrate errors
 */
export class MigrationToolError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MigrationToolError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration and snapshot loading errors
 */
export class ConfigurationError extends MigrationToolError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.filePath = context?.filePath;
  }
}

/**
 * A snapshot written by `fetch` is missing or unreadable
 */
export class SnapshotError extends MigrationToolError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SNAPSHOT_NOT_FOUND,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "SnapshotError";
    this.filePath = context?.filePath;
  }
}

/**
 * A referenced project, class, field or UDF cannot be located
 */
export class MissingEntityError extends MigrationToolError {
  public readonly entityKind: string;
  public readonly reference: string;

  constructor(
    entityKind: string,
    reference: string | number,
    context?: Record<string, unknown>
  ) {
    super(`${entityKind} '${reference}' could not be found`, ErrorCode.MISSING_ENTITY, {
      ...context,
      entityKind,
      reference,
    });
    this.name = "MissingEntityError";
    this.entityKind = entityKind;
    this.reference = String(reference);
  }
}

/**
 * A field or class id inside a validation rule has no entry in the id mapping
 */
export class UnmappedReferenceError extends MigrationToolError {
  public readonly ruleName: string;
  public readonly property: string;
  public readonly reference: string;

  constructor(ruleName: string, property: string, reference: string | number) {
    super(
      `Rule '${ruleName}' references id '${reference}' in ${property}, which has no counterpart in the target schema`,
      ErrorCode.UNMAPPED_REFERENCE,
      { ruleName, property, reference }
    );
    this.name = "UnmappedReferenceError";
    this.ruleName = ruleName;
    this.property = property;
    this.reference = String(reference);
  }
}

/**
 * Transport-level and HTTP status errors from a build-project gateway
 */
export class GatewayError extends MigrationToolError {
  public readonly status?: number;
  public readonly method?: string;
  public readonly path?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GATEWAY_REQUEST_FAILED,
    context?: Record<string, unknown> & { status?: number; method?: string; path?: string },
    options?: { cause?: unknown }
  ) {
    super(message, code, context, options);
    this.name = "GatewayError";
    this.status = context?.status;
    this.method = context?.method;
    this.path = context?.path;
  }

  toString(): string {
    const request = this.method && this.path ? ` (${this.method} ${this.path})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${request}`;
  }
}

/**
 * A pipeline stage failed. Side effects of earlier stages are not rolled back,
 * so `partial` tells the caller whether the target may be half-migrated.
 */
export class MigrationError extends MigrationToolError {
  public readonly stage: string;
  public readonly completedStages: readonly string[];
  public readonly partial: boolean;

  constructor(
    stage: string,
    completedStages: readonly string[],
    partial: boolean,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Migration failed at stage ${stage}: ${reason}`,
      ErrorCode.MIGRATION_STAGE_FAILED,
      { stage, completedStages: [...completedStages], partial },
      { cause }
    );
    this.name = "MigrationError";
    this.stage = stage;
    this.completedStages = completedStages;
    this.partial = partial;
  }
}

/**
 * Creating the target project or applying the source settings to it failed.
 * `projectId` is set once the target exists, even when it was created by this
 * run and the failure came after.
 */
export class TargetPreparationError extends MigrationToolError {
  public readonly projectId?: string;
  public readonly created: boolean;
  public readonly partial: boolean;

  constructor(
    message: string,
    context: { projectId?: string; created: boolean; partial: boolean },
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${reason}`, ErrorCode.TARGET_PREPARATION_FAILED, { ...context }, { cause });
    this.name = "TargetPreparationError";
    this.projectId = context.projectId;
    this.created = context.created;
    this.partial = context.partial;
  }
}

/**
 * Check if an error is a MigrationToolError
 */
export function isMigrationToolError(error: unknown): error is MigrationToolError {
  return error instanceof MigrationToolError;
}

/**
 * Wrap an unknown error in a MigrationToolError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): MigrationToolError {
  if (isMigrationToolError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MigrationToolError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new MigrationToolError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
