import { describe, it, expect } from "vitest";
import {
  ErrorCode,
  GatewayError,
  MigrationError,
  MigrationToolError,
  UnmappedReferenceError,
  wrapError,
} from "../errors.js";

describe("errors", () => {
  it("formats gateway errors with the request", () => {
    const error = new GatewayError("Request failed with status 404: not found", ErrorCode.GATEWAY_REQUEST_FAILED, {
      status: 404,
      method: "GET",
      path: "/api/v2/aihub/build/projects/proj-1/schema",
    });

    expect(error.toString()).toBe(
      "[E3000] GatewayError: Request failed with status 404: not found (GET /api/v2/aihub/build/projects/proj-1/schema)"
    );
  });

  it("names the stage and keeps the cause of a migration failure", () => {
    const cause = new UnmappedReferenceError("Orphan", "affected_fields", 42);
    const error = new MigrationError("VALIDATIONS_RECONCILED", ["FETCHED"], true, cause);

    expect(error.message).toBe(
      "Migration failed at stage VALIDATIONS_RECONCILED: Rule 'Orphan' references id '42' in affected_fields, which has no counterpart in the target schema"
    );
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toMatchObject({
      code: ErrorCode.MIGRATION_STAGE_FAILED,
      context: { stage: "VALIDATIONS_RECONCILED", completedStages: ["FETCHED"], partial: true },
    });
  });

  it("wraps foreign errors and passes its own through", () => {
    const own = new MigrationToolError("known", ErrorCode.INVALID_ARGUMENT);

    expect(wrapError(own)).toBe(own);
    expect(wrapError(new TypeError("bad"))).toMatchObject({ message: "bad", code: ErrorCode.UNKNOWN_ERROR });
    expect(wrapError(42, "fallback").message).toBe("fallback");
  });
});
