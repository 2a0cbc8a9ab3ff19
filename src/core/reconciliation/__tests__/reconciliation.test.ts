/**
 * Reconciliation Tests
 *
 * Schema merge, id mapping and validation rewriting against in-memory
 * gateway fakes.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import type { Identifier, SchemaDocument } from "../../build-project/models/schema.js";
import type { ValidationDocument } from "../../build-project/models/validation.js";
import type { ValidationGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { UdfProvisioner } from "../interfaces/IReconciliation.js";
import { SchemaReconciler, collectSchemaIds } from "../impl/SchemaReconciler.js";
import { mapFieldIds } from "../impl/FieldIdMapper.js";
import { ValidationReconciler, toWireId } from "../impl/ValidationReconciler.js";
import { propertyMatchKey } from "../impl/entity-index.js";
import { MissingEntityError, UnmappedReferenceError } from "../../errors.js";

function sequence(...ids: string[]): () => string {
  let next = 0;
  return () => ids[next++] ?? `overflow-${next}`;
}

function fakeProvisioner(result: Identifier = 99) {
  const provision = vi.fn<UdfProvisioner["provision"]>().mockResolvedValue(result);
  const provisioner: UdfProvisioner = { provision };
  return { provisioner, provision };
}

// =============================================================================
// SchemaReconciler
// =============================================================================

describe("SchemaReconciler", () => {
  const targetSchema: SchemaDocument = {
    "5": { name: "Invoice", description: "Target invoices", fields: { "7": { name: "Total" } } },
    last_edited_at: "2024-03-01T10:00:00Z",
  };

  it("keeps target ids for matched classes and fields and mints ids for new fields", async () => {
    const sourceSchema: SchemaDocument = {
      "2": {
        name: "Invoice",
        description: "Invoices",
        fields: { "3": { name: "Total", lines: [] }, "4": { name: "Date" } },
      },
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new SchemaReconciler(provisioner, { idGenerator: sequence("fresh-date") });

    const payload = await reconciler.reconcile(sourceSchema, targetSchema);

    expect(payload).toEqual({
      classes: {
        "5": {
          name: "Invoice",
          description: "Invoices",
          fields: { "7": { name: "Total", lines: [] } },
          new_fields: [{ name: "Date", uuid: "fresh-date" }],
        },
      },
      new_classes: [],
    });
  });

  it("puts classes missing from the target under new_classes with every field new", async () => {
    const sourceSchema: SchemaDocument = {
      "8": { name: "Receipt", fields: { "9": { name: "Amount" }, last_edited_at: 1700000000 } },
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new SchemaReconciler(provisioner, { idGenerator: sequence("fresh-amount") });

    const payload = await reconciler.reconcile(sourceSchema, targetSchema);

    expect(payload.classes).toEqual({});
    expect(payload.new_classes).toEqual([
      { name: "Receipt", description: "", fields: {}, new_fields: [{ name: "Amount", uuid: "fresh-amount" }] },
    ]);
  });

  it("rewrites UDF lines through the provisioner without touching the source", async () => {
    const sourceSchema: SchemaDocument = {
      "2": {
        name: "Invoice",
        fields: {
          "3": {
            name: "Total",
            lines: [
              { line_type: "UDF", function_id: 11 },
              { line_type: "REGEX", pattern: "\\d+" },
            ],
          },
        },
      },
    };
    const { provisioner, provision } = fakeProvisioner(300);
    const reconciler = new SchemaReconciler(provisioner);

    const payload = await reconciler.reconcile(sourceSchema, targetSchema);

    expect(provision).toHaveBeenCalledTimes(1);
    expect(provision).toHaveBeenCalledWith(11);
    expect(payload.classes["5"]?.fields["7"]?.lines).toEqual([
      { line_type: "UDF", function_id: 300 },
      { line_type: "REGEX", pattern: "\\d+" },
    ]);
    expect(sourceSchema["2"]).toEqual({
      name: "Invoice",
      fields: {
        "3": {
          name: "Total",
          lines: [
            { line_type: "UDF", function_id: 11 },
            { line_type: "REGEX", pattern: "\\d+" },
          ],
        },
      },
    });
  });

  it("propagates a missing UDF from the provisioner", async () => {
    const sourceSchema: SchemaDocument = {
      "2": { name: "Invoice", fields: { "3": { name: "Total", lines: [{ line_type: "UDF", function_id: 404 }] } } },
    };
    const provisioner: UdfProvisioner = {
      provision: vi.fn<UdfProvisioner["provision"]>().mockRejectedValue(new MissingEntityError("UDF", 404)),
    };

    await expect(new SchemaReconciler(provisioner).reconcile(sourceSchema, targetSchema)).rejects.toBeInstanceOf(
      MissingEntityError
    );
  });

  it("never mints an id the target already uses", async () => {
    const sourceSchema: SchemaDocument = {
      "2": { name: "Invoice", fields: { "4": { name: "Date" }, "6": { name: "Due" } } },
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new SchemaReconciler(provisioner, { idGenerator: sequence("7", "5", "n1", "n1", "n2") });

    const payload = await reconciler.reconcile(sourceSchema, targetSchema);

    expect(payload.classes["5"]?.new_fields.map((field) => field.uuid)).toEqual(["n1", "n2"]);
  });

  it("uses the later class when source names collide", async () => {
    const sourceSchema: SchemaDocument = {
      "1": { name: "Invoice", description: "first", fields: {} },
      "2": { name: "Invoice", description: "second", fields: {} },
    };
    const { provisioner } = fakeProvisioner();

    const payload = await new SchemaReconciler(provisioner).reconcile(sourceSchema, targetSchema);

    expect(payload.classes["5"]?.description).toBe("second");
    expect(payload.new_classes).toEqual([]);
  });

  it("matches on a configured property instead of the name", async () => {
    const target: SchemaDocument = {
      "5": { name: "Invoice", external_key: "inv", fields: {} },
    };
    const source: SchemaDocument = {
      "2": { name: "Bill", external_key: "inv", fields: {} },
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new SchemaReconciler(provisioner, { matchKey: propertyMatchKey("external_key") });

    const payload = await reconciler.reconcile(source, target);

    expect(Object.keys(payload.classes)).toEqual(["5"]);
    expect(payload.classes["5"]?.name).toBe("Bill");
  });

  it("collects class and field ids but not metadata keys", () => {
    expect(collectSchemaIds(targetSchema)).toEqual(["5", "7"]);
  });
});

// =============================================================================
// mapFieldIds
// =============================================================================

describe("mapFieldIds", () => {
  it("maps classes and fields into one namespace", () => {
    const oldSchema: SchemaDocument = { "1": { name: "A", fields: { "1": { name: "F" } } } };
    const newSchema: SchemaDocument = { "2": { name: "A", fields: { "2": { name: "F" } } } };

    expect(mapFieldIds(oldSchema, newSchema)).toEqual({ "1": "2" });
  });

  it("leaves out entities that exist on one side only", () => {
    const oldSchema: SchemaDocument = {
      "2": { name: "Invoice", fields: { "3": { name: "Total" }, "4": { name: "Date" }, "10": { name: "Gone" } } },
      "20": { name: "Dropped", fields: { "21": { name: "X" } } },
      last_edited_class_at: "2024-03-01",
    };
    const newSchema: SchemaDocument = {
      "5": { name: "Invoice", fields: { "7": { name: "Total" }, "8": { name: "Date" }, last_edited_at: 1 } },
      "30": { name: "Added", fields: {} },
    };

    expect(mapFieldIds(oldSchema, newSchema)).toEqual({ "2": "5", "3": "7", "4": "8" });
    expect(Object.getPrototypeOf(mapFieldIds(oldSchema, newSchema))).toBeNull();
  });
});

// =============================================================================
// ValidationReconciler
// =============================================================================

describe("ValidationReconciler", () => {
  const mapping = { "2": "5", "3": "7", "4": "a1b2c3" };
  let deleteValidation: Mock<ValidationGateway["deleteValidation"]>;
  let triggerExamples: Mock<ValidationGateway["triggerExamples"]>;
  let gateway: ValidationGateway;

  beforeEach(() => {
    deleteValidation = vi.fn<ValidationGateway["deleteValidation"]>().mockResolvedValue(undefined);
    triggerExamples = vi.fn<ValidationGateway["triggerExamples"]>().mockResolvedValue(undefined);
    gateway = { deleteValidation, triggerExamples };
  });

  const empty: ValidationDocument = { rules: [] };

  it("builds the payload with mapped field references", async () => {
    const source: ValidationDocument = {
      rules: [
        {
          id: 1,
          name: "Total present",
          type: "FIELD_CONFIDENCE",
          alert_level: "WARNING",
          scope: "FIELD",
          affected_fields: [3],
          input_fields: ["4"],
          params: { threshold: 0.8 },
        },
      ],
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new ValidationReconciler(gateway, provisioner, "target-project");

    const payloads = await reconciler.reconcile(empty, source, mapping);

    expect(payloads).toEqual([
      {
        projectId: "target-project",
        name: "Total present",
        type: "FIELD_CONFIDENCE",
        affected_fields: [7],
        alert_level: "WARNING",
        scope: "FIELD",
        description: "",
        input_fields: ["a1b2c3"],
        params: { threshold: 0.8 },
      },
    ]);
    expect(deleteValidation).not.toHaveBeenCalled();
  });

  it("rewrites affected classes of class-confidence rules", async () => {
    const source: ValidationDocument = {
      rules: [{ name: "Invoice confidence", type: "CLASS_CONFIDENCE", params: { affected_classes: [2] } }],
    };
    const { provisioner } = fakeProvisioner();

    const [payload] = await new ValidationReconciler(gateway, provisioner, "target-project").reconcile(
      empty,
      source,
      mapping
    );

    expect(payload?.params.affected_classes).toEqual([5]);
  });

  it("deletes a same-named target rule before returning its replacement", async () => {
    const target: ValidationDocument = { rules: [{ id: 9, name: "Check Total", type: "FIELD_CONFIDENCE" }] };
    const source: ValidationDocument = {
      rules: [{ id: 1, name: "Check Total", type: "FIELD_CONFIDENCE", affected_fields: [3] }],
    };
    const { provisioner } = fakeProvisioner();

    const payloads = await new ValidationReconciler(gateway, provisioner, "target-project").reconcile(
      target,
      source,
      mapping
    );

    expect(deleteValidation).toHaveBeenCalledTimes(1);
    expect(deleteValidation).toHaveBeenCalledWith("target-project", 9);
    expect(payloads.map((payload) => payload.name)).toEqual(["Check Total"]);
  });

  it("fails on a field reference without a mapping entry", async () => {
    const source: ValidationDocument = {
      rules: [{ name: "Orphan", type: "FIELD_CONFIDENCE", affected_fields: [42] }],
    };
    const { provisioner } = fakeProvisioner();
    const reconciler = new ValidationReconciler(gateway, provisioner, "target-project");

    const result = reconciler.reconcile(empty, source, mapping);

    await expect(result).rejects.toBeInstanceOf(UnmappedReferenceError);
    await expect(result).rejects.toMatchObject({
      ruleName: "Orphan",
      property: "affected_fields",
      reference: "42",
    });
  });

  it("fails on an input field without a mapping entry", async () => {
    const source: ValidationDocument = {
      rules: [{ name: "Cross check", type: "FIELD_CONFIDENCE", affected_fields: [3], input_fields: [2, 77] }],
    };
    const { provisioner } = fakeProvisioner();

    const result = new ValidationReconciler(gateway, provisioner, "target-project").reconcile(empty, source, mapping);

    await expect(result).rejects.toBeInstanceOf(UnmappedReferenceError);
    await expect(result).rejects.toMatchObject({
      ruleName: "Cross check",
      property: "input_fields",
      reference: "77",
    });
  });

  it("fails on an affected class without a mapping entry", async () => {
    const source: ValidationDocument = {
      rules: [
        {
          name: "Class check",
          type: "CLASS_CONFIDENCE",
          affected_fields: [],
          params: { affected_classes: [2, 55] },
        },
      ],
    };
    const { provisioner } = fakeProvisioner();

    const result = new ValidationReconciler(gateway, provisioner, "target-project").reconcile(empty, source, mapping);

    await expect(result).rejects.toBeInstanceOf(UnmappedReferenceError);
    await expect(result).rejects.toMatchObject({
      ruleName: "Class check",
      property: "params.affected_classes",
      reference: "55",
    });
  });

  it("does not resolve references through object prototype members", async () => {
    const source: ValidationDocument = {
      rules: [{ name: "Odd reference", type: "FIELD_CONFIDENCE", affected_fields: ["constructor"] }],
    };
    const { provisioner } = fakeProvisioner();

    const result = new ValidationReconciler(gateway, provisioner, "target-project").reconcile(empty, source, mapping);

    await expect(result).rejects.toMatchObject({ property: "affected_fields", reference: "constructor" });
  });

  it("provisions the UDF of UDF-backed rules and triggers example generation", async () => {
    const source: ValidationDocument = {
      rules: [{ name: "Custom check", type: "PROMPT_UDF", affected_fields: [3], params: { udf_id: 11 } }],
    };
    const { provisioner, provision } = fakeProvisioner("300");

    const [payload] = await new ValidationReconciler(gateway, provisioner, "target-project").reconcile(
      empty,
      source,
      mapping
    );

    expect(provision).toHaveBeenCalledWith(11);
    expect(payload?.params.udf_id).toBe(300);
    expect(triggerExamples).toHaveBeenCalledWith("target-project", "300");
  });

  it("fails when a UDF rule names no UDF", async () => {
    const source: ValidationDocument = { rules: [{ name: "Broken", type: "UDF", params: {} }] };
    const { provisioner } = fakeProvisioner();

    await expect(
      new ValidationReconciler(gateway, provisioner, "target-project").reconcile(empty, source, mapping)
    ).rejects.toBeInstanceOf(MissingEntityError);
  });
});

describe("toWireId", () => {
  it("sends numeric ids as numbers and keeps the rest", () => {
    expect(toWireId("5")).toBe(5);
    expect(toWireId(5)).toBe(5);
    expect(toWireId("a1b2c3")).toBe("a1b2c3");
  });
});
