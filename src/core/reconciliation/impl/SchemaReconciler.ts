/**
 * Schema Reconciler
 *
 * Merges a source class/field schema into the target's by match key.
 * Matched classes and fields keep their target ids; everything else is
 * created, with minted ids for new fields and backend-assigned ids for new
 * classes.
 */

import {
  UDF_LINE_TYPE,
  type ClassDefinition,
  type ClassPayload,
  type FieldDefinition,
  type SchemaDocument,
  type SchemaPayload,
} from "../../build-project/models/schema.js";
import type {
  ISchemaReconciler,
  ReconciliationConfig,
  UdfProvisioner,
} from "../interfaces/IReconciliation.js";
import { MissingEntityError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { entityEntries, indexEntityRecords, nameMatchKey, type IndexedEntity } from "./entity-index.js";
import { IdentifierMinter, randomIdGenerator, type IdGenerator } from "./identifier-minter.js";

const logger = createLogger("schema-reconciler");

export interface SchemaReconcilerConfig extends ReconciliationConfig {
  /** Random source for new field ids */
  idGenerator: IdGenerator;
}

export const DEFAULT_SCHEMA_RECONCILER_CONFIG: SchemaReconcilerConfig = {
  matchKey: nameMatchKey,
  idGenerator: randomIdGenerator,
};

/**
 * Every class and field id present in a schema
 */
export function collectSchemaIds(schema: SchemaDocument): string[] {
  const ids: string[] = [];
  for (const [classId, cls] of entityEntries(schema)) {
    ids.push(classId);
    for (const [fieldId] of entityEntries(cls.fields)) {
      ids.push(fieldId);
    }
  }
  return ids;
}

export class SchemaReconciler implements ISchemaReconciler {
  private readonly config: SchemaReconcilerConfig;

  constructor(
    private readonly udfs: UdfProvisioner,
    config: Partial<SchemaReconcilerConfig> = {}
  ) {
    this.config = { ...DEFAULT_SCHEMA_RECONCILER_CONFIG, ...config };
  }

  async reconcile(sourceSchema: SchemaDocument, targetSchema: SchemaDocument): Promise<SchemaPayload> {
    const { matchKey } = this.config;
    const source = structuredClone(sourceSchema);

    const minter = new IdentifierMinter(this.config.idGenerator);
    minter.reserve(collectSchemaIds(targetSchema));

    const sourceClasses = indexEntityRecords(source, matchKey, "class");
    const targetClasses = indexEntityRecords(targetSchema, matchKey, "class");

    const payload: SchemaPayload = { classes: {}, new_classes: [] };
    let newFieldCount = 0;

    for (const [key, { entity: sourceClass }] of sourceClasses) {
      const target = targetClasses.get(key);
      const classPayload = await this.buildClassPayload(sourceClass, target?.entity, minter);
      newFieldCount += classPayload.new_fields.length;

      if (target) {
        payload.classes[target.id] = classPayload;
      } else {
        payload.new_classes.push(classPayload);
      }
    }

    logger.info(
      {
        updatedClasses: Object.keys(payload.classes).length,
        newClasses: payload.new_classes.length,
        newFields: newFieldCount,
        matchKey: matchKey.name,
      },
      "Schema reconciled"
    );

    return payload;
  }

  private async buildClassPayload(
    sourceClass: ClassDefinition,
    targetClass: ClassDefinition | undefined,
    minter: IdentifierMinter
  ): Promise<ClassPayload> {
    const { matchKey } = this.config;
    const classPayload: ClassPayload = {
      name: sourceClass.name,
      description: sourceClass.description ?? "",
      fields: {},
      new_fields: [],
    };

    const targetFields = targetClass
      ? indexEntityRecords(targetClass.fields, matchKey, "field")
      : new Map<string, IndexedEntity<FieldDefinition>>();

    for (const [key, { entity: sourceField }] of indexEntityRecords(sourceClass.fields, matchKey, "field")) {
      await this.rewriteUdfLines(sourceField);

      const targetField = targetFields.get(key);
      if (targetField) {
        classPayload.fields[targetField.id] = sourceField;
      } else {
        classPayload.new_fields.push({ ...sourceField, uuid: minter.mint() });
      }
    }

    return classPayload;
  }

  /**
   * Point every UDF line of the field at the target's copy of its function
   */
  private async rewriteUdfLines(field: FieldDefinition): Promise<void> {
    for (const line of field.lines ?? []) {
      if (line.line_type !== UDF_LINE_TYPE) continue;
      if (line.function_id === undefined) {
        throw new MissingEntityError("UDF", "(none)", { field: field.name });
      }
      line.function_id = await this.udfs.provision(line.function_id);
    }
  }
}
