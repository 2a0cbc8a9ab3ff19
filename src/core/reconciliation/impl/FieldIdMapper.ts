/**
 * Field Id Mapper
 *
 * Pairs source ids with the ids the target assigned, by match key. Classes
 * and fields share one mapping. Call it with the schema the target returned
 * after persisting, since new entities only get their ids there.
 */

import type { SchemaDocument } from "../../build-project/models/schema.js";
import type { FieldIdMapping, MatchKeyStrategy } from "../interfaces/IReconciliation.js";
import { createLogger } from "../../../utils/logger.js";
import { indexEntityRecords, nameMatchKey } from "./entity-index.js";

const logger = createLogger("field-id-mapper");

export function mapFieldIds(
  oldSchema: SchemaDocument,
  newSchema: SchemaDocument,
  matchKey: MatchKeyStrategy = nameMatchKey
): FieldIdMapping {
  // No prototype: source ids are arbitrary strings
  const mapping: FieldIdMapping = Object.create(null);
  const newClasses = indexEntityRecords(newSchema, matchKey, "class");

  for (const [key, oldClass] of indexEntityRecords(oldSchema, matchKey, "class")) {
    const newClass = newClasses.get(key);
    if (!newClass) continue;

    mapping[oldClass.id] = newClass.id;

    const newFields = indexEntityRecords(newClass.entity.fields, matchKey, "field");
    for (const [fieldKey, oldField] of indexEntityRecords(oldClass.entity.fields, matchKey, "field")) {
      const newField = newFields.get(fieldKey);
      if (newField) {
        mapping[oldField.id] = newField.id;
      }
    }
  }

  logger.debug({ entries: Object.keys(mapping).length }, "Mapped source ids to target ids");
  return mapping;
}
