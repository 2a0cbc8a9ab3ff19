/**
 * UDF Sanitizer
 *
 * Strips the properties a UDF only has meaning for in the environment it was
 * read from, so the definition can be created elsewhere.
 */

import type { UdfCatalog } from "../../build-project/models/udf.js";
import { SANITIZED_UDF_RETURN_TYPE, VOLATILE_UDF_KEYS } from "../interfaces/IReconciliation.js";

/**
 * Returns a sanitized deep copy of the catalog; the input is left untouched.
 */
export function sanitizeUdfs(catalog: UdfCatalog): UdfCatalog {
  const sanitized = structuredClone(catalog);

  for (const udf of Object.values(sanitized)) {
    for (const key of VOLATILE_UDF_KEYS) {
      delete udf[key];
    }
    udf.return_type = SANITIZED_UDF_RETURN_TYPE;
  }

  return sanitized;
}
