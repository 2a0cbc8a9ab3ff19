/**
 * UDF Provisioners
 *
 * The one place a source UDF id becomes a target UDF id. Extraction lines and
 * UDF-backed validation rules both go through here.
 */

import { createHash } from "node:crypto";
import type { UdfGateway } from "../../build-project/interfaces/IBuildProjectGateway.js";
import type { Identifier } from "../../build-project/models/schema.js";
import type { Udf, UdfCatalog } from "../../build-project/models/udf.js";
import type { UdfProvisioner } from "../interfaces/IReconciliation.js";
import { MissingEntityError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { sanitizeUdfs } from "./udf-sanitizer.js";

const logger = createLogger("udf-provisioner");

/**
 * Keys that name a UDF's place in an environment rather than what it does
 */
const IDENTITY_KEYS: ReadonlySet<string> = new Set(["id", "udf_id", "project_id"]);

// =============================================================================
// Re-creating Provisioner
// =============================================================================

/**
 * Creates a fresh target UDF on every call, even for a source id it has
 * already provisioned. Re-running a migration leaves the earlier copies behind.
 */
export class RecreatingUdfProvisioner implements UdfProvisioner {
  protected readonly catalog: UdfCatalog;

  constructor(
    protected readonly gateway: UdfGateway,
    protected readonly projectId: string,
    catalog: UdfCatalog
  ) {
    this.catalog = sanitizeUdfs(catalog);
  }

  async provision(sourceUdfId: Identifier): Promise<Identifier> {
    const udf = this.lookup(sourceUdfId);
    const created = await this.gateway.createUdf(this.projectId, structuredClone(udf));
    logger.debug({ sourceUdfId, targetUdfId: created.udf_id, name: udf.name }, "Created UDF on target");
    return created.udf_id;
  }

  protected lookup(sourceUdfId: Identifier): Udf {
    const udf = this.catalog[String(sourceUdfId)];
    if (!udf) {
      throw new MissingEntityError("UDF", sourceUdfId, { projectId: this.projectId });
    }
    return udf;
  }
}

// =============================================================================
// Content-addressed Provisioner
// =============================================================================

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === "object" && value !== null) {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, inner] of entries) {
      out[key] = canonicalize(inner);
    }
    return out;
  }
  return value;
}

/**
 * SHA-256 of the UDF's canonical JSON, identity keys excluded. Expects a
 * sanitized UDF.
 */
export function fingerprintUdf(udf: Udf): string {
  const content: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(udf)) {
    if (!IDENTITY_KEYS.has(key)) content[key] = value;
  }
  return createHash("sha256").update(JSON.stringify(canonicalize(content))).digest("hex");
}

/**
 * Reuses a target UDF whose sanitized content matches the source UDF and
 * creates one only when none does. UDFs created during the run are
 * remembered, so each distinct definition is created at most once.
 */
export class ContentAddressedUdfProvisioner extends RecreatingUdfProvisioner {
  private targetByFingerprint: Map<string, Identifier> | null = null;

  async provision(sourceUdfId: Identifier): Promise<Identifier> {
    const udf = this.lookup(sourceUdfId);
    const fingerprint = fingerprintUdf(udf);
    const known = await this.loadTargetFingerprints();

    const existing = known.get(fingerprint);
    if (existing !== undefined) {
      logger.debug({ sourceUdfId, targetUdfId: existing, name: udf.name }, "Reusing identical target UDF");
      return existing;
    }

    const created = await this.gateway.createUdf(this.projectId, structuredClone(udf));
    known.set(fingerprint, created.udf_id);
    logger.debug({ sourceUdfId, targetUdfId: created.udf_id, name: udf.name }, "Created UDF on target");
    return created.udf_id;
  }

  private async loadTargetFingerprints(): Promise<Map<string, Identifier>> {
    if (this.targetByFingerprint) return this.targetByFingerprint;

    const targetCatalog = sanitizeUdfs(await this.gateway.fetchUdfs(this.projectId));
    const index = new Map<string, Identifier>();
    for (const [id, udf] of Object.entries(targetCatalog)) {
      index.set(fingerprintUdf(udf), id);
    }
    logger.debug({ targetUdfs: index.size }, "Indexed target UDFs");

    this.targetByFingerprint = index;
    return index;
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface UdfProvisionerOptions {
  gateway: UdfGateway;
  projectId: string;
  catalog: UdfCatalog;
  /** Reuse identical target UDFs instead of re-creating them */
  reuse?: boolean;
}

export function createUdfProvisioner(options: UdfProvisionerOptions): UdfProvisioner {
  const { gateway, projectId, catalog, reuse = false } = options;
  return reuse
    ? new ContentAddressedUdfProvisioner(gateway, projectId, catalog)
    : new RecreatingUdfProvisioner(gateway, projectId, catalog);
}
