/**
 * HTTP Build Project Gateway
 *
 * REST client for the build-project API of one environment.
 */

import * as fs from "node:fs";
import { ProxyAgent } from "undici";
import type { z } from "zod";
import type { IBuildProjectGateway } from "../interfaces/IBuildProjectGateway.js";
import {
  SchemaDocumentSchema,
  type Identifier,
  type SchemaDocument,
  type SchemaPayload,
} from "../models/schema.js";
import { CreatedUdfSchema, UdfCatalogSchema, type CreatedUdf, type Udf, type UdfCatalog } from "../models/udf.js";
import {
  PersistedValidationSchema,
  ValidationDocumentSchema,
  type PersistedValidation,
  type ValidationDocument,
  type ValidationPayload,
} from "../models/validation.js";
import {
  CreatedProjectSchema,
  ProjectSettingsDocumentSchema,
  type CreateProjectRequest,
  type CreatedProject,
  type ProjectSettingsDocument,
  type ProjectSettingsUpdate,
} from "../models/settings.js";
import { ErrorCode, GatewayError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { withAbortTimeout } from "../../../utils/async.js";
import { formatZodError } from "../../../utils/validation.js";

const logger = createLogger("http-gateway");

export const PROJECTS_API_PATH = "/api/v2/aihub/build/projects";
export const CERTIFICATE_HEADER_NAME = "IB-Certificate";
export const CONTEXT_HEADER_NAME = "Ib-Context";

export interface HttpGatewayConfig {
  /** Environment host, e.g. https://build.example.com */
  hostUrl: string;
  /** Bearer token */
  token: string;
  /** Per-request timeout (default 30s) */
  timeoutMs?: number;
  /** Client certificate file sent base64-encoded with every request */
  certificatePath?: string;
  /** Authenticated HTTP proxy every request goes through */
  proxy?: ProxySettings;
  /** Fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
}

export interface ProxySettings {
  host: string;
  port: string;
  user: string;
  password: string;
}

type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Reads the certificate file and returns its trimmed contents base64-encoded,
 * or null when the file is missing or empty.
 */
export function loadCertificate(certificatePath: string): string | null {
  let raw: string;
  try {
    raw = fs.readFileSync(certificatePath, "utf-8").trim();
  } catch (error) {
    logger.warn({ err: error, certificatePath }, "Client certificate not readable, continuing without it");
    return null;
  }
  if (!raw) return null;
  return Buffer.from(raw, "utf-8").toString("base64");
}

/**
 * Proxy dispatcher with basic credentials
 */
export function createProxyAgent(proxy: ProxySettings): ProxyAgent {
  const credentials = Buffer.from(`${proxy.user}:${proxy.password}`, "utf-8").toString("base64");
  return new ProxyAgent({
    uri: `http://${proxy.host}:${proxy.port}`,
    token: `Basic ${credentials}`,
  });
}

// =============================================================================
// HttpBuildProjectGateway
// =============================================================================

export class HttpBuildProjectGateway implements IBuildProjectGateway {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly certificate: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly dispatcher?: ProxyAgent;

  constructor(config: HttpGatewayConfig) {
    this.baseUrl = config.hostUrl.replace(/\/+$/, "");
    this.token = config.token;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.certificate = config.certificatePath ? loadCertificate(config.certificatePath) : null;
    this.fetchImpl = config.fetch ?? fetch;
    if (config.proxy) {
      this.dispatcher = createProxyAgent(config.proxy);
      logger.debug({ host: config.proxy.host, port: config.proxy.port }, "Routing requests through proxy");
    }
  }

  // ===========================================================================
  // Schema
  // ===========================================================================

  async fetchSchema(projectId: string): Promise<SchemaDocument> {
    const path = this.projectPath(projectId, "schema");
    return this.parse(SchemaDocumentSchema, await this.request("GET", path), "GET", path);
  }

  async postSchema(projectId: string, payload: SchemaPayload): Promise<SchemaDocument> {
    const path = this.projectPath(projectId, "schema");
    const data = await this.request("POST", path, { body: payload });
    return this.parse(SchemaDocumentSchema, data, "POST", path);
  }

  // ===========================================================================
  // Validations
  // ===========================================================================

  async fetchValidations(projectId: string): Promise<ValidationDocument> {
    const path = this.projectPath(projectId, "validations");
    return this.parse(ValidationDocumentSchema, await this.request("GET", path), "GET", path);
  }

  async postValidation(projectId: string, payload: ValidationPayload): Promise<PersistedValidation> {
    const path = this.projectPath(projectId, "validations");
    const data = await this.request("POST", path, { body: payload });
    return this.parse(PersistedValidationSchema, data, "POST", path);
  }

  async deleteValidation(projectId: string, ruleId: Identifier): Promise<void> {
    await this.request("DELETE", this.projectPath(projectId, "validations"), {
      query: { id: String(ruleId) },
    });
  }

  // ===========================================================================
  // UDFs
  // ===========================================================================

  async fetchUdfs(projectId: string): Promise<UdfCatalog> {
    const path = this.projectPath(projectId, "udfs");
    return this.parse(UdfCatalogSchema, await this.request("GET", path), "GET", path);
  }

  async createUdf(projectId: string, payload: Udf): Promise<CreatedUdf> {
    const path = this.projectPath(projectId, "udfs");
    const data = await this.request("POST", path, { body: payload });
    return this.parse(CreatedUdfSchema, data, "POST", path);
  }

  async triggerExamples(projectId: string, udfOrRuleId: Identifier): Promise<void> {
    await this.request(
      "PUT",
      this.projectPath(projectId, `validations/${encodeURIComponent(String(udfOrRuleId))}/examples`)
    );
  }

  async triggerCodeGeneration(projectId: string, ruleId: Identifier): Promise<void> {
    await this.request(
      "PUT",
      this.projectPath(projectId, `validations/${encodeURIComponent(String(ruleId))}/code-generation`)
    );
  }

  // ===========================================================================
  // Project
  // ===========================================================================

  async fetchSettings(projectId: string): Promise<ProjectSettingsDocument> {
    const data = await this.request("GET", PROJECTS_API_PATH, {
      query: { proj_id: projectId, query_option: "uuid" },
    });
    return this.parse(ProjectSettingsDocumentSchema, data, "GET", PROJECTS_API_PATH);
  }

  async updateSettings(projectId: string, settings: ProjectSettingsUpdate): Promise<void> {
    await this.request("PATCH", PROJECTS_API_PATH, {
      query: { project_id: projectId },
      body: settings,
    });
  }

  async createProject(request: CreateProjectRequest): Promise<CreatedProject> {
    const now = Math.floor(Date.now() / 1000);
    const body = {
      name: request.name,
      desc: request.name,
      llm: "",
      reader_profile: {
        foundationVersion: "",
        schema: "1",
        createdOn: now,
        createdBy: "",
        lastModifiedOn: now,
        lastModifiedBy: "",
        inputPath: null,
        outputPath: null,
        defaultProfile: "",
      },
      extraction_mode: null,
      org: request.org,
      workspace: request.workspace,
      creation_base: "NONE",
    };

    const data = await this.request("POST", PROJECTS_API_PATH, {
      body,
      headers: { [CONTEXT_HEADER_NAME]: request.org },
    });
    return this.parse(CreatedProjectSchema, data, "POST", PROJECTS_API_PATH);
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private projectPath(projectId: string, suffix: string): string {
    return `${PROJECTS_API_PATH}/${encodeURIComponent(projectId)}/${suffix}`;
  }

  private buildHeaders(extra: Record<string, string> = {}, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      ...extra,
    };
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    if (this.certificate) {
      headers[CERTIFICATE_HEADER_NAME] = this.certificate;
    }
    return headers;
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const query = options.query ? `?${new URLSearchParams(options.query).toString()}` : "";
    const url = `${this.baseUrl}${path}${query}`;
    const hasBody = options.body !== undefined;

    let response: Response;
    try {
      response = await withAbortTimeout(this.timeoutMs, (signal) =>
        this.fetchImpl(url, {
          method,
          headers: this.buildHeaders(options.headers, hasBody),
          body: hasBody ? JSON.stringify(options.body) : undefined,
          signal,
          dispatcher: this.dispatcher,
        })
      );
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new GatewayError(
          `Request timed out after ${this.timeoutMs}ms`,
          ErrorCode.GATEWAY_TIMEOUT,
          { method, path },
          { cause: error }
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GatewayError(
        `Request could not be sent: ${reason}`,
        ErrorCode.GATEWAY_REQUEST_FAILED,
        { method, path },
        { cause: error }
      );
    }

    logger.debug({ method, path, status: response.status }, "Gateway request");

    const text = await response.text();
    if (!response.ok) {
      throw new GatewayError(
        `Request failed with status ${response.status}: ${text.slice(0, 200) || response.statusText}`,
        ErrorCode.GATEWAY_REQUEST_FAILED,
        { method, path, status: response.status }
      );
    }

    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new GatewayError(
        "Response body is not valid JSON",
        ErrorCode.GATEWAY_INVALID_RESPONSE,
        { method, path, status: response.status },
        { cause: error }
      );
    }
  }

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    method: HttpMethod,
    path: string
  ): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new GatewayError(
        `Unexpected response shape: ${formatZodError(result.error).join("; ")}`,
        ErrorCode.GATEWAY_INVALID_RESPONSE,
        { method, path }
      );
    }
    return result.data;
  }
}
