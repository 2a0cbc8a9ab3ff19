/**
 * Migration Configuration
 *
 * The config file names the projects and their org/workspace; hosts and
 * tokens come from the environment so they never land on disk.
 */

import { z } from "zod";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { fileExists, getConfigPath, readJsonFile, writeJsonFile, createLogger } from "../../utils/index.js";
import { HttpBuildProjectGateway, type ProxySettings } from "../build-project/impl/HttpBuildProjectGateway.js";
import { MigrationConfigSchema, formatZodError, type MigrationConfig } from "../../utils/validation.js";

const logger = createLogger("config");

export type EnvironmentSide = "source" | "target";

export interface EnvironmentCredentials {
  hostUrl: string;
  token: string;
}

export const CLIENT_CERT_ENV = "CLIENT_CERT_PATH";

export const PROXY_ENV = {
  host: "PROXY_HOST",
  port: "PROXY_PORT",
  user: "PROXY_USER",
  password: "PROXY_PASSWORD",
} as const;

const ENV_NAMES: Record<EnvironmentSide, { hostUrl: string; token: string }> = {
  source: { hostUrl: "SOURCE_HOST_URL", token: "SOURCE_TOKEN" },
  target: { hostUrl: "TARGET_HOST_URL", token: "TARGET_TOKEN" },
};

async function readConfigFile(configPath: string): Promise<unknown> {
  if (!(await fileExists(configPath))) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`, ErrorCode.CONFIG_NOT_FOUND, {
      filePath: configPath,
    });
  }
  try {
    return await readJsonFile(configPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Configuration file is not valid JSON: ${reason}`, ErrorCode.CONFIG_INVALID, {
      filePath: configPath,
    });
  }
}

/**
 * Load and validate the migration config
 */
export async function loadMigrationConfig(configPath: string = getConfigPath()): Promise<MigrationConfig> {
  const raw = await readConfigFile(configPath);
  const result = MigrationConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      filePath: configPath,
      issues,
    });
  }

  logger.debug({ configPath }, "Loaded configuration");
  return result.data;
}

const StoredConfigSchema = z
  .object({ target: z.object({}).passthrough() })
  .passthrough();

/**
 * Write the id of a newly created target project back to the config file,
 * leaving everything else in it as it was
 */
export async function recordTargetProject(projectId: string, configPath: string = getConfigPath()): Promise<void> {
  const result = StoredConfigSchema.safeParse(await readConfigFile(configPath));
  if (!result.success) {
    throw new ConfigurationError("Configuration has no target section", ErrorCode.CONFIG_INVALID, {
      filePath: configPath,
    });
  }

  const stored = result.data;
  stored.target.project_id = projectId;
  await writeJsonFile(configPath, stored);
  logger.info({ configPath, projectId }, "Recorded target project id");
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Environment variable ${name} is not set`, ErrorCode.CONFIG_ENV_MISSING, {
      variable: name,
    });
  }
  return value;
}

/**
 * Host and token of one environment
 *
 * @throws {ConfigurationError} naming the first variable that is unset
 */
export function resolveCredentials(
  side: EnvironmentSide,
  env: NodeJS.ProcessEnv = process.env
): EnvironmentCredentials {
  const names = ENV_NAMES[side];
  return {
    hostUrl: requireEnv(env, names.hostUrl),
    token: requireEnv(env, names.token),
  };
}

export function resolveCertificatePath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env[CLIENT_CERT_ENV] || undefined;
}

/**
 * Proxy settings, only when all four proxy variables are set
 */
export function resolveProxy(env: NodeJS.ProcessEnv = process.env): ProxySettings | undefined {
  const host = env[PROXY_ENV.host];
  const port = env[PROXY_ENV.port];
  const user = env[PROXY_ENV.user];
  const password = env[PROXY_ENV.password];
  if (!host || !port || !user || !password) {
    logger.debug("No proxy configured, using a direct connection");
    return undefined;
  }
  return { host, port, user, password };
}

/**
 * Gateway to one side of the migration, authenticated from the environment
 */
export function createGateway(
  side: EnvironmentSide,
  config: Pick<MigrationConfig, "requestTimeoutMs">,
  env: NodeJS.ProcessEnv = process.env
): HttpBuildProjectGateway {
  const { hostUrl, token } = resolveCredentials(side, env);
  return new HttpBuildProjectGateway({
    hostUrl,
    token,
    timeoutMs: config.requestTimeoutMs,
    certificatePath: resolveCertificatePath(env),
    proxy: resolveProxy(env),
  });
}
