import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import type {
  CollectorConfigFile,
  CollectorServerSettings,
  CollectorSettings,
} from "./types.js";
import { ConfigInvalidError, ConfigMissingError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export type {
  CollectorConfigFile,
  CollectorServerSettings,
  CollectorSettings,
} from "./types.js";

type Env = Record<string, string | undefined>;

export const DEFAULT_API_BASE_URL = "https://api.atlassian.com/admin/v1/orgs";
export const DEFAULT_PORT = 3939;
export const DEFAULT_HOST = "127.0.0.1";
export const MAX_REQUEST_TIMEOUT_SECONDS = 3600;

const DEFAULTS: Partial<Record<keyof CollectorSettings, string | number>> = {
  apiBaseUrl: DEFAULT_API_BASE_URL,
  pageSize: 500,
  maxRetries: 5,
  retryBaseSeconds: 3,
  requestTimeoutSeconds: 30,
  logsDir: "./logs",
};

const SETTING_KEYS = [
  "orgId",
  "apiToken",
  "apiBaseUrl",
  "pageSize",
  "maxRetries",
  "retryBaseSeconds",
  "requestTimeoutSeconds",
  "logsDir",
] as const satisfies ReadonlyArray<keyof CollectorSettings>;

/** Environment variable for each setting. */
export const SETTINGS_ENV: Record<keyof CollectorSettings, string> = {
  orgId: "ORG_ID",
  apiToken: "API_TOKEN",
  apiBaseUrl: "API_BASE_URL",
  pageSize: "PAGE_SIZE",
  maxRetries: "MAX_RETRIES",
  retryBaseSeconds: "RETRY_BASE_SECONDS",
  requestTimeoutSeconds: "REQUEST_TIMEOUT_SECONDS",
  logsDir: "LOGS_DIR",
};

const REQUIRED: ReadonlyArray<keyof CollectorSettings> = ["orgId", "apiToken"];

const settingsSchema = z.object({
  orgId: z.string().trim().min(1),
  apiToken: z.string().trim().min(1),
  apiBaseUrl: z.string().url(),
  pageSize: z.coerce.number().int().positive(),
  maxRetries: z.coerce.number().int().positive(),
  retryBaseSeconds: z.coerce.number().int().nonnegative(),
  requestTimeoutSeconds: z.coerce.number().positive().max(MAX_REQUEST_TIMEOUT_SECONDS),
  logsDir: z.string().min(1),
});

const configFileSchema = z.object({
  orgId: z.string().optional(),
  apiToken: z.string().optional(),
  apiBaseUrl: z.string().optional(),
  pageSize: z.number().optional(),
  maxRetries: z.number().optional(),
  retryBaseSeconds: z.number().optional(),
  requestTimeoutSeconds: z.number().optional(),
  logsDir: z.string().optional(),
  server: z
    .object({
      port: z.number().int().optional(),
      host: z.string().optional(),
    })
    .optional(),
});

const portSchema = z.coerce.number().int().min(0).max(65535);

function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Resolve settings from defaults, the config file and the environment (highest precedence).
 * Throws ConfigMissingError when ORG_ID / API_TOKEN are absent from both sources.
 */
export function loadSettings(
  env: Env = process.env,
  file: CollectorConfigFile = {},
): CollectorSettings {
  const raw: Record<string, unknown> = {};
  const missing: string[] = [];
  for (const key of SETTING_KEYS) {
    const value = fromEnv(env, SETTINGS_ENV[key]) ?? file[key] ?? DEFAULTS[key];
    if (value === undefined && REQUIRED.includes(key)) {
      missing.push(SETTINGS_ENV[key]);
    }
    raw[key] = value;
  }
  if (missing.length > 0) {
    throw new ConfigMissingError(missing);
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(describeIssues(parsed.error));
  }
  logger.debug(
    {
      orgId: parsed.data.orgId,
      apiBaseUrl: parsed.data.apiBaseUrl,
      pageSize: parsed.data.pageSize,
      maxRetries: parsed.data.maxRetries,
      logsDir: parsed.data.logsDir,
    },
    "Settings resolved",
  );
  return Object.freeze(parsed.data);
}

/** Listen address: COLLECTOR_HTTP_PORT / COLLECTOR_HTTP_HOST, then the file, then defaults. */
export function loadServerSettings(
  env: Env = process.env,
  file: CollectorConfigFile = {},
): CollectorServerSettings {
  const rawPort = fromEnv(env, "COLLECTOR_HTTP_PORT") ?? file.server?.port ?? DEFAULT_PORT;
  const port = portSchema.safeParse(rawPort);
  if (!port.success) {
    throw new ConfigInvalidError(`COLLECTOR_HTTP_PORT: ${describeIssues(port.error)}`);
  }
  const host = fromEnv(env, "COLLECTOR_HTTP_HOST") ?? file.server?.host ?? DEFAULT_HOST;
  return Object.freeze({ port: port.data, host });
}

/**
 * Loads `.env` from cwd into process.env when present. Variables already set in the
 * process environment keep their values. Returns whether a file was read.
 */
export function loadDotEnv(cwd: string): boolean {
  const envPath = join(cwd, ".env");
  if (!existsSync(envPath)) return false;
  const { error } = loadEnvFile({ path: envPath });
  if (error) {
    throw new ConfigInvalidError(`${envPath}: ${error.message}`);
  }
  logger.debug({ envPath }, "Loaded .env");
  return true;
}

/**
 * Resolves path to config file in cwd: first .js, then .json.
 */
export function getConfigPath(cwd: string): string | null {
  const names = ["audit-collector.config.js", "audit-collector.config.json"];
  for (const name of names) {
    const p = join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
}

/**
 * Loads the config file from a path. Supports .json (readFile + parse) and .js (dynamic import, default export).
 */
export async function loadConfigFromPath(
  configPath: string,
): Promise<CollectorConfigFile> {
  logger.debug({ configPath }, "Loading config from path");
  let candidate: unknown;
  if (configPath.endsWith(".json")) {
    const raw = readFileSync(configPath, "utf-8");
    try {
      candidate = JSON.parse(raw);
    } catch (err) {
      throw new ConfigInvalidError(
        `${configPath} is not valid JSON (${errorMessage(err)})`,
      );
    }
  } else {
    const mod: unknown = await import(pathToFileURL(configPath).href);
    candidate =
      mod && typeof mod === "object" && "default" in mod ? mod.default : mod;
  }
  const parsed = configFileSchema.safeParse(candidate);
  if (!parsed.success) {
    logger.error({ configPath }, "Invalid collector config file");
    throw new ConfigInvalidError(`${configPath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
