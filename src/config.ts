import JSON5 from "json5";
import fs from "node:fs";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { RssReaderError } from "./errors.js";
import type { LogLevel } from "./logging/subsystem.js";
import { isJsonRecord } from "./models/schema.js";
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from "./request.js";

export const CONFIG_PATH_ENV = "RSS_READER_CONFIG";

const ENV_KEYS = {
  baseUrl: "RSS_READER_BASE_URL",
  apiKey: "RSS_READER_API_KEY",
  timeoutMs: "RSS_READER_TIMEOUT_MS",
  logLevel: "RSS_READER_LOG_LEVEL",
} as const;

export const ClientConfigSchema = Type.Object({
  baseUrl: Type.String({ minLength: 1 }),
  apiKey: Type.String({ minLength: 1 }),
  timeoutMs: Type.Integer({
    exclusiveMinimum: 0,
    maximum: MAX_TIMEOUT_MS,
    default: DEFAULT_TIMEOUT_MS,
  }),
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal("error"),
      Type.Literal("warn"),
      Type.Literal("info"),
      Type.Literal("debug"),
    ]),
  ),
});

export type ClientConfig = Static<typeof ClientConfigSchema>;

export type ClientConfigInput = {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  logLevel?: LogLevel;
};

export type LoadClientConfigParams = {
  overrides?: ClientConfigInput;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
};

function readConfigFile(filePath: string, required: boolean): Record<string, unknown> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    if (!required && (err as { code?: unknown })?.code === "ENOENT") {
      return {};
    }
    throw new RssReaderError(`Failed to read config file ${resolved}: ${String(err)}`, {
      cause: err,
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new RssReaderError(`Failed to parse config file ${resolved}: ${String(err)}`, {
      cause: err,
    });
  }
  if (!isJsonRecord(parsed)) {
    throw new RssReaderError(`Config file ${resolved} must contain an object`);
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const baseUrl = env[ENV_KEYS.baseUrl]?.trim();
  if (baseUrl) {
    out.baseUrl = baseUrl;
  }
  const apiKey = env[ENV_KEYS.apiKey]?.trim();
  if (apiKey) {
    out.apiKey = apiKey;
  }
  const timeout = env[ENV_KEYS.timeoutMs]?.trim();
  if (timeout) {
    // Left as NaN when unparseable so validation reports it.
    out.timeoutMs = /^\d+$/.test(timeout) ? Number.parseInt(timeout, 10) : Number.NaN;
  }
  const logLevel = env[ENV_KEYS.logLevel]?.trim().toLowerCase();
  if (logLevel) {
    out.logLevel = logLevel;
  }
  return out;
}

function dropUndefined(input: ClientConfigInput | undefined): Record<string, unknown> {
  if (!input) {
    return {};
  }
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function describeProblem(pathname: string, message: string): string {
  const key = pathname.replace(/^\//, "") || "config";
  if (key === "baseUrl") {
    return `baseUrl is required (set ${ENV_KEYS.baseUrl})`;
  }
  if (key === "apiKey") {
    return `apiKey is required (set ${ENV_KEYS.apiKey})`;
  }
  if (key === "timeoutMs") {
    return `timeoutMs must be an integer between 1 and ${MAX_TIMEOUT_MS} (milliseconds)`;
  }
  return `${key}: ${message}`;
}

/**
 * Resolves client options. Precedence: explicit overrides, then environment variables,
 * then the JSON5 config file named by `configPath` or `RSS_READER_CONFIG`.
 */
export function loadClientConfig(params: LoadClientConfigParams = {}): ClientConfig {
  const env = params.env ?? process.env;
  const explicitPath = params.configPath?.trim();
  const envPath = env[CONFIG_PATH_ENV]?.trim();
  const filePath = explicitPath || envPath;
  const fromFile = filePath ? readConfigFile(filePath, Boolean(explicitPath)) : {};

  const merged: Record<string, unknown> = {
    ...fromFile,
    ...readEnv(env),
    ...dropUndefined(params.overrides),
  };
  const value = Value.Default(ClientConfigSchema, merged);
  if (Value.Check(ClientConfigSchema, value)) {
    return value;
  }

  const problems = new Set<string>();
  for (const error of Value.Errors(ClientConfigSchema, value)) {
    problems.add(describeProblem(error.path, error.message));
  }
  throw new RssReaderError(
    `Invalid RSS Reader client configuration:\n${[...problems].map((p) => `  - ${p}`).join("\n")}`,
  );
}
