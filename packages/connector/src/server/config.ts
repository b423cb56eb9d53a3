import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_MAX_PAYLOAD_BYTES } from "../shared/tunnel-frames.js";
import {
  LogFormatSchema,
  LogLevelSchema,
  resolveLogConfig,
  type ResolvedLogConfig,
} from "./logger.js";

const LogConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    format: LogFormatSchema.optional(),
  })
  .strict();

export const ConnectorFileConfigSchema = z
  .object({
    broker: z
      .object({
        url: z.string().optional(),
        token: z.string().optional(),
      })
      .strict()
      .optional(),
    backend: z
      .object({
        url: z.string().optional(),
        apiKey: z.string().optional(),
        modelName: z.string().optional(),
        requestTimeoutMs: z.number().optional(),
      })
      .strict()
      .optional(),
    sessions: z
      .object({
        maxConcurrent: z.number().optional(),
        maxQueued: z.number().optional(),
        maxPayloadBytes: z.number().optional(),
        drainGraceMs: z.number().optional(),
      })
      .strict()
      .optional(),
    reconnect: z
      .object({
        baseDelayMs: z.number().optional(),
        maxDelayMs: z.number().optional(),
        stableAfterMs: z.number().optional(),
      })
      .strict()
      .optional(),
    log: LogConfigSchema.optional(),
  })
  .strict();

export type ConnectorFileConfig = z.infer<typeof ConnectorFileConfigSchema>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

function hasProtocol(value: string, protocols: readonly string[]): boolean {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

const BackendFieldsSchema = z.object({
  backendUrl: z
    .string()
    .trim()
    .refine((value) => hasProtocol(value, ["http:", "https:"]), "must be an http:// or https:// URL"),
  backendApiKey: z.string().min(1).optional(),
  modelName: z.string().min(1).optional(),
  requestTimeoutMs: positiveInt,
  maxConcurrentSessions: positiveInt,
  maxQueuedSessions: nonNegativeInt,
  maxPayloadBytes: positiveInt,
  drainGraceMs: nonNegativeInt,
  reconnectBaseMs: positiveInt,
  reconnectMaxMs: positiveInt,
  reconnectStableAfterMs: positiveInt,
});

const ConnectorFieldsSchema = BackendFieldsSchema.extend({
  brokerUrl: z
    .string({ required_error: "is required (set BROKER_WS_URL)" })
    .trim()
    .refine((value) => hasProtocol(value, ["ws:", "wss:"]), "must be a ws:// or wss:// URL"),
  token: z
    .string({ required_error: "is required (set CONNECTOR_TOKEN)" })
    .min(1, "must not be empty"),
});

export type ReconnectSettings = {
  baseDelayMs: number;
  maxDelayMs: number;
  stableAfterMs: number;
};

export type BackendConfig = {
  backendUrl: string;
  backendApiKey?: string;
  modelName?: string;
  requestTimeoutMs: number;
  maxConcurrentSessions: number;
  maxQueuedSessions: number;
  maxPayloadBytes: number;
  drainGraceMs: number;
  reconnect: ReconnectSettings;
  log: ResolvedLogConfig;
};

export type ConnectorConfig = BackendConfig & {
  brokerUrl: string;
  token: string;
};

/** Values given on the command line; they win over every other source. */
export type ConnectorConfigOverrides = {
  brokerUrl?: string;
  backendUrl?: string;
  maxConcurrentSessions?: number;
};

export type LoadConnectorConfigOptions = {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  overrides?: ConnectorConfigOverrides;
};

export const CONNECTOR_CONFIG_DEFAULTS = {
  backendUrl: "http://localhost:8000",
  requestTimeoutMs: 300_000,
  maxConcurrentSessions: 16,
  maxQueuedSessions: 64,
  maxPayloadBytes: DEFAULT_MAX_PAYLOAD_BYTES,
  drainGraceMs: 30_000,
  reconnectBaseMs: 1_000,
  reconnectMaxMs: 60_000,
  reconnectStableAfterMs: 60_000,
} as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
    this.name = "ConfigError";
  }
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((value) => value !== undefined);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function readConnectorFileConfig(configPath: string): ConnectorFileConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in ${configPath}: ${message}`);
  }

  const result = ConnectorFileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${configPath}`, formatIssues(result.error));
  }
  return result.data;
}

/** Flattens every source into one record, highest precedence first per field. */
function layerSources(
  env: NodeJS.ProcessEnv,
  file: ConnectorFileConfig,
  overrides: ConnectorConfigOverrides
) {
  const defaults = CONNECTOR_CONFIG_DEFAULTS;
  return {
    brokerUrl: firstDefined(overrides.brokerUrl, envValue(env, "BROKER_WS_URL"), file.broker?.url),
    token: firstDefined(envValue(env, "CONNECTOR_TOKEN"), file.broker?.token),
    backendUrl: firstDefined(
      overrides.backendUrl,
      envValue(env, "LOCAL_LLM_URL"),
      file.backend?.url,
      defaults.backendUrl
    ),
    backendApiKey: firstDefined(envValue(env, "LOCAL_LLM_API_KEY"), file.backend?.apiKey),
    modelName: firstDefined(envValue(env, "MODEL_NAME"), file.backend?.modelName),
    requestTimeoutMs: firstDefined<string | number>(
      envValue(env, "CONNECTOR_REQUEST_TIMEOUT_MS"),
      file.backend?.requestTimeoutMs,
      defaults.requestTimeoutMs
    ),
    maxConcurrentSessions: firstDefined<string | number>(
      overrides.maxConcurrentSessions,
      envValue(env, "CONNECTOR_MAX_SESSIONS"),
      file.sessions?.maxConcurrent,
      defaults.maxConcurrentSessions
    ),
    maxQueuedSessions: firstDefined<string | number>(
      envValue(env, "CONNECTOR_MAX_QUEUED_SESSIONS"),
      file.sessions?.maxQueued,
      defaults.maxQueuedSessions
    ),
    maxPayloadBytes: firstDefined<string | number>(
      envValue(env, "CONNECTOR_MAX_PAYLOAD_BYTES"),
      file.sessions?.maxPayloadBytes,
      defaults.maxPayloadBytes
    ),
    drainGraceMs: firstDefined<string | number>(
      envValue(env, "CONNECTOR_DRAIN_GRACE_MS"),
      file.sessions?.drainGraceMs,
      defaults.drainGraceMs
    ),
    reconnectBaseMs: firstDefined<string | number>(
      envValue(env, "CONNECTOR_RECONNECT_BASE_MS"),
      file.reconnect?.baseDelayMs,
      defaults.reconnectBaseMs
    ),
    reconnectMaxMs: firstDefined<string | number>(
      envValue(env, "CONNECTOR_RECONNECT_MAX_MS"),
      file.reconnect?.maxDelayMs,
      defaults.reconnectMaxMs
    ),
    reconnectStableAfterMs: firstDefined<string | number>(
      file.reconnect?.stableAfterMs,
      defaults.reconnectStableAfterMs
    ),
  };
}

function toBackendConfig(
  fields: z.infer<typeof BackendFieldsSchema>,
  file: ConnectorFileConfig,
  env: NodeJS.ProcessEnv
): BackendConfig {
  return {
    backendUrl: fields.backendUrl,
    backendApiKey: fields.backendApiKey,
    modelName: fields.modelName,
    requestTimeoutMs: fields.requestTimeoutMs,
    maxConcurrentSessions: fields.maxConcurrentSessions,
    maxQueuedSessions: fields.maxQueuedSessions,
    maxPayloadBytes: fields.maxPayloadBytes,
    drainGraceMs: fields.drainGraceMs,
    reconnect: {
      baseDelayMs: fields.reconnectBaseMs,
      maxDelayMs: fields.reconnectMaxMs,
      stableAfterMs: fields.reconnectStableAfterMs,
    },
    log: resolveLogConfig(file.log, env),
  };
}

function reconnectIssues(fields: { reconnectBaseMs: number; reconnectMaxMs: number }): string[] {
  return fields.reconnectMaxMs < fields.reconnectBaseMs
    ? ["reconnectMaxMs: must not be below reconnectBaseMs"]
    : [];
}

/**
 * Resolves the full connector configuration. Precedence per field:
 * CLI overrides, then environment, then the JSON config file, then defaults.
 */
export function loadConnectorConfig(options: LoadConnectorConfigOptions = {}): ConnectorConfig {
  const env = options.env ?? process.env;
  const file: ConnectorFileConfig = options.configPath
    ? readConnectorFileConfig(options.configPath)
    : {};
  const raw = layerSources(env, file, options.overrides ?? {});

  const result = ConnectorFieldsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid connector configuration", formatIssues(result.error));
  }
  const issues = reconnectIssues(result.data);
  if (issues.length > 0) {
    throw new ConfigError("Invalid connector configuration", issues);
  }

  return {
    ...toBackendConfig(result.data, file, env),
    brokerUrl: result.data.brokerUrl,
    token: result.data.token,
  };
}

/** Same layering as `loadConnectorConfig`, without requiring broker credentials. */
export function loadBackendConfig(options: LoadConnectorConfigOptions = {}): BackendConfig {
  const env = options.env ?? process.env;
  const file: ConnectorFileConfig = options.configPath
    ? readConnectorFileConfig(options.configPath)
    : {};
  const raw = layerSources(env, file, options.overrides ?? {});

  const result = BackendFieldsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid backend configuration", formatIssues(result.error));
  }
  const issues = reconnectIssues(result.data);
  if (issues.length > 0) {
    throw new ConfigError("Invalid backend configuration", issues);
  }
  return toBackendConfig(result.data, file, env);
}
