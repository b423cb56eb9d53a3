import pino from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

export interface LogSettings {
  level?: LogLevel;
  format?: LogFormat;
}

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

function fromEnv<T>(schema: z.ZodType<T>, raw: string | undefined): T | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = schema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function resolveLogConfig(
  settings: LogSettings | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = fromEnv(LogLevelSchema, env.CONNECTOR_LOG);
  const envFormat = fromEnv(LogFormatSchema, env.CONNECTOR_LOG_FORMAT);

  const level: LogLevel = envLevel ?? settings?.level ?? "info";
  const format: LogFormat = envFormat ?? settings?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(config: ResolvedLogConfig): pino.Logger {
  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    name: "inference-tunnel",
    level: config.level,
    transport,
  });
}
