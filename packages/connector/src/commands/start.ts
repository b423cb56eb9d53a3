import { Command } from "commander";
import chalk from "chalk";
import type pino from "pino";
import { createTunnelBridge } from "../server/bridge.js";
import { loadConnectorConfig, type ConnectorConfig } from "../server/config.js";
import { AuthError } from "../server/errors.js";
import { createRootLogger } from "../server/logger.js";
import { errorMessage, parsePositiveInt } from "./options.js";

interface StartOptions {
  config?: string;
  brokerUrl?: string;
  backendUrl?: string;
  maxSessions?: number;
}

// Past the drain grace period, shutdown is forced.
const SHUTDOWN_SLACK_MS = 10_000;

export type ShutdownHandlerOptions = {
  stop: () => Promise<unknown>;
  logger: pino.Logger;
  forceAfterMs: number;
  exit: (code: number) => void;
};

/**
 * Signal handler for `start`: the first signal drains and exits, a second one
 * (or the force timer) exits at once with status 1.
 */
export function createShutdownHandler(options: ShutdownHandlerOptions): (signal: string) => Promise<void> {
  const { stop, logger, forceAfterMs, exit } = options;
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) {
      logger.warn({ signal }, "shutdown_forced");
      exit(1);
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutdown_requested");

    const forceExit = setTimeout(() => {
      logger.warn({ timeoutMs: forceAfterMs }, "shutdown_drain_timeout");
      exit(1);
    }, forceAfterMs);

    try {
      await stop();
      clearTimeout(forceExit);
      exit(0);
    } catch (err) {
      clearTimeout(forceExit);
      logger.error({ err }, "shutdown_failed");
      exit(1);
    }
  };
}

export function startCommand(): Command {
  return new Command("start")
    .description("Connect to the broker and serve tunnelled requests")
    .option("--config <path>", "JSON config file")
    .option("--broker-url <url>", "Broker WebSocket URL (overrides BROKER_WS_URL)")
    .option("--backend-url <url>", "Local inference server URL (overrides LOCAL_LLM_URL)")
    .option("--max-sessions <n>", "Concurrent backend requests", parsePositiveInt)
    .action(async (options: StartOptions) => {
      await runStart(options);
    });
}

async function runStart(options: StartOptions): Promise<void> {
  let config: ConnectorConfig;
  let logger: pino.Logger;
  try {
    config = loadConnectorConfig({
      configPath: options.config,
      overrides: {
        brokerUrl: options.brokerUrl,
        backendUrl: options.backendUrl,
        maxConcurrentSessions: options.maxSessions,
      },
    });
    logger = createRootLogger(config.log);
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    process.exit(1);
  }

  const bridge = createTunnelBridge(config, { logger });

  const handleShutdown = createShutdownHandler({
    stop: () => bridge.stop(),
    logger,
    forceAfterMs: config.drainGraceMs + SHUTDOWN_SLACK_MS,
    exit: (code) => process.exit(code),
  });

  process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
  process.on("SIGINT", () => void handleShutdown("SIGINT"));

  // A permanent rejection after a reconnect is just as fatal as on first connect.
  bridge.connection.on("fatal", (error) => {
    console.error(chalk.red(`Broker rejected the connector: ${error.message}`));
    bridge.client.close();
    process.exit(1);
  });

  try {
    await bridge.start();
  } catch (err) {
    const prefix = err instanceof AuthError ? "Broker rejected the connector" : "Failed to start connector";
    console.error(chalk.red(`${prefix}: ${errorMessage(err)}`));
    bridge.client.close();
    process.exit(1);
  }
}
