import { Command } from "commander";
import chalk from "chalk";
import pino from "pino";
import { loadBackendConfig } from "../server/config.js";
import { LocalApiClient } from "../server/local-api-client.js";
import { errorMessage } from "./options.js";

interface CheckOptions {
  config?: string;
}

export type CheckDeps = {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  print?: (line: string) => void;
};

export function checkCommand(): Command {
  return new Command("check")
    .description("Probe the local inference server and list its models")
    .option("--config <path>", "JSON config file")
    .action(async (options: CheckOptions) => {
      process.exitCode = await runCheck(options);
    });
}

/** Returns the process exit code: 0 when the backend is healthy. */
export async function runCheck(options: CheckOptions, deps: CheckDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let client: LocalApiClient;
  let backendUrl: string;
  try {
    const config = loadBackendConfig({ env: deps.env, configPath: options.config });
    backendUrl = config.backendUrl;
    client = new LocalApiClient({
      baseUrl: config.backendUrl,
      apiKey: config.backendApiKey,
      requestTimeoutMs: config.requestTimeoutMs,
      maxConcurrentRequests: 1,
      maxQueuedRequests: 1,
      fetchImpl: deps.fetchImpl,
      logger: pino({ level: "silent" }),
    });
  } catch (err) {
    print(chalk.red(errorMessage(err)));
    return 1;
  }

  try {
    if (!(await client.checkHealth())) {
      print(chalk.red(`Backend at ${backendUrl} is not healthy`));
      return 1;
    }
    print(chalk.green(`Backend at ${backendUrl} is healthy`));

    try {
      const models = await client.listModels();
      print(models.length > 0 ? `Models: ${models.join(", ")}` : chalk.yellow("Backend lists no models"));
    } catch (err) {
      print(chalk.yellow(`Model listing failed: ${errorMessage(err)}`));
    }
    return 0;
  } finally {
    client.close();
  }
}
