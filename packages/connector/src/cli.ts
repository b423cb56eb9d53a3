import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { startCommand } from "./commands/start.js";
import { CONNECTOR_VERSION } from "./server/bridge.js";

export function createCli(): Command {
  const program = new Command();

  program
    .name("inference-tunnel")
    .description("Expose a local OpenAI-compatible inference server through an outbound broker tunnel")
    .version(CONNECTOR_VERSION, "-v, --version", "output the version number");

  program.addCommand(startCommand());
  program.addCommand(checkCommand());

  return program;
}
