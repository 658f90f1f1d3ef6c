#!/usr/bin/env node
/**
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { serveCommand } from "./commands/serve";
import { runCommand } from "./commands/run";
import { toolsCommand } from "./commands/tools";
import { peersCommand } from "./commands/peers";

export function createCli(): Command {
  const program = new Command();

  program
    .name("meshwork")
    .description("Run capability-dispatching agents that delegate work to each other")
    .version("0.3.0")
    .option("-c, --config <path>", "configuration file (default: ./meshwork.config.json)")
    .option("--log-level <level>", "fatal | error | warn | info | debug | trace | silent");

  program.addCommand(serveCommand());
  program.addCommand(runCommand());
  program.addCommand(toolsCommand());
  program.addCommand(peersCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
