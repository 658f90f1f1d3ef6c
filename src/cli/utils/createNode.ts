import { Command } from "commander";
import { loadConfig, MeshworkConfig } from "../../core/config";
import { AgentNode, createAgentNode } from "../../runtime";

export interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

/**
 * Loads configuration for a subcommand, honoring the global `--config` and `--log-level` flags.
 */
export function configFor(command: Command): MeshworkConfig {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const env = globals.logLevel ? { ...process.env, LOG_LEVEL: globals.logLevel } : process.env;
  return loadConfig({ path: globals.config, env });
}

export function nodeFor(command: Command): AgentNode {
  return createAgentNode(configFor(command));
}
