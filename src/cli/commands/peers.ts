import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { nodeFor } from "../utils/createNode";

export function peersCommand(): Command {
  const cmd = new Command("peers");
  cmd
    .description("List peers known to the directory, best candidates first when filtering by capability")
    .option("--capability <tag>", "only peers advertising this capability tag")
    .option("--limit <n>", "maximum number of peers")
    .action(async (opts: { capability?: string; limit?: string }, command: Command) => {
      const node = nodeFor(command);
      const limit = opts.limit !== undefined ? Number.parseInt(opts.limit, 10) : undefined;
      const peers =
        opts.capability || limit !== undefined
          ? await node.directory.selectPeers({ capability: opts.capability, limit })
          : await node.directory.list();

      printTable(
        ["ID", "STATUS", "URL", "LATENCY", "SUCCESS", "CAPABILITIES"],
        peers.map((p) => [
          p.id,
          p.status,
          p.url,
          `${Math.round(p.latencyMs)}ms`,
          `${Math.round(p.successRate * 100)}%`,
          p.capabilities.join(", "),
        ])
      );
    });
  return cmd;
}
