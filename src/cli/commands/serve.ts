import { Command } from "commander";
import { startServer, stopServer } from "../../server";
import { nodeFor } from "../utils/createNode";

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Start the agent node and its HTTP API")
    .option("-p, --port <port>", "port to listen on (overrides server.port)")
    .action(async (opts: { port?: string }, command: Command) => {
      const node = nodeFor(command);
      const port = opts.port !== undefined ? Number.parseInt(opts.port, 10) : undefined;
      if (port !== undefined && Number.isNaN(port)) {
        throw new Error(`Invalid port: ${opts.port}`);
      }
      const server = await startServer(node, { port });

      const shutdown = (signal: string) => {
        node.logger.info("Shutting down", { signal });
        stopServer(node, server)
          .then(() => node.logger.flush())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error("Shutdown failed:", error instanceof Error ? error.message : String(error));
            process.exit(1);
          });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    });
  return cmd;
}
