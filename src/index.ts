/**
 * Bootstrap: load configuration, wire the node, serve HTTP.
 */

import "dotenv/config";
import { loadConfig } from "./core/config";
import { createAgentNode } from "./runtime";
import { startServer, stopServer } from "./server";

export { loadConfig, parseConfig } from "./core/config";
export type { MeshworkConfig, MeshworkConfigInput } from "./core/config";
export { AgentNode, createAgentNode } from "./runtime";
export type { AgentNodeOverrides } from "./runtime";
export { startServer, stopServer } from "./server";
export { createHttpServer } from "./server/http";

async function main() {
  const config = loadConfig();
  const node = createAgentNode(config);

  node.logger.info("Starting meshwork node", {
    agentId: config.agent.id,
    model: config.model.provider,
    directory: config.directory.remoteUrl ?? "in-memory",
    maxDepth: config.collaboration.maxDepth,
  });

  const server = await startServer(node);

  const shutdown = (signal: string) => {
    node.logger.info("Shutting down gracefully", { signal });
    stopServer(node, server)
      .then(() => node.logger.flush())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
