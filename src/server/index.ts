import http from "http";
import { AgentNode } from "../runtime";
import { createHttpServer, HttpServerOptions } from "./http";

export interface StartServerOptions extends HttpServerOptions {
  /** Defaults to `server.port`; 0 picks a free port. */
  port?: number;
  host?: string;
}

/**
 * Starts the node and its HTTP surface. Resolves once the socket is listening.
 */
export async function startServer(node: AgentNode, options: StartServerOptions = {}): Promise<http.Server> {
  const app = createHttpServer(node, options);
  const server = http.createServer(app);
  const port = options.port ?? node.config.server.port;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  await node.start();

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;
  node.logger.info("Server listening", { agentId: node.config.agent.id, port: actualPort });
  return server;
}

export async function stopServer(node: AgentNode, server: http.Server): Promise<void> {
  await node.stop();
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
