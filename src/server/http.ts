import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { AgentNode } from "../runtime";
import { agentRoutes } from "./routes/agent";
import { toolsRoutes } from "./routes/tools";
import { a2aRoutes } from "./routes/a2a";
import { directoryRoutes } from "./routes/directory";
import { eventRoutes } from "./routes/events";
import { FixedWindowRateLimiter, rateLimit } from "./middleware/rateLimit";
import { ErrorBody, toErrorResponse } from "./middleware/validation";

export interface HttpServerOptions {
  allowedOrigins?: string[];
  rateLimit?: { windowMs: number; max: number };
  now?: () => number;
}

export function createHttpServer(node: AgentNode, options: HttpServerOptions = {}) {
  const app = express();
  const logger = node.logger.child({ agentId: node.config.agent.id, component: "http" });
  const allowedOrigins = options.allowedOrigins ?? node.config.server.allowedOrigins;
  const limiter = new FixedWindowRateLimiter({ ...(options.rateLimit ?? node.config.server.rateLimit), now: options.now });

  app.use(
    cors({
      origin: (origin, callback) => {
        // requests without an Origin header come from other nodes, not browsers
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(bodyParser.json({ limit: "1mb" }));
  app.use(rateLimit(limiter));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.traceRequest(req.method, req.originalUrl, res.statusCode, Date.now() - started);
    });
    next();
  });

  app.get("/", (req, res) => {
    res.json({
      name: "meshwork",
      agent: { id: node.config.agent.id, name: node.config.agent.name },
      endpoints: ["/health", "/agent/run", "/tools", "/tools/invoke", "/a2a/assist", "/a2a/heartbeat", "/a2a/discover", "/directory", "/events"],
    });
  });

  app.get("/health", (req, res) => {
    res.json({
      status: "ok",
      agentId: node.config.agent.id,
      capabilities: node.catalog.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/agent", agentRoutes(node.coordinator));
  app.use("/tools", toolsRoutes(node.catalog));
  app.use("/a2a", a2aRoutes({ coordinator: node.coordinator, directory: node.directory, heartbeat: node.heartbeat }));
  app.use("/directory", directoryRoutes(node.directory));
  app.use("/events", eventRoutes(node.eventBus));

  app.use((req, res) => {
    const body: ErrorBody = {
      ok: false,
      error: { code: "not_found", message: `Route ${req.method} ${req.path} not found` },
    };
    res.status(404).json(body);
  });

  // express recognizes error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParserError(error)) {
      res.status(400).json({ ok: false, error: { code: "invalid_json", message: "Malformed JSON body" } });
      return;
    }
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error(error instanceof Error ? error : String(error), { path: req.path });
    }
    res.status(status).json(body);
  });

  return app;
}

function isBodyParserError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}
