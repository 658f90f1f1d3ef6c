/**
 * Node configuration: `meshwork.config.json` overlaid with environment variables, validated and
 * defaulted by zod.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ValidationError } from "./errors";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const MeshworkConfigSchema = z.object({
  agent: z
    .object({
      id: z.string().min(1).default("agent-local"),
      name: z.string().min(1).default("Local agent"),
      description: z.string().default(""),
      /** Capability tags this agent advertises to peers. */
      capabilities: z.array(z.string()).default([]),
      /** Base URL peers reach this agent at. */
      endpoint: z.string().url().optional(),
    })
    .default({}),
  orchestrator: z
    .object({
      maxTurns: z.number().int().min(0).default(8),
      maxConcurrentInvocations: z.number().int().positive().default(4),
      parallel: z.boolean().default(true),
      invocationTimeoutMs: z.number().int().positive().default(30_000),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .default({}),
  collaboration: z
    .object({
      enabled: z.boolean().default(true),
      maxDepth: z.number().int().min(0).default(3),
      timeoutMs: z.number().int().positive().default(120_000),
      requestTimeoutMs: z.number().int().positive().default(30_000),
      maxPeersPerTask: z.number().int().positive().default(3),
    })
    .default({}),
  resilience: z
    .object({
      maxRetries: z.number().int().min(0).default(2),
      initialDelayMs: z.number().int().min(0).default(100),
      maxDelayMs: z.number().int().min(0).default(5_000),
      multiplier: z.number().min(1).default(2),
      jitter: z.boolean().default(true),
      failureThreshold: z.number().int().positive().default(5),
      recoveryWindowMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  directory: z
    .object({
      heartbeatTimeoutMs: z.number().int().positive().default(30_000),
      sweepIntervalMs: z.number().int().positive().default(10_000),
      evictAfterMs: z.number().int().positive().default(300_000),
      /** When set, peers are tracked by the directory at this URL instead of in memory. */
      remoteUrl: z.string().url().optional(),
      heartbeatIntervalMs: z.number().int().positive().default(10_000),
      weights: z
        .object({
          liveness: z.number().min(0).default(0.3),
          latency: z.number().min(0).default(0.3),
          successRate: z.number().min(0).default(0.4),
        })
        .default({}),
    })
    .default({}),
  /** Tool servers whose catalogs are imported as remote-server capabilities at start. */
  remoteServers: z
    .array(z.object({ url: z.string().url(), prefix: z.string().optional() }))
    .default([]),
  model: z
    .object({
      provider: z.enum(["mock", "openai"]).default("mock"),
      model: z.string().optional(),
      apiKey: z.string().optional(),
      baseURL: z.string().url().optional(),
      timeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(4000),
      allowedOrigins: z.array(z.string()).default(["http://localhost:3000"]),
      rateLimit: z
        .object({
          windowMs: z.number().int().positive().default(60_000),
          max: z.number().int().positive().default(120),
        })
        .default({}),
    })
    .default({}),
  logger: z
    .object({
      level: LogLevelSchema.default("info"),
      format: z.enum(["json", "pretty"]).default("pretty"),
      file: z.string().optional(),
    })
    .default({}),
});

export type MeshworkConfig = z.infer<typeof MeshworkConfigSchema>;
export type MeshworkConfigInput = z.input<typeof MeshworkConfigSchema>;

export const CONFIG_FILE_NAME = "meshwork.config.json";

export interface LoadConfigOptions {
  /** Defaults to `meshwork.config.json` in the working directory; a missing default file is fine. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Throws ValidationError for an unreadable file or an invalid result.
 */
export function loadConfig(options: LoadConfigOptions = {}): MeshworkConfig {
  const env = options.env ?? process.env;
  const file = options.path ?? path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let fromFile: unknown = {};
  if (fs.existsSync(file)) {
    try {
      fromFile = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (e) {
      throw new ValidationError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`, { file });
    }
  } else if (options.path) {
    throw new ValidationError(`Config file not found: ${file}`, { file });
  }

  return parseConfig(deepMerge(fromFile, envOverrides(env)));
}

export function parseConfig(input: unknown): MeshworkConfig {
  const parsed = MeshworkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const num = (v: string | undefined) => (v === undefined || v === "" ? undefined : Number(v));
  const list = (v: string | undefined) => (v ? v.split(",").map((s) => s.trim()).filter(Boolean) : undefined);

  return prune({
    agent: {
      id: env.MESHWORK_AGENT_ID,
      name: env.MESHWORK_AGENT_NAME,
      endpoint: env.MESHWORK_ENDPOINT,
      capabilities: list(env.MESHWORK_CAPABILITIES),
    },
    orchestrator: { maxTurns: num(env.MESHWORK_MAX_TURNS) },
    collaboration: { maxDepth: num(env.MESHWORK_MAX_DEPTH) },
    directory: { remoteUrl: env.MESHWORK_DIRECTORY_URL },
    model: {
      provider: env.MODEL_PROVIDER,
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseURL: env.OPENAI_BASE_URL,
    },
    server: { port: num(env.PORT), allowedOrigins: list(env.MESHWORK_ALLOWED_ORIGINS) },
    logger: { level: env.LOG_LEVEL, format: env.LOG_FORMAT, file: env.LOG_FILE_PATH },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drops undefined leaves and the sections left empty. */
function prune(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (inner === undefined) continue;
    if (isRecord(inner)) {
      const pruned = prune(inner);
      if (Object.keys(pruned).length > 0) out[key] = pruned;
    } else {
      out[key] = inner;
    }
  }
  return out;
}

function deepMerge(base: unknown, override: Record<string, unknown>): unknown {
  if (!isRecord(base)) return Object.keys(override).length > 0 ? override : base;
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return out;
}
