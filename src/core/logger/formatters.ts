/**
 * Pino formatters and log-safe value helpers.
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

const SENSITIVE_KEYS = ["password", "token", "key", "secret", "auth"];

export function createFormatter(config: LoggerConfig): NonNullable<LoggerOptions["formatters"]> {
  return {
    log: (obj: Record<string, unknown>) => {
      const out: Record<string, unknown> = { ...obj };
      if (config.source) {
        out.source = config.source;
      }
      if (out.correlationId === undefined && out.requestId !== undefined) {
        out.correlationId = out.requestId;
      }
      return out;
    },
  };
}

/**
 * Replaces values of credential-like keys, recursively.
 */
export function redactArguments(value: unknown, maxDepth = 5, depth = 0): unknown {
  if (depth >= maxDepth) return "[Max Depth Reached]";
  if (Array.isArray(value)) {
    return value.map((item) => redactArguments(item, maxDepth, depth + 1));
  }
  if (!isPlainRecord(value)) return value;

  const redacted: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const lower = key.toLowerCase();
    redacted[key] = SENSITIVE_KEYS.some((s) => lower.includes(s))
      ? "[REDACTED]"
      : redactArguments(inner, maxDepth, depth + 1);
  }
  return redacted;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
