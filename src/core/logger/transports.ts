/**
 * Pino transport targets for the configured outputs.
 */

import type { TransportTargetOptions } from "pino";
import { FileTransportConfig, LoggerConfig } from "./config";

export function createFileTransport(config: FileTransportConfig): TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: config.path,
      mkdir: true,
      sync: false,
    },
    level: config.level ?? "info",
  };
}

export function createTransportTargets(config: LoggerConfig): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (config.format === "pretty") {
    targets.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,source",
      },
      level: config.level,
    });
  } else {
    // fd 1 is stdout
    targets.push({ target: "pino/file", options: { destination: 1 }, level: config.level });
  }

  if (config.file?.enabled) {
    targets.push(createFileTransport(config.file));
  }

  return targets;
}
