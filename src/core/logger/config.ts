/**
 * Logger configuration and defaults.
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export interface FileTransportConfig {
  enabled: boolean;
  path: string;
  level?: LogLevel;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  file?: FileTransportConfig;
  source?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
  file: {
    enabled: false,
    path: "./logs/meshwork.log",
    level: "info",
  },
};

export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    file: config.file ? { ...DEFAULT_CONFIG.file, ...config.file } : DEFAULT_CONFIG.file,
  };
}
