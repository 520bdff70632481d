import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = {
    level,
    base: { service: "shadow-sentinel" },
    serializers: { err: pino.stdSerializers.err },
    redact: {
      paths: ["apiKey", "*.apiKey", "reasoning.apiKey", "headers.authorization"],
      censor: "[REDACTED]",
    },
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, sync: false }));
  }

  if (!isJson) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,service" },
      },
    });
  }

  return pino(options);
}

/** Logger that drops everything. Used where a caller passes none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
