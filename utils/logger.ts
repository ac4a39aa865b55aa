// ---------------------------------------------------------------------------
// Logging — process-wide winston logger
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import winston from "winston";

let logger: winston.Logger | null = null;

/**
 * Shared logger. JSON lines in production, colourised single lines
 * otherwise. `LOG_LEVEL=silent` mutes every transport.
 */
export function getLogger(): winston.Logger {
  if (logger) return logger;

  const level = process.env.LOG_LEVEL || "info";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length
            ? ` ${JSON.stringify(meta)}`
            : "";
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
        }),
      );

  logger = winston.createLogger({
    level: level === "silent" ? "error" : level,
    silent: level === "silent",
    defaultMeta: { service: "plantwise" },
    transports: [new winston.transports.Console({ format: baseFormat })],
  });

  return logger;
}

export function genCorrelationId(): string {
  return randomUUID();
}
