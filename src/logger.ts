import path from "node:path";
import { createLogger, format, transports, type Logger } from "winston";
import { config, type Config } from "./config.js";

export type LoggerSettings = Pick<Config, "NODE_ENV" | "LOG_LEVEL" | "LOG_DIR">;

const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }), // keep Error.stack when an Error is logged
  format.splat()
);

// One line per entry, metadata pretty-printed underneath
const devFmt = format.combine(
  format.colorize({ all: true }),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length
      ? `\n${JSON.stringify(meta, null, 2)}`
      : "";
    return `${String(timestamp)} ${level} ${String(message)}${
      stack ? `\n${String(stack)}` : ""
    }${metaStr}`;
  })
);

/**
 * JSON lines in production, colorized text elsewhere. Under NODE_ENV=test
 * nothing is written to LOG_DIR.
 */
export function createAppLogger(settings: LoggerSettings): Logger {
  const isProd = settings.NODE_ENV === "production";
  const isTest = settings.NODE_ENV === "test";

  const files = isTest
    ? []
    : [
        new transports.File({
          filename: path.join(settings.LOG_DIR, "app.log"),
          level: "info",
        }),
        new transports.File({
          filename: path.join(settings.LOG_DIR, "error.log"),
          level: "error",
        }),
      ];

  return createLogger({
    level: settings.LOG_LEVEL ?? (isProd ? "info" : "debug"),
    format: format.combine(base, isProd ? format.json() : devFmt),
    transports: [new transports.Console(), ...files],
  });
}

export const logger: Logger = createAppLogger(config);
