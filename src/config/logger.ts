import winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level} ${String(message)}${rest}`;
});

/**
 * Process-wide logger. JSON lines by default; LOG_FORMAT=pretty switches to a
 * single human-readable line per entry for interactive CLI runs.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format:
    config.logFormat === "pretty"
      ? combine(colorize(), timestamp(), errors({ stack: true }), consoleFormat)
      : combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "metal-provisioner" },
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
});
