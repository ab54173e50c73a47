import winston from "winston";
import { config } from "./index.js";

function createFormat(format: "json" | "simple"): winston.Logform.Format {
  if (format === "json") {
    return winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json());
  }

  return winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
    }),
  );
}

/**
 * Process-wide logger. Writes to stderr so a harness's stdout stays clean.
 * Only errors are logged under NODE_ENV=test.
 */
export const logger = winston.createLogger({
  level: config.nodeEnv === "test" ? "error" : config.logLevel,
  format: createFormat(config.logFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});
