// backend/services/shared/src/logger/logger.ts
/**
 * Shared Logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME, opts)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger, logger } from "../../shared/src/logger/logger";
 *   initLogger("scoring", { level: "info", file: "/var/log/scoring.log" });
 *   logger.info({ requestId }, "request");
 *
 * Env:
 * - LOG_LEVEL (optional) fatal|error|warn|info|debug|trace|silent [default: info]
 */

import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function envLogLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase().trim();
  return isLogLevel(raw) ? raw : "info";
}

const pinoOptions: LoggerOptions = {
  level: envLogLevel(),
  base: {}, // ← no "service" until initLogger() runs
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

export type InitLoggerOptions = {
  level?: LevelWithSilent;
  /** Append to this file instead of stdout. */
  file?: string;
};

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(
  serviceName: string,
  opts: InitLoggerOptions = {}
): Logger {
  const service = serviceName.trim();
  if (!service) throw new Error("initLogger requires serviceName");

  const options: LoggerOptions = {
    ...pinoOptions,
    level: opts.level ?? envLogLevel(),
    base: { service },
  };
  logger = opts.file
    ? pino(options, pino.destination({ dest: opts.file, mkdir: true }))
    : pino(options);
  return logger;
}
