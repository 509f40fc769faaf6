/**
 * Engine diagnostics on pino. Records go to stderr so they never mix with
 * whatever a reporter writes to stdout.
 */
import pino from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";

export type { Logger, DestinationStream };

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

/**
 * Create an engine logger. `destination` defaults to a synchronous stderr
 * stream; tests pass an in-memory `{ write }` sink.
 */
export function createLogger(
  level: LogLevel,
  bindings: Record<string, unknown> = {},
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  const options: LoggerOptions = {
    level,
    base: { name: "nstest" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const logger = pino(options, destination);
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

function levelFromEnv(): LogLevel {
  const raw = process.env["NSTEST_LOG_LEVEL"];
  return isLogLevel(raw) ? raw : "warn";
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(levelFromEnv());
  }
  return rootLogger;
}

/** Replace the engine-wide logger, e.g. with one built from config. */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

/** Drop the engine-wide logger; the next getLogger() builds a fresh one. */
export function resetLogger(): void {
  rootLogger = null;
}
