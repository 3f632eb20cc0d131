import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveInitialLevel(): LogLevel {
  const raw = process.env.RSS_READER_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

let root: winston.Logger | null = null;

function getRootLogger(): winston.Logger {
  if (!root) {
    root = winston.createLogger({
      level: resolveInitialLevel(),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(
          ({ timestamp, level, message, subsystem }) =>
            `${String(timestamp)} ${level} [rss-reader/${String(subsystem)}] ${String(message)}`,
        ),
      ),
      // every level goes to stderr
      transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
    });
  }
  return root;
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

export function getLogLevel(): LogLevel {
  const level = getRootLogger().level;
  return isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
}

export type LogTransport = Parameters<winston.Logger["add"]>[0];

/** Adds a transport to the shared logger; the returned function removes it again. */
export function addLogTransport(transport: LogTransport): () => void {
  const logger = getRootLogger();
  logger.add(transport);
  return () => {
    logger.remove(transport);
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string) => {
    getRootLogger().log({ level, message, subsystem });
  };
  return {
    subsystem,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}
