/**
 * Structured logging on top of the effect Logger.
 *
 * Lines look like `[12:00:00.000] INFO  message key=value key2=value2`.
 */
import { Effect, HashMap, Logger, LogLevel } from "effect";

export type LogFields = Readonly<Record<string, string | number | boolean | null | undefined>>;

export type LogLevelName = "debug" | "info" | "warn" | "error" | "none";

/** Plain logging port used across the neuron. */
export interface Log {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

// ── Pretty logger ──────────────────────────────────────────────────────────

function formatMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(formatMessage).join(" ");
  return JSON.stringify(message);
}

function formatValue(v: unknown): string {
  if (typeof v === "string") return /\s/.test(v) ? JSON.stringify(v) : v;
  if (typeof v === "number") return Number.isInteger(v) ? String(v) : v.toPrecision(6);
  return String(v);
}

export const makePrettyLogger = (write: (line: string) => void = (line) => console.log(line)) =>
  Logger.make(({ logLevel, message, date, annotations }) => {
    const ts = date.toISOString().slice(11, 23);
    const lvl = logLevel.label.toUpperCase().padEnd(5);
    let line = `[${ts}] ${lvl} ${formatMessage(message)}`;
    for (const [k, v] of HashMap.toEntries(annotations)) line += ` ${k}=${formatValue(v)}`;
    write(line);
  });

export const prettyLogger = makePrettyLogger();

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

// ── Log port ───────────────────────────────────────────────────────────────

/**
 * A `Log` that runs every call through the effect logger with the pretty
 * format, dropping anything below `level`. `write` receives finished lines.
 */
export function createLogger(level: LogLevelName | string = "info", write?: (line: string) => void): Log {
  const min = parseLogLevel(level);
  const layer = Logger.replace(Logger.defaultLogger, write ? makePrettyLogger(write) : prettyLogger);

  const emit = (effect: Effect.Effect<void>, fields?: LogFields) => {
    const defined: Record<string, unknown> = {};
    if (fields) for (const [k, v] of Object.entries(fields)) if (v !== undefined) defined[k] = v;
    Effect.runSync(
      effect.pipe(Effect.annotateLogs(defined), Logger.withMinimumLogLevel(min), Effect.provide(layer)),
    );
  };

  return {
    debug: (message, fields) => emit(Effect.logDebug(message), fields),
    info: (message, fields) => emit(Effect.logInfo(message), fields),
    warn: (message, fields) => emit(Effect.logWarning(message), fields),
    error: (message, fields) => emit(Effect.logError(message), fields),
  };
}

export const silentLog: Log = createLogger("none");
