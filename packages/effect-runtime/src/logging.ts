/**
 * Structured logging and tracing integration.
 *
 * Log lines go to stderr so that stdout stays machine-readable for commands
 * that print ids.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function formatMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(formatMessage).join(" ");
  return JSON.stringify(message);
}

/**
 * `[HH:MM:SS.mmm] LEVEL message key=value ...`, one line per log call, with
 * the fiber's log annotations appended.
 */
export function makePrettyLogger(write: (line: string) => void): Logger.Logger<unknown, void> {
  return Logger.make(({ logLevel, message, date, annotations }) => {
    const ts = date.toISOString().slice(11, 23);
    const lvl = logLevel.label.toUpperCase().padEnd(5);
    let line = `[${ts}] ${lvl} ${formatMessage(message)}`;
    for (const [key, value] of annotations) line += ` ${key}=${formatMessage(value)}`;
    write(line);
  });
}

export const prettyLogger = makePrettyLogger((line) => console.error(line));

/** Layer that swaps Effect's default logger for `prettyLogger`. */
export const PrettyLoggerLive: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, prettyLogger);

/** Run `effect` with the pretty logger installed at the given minimum level. */
export function withPrettyLogging<A, E, R>(
  effect: Effect.Effect<A, E, R>,
  level: LogLevel.LogLevel,
): Effect.Effect<A, E, R> {
  return effect.pipe(Logger.withMinimumLogLevel(level), Effect.provide(PrettyLoggerLive));
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "trace": return LogLevel.Trace;
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
