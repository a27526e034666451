/**
 * Structured logging and tracing integration.
 *
 * A compact console logger for training runs, and span helpers for tracing.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function formatMessage(message: unknown): string {
  const parts: readonly unknown[] = Array.isArray(message) ? message : [message];
  return parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
}

/** `[hh:mm:ss.mmm] LEVEL message`, written through `write`. */
export const makePrettyLogger = (write: (line: string) => void = console.log) =>
  Logger.make(({ logLevel, message, date }) => {
    const ts = date.toISOString().slice(11, 23);
    const lvl = logLevel.label.toUpperCase().padEnd(5);
    write(`[${ts}] ${lvl} ${formatMessage(message)}`);
  });

export const prettyLogger = makePrettyLogger();

/** Replace the default logger with `logger` and filter below `level`. */
export function loggingLayer(
  level: string,
  logger: Logger.Logger<unknown, void> = prettyLogger,
): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, logger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

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
