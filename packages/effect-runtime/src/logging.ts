/**
 * Structured logging and tracing integration.
 *
 * Library code logs through `Effect.log*` and traces with `Effect.withSpan`;
 * entry points install `loggingLayer` to choose the format and the minimum
 * level.
 */
import { Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function render(message: unknown): string {
  return typeof message === "string" ? message : JSON.stringify(message);
}

/** Format one log line: `[HH:MM:SS.mmm] LEVEL message`. */
export function formatLogLine(level: LogLevel.LogLevel, message: unknown, date: Date): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const msg = Array.isArray(message) ? message.map(render).join(" ") : render(message);
  return `[${ts}] ${lvl} ${msg}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.log(formatLogLine(logLevel, message, date));
});

/** Replace the default logger with `prettyLogger` and filter below `level`. */
export function loggingLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
