/**
 * Structured logging. One root pino logger per process; components take it
 * at construction and derive a child bound to their own `component` name.
 */
import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: opts.name ?? "meteo-etl",
    level: opts.level ?? process.env.LOG_LEVEL ?? "info",
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
}

/** A logger that discards everything; used by tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
