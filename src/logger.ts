import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };
export type LogLevel = Level | "silent";

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Defaults to stderr so stdout stays free for `log://stdout` destinations. */
  destination?: DestinationStream;
}

/**
 * Creates the process-wide diagnostics sink. Call once at startup and hand the
 * logger to every component; components derive children with
 * `log.child({ component })` rather than creating their own.
 */
export const createLogger = (options: CreateLoggerOptions = {}): Logger =>
  pino(
    {
      name: options.name ?? "cotwire",
      level: options.level ?? "info",
    },
    options.destination ?? pino.destination(2),
  );

/** A logger that discards everything; handy for library callers and tests. */
export const createSilentLogger = (): Logger => pino({ level: "silent" });
