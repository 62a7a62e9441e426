/**
 * Logging interface used by the mapper for non-fatal events: lenient key
 * extraction shortfalls, reconstruction warnings, debug traces.
 */

/** Structured context attached to a log line. */
export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Sink for mapper diagnostics. Any logger with `debug` and `warn` methods
 * (pino, winston, console) satisfies it.
 */
export interface MappingLogger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

/** Minimum level a console logger emits. */
export type LogLevel = "debug" | "warn" | "silent";

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  warn: 1,
  silent: 2,
};

/** Logger that discards everything. The default when none is configured. */
export const silentLogger: MappingLogger = Object.freeze({
  debug: () => undefined,
  warn: () => undefined,
});

/** Options for `createConsoleLogger()`. */
export interface ConsoleLoggerOptions {
  /** Default: `"warn"`. */
  readonly level?: LogLevel | undefined;
  /** Prefix for every line. Default: `"entity-mapper"`. */
  readonly prefix?: string | undefined;
  /** Output target. Default: the global `console`. */
  readonly sink?: Pick<Console, "debug" | "warn"> | undefined;
}

/**
 * Creates a logger that writes `[prefix] message {context}` lines to the console.
 *
 * @example
 * ```ts
 * const client = createClient({ adapter, logger: createConsoleLogger({ level: "debug" }) });
 * ```
 */
export const createConsoleLogger = (
  options: ConsoleLoggerOptions = {},
): MappingLogger => {
  const threshold = LEVEL_PRIORITY[options.level ?? "warn"];
  const prefix = options.prefix ?? "entity-mapper";
  const sink = options.sink ?? console;

  const format = (message: string, context: LogContext | undefined): string =>
    context && Object.keys(context).length > 0
      ? `[${prefix}] ${message} ${JSON.stringify(context)}`
      : `[${prefix}] ${message}`;

  return Object.freeze({
    debug: (message: string, context?: LogContext) => {
      if (threshold <= LEVEL_PRIORITY.debug) sink.debug(format(message, context));
    },
    warn: (message: string, context?: LogContext) => {
      if (threshold <= LEVEL_PRIORITY.warn) sink.warn(format(message, context));
    },
  });
};
