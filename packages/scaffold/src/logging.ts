/**
 * Console logging gated by the verbose/quiet flags
 *
 * - debug: only with `verbose`
 * - info: unless `quiet`
 * - warn, error: always
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
};

export type LoggerOptions = {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};

/**
 * The subset of `console` the logger writes to
 */
export type ConsoleSink = Pick<Console, "log" | "warn" | "error">;

export const createConsoleLogger = (
  options: LoggerOptions = {},
  sink: ConsoleSink = console
): Logger => {
  const verbose = options.verbose === true && options.quiet !== true;
  const quiet = options.quiet === true;

  return {
    debug: (message) => {
      if (verbose) sink.log(`[debug] ${message}`);
    },
    info: (message) => {
      if (!quiet) sink.log(message);
    },
    warn: (message) => sink.warn(`warning: ${message}`),
    error: (message) => sink.error(`error: ${message}`),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type LogEntry = {
  readonly level: LogLevel;
  readonly message: string;
};

/**
 * Logger that keeps every message in memory, in order
 */
export const createRecordingLogger = (): {
  readonly logger: Logger;
  readonly entries: readonly LogEntry[];
} => {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string): void => {
      entries.push({ level, message });
    };

  return {
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
    entries,
  };
};
