/**
 * Subsystem loggers.
 *
 * Lines go to stderr as `[subsystem] message` so stdout stays free for
 * command output. `debug` lines are dropped unless verbose.
 */

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggerOptions = {
  verbose?: boolean;
  /** Where formatted lines go (default: `console.error`). */
  sink?: (line: string) => void;
};

export function createSubsystemLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const write = (level: string, msg: string) =>
    sink(level === "info" ? `[${subsystem}] ${msg}` : `[${subsystem}] ${level}: ${msg}`);

  return {
    debug: (msg) => {
      if (options.verbose) write("debug", msg);
    },
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg) => write("error", msg),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
