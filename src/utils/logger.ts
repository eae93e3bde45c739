/**
 * Tagged stderr logger
 *
 * Every line goes to stderr as `[Tag] message`; stdout carries only the final
 * report. Debug lines are emitted only when verbose.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger for a sub-component, sharing sink and verbosity */
  child(tag: string): Logger;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Line sink (default: console.error) */
  sink?: (line: string) => void;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? ((line: string) => console.error(line));
  const write = (level: string, message: string) =>
    sink(level ? `[${tag}] ${level}: ${message}` : `[${tag}] ${message}`);

  return {
    verbose,
    debug: (message) => {
      if (verbose) write('', message);
    },
    info: (message) => write('', message),
    warn: (message) => write('WARNING', message),
    error: (message) => write('ERROR', message),
    child: (childTag) => createLogger(childTag, { verbose, sink }),
  };
}
