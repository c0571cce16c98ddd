/**
 * Logger interface for the editing engine and the CLI.
 * Hosts pass their own implementation; the engine never writes to the
 * console directly.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Console-based logger. Only `info` goes to stdout so command output
 * can still be piped.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

export interface LoggerOptions {
  verbose?: boolean;
  base?: Logger;
}

/**
 * Wrap a logger so that debug output is only emitted in verbose mode.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, base = consoleLogger } = options;
  return {
    info: message => base.info(message),
    warning: message => base.warning(message),
    error: message => base.error(message),
    debug: message => {
      if (verbose) base.debug(message);
    },
  };
}
