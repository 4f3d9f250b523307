/**
 * Console-backed logging. Everything goes to stderr so that reports written
 * to stdout stay machine-readable.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Suppress info lines; warnings and errors still print */
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false } = options;

  return {
    debug(message) {
      if (verbose) console.error(`[debug] ${message}`);
    },
    info(message) {
      if (!quiet) console.error(message);
    },
    warn(message) {
      console.error(`Warning: ${message}`);
    },
    error(message) {
      console.error(`Error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
