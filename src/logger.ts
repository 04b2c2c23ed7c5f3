/**
 * Simple logger interface for the proxy.
 * @packageDocumentation
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
  prefix?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? '[compat-proxy]';
  const verbose = opts.verbose ?? false;
  return {
    debug: (msg, ...args) => {
      if (verbose) console.debug(`${prefix} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}

export const defaultLogger: Logger = createLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
