// Console-backed logger with a verbosity switch for debug output

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose messages carry a bracketed component prefix, e.g. `[Backtest]`.
 * Debug messages are only written when `verbose` is set.
 */
export const createLogger = (prefix: string, verbose: boolean = false): Logger => {
  const tag = `[${prefix}]`;

  return {
    info: (message, ...args) => console.log(`${tag} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => console.error(`${tag} ${message}`, ...args),
    debug: (message, ...args) => logIf(verbose, `${tag} ${message}`, ...args)
  };
};

/**
 * Helper function to conditionally log based on verbosity
 */
export const logIf = (verbose: boolean, message: string, ...args: unknown[]): void => {
  if (verbose) {
    console.log(message, ...args);
  }
};

// Logger that drops everything; the default for library calls
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
