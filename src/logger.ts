// ---------- Logger interface ----------

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createConsoleLogger(prefix = "[aurora]"): Logger {
  return {
    debug: (...args: unknown[]) => console.debug(prefix, ...args),
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
  };
}

/** Pick the logger for a component from its `logger` / `verbose` options. */
export function resolveLogger(options: { logger?: Logger; verbose?: boolean }): Logger {
  if (options.logger) return options.logger;
  return options.verbose ? createConsoleLogger() : nullLogger;
}
