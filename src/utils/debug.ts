/**
 * Debug Logger Utility
 *
 * Conditional logging for routing decisions. Silent unless debug is
 * enabled globally, enabled on a router, or a logger is injected.
 */

/**
 * Debug logger interface
 */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

/**
 * Logger that discards all messages
 */
export const noopLogger: DebugLogger = {
  log: () => {},
  error: () => {},
  warn: () => {},
};

/**
 * Console logger with a line prefix
 */
export const createConsoleLogger = (prefix = "[Router]"): DebugLogger => ({
  log: (...args) => console.log(prefix, ...args),
  error: (...args) => console.error(prefix, ...args),
  warn: (...args) => console.warn(prefix, ...args),
});

const consoleLogger = createConsoleLogger();

let globalDebugEnabled = false;

/**
 * Set global debug state
 */
export const setDebugEnabled = (enabled: boolean): void => {
  globalDebugEnabled = enabled;
};

export const isDebugEnabled = (): boolean => globalDebugEnabled;

/**
 * Get the appropriate logger based on debug state
 */
export const getLogger = (): DebugLogger =>
  globalDebugEnabled ? consoleLogger : noopLogger;

/**
 * Pick the logger for one router instance
 *
 * An injected logger wins; otherwise `debug: true` or the global flag
 * turns on console output.
 */
export const resolveLogger = (options: {
  debug?: boolean;
  logger?: DebugLogger;
}): DebugLogger => {
  if (options.logger) {
    return options.logger;
  }
  if (options.debug === true) {
    return consoleLogger;
  }
  // Deferred so that a later setDebugEnabled() still takes effect
  return {
    log: (...args) => getLogger().log(...args),
    error: (...args) => getLogger().error(...args),
    warn: (...args) => getLogger().warn(...args),
  };
};
