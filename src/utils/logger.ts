/**
 * Logger Interface for Library Code
 *
 * Pipeline components accept a Logger through their options. The CLI passes
 * its CommandContext (which satisfies this interface), tests pass
 * silentLogger or a vi.fn()-backed mock.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Debug output is only written when SKYDOC_DEBUG is set.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => {
    if (process.env.SKYDOC_DEBUG) {
      console.log(message);
    }
  },
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Wrap a logger so every line is tagged with a component prefix,
 * e.g. `[indexer] embedded 12/40 chunks`.
 */
export function withPrefix(prefix: string, logger: Logger): Logger {
  const debug = logger.debug;
  return {
    warn: (message: string) => logger.warn(`[${prefix}] ${message}`),
    debug: debug ? (message: string) => debug(`[${prefix}] ${message}`) : undefined,
  };
}
