/**
 * Prefixed console logging.
 *
 * Verbose output is gated behind a debug switch; warnings and errors always print.
 */

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(prefix: string, isDebugEnabled: () => boolean = () => false): Logger {
  const tag = `[${prefix}]`;

  return {
    debug(message, data) {
      if (!isDebugEnabled()) return;
      if (data) {
        console.debug(`${tag} ${message}`, data);
      } else {
        console.debug(`${tag} ${message}`);
      }
    },

    warn(message, data) {
      if (data) {
        console.warn(`${tag} ${message}`, data);
      } else {
        console.warn(`${tag} ${message}`);
      }
    },

    error(message, error) {
      if (error !== undefined) {
        console.error(`${tag} ${message}`, error);
      } else {
        console.error(`${tag} ${message}`);
      }
    },
  };
}
