/**
 * Prefix logger
 *
 * - debug/info: visible when NODE_ENV=development or LOG_LEVEL=debug
 * - warn/error: always visible
 *
 * Usage:
 *   import { alignLog } from '../lib/logger';
 *   alignLog.debug('Correlated axis', { axis, score });
 *   alignLog.child('pitch').warn('Negative correlation peak');
 */

function isVerbose(): boolean {
  return (
    process.env.NODE_ENV === "development" ||
    process.env.LOG_LEVEL?.toLowerCase() === "debug"
  );
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (isVerbose()) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (isVerbose()) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },

    /**
     * Create a sub-logger with extended prefix
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

export const alignLog = createLogger("Align");
export const sessionLog = createLogger("Session");
export const syncLog = createLogger("Sync");

export { createLogger };
