export type LogContext = Readonly<Record<string, unknown>>;

export interface SyncLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const consoleLogger: SyncLogger = {
  debug: (message, context) => console.debug(message, context ?? {}),
  info: (message, context) => console.info(message, context ?? {}),
  warn: (message, context) => console.warn(message, context ?? {}),
  error: (message, context) => console.error(message, context ?? {}),
};

/**
 * Prefixes every message with `[label]`, matching the bracketed component
 * names used across the codebase's console output.
 */
export const labelLogger = (logger: SyncLogger, label: string): SyncLogger => ({
  debug: (message, context) => logger.debug(`[${label}] ${message}`, context),
  info: (message, context) => logger.info(`[${label}] ${message}`, context),
  warn: (message, context) => logger.warn(`[${label}] ${message}`, context),
  error: (message, context) => logger.error(`[${label}] ${message}`, context),
});
