/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const logger = pino({ level: 'debug' });
 * client.use(loggerPlugin({ logger }));
 * ```
 *
 * @example Console (default)
 * ```typescript
 * client.use(loggerPlugin({ logger: consoleLogger }));
 * ```
 */
export interface Logger {
  /**
   * Pino-style calls pass a structured object first, then the message
   */
  debug(msgOrObj: string | object, ...args: unknown[]): void;
  info(msgOrObj: string | object, ...args: unknown[]): void;
  warn(msgOrObj: string | object, ...args: unknown[]): void;
  error(msgOrObj: string | object, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];

  const gate = (level: Exclude<LogLevel, 'none'>) => {
    return (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels[level] >= minLevelNum) {
        baseLogger[level](msgOrObj, ...args);
      }
    };
  };

  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}
