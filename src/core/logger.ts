/**
 * Centralized logging utilities with structured logging support
 *
 * Uses pino for structured JSON logging.
 * Provides context-aware child loggers for caches and worker channels.
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import { logLevel, isDevelopment } from './config.js';

/**
 * Logger configuration options
 */
interface LoggerConfig {
  level: string;
  pretty: boolean;
  name: string;
}

function getConfig(): LoggerConfig {
  return {
    level: logLevel,
    pretty: isDevelopment,
    name: 'windowed-row-cache',
  };
}

/**
 * Create the base logger instance
 */
function createLogger(): PinoLogger {
  const config = getConfig();

  const pinoConfig: pino.LoggerOptions = {
    name: config.name,
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'msg',
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  // Use pretty print in development
  if (config.pretty) {
    return pino({
      ...pinoConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      },
    });
  }

  return pino(pinoConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ component: 'demo' });
 * log.info('Started'); // Includes component in output
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): PinoLogger {
  return logger.child(context);
}

/**
 * Create a logger for one VirtualCache instance
 *
 * @param cacheName - Name given to the cache (usually the table it browses)
 */
export function createCacheLogger(cacheName: string): PinoLogger {
  return createChildLogger({ component: 'cache', cache: cacheName });
}

/**
 * Create a logger for one worker channel
 *
 * @param channelId - Short identifier of the channel
 * @param name - Optional human readable channel name
 */
export function createWorkerLogger(channelId: string, name?: string): PinoLogger {
  const context: Record<string, unknown> = { component: 'worker', channelId };
  if (name) {
    context.channel = name;
  }
  return createChildLogger(context);
}

export type { Logger } from 'pino';

export default logger;
