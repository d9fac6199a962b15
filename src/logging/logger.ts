/**
 * Diagnostic Logger
 * =================
 *
 * Wrapper around Winston for pipeline diagnostics (connection events,
 * tick failures, conditioning fallbacks). This is not the CSV acquisition
 * log; see AcquisitionLogger for that.
 *
 * Usage:
 *   const root = createLogger({ level: 'debug' });
 *   const logger = componentLogger(root, 'AcquisitionSession');
 *   logger.warn('Tick failed', { error: 'timeout' });
 */

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface every component depends on
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  console?: boolean;
}

const consoleFormat = winston.format.printf((info) => {
  const { timestamp, level, message, component, ...meta } = info;
  const prefix = `${String(timestamp)} [${level.toUpperCase()}] [${String(component ?? 'acquisition')}]`;
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${prefix} ${String(message)}${rest}`;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.console !== false) {
    transports.push(new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        consoleFormat
      )
    }));
  }

  if (options.file) {
    transports.push(new winston.transports.File({
      filename: options.file,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }));
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    transports,
    silent: transports.length === 0
  });
}

/**
 * Child logger that tags every event with the component name
 */
export function componentLogger(root: winston.Logger, component: string): Logger {
  return root.child({ component });
}
