/**
 * Logger Utility
 * Structured logging with winston for the retriever service
 */

import winston from 'winston';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const NODE_ENV = process.env['NODE_ENV'] || 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] || (NODE_ENV === 'production' ? 'info' : 'debug');
const LOGS_DIR = resolve(__dirname, '../../../../logs');

/**
 * Logger surface the retriever components depend on
 * Satisfied by winston loggers and by vi.fn() mocks in tests
 */
export interface RetrieverLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, component, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const scope = component ? `${String(service || 'Retriever')}:${String(component)}` : String(service || 'Retriever');
    return `${String(timestamp)} [${scope}] ${level}: ${String(message)}${metaStr}`;
  })
);

// JSON format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
  }),
];

if (NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'retriever-error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'retriever-combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  defaultMeta: { service: 'Retriever' },
  transports,
  exceptionHandlers: NODE_ENV === 'production' ? [
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'retriever-exceptions.log'),
    }),
  ] : undefined,
  rejectionHandlers: NODE_ENV === 'production' ? [
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'retriever-rejections.log'),
    }),
  ] : undefined,
});

// Create child loggers for different components
export function createLogger(component: string): winston.Logger {
  return logger.child({ component });
}

// Structured error logging helper
export function logError(
  target: RetrieverLogger,
  message: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const errorObj = error instanceof Error ? error : new Error(String(error));
  target.error(message, {
    error: {
      name: errorObj.name,
      message: errorObj.message,
      stack: errorObj.stack,
    },
    ...context,
  });
}

// Performance logging helper
export function logPerformance(
  target: RetrieverLogger,
  operation: string,
  durationMs: number,
  context?: Record<string, unknown>
): void {
  const meta = { durationMs, ...context };
  if (durationMs > 5000) {
    target.warn(`Performance: ${operation}`, meta);
  } else {
    target.debug(`Performance: ${operation}`, meta);
  }
}
