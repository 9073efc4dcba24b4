import { LoggerService } from '@nestjs/common';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

// One winston instance per service name
const loggerCache = new Map<string, winston.Logger>();

export function formatLogLine(
  serviceName: string,
  info: { level: string; message: unknown; timestamp?: unknown; stack?: unknown; [key: string]: unknown },
): string {
  const { level, message, timestamp, stack, ...meta } = info;
  // [2025-11-01 08:00:01] [INFO] [SeedService] Message
  let line = `[${String(timestamp)}] [${level.toUpperCase()}] [${serviceName}] ${String(message)}`;

  if (stack) {
    line += `\n${String(stack)}`;
  }

  if (Object.keys(meta).length > 0) {
    line += `\n${JSON.stringify(meta, null, 2)}`;
  }

  return line;
}

export function sanitizeLogName(name: string): string {
  return name
    .replace(/[^a-zA-Z0-9-_]/g, '-')
    .replace(/-+/g, '-')
    .toLowerCase()
    .slice(0, 200);
}

/** Nest hands the stack over as `trace`; it is stored as `stack`. */
export function toErrorMeta(trace?: string, optionalParams: unknown[] = []): Record<string, unknown> {
  const meta: Record<string, unknown> = {};
  if (trace) {
    meta.stack = trace;
  }
  if (optionalParams.length > 0) {
    meta.context = optionalParams;
  }
  return meta;
}

/**
 * Winston logger for one service: a daily rotated file under `logs/` plus the
 * console. Under Jest (NODE_ENV=test) only the console transport is attached,
 * so no file handles stay open.
 */
export function getWinstonLogger(serviceName: string): winston.Logger {
  const cached = loggerCache.get(serviceName);
  if (cached) {
    return cached;
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => formatLogLine(serviceName, info)),
  );

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), logFormat),
    }),
  ];

  if (process.env.NODE_ENV !== 'test') {
    transports.push(
      new DailyRotateFile({
        filename: `logs/${sanitizeLogName(serviceName || 'supermarket')}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: '14d',
        format: logFormat,
      }),
    );
  }

  const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
    transports,
    exitOnError: false,
  });

  loggerCache.set(serviceName, logger);
  return logger;
}

/** Winston wrapper with the NestJS LoggerService shape. */
export class WinstonLogger implements LoggerService {
  private readonly logger: winston.Logger;

  constructor(private readonly serviceName: string) {
    this.logger = getWinstonLogger(serviceName);
  }

  log(message: string, ...optionalParams: unknown[]) {
    this.logger.info(message, ...optionalParams);
  }

  error(message: string, trace?: string, ...optionalParams: unknown[]) {
    this.logger.error(message, toErrorMeta(trace, optionalParams));
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.logger.warn(message, ...optionalParams);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.logger.debug(message, ...optionalParams);
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    this.logger.verbose(message, ...optionalParams);
  }
}
