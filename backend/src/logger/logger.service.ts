import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

const SERVICE_NAME = 'horizon-convergence';

export interface LogContext {
  [key: string]: unknown;
}

let rootLogger: winston.Logger | undefined;

/** Process-wide winston logger shared by every LoggerService instance. */
export function getRootLogger(): winston.Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

function createRootLogger(): winston.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';

  return winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    defaultMeta: { service: SERVICE_NAME },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      isDevelopment
        ? winston.format.colorize()
        : winston.format.json(),
      winston.format.printf((info) => {
        const { timestamp, level, context, requestId, message, stack, service, ...fields } = info;
        if (isDevelopment) {
          const contextTag = context ? `[${String(context)}]` : '';
          const requestTag = requestId ? `[${String(requestId)}]` : '';
          const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
          const trace = stack ? `\n${String(stack)}` : '';
          return `${String(timestamp)} ${level} ${contextTag}${requestTag} ${String(message)}${extra}${trace}`;
        }
        // JSON format for production
        return JSON.stringify({
          service,
          timestamp,
          level,
          context,
          requestId,
          message,
          ...fields,
          ...(stack ? { stack } : {}),
        });
      }),
    ),
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
  });
}

/**
 * Transient: each consumer gets its own instance, so setContext labels only
 * that consumer's log lines.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private logger = getRootLogger();
  private context?: string;

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.info(message, { context: ctx, ...meta });
  }

  error(message: string, trace?: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.error(message, {
      context: ctx,
      stack: trace,
      ...meta,
    });
  }

  warn(message: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.warn(message, { context: ctx, ...meta });
  }

  debug(message: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.debug(message, { context: ctx, ...meta });
  }

  verbose(message: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.verbose(message, { context: ctx, ...meta });
  }
}
