import type { Request } from 'express';
import mongoose from 'mongoose';
import Log from '../models/Log';
import type { ILog, LogLevel, LogSource } from '../models/Log';
import { errorField, logger } from '../utils/logger';

const isDevelopment = process.env.NODE_ENV === 'development';
const LOG_TO_MONGODB = process.env.LOG_TO_MONGODB !== 'false'; // Default to true
const LOG_LEVEL = (process.env.LOG_LEVEL || 'info').toLowerCase();

// Log level priority
const LOG_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

const shouldLogToMongo = (level: LogLevel): boolean => {
  const currentLevel = LOG_LEVELS[LOG_LEVEL] ?? 2;
  return LOG_LEVELS[level] <= currentLevel;
};

type LogContext = NonNullable<ILog['context']>;
type ErrorInfo = NonNullable<ILog['error']>;
type Metadata = Record<string, unknown>;

export interface ScopedLogger {
  info(message: string, metadata?: Metadata): void;
  warn(message: string, err?: unknown, metadata?: Metadata): void;
  error(message: string, err?: unknown, metadata?: Metadata): void;
}

/**
 * Console logging plus a best-effort copy in MongoDB when a connection is up.
 */
class LoggingService {
  private getContextFromRequest(req?: Request): LogContext {
    if (!req) return {};

    const context: LogContext = {
      requestId: req.requestId,
      ip: req.ip || req.socket?.remoteAddress || undefined,
      route: req.route?.path || req.originalUrl || req.url,
      method: req.method,
      userAgent: req.get('user-agent') || undefined,
    };

    if (req.startTime) {
      context.duration = Date.now() - req.startTime;
    }

    return context;
  }

  private extractErrorInfo(err: unknown): ErrorInfo | undefined {
    if (err === undefined || err === null) return undefined;

    if (err instanceof Error) {
      const code = errorField(err, 'code');
      const statusCode = errorField(err, 'statusCode');
      return {
        name: err.name,
        message: err.message,
        stack: isDevelopment ? err.stack : undefined,
        code: typeof code === 'string' ? code : undefined,
        status: typeof statusCode === 'number' ? statusCode : undefined,
      };
    }

    return {
      message: typeof err === 'string' ? err : JSON.stringify(err),
    };
  }

  /**
   * Fire-and-forget insert; skipped entirely while mongoose is not connected.
   */
  private logToMongo(
    level: LogLevel,
    source: LogSource,
    message: string,
    context: LogContext,
    errorInfo?: ErrorInfo,
    metadata?: Metadata
  ): void {
    if (!LOG_TO_MONGODB || !shouldLogToMongo(level)) {
      return;
    }
    if (mongoose.connection.readyState !== mongoose.ConnectionStates.connected) {
      return;
    }

    Log.create({ level, source, message, context, error: errorInfo, metadata: metadata || {} }).catch((err: unknown) => {
      // Console only, to avoid a logging loop
      if (isDevelopment) {
        logger.error('Failed to save log to MongoDB:', err);
      }
    });
  }

  public warn(message: string, req?: Request, err?: unknown, metadata?: Metadata): void {
    logger.warn(message);
    this.logToMongo('warn', 'http', message, this.getContextFromRequest(req), this.extractErrorInfo(err), metadata);
  }

  public error(message: string, req?: Request, err?: unknown, metadata?: Metadata): void {
    logger.error(message, err);
    this.logToMongo('error', 'http', message, this.getContextFromRequest(req), this.extractErrorInfo(err), metadata);
  }

  /**
   * Logger for work outside a request (recorder, drift job, startup).
   */
  public scope(source: Exclude<LogSource, 'http'>): ScopedLogger {
    return {
      info: (message, metadata) => {
        logger.info(message);
        this.logToMongo('info', source, message, {}, undefined, metadata);
      },
      warn: (message, err, metadata) => {
        logger.warn(err instanceof Error ? `${message}: ${err.message}` : message);
        this.logToMongo('warn', source, message, {}, this.extractErrorInfo(err), metadata);
      },
      error: (message, err, metadata) => {
        logger.error(message, err);
        this.logToMongo('error', source, message, {}, this.extractErrorInfo(err), metadata);
      },
    };
  }
}

export const loggingService = new LoggingService();
