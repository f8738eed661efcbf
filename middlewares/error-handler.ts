import type { Request, Response, NextFunction } from 'express';
import { loggingService } from '../services/logging.service';
import { AppError, ValidationError, toUserMessage } from '../utils/app-error';
import type { FieldIssue } from '../utils/app-error';

interface StandardErrorResponse {
  success: false;
  message: string;
  code: string;
  error?: string;
  field?: string;
  issues?: FieldIssue[];
  suggestion?: string;
  requestId?: string;
}

interface Classification {
  statusCode: number;
  isClientError: boolean;
  code: string;
  message: string;
  suggestion?: string;
}

const hasStatus = (err: unknown): err is { status: number; message?: unknown } =>
  typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';

function classifyError(err: unknown): Classification {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      isClientError: err.statusCode < 500,
      code: err.code,
      message: toUserMessage(err),
      suggestion: err.suggestion,
    };
  }

  // body-parser and other http-errors style failures
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    switch (err.status) {
      case 400:
        return {
          statusCode: 400,
          isClientError: true,
          code: 'BAD_REQUEST',
          message: 'Invalid request. Please check your input.',
          suggestion: 'The request body must be valid JSON.',
        };
      case 413:
        return {
          statusCode: 413,
          isClientError: true,
          code: 'PAYLOAD_TOO_LARGE',
          message: 'Request body is too large.',
        };
      default:
        return {
          statusCode: err.status,
          isClientError: true,
          code: 'CLIENT_ERROR',
          message: toUserMessage(err),
        };
    }
  }

  return {
    statusCode: 500,
    isClientError: false,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred.',
    suggestion: 'Please try again later. If the problem persists, contact support.',
  };
}

/**
 * Centralized error handling middleware
 * Must be added last in the middleware chain
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const classification = classifyError(err);

  const errorResponse: StandardErrorResponse = {
    success: false,
    message: classification.message,
    code: classification.code,
    requestId: req.requestId,
  };

  if (err instanceof ValidationError) {
    errorResponse.field = err.field;
    errorResponse.issues = err.issues;
  }

  if (classification.suggestion) {
    errorResponse.suggestion = classification.suggestion;
  }

  // Technical details only in development
  if (process.env.NODE_ENV === 'development' && err instanceof Error) {
    errorResponse.error = err.message;
  }

  if (classification.isClientError) {
    loggingService.warn(`Client error: ${classification.message}`, req, err, {
      code: classification.code,
      statusCode: classification.statusCode,
    });
  } else {
    loggingService.error(`Server error: ${classification.message}`, req, err, {
      code: classification.code,
      statusCode: classification.statusCode,
    });
  }

  res.status(classification.statusCode).json(errorResponse);
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const errorResponse: StandardErrorResponse = {
    success: false,
    message: 'Route not found.',
    code: 'NOT_FOUND',
    requestId: req.requestId,
    suggestion: 'Please check the URL and try again.',
  };

  loggingService.warn(`404 Not Found: ${req.method} ${req.originalUrl}`, req);

  res.status(404).json(errorResponse);
};
