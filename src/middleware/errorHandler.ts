import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError, ValidationError, type ValidationIssue } from '../errors/index.js';
import { hasStatus } from '../utils/errorHandling.js';

interface ErrorResponseBody {
  error: {
    message: string;
    status: number;
    code?: string;
    details?: ValidationIssue[];
    stack?: string;
  };
}

/**
 * Unified error handler for ApplicationError
 * Provides consistent error responses with rich logging context
 */
export const errorHandler = (
  error: Error | ApplicationError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const isDevelopment = process.env.NODE_ENV === 'development';

  let statusCode: number;
  let message: string;
  let errorCode: string | undefined;
  let details: ValidationIssue[] | undefined;

  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  if (error instanceof ApplicationError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : 'Internal server error';
    errorCode = error.code;
    if (error instanceof ValidationError && error.details.length > 0) {
      details = error.details;
    }

    // Client errors (duplicates, not found, cross-owner) are expected user feedback
    const level = statusCode >= 500 ? 'error' : 'warn';
    logger.log(level, 'Request error', {
      error: error.toJSON(),
      request,
    });
  } else if (hasStatus(error) && error.status >= 400 && error.status < 500) {
    // body-parser failures (malformed JSON, payload too large)
    statusCode = error.status;
    message = error.message;

    logger.warn('Malformed request', {
      error: { name: error.name, message: error.message },
      request,
    });
  } else {
    statusCode = 500;
    message = 'Internal server error';

    logger.error('Request error (generic)', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request,
    });
  }

  const errorResponse: ErrorResponseBody = {
    error: {
      message,
      status: statusCode,
      ...(errorCode && { code: errorCode }),
      ...(details && { details }),
    },
  };

  if (isDevelopment && error.stack) {
    errorResponse.error.stack = error.stack;
  }

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};
