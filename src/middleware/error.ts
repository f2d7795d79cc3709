import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../lib/logger.js';
import { AccessTokenError } from '../lib/wopi/token.js';
import { StorageError } from '../lib/storage/index.js';

/**
 * Standard error codes for structured error responses
 */
export enum ErrorCode {
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  AUTHORIZATION_ERROR = 'AUTHORIZATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
}

/**
 * Custom application error with structured information
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, 400, ErrorCode.BAD_REQUEST, details);
  }

  static unauthorized(message: string = 'Authentication required'): AppError {
    return new AppError(message, 401, ErrorCode.AUTHENTICATION_ERROR);
  }

  static forbidden(message: string = 'Access denied'): AppError {
    return new AppError(message, 403, ErrorCode.AUTHORIZATION_ERROR);
  }

  static notFound(resource: string = 'Resource'): AppError {
    return new AppError(`${resource} not found`, 404, ErrorCode.NOT_FOUND);
  }

  static conflict(message: string): AppError {
    return new AppError(message, 409, ErrorCode.CONFLICT);
  }

  static payloadTooLarge(message: string = 'Request payload too large'): AppError {
    return new AppError(message, 413, ErrorCode.PAYLOAD_TOO_LARGE);
  }

  static internal(message: string = 'Internal server error'): AppError {
    return new AppError(message, 500, ErrorCode.INTERNAL_ERROR);
  }
}

/**
 * Map common error types to appropriate HTTP status codes
 */
const getStatusFromError = (err: Error): number => {
  if (err.name === 'ZodError') {
    return 400;
  }
  if (err instanceof AccessTokenError) {
    return 401;
  }
  if (err instanceof StorageError) {
    switch (err.code) {
      case 'ENOENT':
        return 404;
      case 'EACCES':
        return 403;
      case 'EEXIST':
        return 409;
      case 'EINVAL':
      case 'EISDIR':
        return 400;
      default:
        return 500;
    }
  }

  // body-parser and other http-errors carry their own status, e.g. 413
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }

  return 500;
};

/**
 * Get error code from error type
 */
const getCodeFromError = (err: Error, statusCode: number): ErrorCode => {
  if (err instanceof AppError) {
    return err.code;
  }

  switch (statusCode) {
    case 400:
      return ErrorCode.VALIDATION_ERROR;
    case 401:
      return ErrorCode.AUTHENTICATION_ERROR;
    case 403:
      return ErrorCode.AUTHORIZATION_ERROR;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 413:
      return ErrorCode.PAYLOAD_TOO_LARGE;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
};

/**
 * Global error handler middleware with structured logging and responses
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const requestId = req.id || uuidv4();

  if (res.headersSent) {
    return next(err);
  }

  const statusCode = err instanceof AppError ? err.statusCode : getStatusFromError(err);
  const errorCode = getCodeFromError(err, statusCode);
  const isDevelopment = req.app.get('env') === 'development';

  const logContext = {
    requestId,
    method: req.method,
    path: req.path,
    statusCode,
    errorCode,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  if (statusCode >= 500) {
    logger.error(`Server Error: ${err.message}`, logContext, err);
  } else {
    logger.warn(`Client Error: ${err.message}`, logContext, err);
  }

  const response: {
    error: string;
    code: ErrorCode;
    requestId: string;
    details?: Record<string, unknown>;
    stack?: string;
  } = {
    error: statusCode >= 500 && !isDevelopment ? 'Internal error' : err.message,
    code: errorCode,
    requestId,
  };

  if (err instanceof AppError && err.details) {
    response.details = err.details;
  }

  // Debug log level turns the app into development mode
  if (isDevelopment && err.stack) {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};
