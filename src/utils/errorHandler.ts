import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger, LogMeta } from './Logger';
import { v4 as uuidv4 } from 'uuid';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export type ErrorCode =
  | 'DUPLICATE_SERVER'
  | 'SERVER_NOT_FOUND'
  | 'INVALID_WEIGHT'
  | 'INVALID_SERVER'
  | 'EMPTY_RING'
  | 'NO_SERVERS_AVAILABLE'
  | 'NO_HEALTHY_SERVER'
  | 'INVALID_HASH_FUNCTION'
  | 'INVALID_CONFIG'
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'BAD_GATEWAY'
  | 'INTERNAL_ERROR';

const DEFAULT_STATUS: Record<ErrorCode, number> = {
  DUPLICATE_SERVER: 409,
  SERVER_NOT_FOUND: 404,
  INVALID_WEIGHT: 400,
  INVALID_SERVER: 400,
  EMPTY_RING: 503,
  NO_SERVERS_AVAILABLE: 503,
  NO_HEALTHY_SERVER: 503,
  INVALID_HASH_FUNCTION: 400,
  INVALID_CONFIG: 400,
  INVALID_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  BAD_GATEWAY: 502,
  INTERNAL_ERROR: 500
};

export class BalancerError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: ErrorCode;

  constructor(message: string, code: ErrorCode = 'INTERNAL_ERROR', statusCode: number = DEFAULT_STATUS[code], isOperational: boolean = true) {
    super(message);
    this.name = 'BalancerError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isBalancerError(error: unknown, code?: ErrorCode): error is BalancerError {
  return error instanceof BalancerError && (code === undefined || error.code === code);
}

/**
 * Flattens an unknown thrown value into log metadata; Error instances do
 * not survive JSON serialisation on their own.
 */
export function describeError(error: unknown): LogMeta {
  if (error instanceof BalancerError) {
    return { error: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();
  const requestId = req.requestId;

  logger.http('Request started', {
    requestId,
    method: req.method,
    url: req.url,
    ip: req.ip
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'http';

    logger.log(level, 'Request completed', {
      requestId,
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration,
      backend: res.get('X-Load-Balancer-Server')
    });
  });

  next();
};

export const errorHandlerMiddleware = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = req.requestId;

  let statusCode = 500;
  let message = 'Internal Server Error';
  let errorCode: ErrorCode = 'INTERNAL_ERROR';

  if (err instanceof BalancerError) {
    statusCode = err.statusCode;
    message = err.message;
    errorCode = err.code;
  } else if (err instanceof SyntaxError) {
    // Malformed JSON body from express.json()
    statusCode = 400;
    message = 'Malformed JSON body';
    errorCode = 'INVALID_REQUEST';
  }

  logger.error('Request error', {
    requestId,
    error: err.message,
    stack: err.stack,
    statusCode,
    errorCode,
    url: req.url,
    method: req.method,
    isOperational: err instanceof BalancerError ? err.isOperational : false
  });

  if (process.env.NODE_ENV === 'production' && statusCode === 500) {
    message = 'Internal Server Error';
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    code: errorCode,
    requestId,
    ...(process.env.NODE_ENV !== 'production' && statusCode === 500 && { stack: err.stack })
  });
};

// Async handler wrapper to catch errors in async route handlers
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

export const setupUnhandledErrorHandlers = (): void => {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', describeError(reason));
    process.exit(1);
  });
};
