import { STATUS_CODES } from 'http';
import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';

export class AppError extends Error {
  readonly statusCode: number;
  readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

export const createError = (message: string, statusCode: number = 500): AppError =>
  new AppError(message, statusCode);

export interface ErrorResponseBody {
  success: false;
  error: string;
  message: string;
}

// `error` carries the detail, `message` the status summary
export const errorBody = (statusCode: number, error: string): ErrorResponseBody => ({
  success: false,
  error,
  message: STATUS_CODES[statusCode] ?? 'Error',
});

// express.json() raises a SyntaxError tagged with status 400 on malformed bodies
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'status' in error && error.status === 400;

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json(errorBody(404, `Route ${req.method} ${req.originalUrl} not found`));
};

export const createErrorHandler = (logger: Logger) =>
  (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isBodyParseError(error)) {
      res.status(400).json(errorBody(400, 'Request body must be valid JSON'));
      return;
    }

    if (error instanceof AppError && error.isOperational) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, path: req.originalUrl }, error.message);
      } else {
        logger.warn({ path: req.originalUrl, statusCode: error.statusCode }, error.message);
      }
      res.status(error.statusCode).json(errorBody(error.statusCode, error.message));
      return;
    }

    logger.error({ err: error, path: req.originalUrl }, '💥 Unhandled error');
    res.status(500).json(errorBody(500, 'Internal server error'));
  };
