import { AppError } from '../middleware/errorHandler.js';

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

export class UnknownCategoryError extends AppError {
  readonly category: string;

  constructor(category: string) {
    super('unknown category', 400);
    this.category = category;
  }
}

export class InferenceError extends AppError {
  /** Throttling and upstream 5xx; callers may resubmit the pair later. */
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean = false) {
    super(message, 502);
    this.retryable = retryable;
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class TimeoutError extends AppError {
  constructor(message: string) {
    super(message, 504);
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  return 'Unknown error';
};

export const statusOf = (error: unknown): number | undefined => {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};
