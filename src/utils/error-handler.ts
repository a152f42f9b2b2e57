import logger from './logger';

export enum ErrorType {
  VALIDATION = 'VALIDATION',
  API = 'API',
  DATABASE = 'DATABASE',
  RATE_LIMIT = 'RATE_LIMIT',
  NOTIFICATION = 'NOTIFICATION',
  UNKNOWN = 'UNKNOWN',
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly statusCode?: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN,
    statusCode: number | undefined = undefined,
    isOperational: boolean = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.type = type;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.VALIDATION, 400);
  }
}

export class ApiError extends AppError {
  constructor(message: string, statusCode = 500) {
    super(message, ErrorType.API, statusCode);
  }
}

export class DatabaseError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.DATABASE, 500);
  }
}

export class RateLimitError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.RATE_LIMIT, 429);
  }
}

export class NotificationError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.NOTIFICATION, 500);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown, context: Record<string, unknown> = {}): void {
  if (error instanceof AppError) {
    logger.error(`${error.type}: ${error.message}`, {
      ...context,
      type: error.type,
      statusCode: error.statusCode,
      stack: error.stack,
    });
  } else if (error instanceof Error) {
    logger.error(`Unhandled error: ${error.message}`, {
      ...context,
      type: ErrorType.UNKNOWN,
      stack: error.stack,
    });
  } else {
    logger.error(`Unhandled error: ${String(error)}`, { ...context, type: ErrorType.UNKNOWN });
  }
}

export function isOperationalError(error: unknown): boolean {
  return error instanceof AppError && error.isOperational;
}
