/**
 * Application error types
 * Each error type maps to a specific HTTP status code and client action.
 * Core functions (parser, calculator) return these inside outcome values;
 * services and handlers throw them.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Flat-file storage errors (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, code, 400, details);
  }
}

/**
 * Amount violates the money invariants: negative, or parts above total
 */
export class InvalidAmountError extends ValidationError {
  constructor(
    public readonly reason: 'negative_amount' | 'parts_exceed_total',
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, { reason, ...details }, 'INVALID_AMOUNT');
  }
}

/**
 * A field without which the calculation is meaningless is absent
 */
export class MissingRequiredFieldError extends ValidationError {
  constructor(public readonly field: string) {
    super(`Missing required field: ${field}`, { field }, 'MISSING_REQUIRED_FIELD');
  }
}

export class UnknownPaymentMethodError extends ValidationError {
  constructor(public readonly value: string) {
    super(`Unknown payment method: ${value}`, { value }, 'UNKNOWN_PAYMENT_METHOD');
  }
}

/**
 * Message layout matched none of the known formats (422 Unprocessable Entity)
 */
export class FormatUnrecognizedError extends AppError {
  constructor(text: string) {
    super('Message format not recognized', 'FORMAT_UNRECOGNIZED', 422, {
      preview: text.trim().split('\n').slice(0, 3),
    });
  }
}

/**
 * Message layout was recognized but the total could not be located.
 * Carries the candidate lines so the sender can correct the message.
 */
export class ParseFailureError extends AppError {
  constructor(
    public readonly missingField: string,
    public readonly missingFields: string[],
    public readonly lines: string[]
  ) {
    super(`Could not parse message: ${missingField} not found`, 'PARSE_FAILURE', 422, {
      missingField,
      missingFields,
      lines,
    });
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
