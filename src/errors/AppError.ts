/**
 * Error categories for the application.
 * These categories provide actionable classification of errors.
 */
export type ErrorCategory =
  | 'OPENAI'
  | 'DATABASE'
  | 'RETRIEVAL'
  | 'PROTOCOL'
  | 'VALIDATION'
  | 'TIMEOUT'
  | 'INTERNAL';

/**
 * Error codes for more specific error identification.
 * Format: CATEGORY_SPECIFIC_ERROR
 */
export type ErrorCode =
  | 'OPENAI_API_ERROR'
  | 'OPENAI_RATE_LIMIT'
  | 'OPENAI_TIMEOUT'
  | 'DATABASE_ERROR'
  | 'DATABASE_UNIQUE_VIOLATION'
  | 'RETRIEVAL_FAILED'
  | 'PROTOCOL_MALFORMED_TOOL_ARGS'
  | 'PROTOCOL_DUPLICATE_TOOL_CALL'
  | 'VALIDATION_REQUEST_INVALID'
  | 'VALIDATION_PAYLOAD_TOO_LARGE'
  | 'TIMEOUT_REQUEST'
  | 'INTERNAL_ERROR';

/**
 * Options for creating an AppError.
 */
export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Structured error response payload for API responses.
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

/**
 * AppError is the base error class for all application errors.
 * It carries a category, code, HTTP status and a natural-language message
 * suitable for client responses.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.safeMessage);
    this.name = 'AppError';
    this.category = options.category;
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.safeMessage = options.safeMessage;
    this.details = options.details;
    this.cause = options.cause;

    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Convert the error to a structured payload for API responses.
   */
  toPayload(requestId?: string): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        category: this.category,
        code: this.code,
        message: this.safeMessage,
      },
    };

    if (this.details && Object.keys(this.details).length > 0) {
      payload.error.details = this.details;
    }

    if (requestId) {
      payload.requestId = requestId;
    }

    return payload;
  }

  static validation(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 400,
      safeMessage: message,
      details,
      cause,
    });
  }

  static payloadTooLarge(message: string, details?: Record<string, unknown>): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_PAYLOAD_TOO_LARGE',
      httpStatus: 413,
      safeMessage: message,
      details,
    });
  }

  /**
   * The model produced tool arguments that are not valid JSON or fail the tool schema.
   * Fatal for the current turn.
   */
  static malformedToolArgs(toolName: string, parseError: string, cause?: Error): AppError {
    return new AppError({
      category: 'PROTOCOL',
      code: 'PROTOCOL_MALFORMED_TOOL_ARGS',
      httpStatus: 500,
      safeMessage: 'Sorry, something went wrong while handling your request. Please try rephrasing it.',
      details: { toolName, parseError },
      cause,
    });
  }

  /**
   * The model proposed the same tool call twice in one step.
   * Fatal for the current turn.
   */
  static duplicateToolCall(toolName: string, signature: string, cause?: Error): AppError {
    return new AppError({
      category: 'PROTOCOL',
      code: 'PROTOCOL_DUPLICATE_TOOL_CALL',
      httpStatus: 500,
      safeMessage: 'Sorry, something went wrong while handling your request. Please try again.',
      details: { toolName, signature },
      cause,
    });
  }

  static openai(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_API_ERROR',
      httpStatus: 503,
      safeMessage: 'The AI service is temporarily unavailable. Please try again later.',
      details: { originalMessage: message, ...details },
      cause,
    });
  }

  static openaiRateLimit(cause?: Error): AppError {
    return new AppError({
      category: 'OPENAI',
      code: 'OPENAI_RATE_LIMIT',
      httpStatus: 429,
      safeMessage: 'The AI service is currently busy. Please try again in a moment.',
      cause,
    });
  }

  /**
   * Create an OpenAI timeout error.
   * Used when the SDK itself reports APITimeoutError / APIConnectionTimeoutError.
   */
  static openaiTimeout(
    details?: { elapsedMs?: number; timeoutMs?: number },
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'TIMEOUT',
      code: 'OPENAI_TIMEOUT',
      httpStatus: 504,
      safeMessage: 'The model took too long to respond. Please try again.',
      details,
      cause,
    });
  }

  static database(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'DATABASE',
      code: 'DATABASE_ERROR',
      httpStatus: 503,
      safeMessage: 'The store is temporarily unavailable. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }

  static uniqueViolation(constraint: string | undefined, cause?: Error): AppError {
    return new AppError({
      category: 'DATABASE',
      code: 'DATABASE_UNIQUE_VIOLATION',
      httpStatus: 409,
      safeMessage: 'This record already exists.',
      details: { constraint },
      cause,
    });
  }

  static retrieval(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'RETRIEVAL',
      code: 'RETRIEVAL_FAILED',
      httpStatus: 503,
      safeMessage: 'Search is temporarily unavailable. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }

  /**
   * Create a timeout error for a bounded operation (model call, DB call, search).
   */
  static timeout(operation: string, timeoutMs: number, cause?: Error): AppError {
    return new AppError({
      category: 'TIMEOUT',
      code: 'TIMEOUT_REQUEST',
      httpStatus: 504,
      safeMessage: 'The request took too long to complete. Please try again.',
      details: { operation, timeoutMs },
      cause,
    });
  }

  static internal(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'INTERNAL',
      code: 'INTERNAL_ERROR',
      httpStatus: 500,
      safeMessage: 'An unexpected error occurred. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }

  get isTimeout(): boolean {
    return this.category === 'TIMEOUT';
  }

  get isProtocolViolation(): boolean {
    return this.category === 'PROTOCOL';
  }
}
