import { z } from 'zod';
import { APIConnectionTimeoutError, APIError, APIUserAbortError, RateLimitError } from 'openai';
import { DatabaseError } from 'pg';
import { AppError } from './AppError.js';
import { DuplicateToolCallError, MalformedToolArgsError } from './protocolErrors.js';

/**
 * Check if an error is an abort error (from AbortController).
 */
function isAbortError(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  return (
    error.name === 'AbortError' ||
    error.name === 'TimeoutError' ||
    code === 'ABORT_ERR' ||
    code === 'ERR_ABORTED'
  );
}

/**
 * Map an unknown error to an AppError.
 * Handles:
 * - Zod validation errors
 * - tool-call protocol violations
 * - OpenAI SDK errors
 * - Postgres driver errors
 * - Timeout/abort errors
 * - Generic errors
 */
export function mapError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    const messages = error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    return AppError.validation(messages.join(', '), {
      issues: error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
        code: issue.code,
      })),
    }, error);
  }

  if (error instanceof MalformedToolArgsError) {
    return AppError.malformedToolArgs(error.toolName, error.parseError, error);
  }

  if (error instanceof DuplicateToolCallError) {
    return AppError.duplicateToolCall(error.toolName, error.signature, error);
  }

  if (!(error instanceof Error)) {
    const message = typeof error === 'string' ? error : 'Unknown error';
    return AppError.internal(message);
  }

  // Timeout subclasses must be checked before the generic APIError branch
  if (error instanceof APIConnectionTimeoutError) {
    return AppError.openaiTimeout(undefined, error);
  }

  if (error instanceof APIUserAbortError || isAbortError(error)) {
    return AppError.timeout('request', 0, error);
  }

  if (error instanceof RateLimitError) {
    return AppError.openaiRateLimit(error);
  }

  if (error instanceof APIError) {
    return AppError.openai(error.message, { status: error.status }, error);
  }

  if (error instanceof DatabaseError) {
    if (error.code === '23505') {
      return AppError.uniqueViolation(error.constraint, error);
    }
    return AppError.database(error.message, error);
  }

  return AppError.internal(error.message, error);
}

/**
 * Sanitize error details for logging.
 * Removes secrets and truncates long strings.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  const sanitized: Record<string, unknown> = {};
  const sensitiveKeys = ['token', 'secret', 'password', 'apikey', 'api_key', 'authorization'];

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some((sk) => lowerKey.includes(sk))) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string' && value.length > 500) {
      sanitized[key] = value.substring(0, 500) + '...[truncated]';
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
