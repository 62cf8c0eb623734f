export { AppError, type ErrorCategory, type ErrorCode, type ErrorPayload, type AppErrorOptions } from './AppError.js';
export { mapError, sanitizeForLogging } from './mapError.js';
export { MalformedToolArgsError, DuplicateToolCallError } from './protocolErrors.js';
