import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../config.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';

/**
 * Map any thrown value to an AppError, log it and send its payload.
 * Validation problems are logged as warnings, everything else as errors.
 */
export function sendError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown
): FastifyReply {
  const appError = mapError(error);

  const logPayload: Record<string, unknown> = {
    msg: 'Request error',
    route: request.routeOptions.url,
    category: appError.category,
    code: appError.code,
    requestId: request.id,
    httpStatus: appError.httpStatus,
  };
  if (config.debug && appError.details) {
    logPayload.details = sanitizeForLogging(appError.details);
  }

  if (appError.category === 'VALIDATION') {
    log.warn(logPayload);
  } else {
    log.error(logPayload);
  }

  return reply.status(appError.httpStatus).send(appError.toPayload(request.id));
}
