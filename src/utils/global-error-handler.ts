import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { translateDatabaseError } from './database-error-handler';
import { isAppError } from './errors';

/**
 * Global Error Handler
 *
 * Intercepts all unhandled errors in the application.
 * 1. Logs the error through the request logger
 * 2. Maps domain errors and schema validation failures to their status
 * 3. Returns a safe error response, with the request id as reference
 */
export function createGlobalErrorHandler(options: { isProduction: boolean }) {
  return async function globalErrorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
    const translated = translateDatabaseError(error);

    if (isAppError(translated)) {
      const context = { err: translated, url: request.url, method: request.method };
      if (translated.statusCode >= 500) {
        request.log.error(context, `[Errors] ${translated.kind}`);
      } else {
        request.log.warn(context, `[Errors] ${translated.kind}`);
      }
      return reply.status(translated.statusCode).send({
        success: false,
        error: translated.kind,
        message: translated.message,
        reference: request.id,
      });
    }

    if (error.validation) {
      request.log.warn({ url: request.url, method: request.method, validation: error.validation }, '[Errors] Request validation failed');
      return reply.status(400).send({
        success: false,
        error: 'VALIDATION_ERROR',
        message: error.message,
        reference: request.id,
      });
    }

    // Fastify's own client errors (bad JSON, payload too large, ...)
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ err: error, url: request.url, method: request.method }, '[Errors] Client error');
      return reply.status(error.statusCode).send({
        success: false,
        error: error.code ?? 'BAD_REQUEST',
        message: error.message,
        reference: request.id,
      });
    }

    request.log.error({ err: error, url: request.url, method: request.method }, 'Unhandled exception details');
    return reply.status(500).send({
      success: false,
      error: 'INTERNAL_ERROR',
      message: options.isProduction ? 'An unexpected error occurred.' : error.message,
      reference: request.id,
    });
  };
}
