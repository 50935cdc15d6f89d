import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance } from 'fastify';
import type { ApiResponse } from '@flowqa/shared';
import { ProcessorError } from '../types/index.js';

/**
 * Global error handler plugin.
 * Maps ProcessorError, Fastify validation errors, and unknown errors to
 * consistent JSON envelopes.
 *
 * Wrapped with fp() so the handler applies to every route, not just the
 * routes registered inside this plugin.
 */
export const errorHandlerPlugin = fp(async function (app: FastifyInstance): Promise<void> {
  app.setErrorHandler((error: FastifyError | ProcessorError, request, reply) => {
    const log = request.log;

    if (error instanceof ProcessorError) {
      log.warn({ code: error.code, path: request.url }, error.message);
      const body: ApiResponse = {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details ? { details: error.details } : {}),
        },
      };
      return reply.status(error.statusCode).send(body);
    }

    if (error.validation) {
      const body: ApiResponse = {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: { errors: error.validation },
        },
      };
      return reply.status(400).send(body);
    }

    // Fastify built-in client errors keep their status code
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const body: ApiResponse = {
        success: false,
        error: { code: 'BAD_REQUEST', message: error.message || 'Bad request' },
      };
      return reply.status(error.statusCode).send(body);
    }

    log.error({ err: error, path: request.url }, 'Unhandled error');
    const body: ApiResponse = {
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
    return reply.status(500).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const body: ApiResponse = {
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(body);
  });
});
