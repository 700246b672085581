/**
 * Error and not-found handlers
 *
 * Maps thrown errors to the response envelope:
 * - GatewayError → its own status and code
 * - ZodError → 400 VALIDATION_ERROR with the issues as details
 * - Fastify client errors (bad JSON, oversized body) → their status
 * - anything else → 500 INTERNAL_ERROR, logged, message withheld
 */

import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { GatewayError } from '@tollgate/core';
import { ErrorCodes, wrapError } from './admin/reply-envelope.js';

export function registerErrorHandlers(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof GatewayError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      } else {
        request.log.debug({ code: error.code }, 'Request rejected');
      }
      return reply
        .status(error.statusCode)
        .send(wrapError(error.code, error.message, error.details ? [error.details] : undefined));
    }

    if (error instanceof ZodError) {
      return reply
        .status(400)
        .send(wrapError(ErrorCodes.VALIDATION_ERROR, 'Invalid request', error.issues));
    }

    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send(wrapError(ErrorCodes.BAD_REQUEST, error.message));
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send(wrapError(ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred'));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(wrapError(ErrorCodes.NOT_FOUND, `Route ${request.method} ${request.url} not found`));
  });
}
