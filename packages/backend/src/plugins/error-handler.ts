/**
 * Global error handler plugin
 * Ensures consistent error responses without leaking internal details
 */

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError, InternalError, InvalidRequestError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId;

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      const validationError = new InvalidRequestError(
        'Invalid request',
        error.errors.map((e) => ({
          field: e.path.join('.'),
          message: e.message,
        }))
      );

      logger.warn(
        {
          validationErrors: validationError.details,
          correlationId,
          method: request.method,
          url: request.url,
        },
        'Request validation failed'
      );

      return reply.status(validationError.statusCode).send(validationError.toResponse(correlationId));
    }

    // Handle application errors
    if (error instanceof AppError) {
      const fields = {
        kind: error.kind,
        errorMessage: error.message,
        errorDetails: error.details,
        statusCode: error.statusCode,
        correlationId,
        method: request.method,
        url: request.url,
      };
      if (error.statusCode >= 500) {
        logger.error({ ...fields, stack: error.stack }, `${error.kind}: ${error.message}`);
      } else {
        logger.warn(fields, `${error.kind}: ${error.message}`);
      }

      return reply.status(error.statusCode).send(error.toResponse(correlationId));
    }

    // Handle Fastify validation errors
    if (error.validation) {
      const validationError = new InvalidRequestError(
        'Invalid request',
        error.validation.map((v) => ({
          field: v.instancePath.replace(/^\//, ''),
          message: v.message || 'Invalid value',
        }))
      );
      return reply.status(validationError.statusCode).send(validationError.toResponse(correlationId));
    }

    // Client errors raised by Fastify itself (malformed JSON, unsupported media type)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ code: error.code, errorMessage: error.message, correlationId }, 'Rejected request');
      const clientError = new InvalidRequestError(error.message);
      return reply.status(error.statusCode).send(clientError.toResponse(correlationId));
    }

    // Handle unknown errors - don't leak details
    logger.error(
      {
        errorName: error.name,
        errorCode: error.code,
        errorMessage: error.message,
        correlationId,
        method: request.method,
        url: request.url,
        stack: error.stack,
      },
      `Unhandled error: ${error.name} - ${error.message}`
    );

    const internalError = new InternalError();
    return reply.status(internalError.statusCode).send(internalError.toResponse(correlationId));
  });

  // Handle 404
  fastify.setNotFoundHandler((request, reply) => {
    const notFound = new NotFoundError('Route');
    reply.status(notFound.statusCode).send(notFound.toResponse(request.correlationId));
  });
};

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
