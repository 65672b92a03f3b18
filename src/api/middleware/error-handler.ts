/**
 * Error Handler Middleware
 *
 * Global error handler for Fastify, plus the mapping from core failures to
 * HTTP statuses
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { CoreErrorCode, type CoreFailure, type Result } from '../../errors.js';
import type { ErrorResponse } from '../types.js';

/**
 * Custom API error with status code
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const STATUS_BY_CODE: Record<CoreErrorCode, number> = {
  [CoreErrorCode.INVALID_TOKEN]: 401,
  [CoreErrorCode.EXPIRED]: 410,
  [CoreErrorCode.ALREADY_USED]: 409,
  [CoreErrorCode.ALREADY_VOTED]: 409,
  [CoreErrorCode.ELECTION_NOT_OPEN]: 409,
  [CoreErrorCode.INVALID_TRANSITION]: 409,
  [CoreErrorCode.CHAIN_BROKEN]: 409,
  [CoreErrorCode.SECOND_FACTOR_MISMATCH]: 403,
  [CoreErrorCode.ELECTION_NOT_CLOSED]: 403,
  [CoreErrorCode.ELECTION_NOT_FOUND]: 404,
  [CoreErrorCode.INVALID_INPUT]: 400,
  [CoreErrorCode.STORAGE_UNAVAILABLE]: 503,
};

/**
 * Convert a core failure to an API error
 */
export function fromFailure(failure: CoreFailure): ApiError {
  return new ApiError(STATUS_BY_CODE[failure.code], failure.message, failure.code);
}

/**
 * Return the value of a core result or throw the matching API error
 */
export function orThrow<T>(result: Result<T>): T {
  if (!result.ok) {
    throw fromFailure(result.error);
  }
  return result.value;
}

/**
 * Error handler function for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const response: ErrorResponse = {
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    };

    reply.status(400).send({
      ...response,
      validationErrors: error.errors,
    });
    return;
  }

  // Handle custom API errors
  if (error instanceof ApiError) {
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
      },
    };

    if (error.statusCode >= 500) {
      request.log.error({ code: error.code }, error.message);
    }
    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle Fastify errors
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    const response: ErrorResponse = {
      error: {
        message: error.message,
        code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
        statusCode: error.statusCode,
      },
    };

    reply.status(error.statusCode).send(response);
    return;
  }

  // Handle generic errors
  request.log.error({ err: error }, 'Unhandled error');
  const response: ErrorResponse = {
    error: {
      message: 'Internal server error',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    },
  };

  reply.status(500).send(response);
}

/**
 * Helper to create unauthorized error
 */
export function unauthorized(message = 'Unauthorized'): ApiError {
  return new ApiError(401, message, 'UNAUTHORIZED');
}

/**
 * Helper to create forbidden error
 */
export function forbidden(message = 'Forbidden'): ApiError {
  return new ApiError(403, message, 'FORBIDDEN');
}
