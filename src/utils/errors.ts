import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'UNAUTHENTICATED' | 'NOT_FOUND' | 'RATE_LIMITED' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function readProp(error: Error, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/** Strip file paths, KEY=/SECRET= assignments and email addresses. */
export function scrubMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Convert any error to ErrorV1 (never includes the stack)
 *
 * @param request Optional Fastify request for the request id
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    const statusCode = readProp(error, 'statusCode');
    const code = readProp(error, 'code');

    if (statusCode === 429 || error.message.toLowerCase().includes('rate limit')) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }

    if (code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    // Fastify client errors (malformed JSON, unsupported media type, ...)
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
      if (statusCode === 404) {
        return buildErrorV1('NOT_FOUND', scrubMessage(error.message), undefined, requestId);
      }
      return buildErrorV1('BAD_INPUT', scrubMessage(error.message), undefined, requestId);
    }

    return buildErrorV1(
      'INTERNAL',
      scrubMessage(error.message || 'An unexpected error occurred'),
      undefined,
      requestId
    );
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', scrubMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'UNAUTHENTICATED':
      return 401;
    case 'NOT_FOUND':
      return 404;
    case 'RATE_LIMITED':
      return 429;
    case 'INTERNAL':
    default:
      return 500;
  }
}
