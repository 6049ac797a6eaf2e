import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';
import { isPrimingError, type PrimingError } from '../priming/errors.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'CONFLICT' | 'INTERNAL';

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

/**
 * A stack mismatch means the caller's begin/end events disagree with the
 * stack; every other priming error is a problem with the submitted tree.
 */
export function primingErrorToErrorV1(error: PrimingError, requestId?: string): ErrorV1 {
  const code: ErrorCode = error.code === 'STACK_MISMATCH' ? 'CONFLICT' : 'BAD_INPUT';
  return buildErrorV1(code, error.message, { priming_code: error.code }, requestId);
}

function sanitiseMessage(message: string): string {
  return message
    // File paths
    .replace(/\/[\w/.@-]+/g, '[path]')
    // Potential secrets
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    // Email addresses
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Fastify errors carry an HTTP status; only the 4xx ones are the caller's.
 */
function clientStatusOf(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (isPrimingError(error)) {
    return primingErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    const status = clientStatusOf(error);
    if (status === 404) {
      return buildErrorV1('NOT_FOUND', 'Route not found', undefined, requestId);
    }
    if (status !== undefined) {
      // Malformed JSON, body too large, unsupported media type
      return buildErrorV1('BAD_INPUT', sanitiseMessage(error.message), { http_status: status }, requestId);
    }
    return buildErrorV1('INTERNAL', sanitiseMessage(error.message || 'An unexpected error occurred'), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitiseMessage(error), undefined, requestId);
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
    case 'NOT_FOUND':
      return 404;
    case 'CONFLICT':
      return 409;
    case 'INTERNAL':
    default:
      return 500;
  }
}
