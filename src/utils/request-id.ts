import { randomUUID } from 'node:crypto';
import type { FastifyRequest, RawRequestDefaultExpression } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Reuse an incoming X-Request-Id header or generate a new one.
 * Wired as Fastify's `genReqId`, so `request.id` carries the result.
 */
export function getOrGenerateRequestId(raw: RawRequestDefaultExpression): string {
  const incomingId = raw.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string') {
    const trimmed = incomingId.trim();
    if (trimmed.length > 0 && trimmed.length <= MAX_INCOMING_ID_LENGTH) {
      return trimmed;
    }
  }

  return generateRequestId();
}

export function getRequestId(request?: FastifyRequest): string {
  return request?.id ?? 'unknown';
}
