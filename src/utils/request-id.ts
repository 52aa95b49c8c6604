import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Reuse an incoming X-Request-Id or generate a new one.
 * Wired into Fastify as `genReqId`, so `request.id` carries it.
 */
export function getOrGenerateRequestId(request: { headers: IncomingHttpHeaders }): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string' && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}
