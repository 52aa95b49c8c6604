import { ZodError } from 'zod';
import {
  ConfigurationError,
  ExternalServiceError,
  MalformedResponseError,
  NotFoundError,
  ProposalStateError,
} from '../alignment/errors.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'UPSTREAM_FAILED'
  | 'MISCONFIGURED'
  | 'INTERNAL';

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

function sanitizeMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/sk-[A-Za-z0-9_-]{8,}/g, '[KEY_REDACTED]');
}

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack)
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof NotFoundError) {
    return buildErrorV1(
      'NOT_FOUND',
      error.message,
      { resource: error.resource, ...(error.resourceId ? { id: error.resourceId } : {}) },
      requestId
    );
  }

  if (error instanceof ProposalStateError) {
    return buildErrorV1(
      'CONFLICT',
      error.message,
      { proposal_id: error.proposalId, status: error.currentStatus },
      requestId
    );
  }

  if (error instanceof ExternalServiceError) {
    return buildErrorV1(
      'UPSTREAM_FAILED',
      sanitizeMessage(error.message),
      { service: error.service, operation: error.operation },
      requestId
    );
  }

  if (error instanceof MalformedResponseError) {
    return buildErrorV1('UPSTREAM_FAILED', sanitizeMessage(error.message), { operation: error.operation }, requestId);
  }

  if (error instanceof ConfigurationError) {
    return buildErrorV1('MISCONFIGURED', error.message, error.details, requestId);
  }

  if (error instanceof Error) {
    if (hasStatusCode(error) && error.statusCode === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeMessage(error.message), undefined, requestId);
    }
    return buildErrorV1('INTERNAL', sanitizeMessage(error.message || 'An unexpected error occurred'), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
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
    case 'RATE_LIMITED':
      return 429;
    case 'UPSTREAM_FAILED':
      return 502;
    case 'MISCONFIGURED':
    case 'INTERNAL':
    default:
      return 500;
  }
}
