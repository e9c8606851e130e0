// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * All HTTP error responses follow this structure so clients can parse
 * them the same way, whichever route failed.
 */

import type { DispatchErrorCode } from '../../dispatch/domain/errors';

export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    correlationId?: string;
    issues?: string[];
    details?: unknown;
  };
};

export function buildErrorEnvelope(params: {
  code: string;
  message: string;
  correlationId?: string;
  issues?: string[];
  details?: unknown;
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
      ...(params.details !== undefined ? { details: params.details } : {}),
    },
  };
}

/**
 * HTTP status for a tool dispatch error code.
 */
export function statusForErrorCode(code: DispatchErrorCode): number {
  switch (code) {
    case 'UNKNOWN_TOOL':
      return 404;
    case 'MISSING_PARAMETER':
    case 'INVALID_PARAMETER':
      return 400;
    case 'RATE_LIMITED':
      return 429;
    case 'TRANSPORT_ERROR':
    case 'UPSTREAM_ERROR':
    case 'NORMALIZATION_ERROR':
      return 502;
    case 'INTERNAL_ERROR':
      return 500;
  }
}
