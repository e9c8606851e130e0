/**
 * NormalizedResult
 *
 * The uniform outcome of one tool invocation. Dispatch never throws for
 * per-invocation failures; it returns the error variant instead.
 */

import type { DispatchErrorCode } from './errors';

export type NormalizedPayload = Record<string, unknown> | unknown[] | string;

export interface NormalizedSuccess {
  status: 'ok';
  payload: NormalizedPayload;

  /**
   * True when payload is a shortened text rendering of a larger body.
   */
  truncated: boolean;
}

export interface NormalizedFailure {
  status: 'error';
  errorCode: DispatchErrorCode;
  errorDetail: string;
  issues?: string[];
}

export type NormalizedResult = NormalizedSuccess | NormalizedFailure;
