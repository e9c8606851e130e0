// src/dispatch/application/ResponseNormalizer.ts

/**
 * ResponseNormalizer
 *
 * Shapes a raw upstream body into a NormalizedResult:
 * 1) parse JSON (bare NaN / Infinity read as null)
 * 2) convert row records to columns for tabular tools
 * 3) run the tool's shape step, if any
 * 4) truncate the text rendering when it exceeds maxChars
 *
 * Without tabular conversion or a shape step the parsed object is
 * returned as-is, so top-level keys and values are preserved.
 */

import type { NormalizedPayload, NormalizedResult } from '../domain/NormalizedResult';
import type { PayloadShaper, ResolvedArguments } from '../domain/ToolSpec';
import { INVALID_UPSTREAM_RESPONSE } from '../domain/errors';
import { parseLenientJson } from './lenientJson';
import { isRecord, rowsToColumns } from './tabular';

export type NormalizeOptions = {
  tabular?: boolean;
  shape?: PayloadShaper;
  args?: ResolvedArguments;
};

export const TRUNCATION_MARKER_PREFIX = '\n...[truncated: showing';

/**
 * Text rendering used both for the size check and for presentation.
 */
export function serializePayload(payload: NormalizedPayload): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
}

export class ResponseNormalizer {
  public constructor(private readonly maxChars: number) {}

  public normalize(
    body: string,
    contentType: string | null,
    options: NormalizeOptions = {},
  ): NormalizedResult {
    if (contentType !== null && /text\/html/i.test(contentType)) {
      return invalidResponse();
    }

    let parsed: unknown;
    try {
      parsed = parseLenientJson(body);
    } catch {
      return invalidResponse();
    }

    if (options.tabular) {
      parsed = rowsToColumns(parsed) ?? parsed;
    }

    if (options.shape) {
      parsed = options.shape(parsed, options.args ?? {});
    }

    if (!Array.isArray(parsed) && !isRecord(parsed)) {
      return invalidResponse();
    }

    return this.truncate(parsed);
  }

  /**
   * Apply the size limit to an already-parsed payload.
   */
  public truncate(payload: Record<string, unknown> | unknown[]): NormalizedResult {
    const text = serializePayload(payload);

    if (text.length <= this.maxChars) {
      return { status: 'ok', payload, truncated: false };
    }

    const kept = keepWholeCodePoints(text, this.maxChars);

    return {
      status: 'ok',
      payload:
        kept + `${TRUNCATION_MARKER_PREFIX} ${kept.length} of ${text.length} characters]`,
      truncated: true,
    };
  }
}

/**
 * First maxChars UTF-16 units of text, one fewer when the cut would
 * separate a surrogate pair.
 */
function keepWholeCodePoints(text: string, maxChars: number): string {
  const last = text.charCodeAt(maxChars - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxChars - 1 : maxChars;
  return text.slice(0, end);
}

function invalidResponse(): NormalizedResult {
  return {
    status: 'error',
    errorCode: 'NORMALIZATION_ERROR',
    errorDetail: INVALID_UPSTREAM_RESPONSE,
  };
}
