/**
 * Per-invocation error taxonomy.
 *
 * Every failure a single tool call can hit is one of these. The
 * dispatcher converts them into NormalizedResult{status: "error"}, so
 * they never escape to the transport. ConfigurationError is not part of
 * this family: it is startup-fatal (see shared/config/Config).
 */

export type DispatchErrorCode =
  | 'UNKNOWN_TOOL'
  | 'MISSING_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'RATE_LIMITED'
  | 'TRANSPORT_ERROR'
  | 'UPSTREAM_ERROR'
  | 'NORMALIZATION_ERROR'
  | 'INTERNAL_ERROR';

export abstract class ToolDispatchError extends Error {
  public abstract readonly code: DispatchErrorCode;

  /**
   * Per-argument details, when the error concerns several arguments.
   */
  public readonly issues?: string[];

  protected constructor(message: string, issues?: string[]) {
    super(message);
    this.issues = issues;
  }
}

export class UnknownToolError extends ToolDispatchError {
  public readonly code = 'UNKNOWN_TOOL';

  public constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class MissingParameterError extends ToolDispatchError {
  public readonly code = 'MISSING_PARAMETER';

  public constructor(public readonly missing: string[]) {
    super(`Missing required parameter(s): ${missing.join(', ')}`, [...missing]);
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends ToolDispatchError {
  public readonly code = 'INVALID_PARAMETER';

  public constructor(issues: string[]) {
    super(`Invalid parameter(s): ${issues.join('; ')}`, issues);
    this.name = 'InvalidParameterError';
  }
}

export class RateLimitedError extends ToolDispatchError {
  public readonly code = 'RATE_LIMITED';

  public constructor(public readonly limitPerMinute: number) {
    super(`Rate limit exceeded (${limitPerMinute} requests per minute). Please try again later.`);
    this.name = 'RateLimitedError';
  }
}

export type TransportFailureReason = 'timeout' | 'network';

/**
 * The request never produced an HTTP response.
 */
export class TransportError extends ToolDispatchError {
  public readonly code = 'TRANSPORT_ERROR';

  public constructor(
    public readonly reason: TransportFailureReason,
    detail: string,
  ) {
    super(`Upstream request failed (${reason}): ${detail}`);
    this.name = 'TransportError';
  }
}

/**
 * The upstream answered with HTTP status >= 400.
 */
export class UpstreamError extends ToolDispatchError {
  public readonly code = 'UPSTREAM_ERROR';

  public constructor(
    public readonly statusCode: number,
    public readonly bodySnippet: string,
    public readonly retryAfter?: string,
  ) {
    super(
      `Upstream returned HTTP ${statusCode}` +
        (retryAfter ? ` (retry after ${retryAfter})` : '') +
        (bodySnippet ? `: ${bodySnippet}` : ''),
    );
    this.name = 'UpstreamError';
  }

  public get isServerError(): boolean {
    return this.statusCode >= 500;
  }
}

export const INVALID_UPSTREAM_RESPONSE = 'invalid upstream response';

export class NormalizationError extends ToolDispatchError {
  public readonly code = 'NORMALIZATION_ERROR';

  public constructor() {
    super(INVALID_UPSTREAM_RESPONSE);
    this.name = 'NormalizationError';
  }
}
