/**
 * Upstream request/response shapes shared by the builder and executor.
 */

export interface UpstreamRequest {
  url: URL;
  headers: Record<string, string>;
}

export interface UpstreamResponse {
  statusCode: number;
  body: string;
  contentType: string | null;
}

/**
 * Abstraction over the outbound HTTP call so dispatch can be tested
 * with an in-process stand-in.
 */
export interface IHttpExecutor {
  /**
   * Resolve with the response for any status below 400; reject with
   * TransportError or UpstreamError otherwise.
   */
  execute(request: UpstreamRequest): Promise<UpstreamResponse>;
}
