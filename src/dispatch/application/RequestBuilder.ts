// src/dispatch/application/RequestBuilder.ts

/**
 * RequestBuilder
 *
 * Turns a path template plus resolved arguments into a fully qualified
 * upstream request. Pure: identical inputs give identical output and
 * nothing outside the arguments is read.
 */

import type { ProviderConfig } from '../domain/Provider';
import type { ParamValue } from '../domain/ToolSpec';
import type { UpstreamRequest } from '../domain/Upstream';
import { extractPlaceholders } from '../domain/ToolSpec';
import { MissingParameterError } from '../domain/errors';

/**
 * Build the upstream request for a path template.
 *
 * @param pathTemplate Path with {name} placeholders, relative to config.baseUrl.
 * @param params       Values for the placeholders; each one is percent-encoded.
 * @param config       Provider credentials, base URL and default query.
 * @param query        Extra query parameters; these override defaultQuery.
 */
export function buildRequest(
  pathTemplate: string,
  params: Readonly<Record<string, ParamValue>>,
  config: ProviderConfig,
  query: Readonly<Record<string, ParamValue>> = {},
): UpstreamRequest {
  const placeholders = extractPlaceholders(pathTemplate);
  const missing = placeholders.filter((name) => !Object.hasOwn(params, name));

  if (missing.length > 0) {
    throw new MissingParameterError(missing);
  }

  const path = pathTemplate.replace(/\{([A-Za-z0-9_]+)\}/g, (_match, name: string) =>
    encodeURIComponent(String(params[name])),
  );

  const url = new URL(`${config.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`);

  for (const [key, value] of Object.entries(config.defaultQuery)) {
    if (!Object.hasOwn(query, key)) {
      url.searchParams.set(key, value);
    }
  }

  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }

  const headers: Record<string, string> = { Accept: 'application/json' };

  if (config.authStyle !== 'none' && config.apiKey !== undefined) {
    if (config.authStyle === 'query_param') {
      // set() replaces any caller-supplied value so the key appears once
      url.searchParams.set(config.apiKeyParam, config.apiKey);
    } else {
      url.searchParams.delete(config.apiKeyParam);
      headers[config.apiKeyHeader] = config.apiKey;
    }
  }

  return { url, headers };
}

/**
 * Render a URL for logs with any API key value masked.
 */
export function redactUrl(url: URL, config: ProviderConfig): string {
  if (!url.searchParams.has(config.apiKeyParam)) {
    return url.toString();
  }

  const copy = new URL(url.toString());
  copy.searchParams.set(config.apiKeyParam, '***');
  return copy.toString();
}
