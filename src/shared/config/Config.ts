/**
 * Runtime configuration for the sports data MCP servers.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase. Provider credentials
 * are resolved separately (see resolveProviderConfig) so a missing
 * API key fails the server that needs it, and only that one.
 */
import dotenv from 'dotenv';

import type { AuthStyle, ProviderConfig, ProviderId } from '../../dispatch/domain/Provider';

dotenv.config();

export type McpTransportKind = 'stdio' | 'http';

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  serviceName: string;
  serviceVersion: string;
  logLevel: string;
  requestTimeoutMs: number;
  retryDelayMs: number;
  maxResponseChars: number;
  rateLimitPerMinute: number;
  transport: McpTransportKind;
  port: number;
}

const DEFAULT_PORT = 8000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_DELAY_MS = 250;
const DEFAULT_MAX_RESPONSE_CHARS = 50_000;
const DEFAULT_RATE_LIMIT_PER_MINUTE = 60;

/**
 * Thrown when the process cannot start serving tools because its
 * environment is incomplete. Never raised per invocation.
 */
export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function parseEnv(raw: string | undefined): AppConfig['env'] {
  if (raw === 'production' || raw === 'test' || raw === 'development') {
    return raw;
  }
  return 'development';
}

function parseTransport(raw: string | undefined): McpTransportKind {
  return raw === 'http' ? 'http' : 'stdio';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value < 0) {
    return fallback;
  }
  return value;
}

/**
 * Build an AppConfig from an environment map. Invalid numeric values
 * fall back to their defaults rather than failing startup.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const appEnv = parseEnv(env.NODE_ENV);

  return {
    env: appEnv,
    serviceName: env.SERVICE_NAME || 'sports-data-mcp',
    serviceVersion: env.SERVICE_VERSION || '0.1.0',
    logLevel: env.LOG_LEVEL || (appEnv === 'production' ? 'info' : 'debug'),
    requestTimeoutMs: parsePositiveInt(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
    retryDelayMs: parseNonNegativeInt(env.RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    maxResponseChars: parsePositiveInt(env.MAX_RESPONSE_CHARS, DEFAULT_MAX_RESPONSE_CHARS),
    // 0 disables the limiter
    rateLimitPerMinute: parseNonNegativeInt(
      env.RATE_LIMIT_PER_MINUTE,
      DEFAULT_RATE_LIMIT_PER_MINUTE,
    ),
    transport: parseTransport(env.MCP_TRANSPORT),
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
  };
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = loadAppConfig();

/* ------------------------- provider credentials ------------------------- */

const SPORTRADAR_HOST = 'https://api.sportradar.com';
const DEFAULT_ERGAST_BASE_URL = 'https://api.jolpi.ca/ergast/f1';
const DEFAULT_OPENF1_BASE_URL = 'https://api.openf1.org/v1';

function readSportRadarAuthStyle(env: NodeJS.ProcessEnv): AuthStyle {
  const raw = env.SPORTRADAR_AUTH_STYLE?.trim();
  if (raw === undefined || raw.length === 0 || raw === 'query_param') {
    return 'query_param';
  }
  if (raw === 'header') {
    return 'header';
  }
  throw new ConfigurationError(
    `SPORTRADAR_AUTH_STYLE must be "query_param" or "header", got "${raw}"`,
  );
}

function readSportRadarAccessLevel(env: NodeJS.ProcessEnv): string {
  const raw = env.SPORTRADAR_ACCESS_LEVEL?.trim();
  if (raw === undefined || raw.length === 0) {
    return 'production';
  }
  if (raw !== 'production' && raw !== 'trial') {
    throw new ConfigurationError(
      `SPORTRADAR_ACCESS_LEVEL must be "production" or "trial", got "${raw}"`,
    );
  }
  return raw;
}

function readBaseUrl(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  const value = raw && raw.length > 0 ? raw : fallback;

  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`${key} is not a valid URL: "${value}"`);
  }

  return value.replace(/\/+$/, '');
}

function resolveSportRadar(
  id: 'mlb' | 'nba',
  env: NodeJS.ProcessEnv,
): ProviderConfig {
  const apiKey = env.SPORTRADAR_API_KEY?.trim();

  if (!apiKey || apiKey.length === 0) {
    throw new ConfigurationError('SPORTRADAR_API_KEY environment variable is required');
  }

  const accessLevel = readSportRadarAccessLevel(env);
  const baseUrlKey = id === 'mlb' ? 'MLB_API_BASE_URL' : 'NBA_API_BASE_URL';

  return Object.freeze({
    id,
    apiKey,
    authStyle: readSportRadarAuthStyle(env),
    apiKeyParam: 'api_key',
    apiKeyHeader: 'x-api-key',
    baseUrl: readBaseUrl(env, baseUrlKey, `${SPORTRADAR_HOST}/${id}/${accessLevel}/v8`),
    defaultQuery: Object.freeze({}),
  });
}

/**
 * Resolve the immutable ProviderConfig for a provider.
 *
 * Called once per provider at startup. Throws ConfigurationError when a
 * required credential is missing so the server refuses to start.
 */
export function resolveProviderConfig(
  providerId: ProviderId,
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig {
  switch (providerId) {
    case 'mlb':
    case 'nba':
      return resolveSportRadar(providerId, env);

    case 'ergast':
      return Object.freeze({
        id: providerId,
        authStyle: 'none',
        apiKeyParam: 'api_key',
        apiKeyHeader: 'x-api-key',
        baseUrl: readBaseUrl(env, 'ERGAST_API_BASE_URL', DEFAULT_ERGAST_BASE_URL),
        // Ergast pages at 30 rows; a full season calendar or grid fits in 100.
        defaultQuery: Object.freeze({ limit: '100' }),
      });

    case 'openf1':
      return Object.freeze({
        id: providerId,
        authStyle: 'none',
        apiKeyParam: 'api_key',
        apiKeyHeader: 'x-api-key',
        baseUrl: readBaseUrl(env, 'OPENF1_API_BASE_URL', DEFAULT_OPENF1_BASE_URL),
        defaultQuery: Object.freeze({}),
      });
  }
}
