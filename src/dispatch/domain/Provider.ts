/**
 * Provider domain model.
 *
 * A provider is one upstream sports-data API. Its configuration is
 * resolved once at startup, frozen, and handed explicitly to every
 * request build; nothing reads credentials from ambient state.
 */

/**
 * Upstream APIs the servers talk to:
 * - "mlb" / "nba" → SportRadar v8 (API key required)
 * - "ergast"      → Jolpica-Ergast F1 archive (keyless)
 * - "openf1"      → OpenF1 timing data (keyless)
 */
export type ProviderId = 'mlb' | 'nba' | 'ergast' | 'openf1';

/**
 * Where the API key travels. "none" is used by keyless providers.
 */
export type AuthStyle = 'query_param' | 'header' | 'none';

export interface ProviderConfig {
  readonly id: ProviderId;

  /**
   * Present whenever authStyle is not "none".
   */
  readonly apiKey?: string;

  /**
   * Base URL without a trailing slash.
   * Example: "https://api.sportradar.com/mlb/production/v8".
   */
  readonly baseUrl: string;

  readonly authStyle: AuthStyle;

  /**
   * Query parameter carrying the key when authStyle is "query_param".
   */
  readonly apiKeyParam: string;

  /**
   * Header carrying the key when authStyle is "header".
   */
  readonly apiKeyHeader: string;

  /**
   * Query parameters appended to every request unless the caller
   * supplies the same key.
   */
  readonly defaultQuery: Readonly<Record<string, string>>;
}
