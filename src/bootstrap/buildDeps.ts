// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure and application services
 * for one server definition.
 *
 * Provider configs are resolved here, once. A missing credential throws
 * ConfigurationError before any transport is started.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';

import { type AppConfig, config, resolveProviderConfig } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';

import type { ProviderConfig, ProviderId } from '../dispatch/domain/Provider';
import type { IHttpExecutor } from '../dispatch/domain/Upstream';
import { SlidingWindowRateLimiter } from '../dispatch/application/RateLimiter';
import { ResponseNormalizer } from '../dispatch/application/ResponseNormalizer';
import { ToolDispatcher } from '../dispatch/application/ToolDispatcher';
import { ToolRegistry } from '../dispatch/application/ToolRegistry';
import { FetchHttpExecutor } from '../dispatch/infrastructure/FetchHttpExecutor';
import { createMcpServer } from '../mcp/McpToolServer';
import type { ServerDefinition } from '../providers/ServerDefinition';

export type RuntimeDeps = {
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  providerConfigs: ReadonlyMap<ProviderId, ProviderConfig>;

  /**
   * Fresh MCP server bound to the shared dispatcher. Stdio uses one;
   * stateless HTTP creates one per request.
   */
  createMcpServer: () => Server;
};

export type BuildDepsOptions = {
  env?: NodeJS.ProcessEnv;
  appConfig?: AppConfig;

  /**
   * Replaces the fetch-based executor (tests).
   */
  executor?: IHttpExecutor;
};

export function buildRuntimeDeps(
  definition: ServerDefinition,
  options: BuildDepsOptions = {},
): RuntimeDeps {
  const env = options.env ?? process.env;
  const appConfig = options.appConfig ?? config;

  const providerConfigs = new Map<ProviderId, ProviderConfig>(
    definition.providers.map((id) => [id, resolveProviderConfig(id, env)] as const),
  );

  const registry = new ToolRegistry(definition.tools, definition.providers);

  const executor =
    options.executor ??
    new FetchHttpExecutor({
      timeoutMs: appConfig.requestTimeoutMs,
      retryDelayMs: appConfig.retryDelayMs,
      logger,
    });

  const dispatcher = new ToolDispatcher({
    registry,
    providerConfigs,
    executor,
    normalizer: new ResponseNormalizer(appConfig.maxResponseChars),
    rateLimiter: new SlidingWindowRateLimiter(appConfig.rateLimitPerMinute),
    logger,
  });

  return {
    registry,
    dispatcher,
    providerConfigs,
    createMcpServer: () =>
      createMcpServer(
        { name: definition.name, version: definition.version },
        { registry, dispatcher },
      ),
  };
}
