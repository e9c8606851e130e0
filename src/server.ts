/**
 * Process entrypoint shared by the three executables.
 *
 * This file:
 * - Parses --transport / --port (falling back to MCP_TRANSPORT / PORT)
 * - Resolves provider credentials and builds the runtime deps
 * - Serves MCP over stdio, or over HTTP with the Express app
 * - Shuts down on SIGINT / SIGTERM
 */
import { createServer } from 'http';
import { parseArgs } from 'util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import type { ServerDefinition } from './providers/ServerDefinition';
import { type AppConfig, config, ConfigurationError, type McpTransportKind } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const MIN_PORT = 1024;
const MAX_PORT = 65535;

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliOptions = {
  transport: McpTransportKind;
  port: number;
};

export function parseCliOptions(
  argv: readonly string[],
  defaults: Pick<AppConfig, 'transport' | 'port'> = config,
): CliOptions {
  let values: { transport?: string; port?: string };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        transport: { type: 'string', short: 't' },
        port: { type: 'string', short: 'p' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const transport = values.transport ?? defaults.transport;
  if (transport !== 'stdio' && transport !== 'http') {
    throw new CliUsageError(`--transport must be "stdio" or "http", got "${transport}"`);
  }

  const port = values.port !== undefined ? Number(values.port) : defaults.port;
  // stdio never binds, so the port only matters for http
  if (transport === 'http' && (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT)) {
    throw new CliUsageError(`--port must be an integer between ${MIN_PORT} and ${MAX_PORT}`);
  }

  return { transport, port };
}

/**
 * Start serving one definition. Resolves once the transport is up.
 */
export async function startServer(
  definition: ServerDefinition,
  argv: readonly string[] = process.argv.slice(2),
): Promise<void> {
  const options = parseCliOptions(argv);
  const deps = buildRuntimeDeps(definition);

  if (options.transport === 'stdio') {
    const server = deps.createMcpServer();
    await server.connect(new StdioServerTransport());

    logger.info(
      { server: definition.name, transport: 'stdio', tools: deps.registry.list().length },
      'MCP server started',
    );

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      server
        .close()
        .catch((err: unknown) => logger.error({ err }, 'Error while closing MCP server'))
        .finally(() => process.exit(0));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    return;
  }

  const app = createApp({
    service: { name: definition.name, version: definition.version },
    registry: deps.registry,
    dispatcher: deps.dispatcher,
    mcpServerFactory: deps.createMcpServer,
  });
  const httpServer = createServer(app);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  logger.info(
    { server: definition.name, transport: 'http', port: options.port, env: config.env },
    'MCP server started',
  );

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    httpServer.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * startServer for executables: startup failures are logged and the
 * process exits with status 1.
 */
export function runServer(definition: ServerDefinition): void {
  startServer(definition).catch((err: unknown) => {
    if (err instanceof ConfigurationError || err instanceof CliUsageError) {
      logger.fatal({ server: definition.name }, err.message);
    } else {
      logger.fatal({ server: definition.name, err }, 'Failed to start server');
    }
    process.exitCode = 1;
  });
}
