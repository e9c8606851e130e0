/**
 * Express application setup for the HTTP transport.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (JSON parsing, correlation ids, request logging).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts the MCP endpoint and the /v1/tools inspection routes when
 *   their dependencies are provided.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import type { IToolDispatcher } from './dispatch/application/ToolDispatcher';
import type { IToolRegistry } from './dispatch/application/ToolRegistry';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createMcpRoutes, type McpServerFactory } from './http/routes/mcpRoutes';
import { createToolRoutes } from './http/routes/toolRoutes';
import { logger } from './shared/logging/Logger';

export type AppDeps = {
  service?: { name: string; version: string };
  registry?: IToolRegistry;
  dispatcher?: IToolDispatcher;
  mcpServerFactory?: McpServerFactory;
};

export function createApp(deps: AppDeps = {}): Application {
  const app = express();

  // Parse JSON bodies
  app.use(express.json({ limit: '1mb' }));
  app.use(correlationIdMiddleware);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: deps.service?.name ?? 'sports-data-mcp',
      ...(deps.service ? { version: deps.service.version } : {}),
      tools: deps.registry?.list().length ?? 0,
      timestamp: new Date().toISOString(),
    });
  });

  if (deps.mcpServerFactory) {
    app.use(createMcpRoutes(deps.mcpServerFactory));
  }

  if (deps.registry && deps.dispatcher) {
    app.use(createToolRoutes(deps.registry, deps.dispatcher));
  }

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
