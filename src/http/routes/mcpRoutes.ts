// src/http/routes/mcpRoutes.ts

/**
 * /mcp route: MCP over Streamable HTTP, stateless.
 *
 * Each POST gets its own MCP server and transport, closed when the
 * response ends, so no session state is shared between requests.
 * GET and DELETE (SSE stream / session teardown) are not offered.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { logger } from '../../shared/logging/Logger';

export type McpServerFactory = () => Server;

function methodNotAllowed(_req: Request, res: Response): Response {
  return res.status(405).set('Allow', 'POST').json({
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Method not allowed.' },
    id: null,
  });
}

export function createMcpRoutes(createServer: McpServerFactory): Router {
  const router = Router();

  router.post('/mcp', async (req: Request, res: Response, next: NextFunction) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        logger.warn({ correlationId: req.correlationId, err }, 'Failed to close MCP transport');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      if (res.headersSent) {
        logger.error({ correlationId: req.correlationId, err }, 'MCP request failed mid-response');
        return;
      }
      next(err);
    }
  });

  router.get('/mcp', methodNotAllowed);
  router.delete('/mcp', methodNotAllowed);

  return router;
}
