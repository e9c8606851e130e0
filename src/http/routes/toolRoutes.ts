// src/http/routes/toolRoutes.ts

/**
 * /v1/tools routes
 *
 * Plain JSON view of the same registry and dispatcher the MCP transport
 * uses, for inspection and scripting:
 * - GET  /v1/tools        → advertised tools with their input schemas
 * - POST /v1/tools/:name  → one invocation; error results map to HTTP statuses
 *
 * The route stays thin: validate body → dispatch → map result.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type { IToolDispatcher } from '../../dispatch/application/ToolDispatcher';
import type { IToolRegistry } from '../../dispatch/application/ToolRegistry';
import { parseToolCallDto } from '../../dispatch/dto/ToolCallDto';
import { listTools } from '../../mcp/McpToolServer';
import { buildErrorEnvelope, statusForErrorCode } from '../errors/errorEnvelope';

export function createToolRoutes(registry: IToolRegistry, dispatcher: IToolDispatcher): Router {
  const router = Router();

  router.get('/v1/tools', (_req: Request, res: Response) => {
    return res.status(200).json({ tools: listTools(registry) });
  });

  router.post(
    '/v1/tools/:name',
    async (req: Request<{ name: string }>, res: Response, next: NextFunction) => {
      try {
        const args = parseToolCallDto(req.body);
        const result = await dispatcher.dispatch(req.params.name, args);

        if (result.status === 'ok') {
          return res.status(200).json({
            tool: req.params.name,
            truncated: result.truncated,
            payload: result.payload,
          });
        }

        return res.status(statusForErrorCode(result.errorCode)).json(
          buildErrorEnvelope({
            code: result.errorCode,
            message: result.errorDetail,
            correlationId: req.correlationId,
            issues: result.issues,
          }),
        );
      } catch (err) {
        return next(err);
      }
    },
  );

  return router;
}
