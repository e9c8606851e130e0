// src/mcp/McpToolServer.ts

/**
 * MCP surface for one server definition.
 *
 * tools/list advertises the registry; tools/call goes through the
 * dispatcher and is rendered as a single text block. Error results keep
 * the protocol call successful and set isError so the assistant can
 * read the reason.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import type { IToolDispatcher } from '../dispatch/application/ToolDispatcher';
import type { IToolRegistry } from '../dispatch/application/ToolRegistry';
import { serializePayload } from '../dispatch/application/ResponseNormalizer';
import type { NormalizedResult } from '../dispatch/domain/NormalizedResult';
import { toolInputSchema } from '../dispatch/dto/ToolArgumentsDto';

export type McpServerIdentity = {
  name: string;
  version: string;
};

export type McpServerDeps = {
  registry: IToolRegistry;
  dispatcher: IToolDispatcher;
};

export function listTools(registry: IToolRegistry): Tool[] {
  return registry.list().map((spec) => ({
    name: spec.name,
    description: spec.description,
    inputSchema: toolInputSchema(spec),
  }));
}

export function toCallToolResult(result: NormalizedResult): CallToolResult {
  if (result.status === 'ok') {
    return { content: [{ type: 'text', text: serializePayload(result.payload) }] };
  }

  return {
    content: [{ type: 'text', text: `Error (${result.errorCode}): ${result.errorDetail}` }],
    isError: true,
  };
}

export function createMcpServer(identity: McpServerIdentity, deps: McpServerDeps): Server {
  const server = new Server(
    { name: identity.name, version: identity.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(deps.registry),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await deps.dispatcher.dispatch(
      request.params.name,
      request.params.arguments ?? {},
    );
    return toCallToolResult(result);
  });

  return server;
}
