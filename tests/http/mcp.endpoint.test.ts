// tests/http/mcp.endpoint.test.ts

import request from 'supertest';

import { createApp } from '../../src/app';
import type { IToolDispatcher } from '../../src/dispatch/application/ToolDispatcher';
import { ToolRegistry } from '../../src/dispatch/application/ToolRegistry';
import type { NormalizedResult } from '../../src/dispatch/domain/NormalizedResult';
import type { ToolSpec } from '../../src/dispatch/domain/ToolSpec';
import { createMcpServer } from '../../src/mcp/McpToolServer';

describe('/mcp (Streamable HTTP, stateless)', () => {
  const spec: ToolSpec = {
    name: 'get_drivers',
    description: 'Drivers of a session.',
    provider: 'openf1',
    pathTemplate: '/drivers',
    params: [{ name: 'session_key', type: 'string', description: 'Session key.', required: true }],
  };

  const registry = new ToolRegistry([spec]);
  const dispatch = jest.fn<Promise<NormalizedResult>, [string, unknown]>(async () => ({
    status: 'ok',
    payload: { drivers: [44] },
    truncated: false,
  }));
  const dispatcher: IToolDispatcher = { dispatch };

  const app = createApp({
    registry,
    dispatcher,
    mcpServerFactory: () => createMcpServer({ name: 'f1-data', version: '0.1.0' }, { registry, dispatcher }),
  });

  function rpc(body: unknown) {
    return request(app)
      .post('/mcp')
      .set('accept', 'application/json, text/event-stream')
      .set('content-type', 'application/json')
      .send(JSON.stringify(body));
  }

  beforeEach(() => dispatch.mockClear());

  test('initialize reports the server identity', async () => {
    const res = await rpc({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: {
        protocolVersion: '2025-03-26',
        capabilities: {},
        clientInfo: { name: 'test-client', version: '1.0.0' },
      },
    }).expect(200);

    expect(res.body.id).toBe(1);
    expect(res.body.result.serverInfo).toEqual({ name: 'f1-data', version: '0.1.0' });
    expect(res.body.result.capabilities).toHaveProperty('tools');
  });

  test('tools/list advertises the registry', async () => {
    const res = await rpc({ jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} }).expect(200);

    expect(res.body.result.tools.map((t: { name: string }) => t.name)).toEqual(['get_drivers']);
  });

  test('tools/call goes through the dispatcher', async () => {
    const res = await rpc({
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: { name: 'get_drivers', arguments: { session_key: 'latest' } },
    }).expect(200);

    expect(dispatch).toHaveBeenCalledWith('get_drivers', { session_key: 'latest' });
    expect(res.body.result.content).toEqual([
      { type: 'text', text: '{\n  "drivers": [\n    44\n  ]\n}' },
    ]);
  });

  test.each(['get', 'delete'] as const)('%s /mcp is not allowed', async (method) => {
    const res = await request(app)[method]('/mcp').expect(405);

    expect(res.headers.allow).toBe('POST');
    expect(res.body).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });
});
