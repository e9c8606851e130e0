import { ToolRegistry } from '../../src/dispatch/application/ToolRegistry';
import type { ToolSpec } from '../../src/dispatch/domain/ToolSpec';
import { listTools, toCallToolResult } from '../../src/mcp/McpToolServer';

describe('MCP tool surface', () => {
  const spec: ToolSpec = {
    name: 'get_event_schedule',
    description: 'Season calendar.',
    provider: 'ergast',
    pathTemplate: '/{year}.json',
    params: [
      { name: 'year', type: 'integer', description: 'Season year.', required: true, min: 1950, max: 2100 },
    ],
  };

  it('advertises each registered tool with its JSON schema', () => {
    expect(listTools(new ToolRegistry([spec]))).toEqual([
      {
        name: 'get_event_schedule',
        description: 'Season calendar.',
        inputSchema: {
          type: 'object',
          properties: {
            year: { type: 'integer', description: 'Season year.', minimum: 1950, maximum: 2100 },
          },
          required: ['year'],
        },
      },
    ]);
  });

  it('renders ok payloads as pretty-printed JSON text', () => {
    expect(toCallToolResult({ status: 'ok', payload: { a: 1 }, truncated: false })).toEqual({
      content: [{ type: 'text', text: '{\n  "a": 1\n}' }],
    });
  });

  it('renders truncated payloads as-is', () => {
    const text = 'abc\n...[truncated: showing 3 of 10 characters]';
    expect(toCallToolResult({ status: 'ok', payload: text, truncated: true })).toEqual({
      content: [{ type: 'text', text }],
    });
  });

  it('flags error results with isError and the error code', () => {
    expect(
      toCallToolResult({
        status: 'error',
        errorCode: 'UNKNOWN_TOOL',
        errorDetail: 'Unknown tool: get_weather',
      }),
    ).toEqual({
      content: [{ type: 'text', text: 'Error (UNKNOWN_TOOL): Unknown tool: get_weather' }],
      isError: true,
    });
  });
});
