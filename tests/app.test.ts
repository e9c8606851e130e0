/**
 * Basic integration tests for the Express app.
 *
 * This verifies that the healthcheck endpoint is wired correctly
 * and that the app can be instantiated without a tool table.
 */
import request from 'supertest';
import { createApp } from '../src/app';
import { ToolRegistry } from '../src/dispatch/application/ToolRegistry';
import { f1ServerDefinition } from '../src/providers/f1/f1Tools';

describe('sports-data app', () => {
  it('should respond to GET /health with status 200 and JSON body', async () => {
    const app = createApp();
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body).toHaveProperty('status', 'ok');
    expect(response.body).toHaveProperty('service', 'sports-data-mcp');
    expect(response.body).toHaveProperty('tools', 0);
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('reports the served definition and its tool count', async () => {
    const registry = new ToolRegistry(f1ServerDefinition.tools, f1ServerDefinition.providers);
    const app = createApp({
      service: { name: f1ServerDefinition.name, version: f1ServerDefinition.version },
      registry,
    });

    const response = await request(app).get('/health').expect(200);

    expect(response.body.service).toBe('f1-data');
    expect(response.body.version).toBe('0.1.0');
    expect(response.body.tools).toBe(f1ServerDefinition.tools.length);
  });
});
