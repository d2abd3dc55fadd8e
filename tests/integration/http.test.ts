import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { z } from 'zod';
import {
  DEFAULT_HTTP_PORT,
  parseHttpArgs,
  startHttpServer,
  type HttpServerHandle,
} from '../../src/httpServer.js';
import { createTestKernel } from '../utils/mcp-test-client.js';

const ToolsBodySchema = z.object({
  status: z.string(),
  tools: z.array(z.object({ name: z.string() }).passthrough()),
});

const McpCallResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.number(),
  result: z.object({
    content: z.array(z.object({ type: z.string(), text: z.string() })),
    isError: z.boolean(),
  }),
});

/** Pull the JSON-RPC message out of a single-event SSE body. */
function sseMessage(body: string): unknown {
  const match = /^data: (.+)$/m.exec(body);
  if (!match) {
    throw new Error(`No SSE data line in: ${body}`);
  }
  return JSON.parse(match[1]);
}

describe('HTTP Server', () => {
  let handle: HttpServerHandle;
  let baseUrl: string;

  beforeAll(async () => {
    const kernel = createTestKernel();
    handle = await startHttpServer(kernel, { port: 0, host: '127.0.0.1' });
    baseUrl = `http://127.0.0.1:${handle.port}`;
  });

  afterAll(async () => {
    await handle.stop();
  });

  function postCall(body: string): Promise<Response> {
    return fetch(`${baseUrl}/call`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('binds an ephemeral port when asked for port 0', () => {
    expect(handle.port).toBeGreaterThan(0);
    expect(handle.host).toBe('127.0.0.1');
  });

  it('reports health with the package identity and tool count', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      name: 'mcp-toolbox',
      version: '0.2.0',
      tools: 12,
    });
  });

  it('lists the composed catalog', async () => {
    const res = await fetch(`${baseUrl}/tools`);
    const body = ToolsBodySchema.parse(await res.json());
    expect(body.status).toBe('ok');
    expect(body.tools).toHaveLength(12);
    expect(body.tools[0]).toMatchObject({ name: 'add', options: { title: 'Add' } });
  });

  it('executes a tool through /call', async () => {
    const res = await postCall(JSON.stringify({ tool: 'multiply', arguments: { a: 6, b: 7 } }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'executed',
      tool: 'multiply',
      result: { content: [{ type: 'text', text: '42' }], isError: false },
    });
  });

  it('marks tool errors in the envelope', async () => {
    const res = await postCall(JSON.stringify({ tool: 'divide', arguments: { a: 1, b: 0 } }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'error',
      tool: 'divide',
      result: { content: [{ type: 'text', text: 'Division by zero' }], isError: true },
    });
  });

  it('rejects bodies that are not JSON', async () => {
    const res = await postCall('not json');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      error: 'Invalid JSON',
      code: 'INVALID_REQUEST',
    });
  });

  it('rejects bodies without a tool name', async () => {
    const res = await postCall(JSON.stringify({ arguments: { a: 1 } }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      error: 'Body must be { tool: string, arguments?: object }',
      code: 'INVALID_REQUEST',
    });
  });

  it('answers preflight requests', async () => {
    const res = await fetch(`${baseUrl}/call`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ status: 'error', error: 'Not found', code: 'NOT_FOUND' });
  });

  it('answers successive MCP tool calls on /mcp', async () => {
    const callMcp = (id: number, args: Record<string, number>) =>
      fetch(`${baseUrl}/mcp`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json, text/event-stream',
        },
        body: JSON.stringify({
          jsonrpc: '2.0',
          id,
          method: 'tools/call',
          params: { name: 'add', arguments: args },
        }),
      });

    const first = await callMcp(1, { a: 2, b: 3 });
    expect(first.status).toBe(200);
    expect(McpCallResponseSchema.parse(sseMessage(await first.text()))).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: '5' }], isError: false },
    });

    const second = await callMcp(2, { a: 10, b: -4 });
    expect(second.status).toBe(200);
    expect(McpCallResponseSchema.parse(sseMessage(await second.text()))).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { content: [{ type: 'text', text: '6' }], isError: false },
    });
  });

  it('routes /mcp to the streamable HTTP transport', async () => {
    const res = await fetch(`${baseUrl}/mcp`, { headers: { Accept: 'application/json' } });
    expect(res.status).toBe(406);
    await res.body?.cancel();
  });
});

describe('parseHttpArgs', () => {
  it('defaults to stdio on the default port', () => {
    expect(parseHttpArgs(['node', 'server.js'])).toEqual({
      httpMode: false,
      port: DEFAULT_HTTP_PORT,
      host: '0.0.0.0',
    });
  });

  it('reads --http, --port and --host', () => {
    expect(parseHttpArgs(['node', 'server.js', '--http', '--port', '9000', '--host', '127.0.0.1'])).toEqual({
      httpMode: true,
      port: 9000,
      host: '127.0.0.1',
    });
  });

  it('falls back to the default port when --port is not a number', () => {
    expect(parseHttpArgs(['--http', '--port', 'abc']).port).toBe(DEFAULT_HTTP_PORT);
    expect(parseHttpArgs(['--http', '--port']).port).toBe(DEFAULT_HTTP_PORT);
  });
});
