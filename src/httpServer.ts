/**
 * HTTP Server Mode for MCP Toolbox
 *
 * Exposes the kernel over HTTP for remote agents and quick manual checks.
 *
 * Usage:
 *   node dist/src/server.js --http --port 8787
 *
 * Endpoints:
 *   GET  /          - Health check with package name and version
 *   GET  /health    - Health check
 *   GET  /tools     - List available tools
 *   POST /call      - Execute any tool: { tool: string, arguments?: object }
 *   POST /mcp       - Full MCP protocol endpoint (stateless streamable HTTP)
 *
 * /call responses use a status envelope:
 *   { "status": "executed", "tool": "...", "result": { content, isError } }
 *   { "status": "error", "error": "...", "code": "..." }
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import { getPackageInfo, log } from './config.js';
import type { ToolKernel } from './kernel.js';
import { createMcpServer } from './transports/mcp.js';
import type { ToolResult } from './tools/types.js';

export const DEFAULT_HTTP_PORT = 8787;

// ============================================================================
// Status Envelope Types
// ============================================================================

interface StatusEnvelope {
  status: 'ok' | 'executed' | 'error';
  [key: string]: unknown;
}

interface ErrorEnvelope extends StatusEnvelope {
  status: 'error';
  error: string;
  code?: string;
}

const CallBodySchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

// ============================================================================
// Response Helpers
// ============================================================================

function wrapResult(tool: string, result: ToolResult): StatusEnvelope {
  return { status: result.isError ? 'error' : 'executed', tool, result };
}

function wrapError(error: string, code?: string): ErrorEnvelope {
  return { status: 'error', error, ...(code && { code }) };
}

function sendJson(res: ServerResponse, statusCode: number, data: StatusEnvelope): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

class InvalidBodyError extends Error {}

/**
 * Parse JSON body from request
 */
async function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => { body += chunk; });
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new InvalidBodyError('Invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

// ============================================================================
// Server
// ============================================================================

export interface HttpServerOptions {
  port: number;
  host?: string;
}

export interface HttpServerHandle {
  /** Bound port (differs from the requested one when 0 was asked for) */
  port: number;
  host: string;
  stop(): Promise<void>;
}

/**
 * Serve one /mcp request on its own Server and stateless transport. A
 * stateless transport answers a single request; closing the Server once the
 * response is done closes the transport with it.
 */
async function handleMcpRequest(
  kernel: ToolKernel,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const server = createMcpServer(kernel);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });

  res.on('close', () => {
    server.close().catch((error: unknown) => {
      log(`HTTP: Error closing MCP request: ${error instanceof Error ? error.message : String(error)}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Start an HTTP server that handles MCP and plain JSON tool requests.
 */
export async function startHttpServer(
  kernel: ToolKernel,
  options: HttpServerOptions
): Promise<HttpServerHandle> {
  const { port, host = '0.0.0.0' } = options;
  const pkg = getPackageInfo();

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
    const path = url.pathname;

    log(`HTTP: ${req.method} ${path}`);

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Mcp-Session-Id, Accept');
    res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if ((path === '/' || path === '/health') && req.method === 'GET') {
      sendJson(res, 200, {
        status: 'ok',
        name: pkg.name,
        version: pkg.version,
        tools: kernel.toolCount,
      });
      return;
    }

    if (path === '/tools' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok', tools: kernel.listTools().tools });
      return;
    }

    if (path === '/call' && req.method === 'POST') {
      let body: unknown;
      try {
        body = await parseBody(req);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        sendJson(res, 400, wrapError(message, 'INVALID_REQUEST'));
        return;
      }

      const parsed = CallBodySchema.safeParse(body);
      if (!parsed.success) {
        sendJson(res, 400, wrapError('Body must be { tool: string, arguments?: object }', 'INVALID_REQUEST'));
        return;
      }

      const { tool, arguments: args } = parsed.data;
      const result = kernel.dispatch(tool, args);
      sendJson(res, 200, wrapResult(tool, result));
      return;
    }

    if (path === '/mcp') {
      try {
        await handleMcpRequest(kernel, req, res);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log(`HTTP: Error handling MCP request: ${message}`);
        if (!res.writableEnded) {
          sendJson(res, 500, wrapError(message, 'MCP_ERROR'));
        }
      }
      return;
    }

    sendJson(res, 404, wrapError('Not found', 'NOT_FOUND'));
  }

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      log(`HTTP: Unhandled error: ${message}`);
      if (!res.headersSent) {
        sendJson(res, 500, wrapError(message, 'INTERNAL_ERROR'));
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  log(`HTTP Server listening on http://${host}:${boundPort}`);

  return {
    port: boundPort,
    host,
    stop: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      log('HTTP Server stopped');
    },
  };
}

/**
 * Parse command line arguments for HTTP mode
 */
export function parseHttpArgs(args: string[]): {
  httpMode: boolean;
  port: number;
  host: string;
} {
  const httpMode = args.includes('--http');
  const portIndex = args.indexOf('--port');
  const requested = portIndex !== -1 ? parseInt(args[portIndex + 1], 10) : DEFAULT_HTTP_PORT;
  const port = Number.isNaN(requested) ? DEFAULT_HTTP_PORT : requested;
  const hostIndex = args.indexOf('--host');
  const host = hostIndex !== -1 && args[hostIndex + 1] ? args[hostIndex + 1] : '0.0.0.0';

  return { httpMode, port, host };
}
