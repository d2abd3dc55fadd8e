// ============================================================================
// HTTP Transport Adapter
// ============================================================================
// The HTTP server builds an MCP Server per /mcp request, so this adapter only
// holds the listening handle.
// ============================================================================

import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { startHttpServer, DEFAULT_HTTP_PORT, type HttpServerHandle } from '../httpServer.js';

export class HttpAdapter implements TransportAdapter {
  readonly name = 'http';
  private handle: HttpServerHandle | null = null;

  async start(kernel: ToolKernel, config: TransportConfig): Promise<void> {
    this.handle = await startHttpServer(kernel, {
      port: config.port ?? DEFAULT_HTTP_PORT,
      host: config.host,
    });
    log(`HTTP transport listening on ${this.handle.host}:${this.handle.port}`);
  }

  async stop(): Promise<void> {
    await this.handle?.stop();
    this.handle = null;
  }
}
