// ============================================================================
// Stdio Transport Adapter
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter } from './types.js';
import { createMcpServer } from './mcp.js';

/** One MCP Server for the life of the process, talking over stdin/stdout. */
export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: Server | null = null;

  async start(kernel: ToolKernel): Promise<void> {
    this.server = createMcpServer(kernel);
    await this.server.connect(new StdioServerTransport());
    log(`stdio transport serving ${kernel.toolCount} tools`);
  }

  async stop(): Promise<void> {
    await this.server?.close();
    this.server = null;
  }
}
