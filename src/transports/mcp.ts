// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with ListTools + CallTool handlers wired to the kernel.
// Each transport adapter calls this to get its own Server instance.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import { getPackageInfo, log } from '../config.js';
import type { DispatchContext, ToolKernel } from '../kernel.js';
import type { Tool } from '../tools/types.js';

/**
 * Map a catalog entry onto the MCP tools/list shape.
 */
export function toMcpTool(tool: Tool): McpTool {
  const { title, description, outputSchema, annotations, meta } = tool.options;
  return {
    name: tool.name,
    title,
    description,
    inputSchema: {
      type: 'object',
      properties: { ...tool.inputSchema.properties },
      required: [...tool.inputSchema.required],
    },
    ...(outputSchema && { outputSchema: { ...outputSchema } }),
    ...(annotations && { annotations: { ...annotations } }),
    ...(meta && { _meta: { ...meta } }),
  };
}

function contextFromMeta(meta: Record<string, unknown> | undefined): DispatchContext {
  if (!meta) return {};
  return {
    agentId: typeof meta.agentId === 'string' ? meta.agentId : undefined,
    requestId: typeof meta.requestId === 'string' ? meta.requestId : undefined,
  };
}

/**
 * Create an MCP Server wired to the given kernel.
 * Each transport gets its own Server instance (MCP SDK only supports
 * one transport per Server).
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const pkg = getPackageInfo();
  const server = new Server(
    { name: pkg.name, version: pkg.version },
    { capabilities: { tools: {} } }
  );

  const mcpTools = kernel.tools.map(toMcpTool);

  // The catalog is static, so the cursor is ignored and nextCursor never set.
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: mcpTools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args, _meta } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args, null, 2));

    try {
      const result = kernel.dispatch(name, args, contextFromMeta(_meta));
      return { content: result.content, isError: result.isError };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      log(`Error in tool ${name}:`, errorMessage);
      return {
        content: [{ type: 'text', text: errorMessage }],
        isError: true,
      };
    }
  });

  return server;
}
