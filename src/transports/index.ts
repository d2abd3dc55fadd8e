// ============================================================================
// Transport Layer: public API
// ============================================================================

export type { TransportAdapter, TransportConfig } from './types.js';
export { createMcpServer, toMcpTool } from './mcp.js';
export { StdioAdapter } from './stdio.js';
export { HttpAdapter } from './http.js';
