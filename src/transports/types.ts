// ============================================================================
// Transport Adapter Interface
// ============================================================================

import type { ToolKernel } from '../kernel.js';

/** Listen address; only the HTTP adapter reads it. */
export interface TransportConfig {
  port?: number;
  host?: string;
}

/**
 * Exposes a kernel over one transport. server.ts picks the adapter from the
 * command line and owns its start/stop lifecycle.
 */
export interface TransportAdapter {
  readonly name: 'stdio' | 'http';
  start(kernel: ToolKernel, config: TransportConfig): Promise<void>;
  stop(): Promise<void>;
}
