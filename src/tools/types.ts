// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the provider contract: tool descriptors,
// requests, results, and the three-way call outcome.
// ============================================================================

import type { SystemSource } from './shared/entropy.js';

// ============================================================================
// Descriptors
// ============================================================================

export type PropertyKind = 'number' | 'string';

export type PropertySchema = {
  type: PropertyKind;
  description: string;
};

/**
 * Wire-visible argument contract of a tool. Must agree with the tool's
 * argument parser; the catalog refuses to build otherwise.
 */
export type InputSchema = {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required: string[];
};

export type OutputSchema = {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
};

export type ToolAnnotations = {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

export type ToolOptions = {
  title: string;
  description: string;
  outputSchema?: OutputSchema;
  annotations?: ToolAnnotations;
  meta?: Record<string, unknown>;
};

export type Tool = {
  name: string;
  inputSchema: InputSchema;
  options: ToolOptions;
};

// ============================================================================
// Requests and Results
// ============================================================================

export interface ListToolsRequest {
  /** Accepted for protocol compatibility; catalogs are never paginated. */
  cursor?: string;
}

export interface ListToolsResult {
  tools: readonly Tool[];
  nextCursor?: string;
}

export interface CallToolRequest {
  name: string;
  /** JSON-encoded object */
  arguments?: string;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export type ContentBlock = TextContent;

/**
 * Standard MCP tool result format. Success and failure share the text slot;
 * callers branch on `isError`.
 */
export interface ToolResult {
  content: [ContentBlock, ...ContentBlock[]];
  isError: boolean;
  structuredContent?: Record<string, unknown>;
}

export type CallOutcome =
  | { kind: 'not_handled' }
  | { kind: 'success'; result: ToolResult }
  | { kind: 'failure'; result: ToolResult };

// ============================================================================
// Provider Contract
// ============================================================================

/**
 * Per-call context handed down by the host. Providers may ignore it.
 */
export interface ProviderContext {
  requestId?: string;
  agentId?: string;
}

/**
 * Capabilities a handler may reach beyond its arguments.
 */
export interface ToolEnv {
  source: SystemSource;
}

/** A field as the argument parser sees it, in declaration order. */
export interface ArgumentField {
  name: string;
  kind: PropertyKind;
  description?: string;
}

/**
 * Tool specification combining definition and handler. Each domain exports an
 * array of these; `run` parses the raw arguments and returns the result text,
 * throwing a ToolError on failure.
 */
export interface ToolSpec {
  definition: Tool;
  fields: readonly ArgumentField[];
  run: (rawArguments: string | undefined, env: ToolEnv) => string;
}

export interface ToolProvider {
  readonly id: string;
  listTools(context: ProviderContext, request: ListToolsRequest): ListToolsResult;
  callTool(context: ProviderContext, request: CallToolRequest): CallOutcome;
}
