// ============================================================================
// Tool Kernel: composes providers behind one catalog and one dispatch
// ============================================================================
// The kernel is the host side of the provider contract. It lists every
// provider's tools as one catalog and, for a call, probes providers in order
// until one claims the name. Both stdio and HTTP transports share a kernel.
// ============================================================================

import { EventEmitter } from 'events';
import { log } from './config.js';
import { CatalogError, toolError } from './tools/shared/index.js';
import type {
  ListToolsResult,
  ProviderContext,
  Tool,
  ToolProvider,
  ToolResult,
} from './tools/types.js';

// ============================================================================
// Dispatch Events: observability seam
// ============================================================================

export interface DispatchEvent {
  type: 'dispatch' | 'result';
  tool: string;
  provider?: string;
  agentId: string;
  requestId?: string;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  handled?: boolean;
}

export type DispatchContext = ProviderContext;

export interface ToolKernel {
  providers: readonly ToolProvider[];
  /** Composed catalog, in provider order then declaration order */
  tools: readonly Tool[];
  /** Which provider serves each tool */
  toolOwners: ReadonlyMap<string, string>;

  listTools(): ListToolsResult;

  /**
   * Dispatch a tool call. Object arguments are serialized to the JSON string
   * providers take. Names no provider claims produce an "Unknown tool" error
   * result from the kernel itself.
   */
  dispatch(name: string, args?: Record<string, unknown>, context?: DispatchContext): ToolResult;

  /** Subscribe to dispatch events (dispatch, result) */
  on(event: DispatchEvent['type'], listener: (evt: DispatchEvent) => void): void;

  toolCount: number;
}

/**
 * Create the tool kernel. Call once at startup. Throws CatalogError when two
 * providers publish the same tool name.
 */
export function createKernel(providers: readonly ToolProvider[]): ToolKernel {
  const tools: Tool[] = [];
  const toolOwners = new Map<string, string>();

  for (const provider of providers) {
    const { tools: provided } = provider.listTools({}, {});
    for (const tool of provided) {
      const owner = toolOwners.get(tool.name);
      if (owner) {
        throw new CatalogError(
          `Tool '${tool.name}' is provided by both '${owner}' and '${provider.id}'`
        );
      }
      toolOwners.set(tool.name, provider.id);
      tools.push(tool);
    }
  }
  Object.freeze(tools);

  log(`Kernel: loaded ${tools.length} tools from ${providers.length} providers (${providers.map((p) => p.id).join(', ')})`);

  const emitter = new EventEmitter();

  function listTools(): ListToolsResult {
    return { tools };
  }

  function dispatch(
    name: string,
    args?: Record<string, unknown>,
    context: DispatchContext = {}
  ): ToolResult {
    const agentId = context.agentId || 'anonymous';
    const requestId = context.requestId;
    const rawArguments = args === undefined ? undefined : JSON.stringify(args);

    log(`Kernel: dispatch ${name} (agent=${agentId}${requestId ? ` request=${requestId}` : ''})`);

    const startTime = Date.now();
    emitter.emit('dispatch', {
      type: 'dispatch', tool: name,
      agentId, requestId, timestamp: new Date().toISOString(),
    } satisfies DispatchEvent);

    for (const provider of providers) {
      const outcome = provider.callTool(context, { name, arguments: rawArguments });
      if (outcome.kind === 'not_handled') {
        continue;
      }
      emitter.emit('result', {
        type: 'result', tool: name, provider: provider.id,
        agentId, requestId, timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime,
        success: outcome.kind === 'success', handled: true,
      } satisfies DispatchEvent);
      return outcome.result;
    }

    log(`Kernel: no provider handles ${name}`);
    emitter.emit('result', {
      type: 'result', tool: name,
      agentId, requestId, timestamp: new Date().toISOString(),
      duration_ms: Date.now() - startTime,
      success: false, handled: false,
    } satisfies DispatchEvent);
    return toolError(`Unknown tool: ${name}`);
  }

  return {
    providers,
    tools,
    toolOwners,
    listTools,
    dispatch,
    on: (event, listener) => {
      emitter.on(event, listener);
    },
    toolCount: tools.length,
  };
}
