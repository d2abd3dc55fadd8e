// ============================================================================
// Tool Provider
// ============================================================================
// One catalog plus one dispatcher behind the list/call contract. Concrete
// providers differ only in the ToolSpec array they hand in.
// ============================================================================

import { log } from '../../config.js';
import type {
  CallOutcome,
  CallToolRequest,
  ListToolsRequest,
  ListToolsResult,
  ProviderContext,
  ToolEnv,
  ToolProvider,
  ToolResult,
  ToolSpec,
} from '../types.js';
import { buildCatalog } from './catalog.js';
import { systemSource } from './entropy.js';
import { isToolError } from './errors.js';
import { toolError, toolSuccess } from './response.js';

export const defaultToolEnv: ToolEnv = { source: systemSource };

export function createToolProvider(
  id: string,
  specs: readonly ToolSpec[],
  env: ToolEnv = defaultToolEnv
): ToolProvider {
  const tools = buildCatalog(id, specs);
  const handlers = new Map(specs.map((spec) => [spec.definition.name, spec]));

  function listTools(_context: ProviderContext, _request: ListToolsRequest): ListToolsResult {
    return { tools };
  }

  function callTool(context: ProviderContext, request: CallToolRequest): CallOutcome {
    const spec = handlers.get(request.name);
    if (!spec) {
      return { kind: 'not_handled' };
    }

    try {
      const text = spec.run(request.arguments, env);
      return { kind: 'success', result: toolSuccess(text) };
    } catch (err) {
      if (isToolError(err)) {
        log(`${id}: ${request.name} failed (${err.code}): ${err.message}`);
        return { kind: 'failure', result: toolError(err.message) };
      }
      const message = err instanceof Error ? err.message : String(err);
      log(`${id}: ${request.name} threw unexpectedly${context.requestId ? ` (request ${context.requestId})` : ''}:`, err);
      return { kind: 'failure', result: toolError(`Internal error in ${request.name}: ${message}`) };
    }
  }

  return { id, listTools, callTool };
}

/**
 * Collapse an outcome to the optional result the wire protocol carries.
 */
export function outcomeResult(outcome: CallOutcome): ToolResult | undefined {
  return outcome.kind === 'not_handled' ? undefined : outcome.result;
}
