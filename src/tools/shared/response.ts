// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers. Both helpers put plain
// text in a single text block; only isError tells them apart.
// ============================================================================

import { ToolResult } from '../types.js';

/**
 * Create a successful tool response
 */
export function toolSuccess(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: false,
  };
}

/**
 * Create an error tool response
 */
export function toolError(message: string): ToolResult {
  return {
    content: [{ type: 'text', text: message }],
    isError: true,
  };
}

/**
 * Text of the first content block.
 */
export function resultText(result: ToolResult): string {
  return result.content[0].text;
}
