// ============================================================================
// System Info Domain Tools
// ============================================================================
// Clock, UUID and base64 utilities. timestamp and random_uuid take no
// arguments and read from the provider's SystemSource.
// ============================================================================

import { z } from 'zod';
import type { ToolEnv, ToolProvider, ToolSpec } from '../types.js';
import { createToolProvider, defineTool } from '../shared/index.js';
import { base64Decode, base64Encode, randomUuid, unixTimestamp } from '../systemInfo.js';

export const SYSTEM_INFO_PROVIDER_ID = 'system-info';

const noArgs = z.object({});

// ============================================================================
// Timestamp Tool
// ============================================================================

export const timestampTool: ToolSpec = defineTool({
  definition: {
    name: 'timestamp',
    inputSchema: {
      type: 'object',
      properties: {},
      required: [],
    },
    options: {
      title: 'Timestamp',
      description: 'Get current Unix timestamp',
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
  },
  args: noArgs,
  handler: (_args, env) => String(unixTimestamp(env.source)),
});

// ============================================================================
// Random UUID Tool
// ============================================================================

export const randomUuidTool: ToolSpec = defineTool({
  definition: {
    name: 'random_uuid',
    inputSchema: {
      type: 'object',
      properties: {},
      required: [],
    },
    options: {
      title: 'Random UUID',
      description: 'Generate a random UUID v4',
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
  },
  args: noArgs,
  handler: (_args, env) => randomUuid(env.source),
});

// ============================================================================
// Base64 Tools
// ============================================================================

export const base64EncodeTool: ToolSpec = defineTool({
  definition: {
    name: 'base64_encode',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to encode to base64' },
      },
      required: ['text'],
    },
    options: {
      title: 'Base64 Encode',
      description: 'Encode string to base64',
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
  },
  args: z.object({ text: z.string().describe('Text to encode to base64') }),
  handler: ({ text }) => base64Encode(text),
});

export const base64DecodeTool: ToolSpec = defineTool({
  definition: {
    name: 'base64_decode',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Base64 text to decode' },
      },
      required: ['text'],
    },
    options: {
      title: 'Base64 Decode',
      description: 'Decode base64 to string. Fails if the decoded bytes are not UTF-8 text.',
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
  },
  args: z.object({ text: z.string().describe('Base64 text to decode') }),
  handler: ({ text }) => base64Decode(text),
});

export const systemInfoTools: ToolSpec[] = [
  timestampTool,
  randomUuidTool,
  base64EncodeTool,
  base64DecodeTool,
];

export function createSystemInfoProvider(env?: ToolEnv): ToolProvider {
  return createToolProvider(SYSTEM_INFO_PROVIDER_ID, systemInfoTools, env);
}
