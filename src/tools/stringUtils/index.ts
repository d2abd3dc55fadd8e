// ============================================================================
// String Utility Domain Tools
// ============================================================================

import { z } from 'zod';
import type { ToolAnnotations, ToolEnv, ToolProvider, ToolSpec } from '../types.js';
import { createToolProvider, defineTool } from '../shared/index.js';
import { lowercase, reverse, uppercase, wordCount } from '../stringUtils.js';

export const STRING_UTILS_PROVIDER_ID = 'string-utils';

const PURE: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

function textArgs(description: string) {
  return z.object({ text: z.string().describe(description) });
}

export const uppercaseTool: ToolSpec = defineTool({
  definition: {
    name: 'uppercase',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to convert to uppercase' },
      },
      required: ['text'],
    },
    options: {
      title: 'Uppercase',
      description: 'Convert text to uppercase',
      annotations: PURE,
    },
  },
  args: textArgs('Text to convert to uppercase'),
  handler: ({ text }) => uppercase(text),
});

export const lowercaseTool: ToolSpec = defineTool({
  definition: {
    name: 'lowercase',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to convert to lowercase' },
      },
      required: ['text'],
    },
    options: {
      title: 'Lowercase',
      description: 'Convert text to lowercase',
      annotations: PURE,
    },
  },
  args: textArgs('Text to convert to lowercase'),
  handler: ({ text }) => lowercase(text),
});

export const reverseTool: ToolSpec = defineTool({
  definition: {
    name: 'reverse',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to reverse' },
      },
      required: ['text'],
    },
    options: {
      title: 'Reverse',
      description: 'Reverse the characters of a string',
      annotations: PURE,
    },
  },
  args: textArgs('Text to reverse'),
  handler: ({ text }) => reverse(text),
});

export const wordCountTool: ToolSpec = defineTool({
  definition: {
    name: 'word_count',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to count words in' },
      },
      required: ['text'],
    },
    options: {
      title: 'Word Count',
      description: 'Count whitespace-separated words in text',
      annotations: PURE,
    },
  },
  args: textArgs('Text to count words in'),
  handler: ({ text }) => wordCount(text),
});

export const stringUtilsTools: ToolSpec[] = [
  uppercaseTool,
  lowercaseTool,
  reverseTool,
  wordCountTool,
];

export function createStringUtilsProvider(env?: ToolEnv): ToolProvider {
  return createToolProvider(STRING_UTILS_PROVIDER_ID, stringUtilsTools, env);
}
