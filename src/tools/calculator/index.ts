// ============================================================================
// Calculator Domain Tools
// ============================================================================
// Basic arithmetic on two numbers.
// ============================================================================

import { z } from 'zod';
import type { ToolAnnotations, ToolEnv, ToolProvider, ToolSpec } from '../types.js';
import { createToolProvider, defineTool } from '../shared/index.js';
import { add, divide, formatNumber, multiply, subtract } from '../calculator.js';

export const CALCULATOR_PROVIDER_ID = 'calculator';

const PURE: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

function operandArgs(aDescription: string, bDescription: string) {
  return z.object({
    a: z.number().finite().describe(aDescription),
    b: z.number().finite().describe(bDescription),
  });
}

// ============================================================================
// Add Tool
// ============================================================================

export const addTool: ToolSpec = defineTool({
  definition: {
    name: 'add',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'number', description: 'First number' },
        b: { type: 'number', description: 'Second number' },
      },
      required: ['a', 'b'],
    },
    options: {
      title: 'Add',
      description: 'Add two numbers together',
      annotations: PURE,
    },
  },
  args: operandArgs('First number', 'Second number'),
  handler: ({ a, b }) => formatNumber(add(a, b)),
});

// ============================================================================
// Subtract Tool
// ============================================================================

export const subtractTool: ToolSpec = defineTool({
  definition: {
    name: 'subtract',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'number', description: 'Number to subtract from' },
        b: { type: 'number', description: 'Number to subtract' },
      },
      required: ['a', 'b'],
    },
    options: {
      title: 'Subtract',
      description: 'Subtract b from a',
      annotations: PURE,
    },
  },
  args: operandArgs('Number to subtract from', 'Number to subtract'),
  handler: ({ a, b }) => formatNumber(subtract(a, b)),
});

// ============================================================================
// Multiply Tool
// ============================================================================

export const multiplyTool: ToolSpec = defineTool({
  definition: {
    name: 'multiply',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'number', description: 'First number' },
        b: { type: 'number', description: 'Second number' },
      },
      required: ['a', 'b'],
    },
    options: {
      title: 'Multiply',
      description: 'Multiply two numbers',
      annotations: PURE,
    },
  },
  args: operandArgs('First number', 'Second number'),
  handler: ({ a, b }) => formatNumber(multiply(a, b)),
});

// ============================================================================
// Divide Tool
// ============================================================================

export const divideTool: ToolSpec = defineTool({
  definition: {
    name: 'divide',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'number', description: 'Dividend' },
        b: { type: 'number', description: 'Divisor' },
      },
      required: ['a', 'b'],
    },
    options: {
      title: 'Divide',
      description: 'Divide a by b. Fails when b is zero.',
      annotations: PURE,
    },
  },
  args: operandArgs('Dividend', 'Divisor'),
  handler: ({ a, b }) => formatNumber(divide(a, b)),
});

// ============================================================================
// Export All Tools
// ============================================================================

export const calculatorTools: ToolSpec[] = [
  addTool,
  subtractTool,
  multiplyTool,
  divideTool,
];

export function createCalculatorProvider(env?: ToolEnv): ToolProvider {
  return createToolProvider(CALCULATOR_PROVIDER_ID, calculatorTools, env);
}
