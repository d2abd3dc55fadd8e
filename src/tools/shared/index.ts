// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError, resultText } from './response.js';
export { parseArguments, describeArgs } from './validation.js';
export type { ArgsShape, ParsedArgs } from './validation.js';
export { defineTool, buildCatalog, schemaMismatches } from './catalog.js';
export type { ToolConfig } from './catalog.js';
export { createToolProvider, outcomeResult, defaultToolEnv } from './provider.js';
export { systemSource, fixedSource } from './entropy.js';
export type { SystemSource } from './entropy.js';
export * from './errors.js';
