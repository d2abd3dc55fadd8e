// ============================================================================
// Tool Catalog
// ============================================================================
// Ties a literal tool definition to its argument schema and handler, and
// builds the frozen, ordered catalog a provider serves.
// ============================================================================

import type { z } from 'zod';
import type { ArgumentField, Tool, ToolEnv, ToolSpec } from '../types.js';
import { CatalogError } from './errors.js';
import { ArgsShape, ParsedArgs, describeArgs, parseArguments } from './validation.js';

export interface ToolConfig<S extends ArgsShape> {
  definition: Tool;
  args: z.ZodObject<S>;
  handler: (args: ParsedArgs<S>, env: ToolEnv) => string;
}

/**
 * Bind a definition, its argument schema and its handler into a ToolSpec.
 */
export function defineTool<S extends ArgsShape>(config: ToolConfig<S>): ToolSpec {
  const { definition, args, handler } = config;
  return {
    definition,
    fields: describeArgs(args.shape),
    run: (rawArguments, env) => handler(parseArguments(rawArguments, args), env),
  };
}

/**
 * Report every way a tool's published input schema disagrees with the fields
 * its parser accepts. An empty list means they match.
 */
export function schemaMismatches(definition: Tool, fields: readonly ArgumentField[]): string[] {
  const problems: string[] = [];
  const { inputSchema } = definition;
  const published = Object.keys(inputSchema.properties);
  const parsed = fields.map((f) => f.name);

  for (const field of fields) {
    const property = inputSchema.properties[field.name];
    if (!property) {
      problems.push(`field '${field.name}' is parsed but not published`);
      continue;
    }
    if (property.type !== field.kind) {
      problems.push(`field '${field.name}' is published as ${property.type} but parsed as ${field.kind}`);
    }
    if (!property.description) {
      problems.push(`field '${field.name}' has no description`);
    } else if (property.description !== field.description) {
      problems.push(
        `field '${field.name}' is published as "${property.description}" but parsed as "${field.description ?? ''}"`
      );
    }
  }

  for (const name of published) {
    if (!parsed.includes(name)) {
      problems.push(`field '${name}' is published but not parsed`);
    }
  }

  // Every parsed field is required, in declaration order.
  if (inputSchema.required.join(',') !== parsed.join(',')) {
    problems.push(
      `required is [${inputSchema.required.join(', ')}], expected [${parsed.join(', ')}]`
    );
  }

  return problems;
}

/**
 * Freeze a definition and everything it reaches. Definitions may share nested
 * objects (annotations, meta), so those are frozen too.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate and freeze a provider's catalog. Throws CatalogError on duplicate
 * names or on a schema that does not match its parser.
 */
export function buildCatalog(providerId: string, specs: readonly ToolSpec[]): readonly Tool[] {
  const seen = new Set<string>();
  for (const spec of specs) {
    const { name } = spec.definition;
    if (seen.has(name)) {
      throw new CatalogError(`Provider '${providerId}' declares tool '${name}' more than once`);
    }
    seen.add(name);

    const problems = schemaMismatches(spec.definition, spec.fields);
    if (problems.length > 0) {
      throw new CatalogError(
        `Tool '${name}' in provider '${providerId}' has an inconsistent input schema: ${problems.join('; ')}`
      );
    }
  }
  return Object.freeze(specs.map((spec) => deepFreeze(spec.definition)));
}
