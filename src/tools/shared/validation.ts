// ============================================================================
// Validation Helpers
// ============================================================================
// The argument parser. This is the only place tool input is type-checked;
// operations downstream trust what they are given.
// ============================================================================

import { z } from 'zod';
import type { ArgumentField } from '../types.js';
import {
  InvalidJsonError,
  MissingArgumentsError,
  MissingOrInvalidParameterError,
} from './errors.js';

/** Tool arguments are flat objects of numbers and strings. */
export type ArgsShape = Record<string, z.ZodNumber | z.ZodString>;

export type ParsedArgs<S extends ArgsShape> = z.output<z.ZodObject<S>>;

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * List the fields of an argument schema in declaration order.
 */
export function describeArgs(shape: ArgsShape): ArgumentField[] {
  return Object.entries(shape).map(([name, field]) => ({
    name,
    kind: field instanceof z.ZodNumber ? 'number' : 'string',
    description: field.description,
  }));
}

/**
 * Parse a tool's raw JSON arguments against its schema.
 *
 * Fields are checked in declaration order and the first bad one is reported.
 * There is no coercion: "2" is not a number and 2 is not a string. Tools that
 * declare no fields ignore their arguments entirely.
 */
export function parseArguments<S extends ArgsShape>(
  raw: string | undefined,
  schema: z.ZodObject<S>
): ParsedArgs<S> {
  const fields = Object.keys(schema.shape);
  if (fields.length === 0) {
    return schema.parse({});
  }

  if (raw === undefined) {
    throw new MissingArgumentsError();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InvalidJsonError(err instanceof Error ? err.message : String(err));
  }

  if (!isJsonObject(json)) {
    throw new MissingOrInvalidParameterError(fields[0]);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const offending = parsed.error.issues[0]?.path[0];
    throw new MissingOrInvalidParameterError(
      offending === undefined ? fields[0] : String(offending)
    );
  }
  return parsed.data;
}
