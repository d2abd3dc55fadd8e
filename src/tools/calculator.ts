// ============================================================================
// Calculator Operations
// ============================================================================

import { DivisionByZeroError, DomainError } from './shared/errors.js';

export function add(a: number, b: number): number {
  return a + b;
}

export function subtract(a: number, b: number): number {
  return a - b;
}

export function multiply(a: number, b: number): number {
  return a * b;
}

/**
 * Divide a by b. The divisor is checked before dividing so the result is
 * never Infinity or NaN.
 */
export function divide(a: number, b: number): number {
  if (b === 0) {
    throw new DivisionByZeroError();
  }
  return a / b;
}

/**
 * Shortest round-trip decimal in positional notation: 1e21 renders as
 * "1000000000000000000000" and 1e-7 as "0.0000001". Operands are finite, so
 * a non-finite value here means the operation overflowed.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new DomainError('Result is not a finite number');
  }

  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
