// ============================================================================
// String Operations
// ============================================================================

export function uppercase(text: string): string {
  return text.toUpperCase();
}

export function lowercase(text: string): string {
  return text.toLowerCase();
}

/**
 * Reverse by code point, so surrogate pairs survive.
 */
export function reverse(text: string): string {
  return Array.from(text).reverse().join('');
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function wordCount(text: string): string {
  return `${countWords(text)} words`;
}
