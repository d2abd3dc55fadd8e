// ============================================================================
// System Utility Operations
// ============================================================================
// Timestamp, UUID and base64 helpers. Clock and randomness come in through a
// SystemSource; nothing here reads them directly.
// ============================================================================

import type { SystemSource } from './shared/entropy.js';
import { EncodingError, InvalidBase64Error } from './shared/errors.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Whole seconds since the Unix epoch.
 */
export function unixTimestamp(source: SystemSource): number {
  return Math.floor(source.now() / 1000);
}

/**
 * Format 16 bytes as an RFC 4122 version 4 UUID, overwriting the version and
 * variant bits.
 */
export function formatUuidV4(bytes: Uint8Array): string {
  if (bytes.length !== 16) {
    throw new RangeError(`UUID needs 16 bytes, got ${bytes.length}`);
  }
  const b = Uint8Array.from(bytes);
  b[6] = (b[6] & 0x0f) | 0x40;
  b[8] = (b[8] & 0x3f) | 0x80;

  const hex = Array.from(b, (byte) => byte.toString(16).padStart(2, '0')).join('');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

export function randomUuid(source: SystemSource): string {
  return formatUuidV4(source.randomBytes(16));
}

export function base64Encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

/**
 * Decode standard, padded base64 into UTF-8 text.
 *
 * Buffer's decoder skips characters it does not know, so the input is
 * re-encoded and compared to reject anything that is not canonical.
 */
export function base64Decode(encoded: string): string {
  const bytes = Buffer.from(encoded, 'base64');
  if (bytes.toString('base64') !== encoded) {
    throw new InvalidBase64Error('expected padded standard base64 (A-Z, a-z, 0-9, +, /)');
  }

  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new EncodingError('Decoded data is not valid UTF-8 text');
  }
}
