import { describe, it, expect } from 'vitest';
import {
  base64Decode,
  base64Encode,
  formatUuidV4,
  randomUuid,
  unixTimestamp,
} from '../../src/tools/systemInfo.js';
import { createSystemInfoProvider } from '../../src/tools/systemInfo/index.js';
import { fixedSource, systemSource } from '../../src/tools/shared/entropy.js';
import { EncodingError, InvalidBase64Error } from '../../src/tools/shared/errors.js';
import '../utils/matchers.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('System Utility Operations', () => {
  describe('unixTimestamp', () => {
    it('floors the clock reading to whole seconds', () => {
      expect(unixTimestamp(fixedSource(1704164645678, [0]))).toBe(1704164645);
      expect(unixTimestamp(fixedSource(999, [0]))).toBe(0);
    });

    it('reads the real clock by default', () => {
      const before = Math.floor(Date.now() / 1000);
      const value = unixTimestamp(systemSource);
      expect(value).toBeGreaterThanOrEqual(before);
    });
  });

  describe('formatUuidV4', () => {
    it('sets the version and variant bits', () => {
      const bytes = Uint8Array.from({ length: 16 }, (_, i) => i);
      expect(formatUuidV4(bytes)).toBe('00010203-0405-4607-8809-0a0b0c0d0e0f');
    });

    it('does not modify the bytes it was given', () => {
      const bytes = new Uint8Array(16).fill(0xff);
      formatUuidV4(bytes);
      expect(Array.from(bytes)).toEqual(new Array(16).fill(0xff));
    });

    it('rejects anything but 16 bytes', () => {
      expect(() => formatUuidV4(new Uint8Array(15))).toThrow(RangeError);
    });
  });

  describe('randomUuid', () => {
    it('is a pure function of the source', () => {
      const source = fixedSource(0, [0xde, 0xad, 0xbe, 0xef]);
      expect(randomUuid(source)).toBe('deadbeef-dead-4eef-9ead-beefdeadbeef');
      expect(randomUuid(source)).toBe('deadbeef-dead-4eef-9ead-beefdeadbeef');
    });

    it('produces version 4 UUIDs from the system source', () => {
      const first = randomUuid(systemSource);
      const second = randomUuid(systemSource);
      expect(first).toMatch(UUID_V4);
      expect(second).toMatch(UUID_V4);
      expect(first).not.toBe(second);
    });
  });

  describe('base64', () => {
    it('encodes the UTF-8 bytes of the text', () => {
      expect(base64Encode('hi')).toBe('aGk=');
      expect(base64Encode('')).toBe('');
      expect(base64Encode('héllo')).toBe('aMOpbGxv');
    });

    it('decodes standard base64', () => {
      expect(base64Decode('aGk=')).toBe('hi');
      expect(base64Decode('R3LDvMOfZSwg5LiW55WM')).toBe('Grüße, 世界');
      expect(base64Decode('')).toBe('');
    });

    it('round-trips text', () => {
      for (const s of ['hi', '', 'line\nbreak', '\u{1F600} smile', '\uFEFFbom first']) {
        expect(base64Decode(base64Encode(s))).toBe(s);
      }
    });

    it('rejects malformed or non-canonical base64', () => {
      expect(() => base64Decode('aGk')).toThrow(InvalidBase64Error);
      expect(() => base64Decode('a$Gk=')).toThrow(InvalidBase64Error);
      expect(() => base64Decode('aGl=')).toThrow(InvalidBase64Error);
      expect(() => base64Decode('-_8=')).toThrow(/^Invalid base64: /);
    });

    it('rejects bytes that are not UTF-8 text', () => {
      expect(() => base64Decode('//4=')).toThrow(EncodingError);
      expect(() => base64Decode('//4=')).toThrow('Decoded data is not valid UTF-8 text');
    });
  });
});

describe('System Info Provider', () => {
  const provider = createSystemInfoProvider({ source: fixedSource(1704164645678, [0xde, 0xad, 0xbe, 0xef]) });

  function call(name: string, args?: string) {
    const outcome = provider.callTool({}, { name, arguments: args });
    return outcome.kind === 'not_handled' ? outcome : outcome.result;
  }

  it('lists its four tools in declaration order', () => {
    expect(provider.listTools({}, {}).tools.map((t) => t.name)).toEqual([
      'timestamp',
      'random_uuid',
      'base64_encode',
      'base64_decode',
    ]);
  });

  it('timestamp and random_uuid need no arguments', () => {
    expect(call('timestamp')).toBeToolSuccess('1704164645');
    expect(call('random_uuid')).toBeToolSuccess('deadbeef-dead-4eef-9ead-beefdeadbeef');
    expect(call('timestamp', 'not json')).toBeToolSuccess('1704164645');
  });

  it('timestamp from the default provider is a numeric string', () => {
    const outcome = createSystemInfoProvider().callTool({}, { name: 'timestamp' });
    expect(outcome.kind).toBe('success');
    if (outcome.kind !== 'success') return;
    expect(outcome.result.content[0].text).toMatch(/^\d+$/);
  });

  it('encodes and decodes through the dispatcher', () => {
    expect(call('base64_encode', '{"text":"hi"}')).toBeToolSuccess('aGk=');
    expect(call('base64_decode', '{"text":"aGk="}')).toBeToolSuccess('hi');
  });

  it('turns decoding failures into error results', () => {
    expect(call('base64_decode', '{"text":"//4="}')).toBeToolError('not valid UTF-8');
    expect(call('base64_decode', '{"text":"aGk"}')).toBeToolError('Invalid base64');
    expect(call('base64_decode')).toBeToolError('Missing arguments');
  });
});
