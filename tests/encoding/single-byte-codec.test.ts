/**
 * Tests for the table-driven codecs and the transcoder
 */

import { UNMAPPED, Transcoder, transcodeBytes } from '../../src/encoding/codec.js';
import { createDefaultRegistry } from '../../src/encoding/registry.js';
import { SingleByteCodec } from '../../src/encoding/single-byte-codec.js';
import { createAsciiCodec } from '../test-utils.js';

const registry = createDefaultRegistry();
const latin1 = registry.require('ISO8859-1');
const ebcdic = registry.require('IBM-1047');

function tableCodec(name: string): SingleByteCodec {
  const codec = registry.require(name);
  if (!(codec instanceof SingleByteCodec)) {
    throw new Error(`${name} is expected to be table driven`);
  }
  return codec;
}

function bytesOf(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, 'latin1'));
}

describe('SingleByteCodec', () => {
  it('should reject tables that do not have 256 entries', () => {
    expect(() =>
      SingleByteCodec.fromTable({ name: 'SHORT', ccsid: 1, substitute: 0, toUnicode: [0, 1, 2] })
    ).toThrow();
  });

  it('should reject a substitute outside the byte range', () => {
    expect(() =>
      SingleByteCodec.fromTable({
        name: 'BAD',
        ccsid: 2,
        substitute: 256,
        toUnicode: Array.from({ length: 256 }, (_, i) => i),
      })
    ).toThrow();
  });

  it('should default aliases to an empty list', () => {
    const codec = SingleByteCodec.fromTable({
      name: 'PLAIN',
      ccsid: 3,
      substitute: 0,
      toUnicode: Array.from({ length: 256 }, (_, i) => i),
    });
    expect(codec.aliases).toEqual([]);
  });

  it('should decode unmapped bytes as UNMAPPED', () => {
    const ascii = createAsciiCodec();
    expect(ascii.decodeByte(0x41)).toBe(0x41);
    expect(ascii.decodeByte(0x80)).toBe(UNMAPPED);
    expect(ascii.encodeCodePoint(0xe9)).toBeUndefined();
  });

  it('should carry the standard substitute bytes', () => {
    expect(latin1.substitute).toBe(0x1a);
    expect(ebcdic.substitute).toBe(0x3f);
  });
});

describe('IBM-1047 table', () => {
  const table = tableCodec('IBM-1047');

  it('should map letters, digits and space', () => {
    expect(table.encodeCodePoint(0x41)).toBe(0xc1); // A
    expect(table.encodeCodePoint(0x61)).toBe(0x81); // a
    expect(table.encodeCodePoint(0x30)).toBe(0xf0); // 0
    expect(table.encodeCodePoint(0x20)).toBe(0x40);
  });

  it('should map line feed to NL (0x15)', () => {
    expect(table.encodeCodePoint(0x0a)).toBe(0x15);
    expect(table.decodeByte(0x15)).toBe(0x0a);
    expect(table.decodeByte(0x25)).toBe(0x85);
  });

  it('should place the brackets and caret where 1047 puts them', () => {
    expect(table.encodeCodePoint(0x5b)).toBe(0xad);
    expect(table.encodeCodePoint(0x5d)).toBe(0xbd);
    expect(table.encodeCodePoint(0x5e)).toBe(0x5f);
    expect(table.encodeCodePoint(0xac)).toBe(0xb0);
  });

  it('should cover every byte value in both directions', () => {
    const seen = new Set<number>();
    for (let byte = 0; byte < 256; byte++) {
      const cp = table.decodeByte(byte);
      expect(cp).not.toBe(UNMAPPED);
      expect(cp).toBeLessThan(256);
      seen.add(cp);
    }
    expect(seen.size).toBe(256);
  });
});

describe('transcodeBytes', () => {
  it('should encode "Hello" into IBM-1047', () => {
    const result = transcodeBytes(latin1, ebcdic, bytesOf('Hello'));

    expect(Array.from(result.bytes)).toEqual([0xc8, 0x85, 0x93, 0x93, 0x96]);
    expect(result.replacedCharCount).toBe(0);
  });

  it('should decode IBM-1047 back into ISO8859-1', () => {
    const result = transcodeBytes(ebcdic, latin1, Uint8Array.from([0xc8, 0x85, 0x93, 0x93, 0x96, 0x15]));

    expect(Buffer.from(result.bytes).toString('latin1')).toBe('Hello\n');
  });

  it('should round-trip every byte value', () => {
    const all = Uint8Array.from({ length: 256 }, (_, i) => i);
    const there = transcodeBytes(latin1, ebcdic, all);
    const back = transcodeBytes(ebcdic, latin1, there.bytes);

    expect(there.bytes).toHaveLength(256);
    expect(Array.from(back.bytes)).toEqual(Array.from(all));
    expect(there.replacedCharCount + back.replacedCharCount).toBe(0);
  });

  it('should write the target substitute for characters it cannot encode', () => {
    const result = transcodeBytes(latin1, createAsciiCodec(), Uint8Array.from([0x41, 0xe9, 0x42]));

    expect(Array.from(result.bytes)).toEqual([0x41, 0x1a, 0x42]);
    expect(result.replacedCharCount).toBe(1);
  });

  it('should substitute undecodable source bytes once each', () => {
    const result = transcodeBytes(createAsciiCodec(), ebcdic, Uint8Array.from([0x48, 0x80, 0x69, 0xff]));

    expect(Array.from(result.bytes)).toEqual([0xc8, 0x3f, 0x89, 0x3f]);
    expect(result.replacedCharCount).toBe(2);
  });

  it('should handle empty input', () => {
    const result = transcodeBytes(latin1, ebcdic, new Uint8Array(0));

    expect(result.bytes).toHaveLength(0);
    expect(result.replacedCharCount).toBe(0);
  });
});

describe('Transcoder', () => {
  it('should accumulate replacements across writes', () => {
    const transcoder = new Transcoder(latin1, createAsciiCodec());

    transcoder.write(Uint8Array.from([0xe0, 0x41]));
    transcoder.write(Uint8Array.from([0xe1]));
    const tail = transcoder.end();

    expect(tail).toHaveLength(0);
    expect(transcoder.replacedCharCount).toBe(2);
  });
});
