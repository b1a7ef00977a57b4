/**
 * Table-driven 8-bit codec.
 */

import { z } from 'zod';
import {
  UNMAPPED,
  emptyCodePoints,
  type Codec,
  type Decoder,
  type EncodeResult,
  type Encoder,
  type EncodingName,
} from './codec.js';

const byteValue = z.number().int().min(0).max(0xff);

/**
 * Shape of the JSON byte tables under ./tables. `toUnicode[b]` is the code
 * point of byte `b`, or null when the byte has no mapping.
 */
export const EncodingDefinitionSchema = z.object({
  name: z.string().min(1),
  ccsid: z.number().int().positive(),
  aliases: z.array(z.string()).default([]),
  substitute: byteValue,
  toUnicode: z.array(z.number().int().min(0).max(0x10ffff).nullable()).length(256),
});

export type EncodingDefinition = z.infer<typeof EncodingDefinitionSchema>;

class SingleByteDecoder implements Decoder {
  constructor(private readonly toUnicode: Int32Array) {}

  write(bytes: Uint8Array): Int32Array {
    const out = new Int32Array(bytes.length);
    for (let i = 0; i < bytes.length; i++) {
      out[i] = this.toUnicode[bytes[i]];
    }
    return out;
  }

  end(): Int32Array {
    return emptyCodePoints();
  }
}

class SingleByteEncoder implements Encoder {
  constructor(
    private readonly fromUnicode: ReadonlyMap<number, number>,
    private readonly substitute: number
  ) {}

  write(codePoints: Int32Array): EncodeResult {
    const bytes = new Uint8Array(codePoints.length);
    let replaced = 0;

    for (let i = 0; i < codePoints.length; i++) {
      const cp = codePoints[i];
      const byte = cp === UNMAPPED ? undefined : this.fromUnicode.get(cp);
      if (byte === undefined) {
        bytes[i] = this.substitute;
        replaced++;
      } else {
        bytes[i] = byte;
      }
    }

    return { bytes, replaced };
  }

  end(): EncodeResult {
    return { bytes: new Uint8Array(0), replaced: 0 };
  }
}

export class SingleByteCodec implements Codec {
  readonly name: EncodingName;
  readonly ccsid: number;
  readonly aliases: readonly string[];
  readonly substitute: number;
  private readonly toUnicode: Int32Array;
  private readonly fromUnicode: Map<number, number>;

  constructor(definition: EncodingDefinition) {
    this.name = definition.name;
    this.ccsid = definition.ccsid;
    this.aliases = [...definition.aliases];
    this.substitute = definition.substitute;
    this.toUnicode = new Int32Array(256);
    this.fromUnicode = new Map();

    definition.toUnicode.forEach((cp, byte) => {
      this.toUnicode[byte] = cp ?? UNMAPPED;
      // first byte wins when a table maps two bytes to one character
      if (cp !== null && !this.fromUnicode.has(cp)) {
        this.fromUnicode.set(cp, byte);
      }
    });
  }

  /**
   * Validate raw table data (usually parsed JSON) and build a codec from it.
   */
  static fromTable(data: unknown): SingleByteCodec {
    return new SingleByteCodec(EncodingDefinitionSchema.parse(data));
  }

  createDecoder(): Decoder {
    return new SingleByteDecoder(this.toUnicode);
  }

  createEncoder(): Encoder {
    return new SingleByteEncoder(this.fromUnicode, this.substitute);
  }

  /** Code point of `byte`, or UNMAPPED. */
  decodeByte(byte: number): number {
    return this.toUnicode[byte] ?? UNMAPPED;
  }

  /** Byte for `codePoint`, or undefined when the table cannot represent it. */
  encodeCodePoint(codePoint: number): number | undefined {
    return this.fromUnicode.get(codePoint);
  }
}
