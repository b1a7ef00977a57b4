/**
 * Codec contracts
 *
 * Decoders turn bytes into code points and encoders turn code points back
 * into bytes. Both are stateful so that a multi-byte sequence split across
 * two chunks is held back until its remaining bytes arrive.
 */

/** Code point emitted by a decoder for a byte the table does not map. */
export const UNMAPPED = -1;

export type EncodingName = string;

export interface EncodeResult {
  bytes: Uint8Array;
  /** Code points written as the substitute byte */
  replaced: number;
}

export interface Decoder {
  /** Decode a chunk; bytes of an incomplete trailing sequence are kept for the next call. */
  write(bytes: Uint8Array): Int32Array;
  /** Emit whatever is still pending, as UNMAPPED for incomplete sequences. */
  end(): Int32Array;
}

export interface Encoder {
  write(codePoints: Int32Array): EncodeResult;
  end(): EncodeResult;
}

export interface Codec {
  readonly name: EncodingName;
  readonly ccsid: number;
  readonly aliases: readonly string[];
  /** Byte written in this encoding in place of an unmappable character */
  readonly substitute: number;
  createDecoder(): Decoder;
  createEncoder(): Encoder;
}

export interface TranscodeResult {
  bytes: Uint8Array;
  replacedCharCount: number;
}

const EMPTY_CODE_POINTS = new Int32Array(0);

export function emptyCodePoints(): Int32Array {
  return EMPTY_CODE_POINTS;
}

/**
 * Pair a decoder for `source` with an encoder for `target`.
 * Instances hold per-call state and must not be shared between conversions.
 */
export class Transcoder {
  private readonly decoder: Decoder;
  private readonly encoder: Encoder;
  private replacedTotal = 0;

  constructor(source: Codec, target: Codec) {
    this.decoder = source.createDecoder();
    this.encoder = target.createEncoder();
  }

  get replacedCharCount(): number {
    return this.replacedTotal;
  }

  write(chunk: Uint8Array): Uint8Array {
    const encoded = this.encoder.write(this.decoder.write(chunk));
    this.replacedTotal += encoded.replaced;
    return encoded.bytes;
  }

  end(): Uint8Array {
    const tail = this.encoder.write(this.decoder.end());
    const final = this.encoder.end();
    this.replacedTotal += tail.replaced + final.replaced;
    if (final.bytes.length === 0) return tail.bytes;

    const merged = new Uint8Array(tail.bytes.length + final.bytes.length);
    merged.set(tail.bytes, 0);
    merged.set(final.bytes, tail.bytes.length);
    return merged;
  }
}

/**
 * Transcode an in-memory buffer in one pass.
 */
export function transcodeBytes(source: Codec, target: Codec, bytes: Uint8Array): TranscodeResult {
  const transcoder = new Transcoder(source, target);
  const body = transcoder.write(bytes);
  const tail = transcoder.end();

  if (tail.length === 0) {
    return { bytes: body, replacedCharCount: transcoder.replacedCharCount };
  }

  const merged = new Uint8Array(body.length + tail.length);
  merged.set(body, 0);
  merged.set(tail, body.length);
  return { bytes: merged, replacedCharCount: transcoder.replacedCharCount };
}
