/**
 * Stream Converter
 *
 * Moves bytes from a readable to a writable in bounded chunks. When source
 * and target are the same registered encoding the bytes are copied as-is;
 * otherwise every chunk goes through a decoder/encoder pair whose state
 * carries partial sequences over chunk boundaries.
 *
 * Unmappable bytes and characters become the target's substitute byte and
 * are counted. Read and write failures end the conversion; output that was
 * already written stays written.
 */

import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { Transcoder, transcodeBytes, type TranscodeResult } from '../encoding/codec.js';
import type { EncodingRegistry } from '../encoding/registry.js';
import { getErrorMessage } from '../errors/base-error.js';
import {
  ConversionAbortedError,
  InvalidOptionError,
  UnsupportedEncodingError,
  toErrorDetail,
} from '../errors/conversion-errors.js';
import { logger } from '../utils/logger.js';
import { createResult } from './result.js';
import type { ConversionResult, DescriptorKind } from './types.js';

const log = logger.child('stream-converter');

export const DEFAULT_CHUNK_SIZE = 8192;

export interface StreamConvertOptions {
  source: string;
  target: string;
  input: Readable;
  output: Writable;
  /** Upper bound for the bytes handled per step; defaults to the converter's */
  chunkSize?: number;
  /**
   * Destroy `input` when the conversion stops early. Default: false, the
   * caller keeps the stream
   */
  destroyInput?: boolean;
  /** Checked between chunks */
  signal?: AbortSignal;
  /** End `output` once input is exhausted. Default: true */
  endOutput?: boolean;
  /** Recorded on the result. Default: "special-stream" */
  inputKind?: DescriptorKind;
}

export interface StreamConverterOptions {
  chunkSize?: number;
}

interface Counters {
  bytesRead: number;
  bytesWritten: number;
  chunksProcessed: number;
}

export class StreamConverter {
  private readonly chunkSize: number;

  /**
   * @throws InvalidOptionError when `chunkSize` is not a positive integer
   */
  constructor(
    private readonly registry: EncodingRegistry,
    options: StreamConverterOptions = {}
  ) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!isValidChunkSize(chunkSize)) {
      throw new InvalidOptionError('chunkSize', chunkSize, 'a positive integer');
    }
    this.chunkSize = chunkSize;
  }

  /**
   * Copy or transcode `input` into `output`. Never rejects; failures are
   * reported through `result.error`.
   */
  async convert(options: StreamConvertOptions): Promise<ConversionResult> {
    const inputKind = options.inputKind ?? 'special-stream';
    const counters: Counters = { bytesRead: 0, bytesWritten: 0, chunksProcessed: 0 };

    const chunkSize = options.chunkSize ?? this.chunkSize;
    if (!isValidChunkSize(chunkSize)) {
      const invalid = new InvalidOptionError('chunkSize', chunkSize, 'a positive integer');
      return createResult({ inputKind, error: toErrorDetail(invalid) });
    }
    const { output, signal } = options;
    if (output.errored) {
      return createResult({ inputKind, error: toErrorDetail(output.errored) });
    }

    const source = this.registry.lookup(options.source);
    const target = this.registry.lookup(options.target);
    if (!source || !target) {
      const missing = new UnsupportedEncodingError(source ? options.target : options.source);
      return createResult({ inputKind, error: toErrorDetail(missing) });
    }
    const sourceName = source.name;
    const targetName = target.name;
    const transcoder = source === target ? undefined : new Transcoder(source, target);

    const conversionPerformed = transcoder !== undefined;

    log.debug(conversionPerformed ? 'Transcoding stream' : 'Copying stream', {
      source: sourceName,
      target: targetName,
      chunkSize,
    });

    // a failed write rejects through its callback and emits 'error' a tick
    // later; the one-shot listener absorbs that event and then removes itself
    let outputError: Error | undefined;
    const onOutputError = (error: Error): void => {
      outputError = error;
    };
    output.once('error', onOutputError);

    const chunks: AsyncIterable<unknown> = options.input.iterator({
      destroyOnReturn: options.destroyInput ?? false,
    });

    try {
      for await (const raw of chunks) {
        const bytes = toBytes(raw);

        for (let offset = 0; offset < bytes.length; offset += chunkSize) {
          if (signal?.aborted) {
            throw new ConversionAbortedError(abortMessage(signal));
          }

          const piece = bytes.subarray(offset, Math.min(offset + chunkSize, bytes.length));
          counters.bytesRead += piece.length;
          counters.chunksProcessed++;

          const out = transcoder ? transcoder.write(piece) : piece;
          if (out.length > 0) {
            await writeBytes(output, out);
            counters.bytesWritten += out.length;
          }
        }
      }

      if (transcoder) {
        const tail = transcoder.end();
        if (tail.length > 0) {
          await writeBytes(output, tail);
          counters.bytesWritten += tail.length;
        }
      }

      if (options.endOutput ?? true) {
        output.end();
        await finished(output, { readable: false });
      }
      if (outputError) throw outputError;
    } catch (error) {
      if (!output.errored) output.off('error', onOutputError);
      log.debug('Stream conversion failed', { ...counters, error: toErrorDetail(error).message });
      return createResult({
        inputKind,
        ...counters,
        encodingDetected: sourceName,
        targetEncoding: targetName,
        conversionPerformed,
        replacedCharCount: transcoder?.replacedCharCount ?? 0,
        error: toErrorDetail(error),
      });
    }

    output.off('error', onOutputError);
    log.debug('Stream conversion complete', { ...counters });

    return createResult({
      success: true,
      inputKind,
      ...counters,
      encodingDetected: sourceName,
      targetEncoding: targetName,
      conversionPerformed,
      replacedCharCount: transcoder?.replacedCharCount ?? 0,
    });
  }

  /**
   * Transcode an in-memory buffer. Identical encodings return a copy.
   *
   * @throws UnsupportedEncodingError for unregistered names
   */
  convertBytes(source: string, target: string, bytes: Uint8Array): TranscodeResult {
    const from = this.registry.require(source);
    const to = this.registry.require(target);
    if (from === to) {
      return { bytes: Uint8Array.from(bytes), replacedCharCount: 0 };
    }
    return transcodeBytes(from, to, bytes);
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  throw new TypeError(`Expected binary chunks from the input stream, got ${typeof chunk}`);
}

function writeBytes(output: Writable, bytes: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(bytes, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return reason === undefined ? 'Conversion aborted' : getErrorMessage(reason);
}

function isValidChunkSize(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
