/**
 * Code Page Service
 *
 * Path- and buffer-oriented facade over the conversion engine for callers
 * that do not want to build descriptors and requests themselves.
 *
 * @example
 * ```typescript
 * const service = new CodePageService({ tagStore: new MemoryTagStore() });
 *
 * const ccsid = await service.getCcsid('/data/input.txt');
 * const ebcdic = service.convertToEbcdic(Buffer.from('Hello', 'latin1'));
 *
 * // regular files are tag-inspected, pipes need a source encoding
 * await service.convertInput('/tmp/fifo', '/data/out.txt', 'ISO8859-1');
 * ```
 */

import type { EncodingName } from '../encoding/codec.js';
import { CCSID_IBM1047, CCSID_ISO8859_1, IBM_1047, ISO8859_1 } from '../encoding/registry.js';
import { toErrorDetail } from '../errors/conversion-errors.js';
import { describeInput, describeOutput, detectKind } from '../conversion/descriptors.js';
import {
  ConversionOrchestrator,
  type ConversionOrchestratorOptions,
} from '../conversion/orchestrator.js';
import { createResult } from '../conversion/result.js';
import { StreamConverter } from '../conversion/stream-converter.js';
import type { ConversionResult, InputDescriptor, OutputDescriptor } from '../conversion/types.js';
import { describeTag, type TagInfo } from '../tagging/tag-inspector.js';
import { UNTAGGED } from '../tagging/tag-store.js';

export type CodePageServiceOptions = ConversionOrchestratorOptions;

export class CodePageService {
  readonly orchestrator: ConversionOrchestrator;
  private readonly converter: StreamConverter;

  constructor(options: CodePageServiceOptions = {}) {
    this.orchestrator = new ConversionOrchestrator(options);
    this.converter = new StreamConverter(this.orchestrator.registry, {
      chunkSize: this.orchestrator.config.chunkSize,
    });
  }

  /**
   * Tag of `path`. Pipes, devices and paths that cannot be stat'ed report as untagged.
   */
  async getTagInfo(path: string): Promise<TagInfo> {
    const registry = this.orchestrator.registry;
    try {
      if ((await detectKind(path)) !== 'regular-file') {
        return describeTag(UNTAGGED, registry);
      }
    } catch {
      return describeTag(UNTAGGED, registry);
    }
    return this.orchestrator.inspector.inspectInfo(path);
  }

  /** 819 for ISO8859-1, 1047 for IBM-1047, 0 when untagged */
  async getCcsid(path: string): Promise<number> {
    return (await this.getTagInfo(path)).ccsid;
  }

  /** Canonical encoding name, or "untagged" */
  async getEncodingName(path: string): Promise<string> {
    return (await this.getTagInfo(path)).encodingName;
  }

  async isAscii(path: string): Promise<boolean> {
    return (await this.getCcsid(path)) === CCSID_ISO8859_1;
  }

  async isEbcdic(path: string): Promise<boolean> {
    return (await this.getCcsid(path)) === CCSID_IBM1047;
  }

  async isUntagged(path: string): Promise<boolean> {
    return (await this.getCcsid(path)) === 0;
  }

  /**
   * @throws UnsupportedEncodingError for unregistered encoding names
   */
  convertBytes(data: Uint8Array, source: EncodingName, target: EncodingName): Uint8Array {
    return this.converter.convertBytes(source, target, data).bytes;
  }

  convertToEbcdic(data: Uint8Array, source: EncodingName = ISO8859_1): Uint8Array {
    return this.convertBytes(data, source, IBM_1047);
  }

  convertToAscii(data: Uint8Array, source: EncodingName = IBM_1047): Uint8Array {
    return this.convertBytes(data, source, ISO8859_1);
  }

  /**
   * Convert a regular file. The source is read from its tag unless given.
   */
  async convertFile(
    input: string,
    output: string,
    source?: EncodingName,
    target?: EncodingName
  ): Promise<ConversionResult> {
    return this.runPaths({ kind: 'regular-file', locator: input }, output, source, target);
  }

  /**
   * Convert a regular file, named pipe or character device, picking the
   * descriptor kind from stat(2). Pipes and devices need `source`.
   */
  async convertInput(
    input: string,
    output: string,
    source?: EncodingName,
    target?: EncodingName
  ): Promise<ConversionResult> {
    let descriptor: InputDescriptor;
    try {
      descriptor = await describeInput(input);
    } catch (error) {
      return createResult({ inputKind: 'regular-file', error: toErrorDetail(error) });
    }
    return this.runPaths(descriptor, output, source, target);
  }

  private async runPaths(
    input: InputDescriptor,
    output: string,
    source: EncodingName | undefined,
    target: EncodingName | undefined
  ): Promise<ConversionResult> {
    let outputDescriptor: OutputDescriptor;
    try {
      outputDescriptor = await describeOutput(output);
    } catch (error) {
      return createResult({ inputKind: input.kind, error: toErrorDetail(error) });
    }
    return this.orchestrator.run({ input, output: outputDescriptor, sourceOverride: source, target });
  }
}

/**
 * CCSID of `path` (0 when untagged).
 */
export async function detectCodePage(path: string, options: CodePageServiceOptions = {}): Promise<number> {
  return new CodePageService(options).getCcsid(path);
}

/**
 * Encoding name of `path`, or "untagged".
 */
export async function detectEncoding(path: string, options: CodePageServiceOptions = {}): Promise<string> {
  return new CodePageService(options).getEncodingName(path);
}

export function convertData(data: Uint8Array, source: EncodingName, target: EncodingName): Uint8Array {
  return new CodePageService().convertBytes(data, source, target);
}
