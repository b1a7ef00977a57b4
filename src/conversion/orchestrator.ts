/**
 * Conversion Orchestrator
 *
 * Runs one conversion request, or a batch of them, end to end:
 * resolve the source encoding, open the streams, copy or transcode, then tag
 * a regular-file output. Every failure is captured on that request's result;
 * nothing is thrown to the caller and one failed batch item never stops the
 * items after it.
 */

import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import {
  loadConverterConfig,
  type ConverterConfig,
  type ConverterConfigInput,
} from '../config/converter-config.js';
import { createDefaultRegistry, type EncodingRegistry } from '../encoding/registry.js';
import { toErrorDetail } from '../errors/conversion-errors.js';
import { createDefaultTagStore } from '../tagging/index.js';
import { TagInspector } from '../tagging/tag-inspector.js';
import type { CodePageTag, TagStore } from '../tagging/tag-store.js';
import { TagWriter } from '../tagging/tag-writer.js';
import { logger } from '../utils/logger.js';
import { openInput, openOutput, type OpenedStream } from './descriptors.js';
import { EncodingResolver } from './encoding-resolver.js';
import { createResult, withResult } from './result.js';
import { StreamConverter } from './stream-converter.js';
import type { ConversionRequest, ConversionResult, Resolution } from './types.js';
import { describeLocator } from './types.js';

const log = logger.child('orchestrator');

export interface ConversionOrchestratorOptions {
  registry?: EncodingRegistry;
  tagStore?: TagStore;
  config?: ConverterConfigInput;
  /** Environment read for configuration. Default: process.env */
  env?: Record<string, string | undefined>;
}

export interface ConversionOrchestratorEvents {
  'resolved': (request: ConversionRequest, resolution: Resolution) => void;
  'completed': (request: ConversionRequest, result: ConversionResult) => void;
}

export class ConversionOrchestrator extends EventEmitter {
  readonly registry: EncodingRegistry;
  readonly config: ConverterConfig;
  readonly inspector: TagInspector;
  private readonly resolver: EncodingResolver;
  private readonly converter: StreamConverter;
  private readonly writer: TagWriter;

  constructor(options: ConversionOrchestratorOptions = {}) {
    super();
    this.registry = options.registry ?? createDefaultRegistry();
    this.config = loadConverterConfig(options.config, options.env);

    const store = options.tagStore ?? createDefaultTagStore(process.platform, this.registry);
    this.inspector = new TagInspector(store, this.registry);
    this.resolver = new EncodingResolver(this.registry, this.inspector, {
      untaggedSource: this.config.untaggedSource,
      unknownTagPolicy: this.config.unknownTagPolicy,
      defaultTarget: this.config.defaultTarget,
    });
    this.converter = new StreamConverter(this.registry, { chunkSize: this.config.chunkSize });
    this.writer = new TagWriter(store, { verify: this.config.verifyTags });
  }

  /**
   * Run a single request. Never rejects.
   */
  async run(request: ConversionRequest): Promise<ConversionResult> {
    let result: ConversionResult;
    try {
      result = await this.execute(request);
    } catch (error) {
      result = createResult({ inputKind: request.input.kind, error: toErrorDetail(error) });
    }

    if (result.success) {
      log.debug(`Converted ${describeLocator(request.input)}`, {
        bytesRead: result.bytesRead,
        bytesWritten: result.bytesWritten,
        conversionPerformed: result.conversionPerformed,
      });
    } else {
      log.debug(`Conversion of ${describeLocator(request.input)} failed`, { error: result.error });
    }

    this.emit('completed', request, result);
    return result;
  }

  /**
   * Run requests one after another. Results are in request order, and a
   * failed item is recorded without stopping the rest.
   */
  async runBatch(requests: readonly ConversionRequest[]): Promise<ConversionResult[]> {
    const results: ConversionResult[] = [];
    for (const request of requests) {
      results.push(await this.run(request));
    }
    return results;
  }

  private async execute(request: ConversionRequest): Promise<ConversionResult> {
    const inputKind = request.input.kind;

    let resolution: Resolution;
    try {
      resolution = await this.resolver.resolve(request);
    } catch (error) {
      return createResult({ inputKind, error: toErrorDetail(error) });
    }
    this.emit('resolved', request, resolution);

    const resolved = {
      inputKind,
      encodingDetected: resolution.source,
      targetEncoding: resolution.target,
      resolvedBy: resolution.resolvedBy,
    };

    let input: OpenedStream<Readable> | undefined;
    let output: OpenedStream<Writable> | undefined;
    try {
      input = await openInput(request.input, this.config.chunkSize);
      output = await openOutput(request.output);
    } catch (error) {
      if (input?.owned) input.stream.destroy();
      return createResult({ ...resolved, error: toErrorDetail(error) });
    }

    const signal =
      this.config.deadlineMs !== undefined ? AbortSignal.timeout(this.config.deadlineMs) : undefined;

    const converted = await this.converter.convert({
      source: resolution.source,
      target: resolution.target,
      input: input.stream,
      output: output.stream,
      signal,
      endOutput: output.owned,
      destroyInput: input.owned,
      inputKind,
    });

    if (!converted.success) {
      if (input.owned) input.stream.destroy();
      if (output.owned) output.stream.destroy();
      return withResult(converted, { resolvedBy: resolution.resolvedBy });
    }

    let result = withResult(converted, { resolvedBy: resolution.resolvedBy });

    if (request.output.kind === 'regular-file' && this.config.tagOutput) {
      const tag: CodePageTag = { ccsid: this.registry.require(resolution.target).ccsid, isText: true };
      try {
        await this.writer.tag(request.output.locator, tag);
        result = withResult(result, { tagApplied: tag });
      } catch (error) {
        log.debug(`Output ${request.output.locator} written but not tagged`, {
          error: toErrorDetail(error).message,
        });
        result = withResult(result, { tagError: toErrorDetail(error) });
      }
    }

    return result;
  }

  on<K extends keyof ConversionOrchestratorEvents>(event: K, listener: ConversionOrchestratorEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ConversionOrchestratorEvents>(
    event: K,
    ...args: Parameters<ConversionOrchestratorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
