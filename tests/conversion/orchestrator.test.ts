/**
 * Tests for ConversionOrchestrator: end-to-end runs against temp files and
 * an in-memory Tag Store
 */

import * as path from 'path';
import fs from 'fs-extra';
import { ConversionOrchestrator, type ConversionOrchestratorOptions } from '../../src/conversion/orchestrator.js';
import type { ConversionRequest, ConversionResult, Resolution } from '../../src/conversion/types.js';
import { MemoryTagStore } from '../../src/tagging/memory-tag-store.js';
import { UnsupportedTagStore } from '../../src/tagging/unsupported-tag-store.js';
import { collector, failingWritable, makeTempDir, readableOf, tricklingReadable } from '../test-utils.js';

describe('ConversionOrchestrator', () => {
  let dir: string;
  let store: MemoryTagStore;

  beforeEach(async () => {
    dir = await makeTempDir('orchestrator');
    store = new MemoryTagStore();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  function at(name: string): string {
    return path.join(dir, name);
  }

  function fileRequest(input: string, output: string, extra: Partial<ConversionRequest> = {}): ConversionRequest {
    return {
      input: { kind: 'regular-file', locator: at(input) },
      output: { kind: 'regular-file', locator: at(output) },
      ...extra,
    };
  }

  function orchestrator(options: ConversionOrchestratorOptions = {}): ConversionOrchestrator {
    return new ConversionOrchestrator({ tagStore: store, env: {}, ...options });
  }

  describe('run', () => {
    it('should convert a file tagged ISO8859-1 to IBM-1047 and tag the output', async () => {
      await fs.writeFile(at('in.txt'), Buffer.from('Hello', 'latin1'));
      await store.setTag(at('in.txt'), { ccsid: 819, isText: true });

      const result = await orchestrator().run(fileRequest('in.txt', 'out.txt', { target: 'IBM-1047' }));

      expect(Array.from(await fs.readFile(at('out.txt')))).toEqual([0xc8, 0x85, 0x93, 0x93, 0x96]);
      expect(result).toMatchObject({
        success: true,
        bytesRead: 5,
        bytesWritten: 5,
        encodingDetected: 'ISO8859-1',
        targetEncoding: 'IBM-1047',
        resolvedBy: 'tag',
        conversionPerformed: true,
        replacedCharCount: 0,
        inputKind: 'regular-file',
        tagApplied: { ccsid: 1047, isText: true },
      });
      expect(result.error).toBeUndefined();
      await expect(store.queryTag(at('out.txt'))).resolves.toEqual({ ccsid: 1047, isText: true });
    });

    it('should copy untagged files verbatim', async () => {
      const data = Buffer.from([0x00, 0x15, 0xc1, 0xff]);
      await fs.writeFile(at('in.bin'), data);

      const result = await orchestrator().run(fileRequest('in.bin', 'out.bin'));

      expect((await fs.readFile(at('out.bin'))).equals(data)).toBe(true);
      expect(result).toMatchObject({
        success: true,
        conversionPerformed: false,
        resolvedBy: 'untagged-default',
        encodingDetected: 'IBM-1047',
      });
    });

    it('should produce the same bytes when a no-op copy is repeated', async () => {
      const data = Buffer.from('same bytes', 'latin1');
      await fs.writeFile(at('a'), data);
      await store.setTag(at('a'), { ccsid: 1047, isText: true });
      const runner = orchestrator();

      await runner.run(fileRequest('a', 'b'));
      await runner.run(fileRequest('b', 'c'));

      expect((await fs.readFile(at('c'))).equals(data)).toBe(true);
    });

    it('should convert untagged files from the configured untagged encoding', async () => {
      await fs.writeFile(at('in.txt'), Buffer.from('A', 'latin1'));

      const result = await orchestrator({ config: { untaggedSource: 'ISO8859-1' } }).run(
        fileRequest('in.txt', 'out.txt')
      );

      expect(Array.from(await fs.readFile(at('out.txt')))).toEqual([0xc1]);
      expect(result.conversionPerformed).toBe(true);
    });

    it('should prefer the source override over the tag', async () => {
      await fs.writeFile(at('in.txt'), Buffer.from([0xc1]));
      await store.setTag(at('in.txt'), { ccsid: 819, isText: true });

      const result = await orchestrator().run(
        fileRequest('in.txt', 'out.txt', { sourceOverride: 'IBM-1047', target: 'ISO8859-1' })
      );

      expect((await fs.readFile(at('out.txt'))).toString('latin1')).toBe('A');
      expect(result.resolvedBy).toBe('override');
      expect(result.tagApplied).toEqual({ ccsid: 819, isText: true });
    });

    it('should refuse a named pipe without a source encoding', async () => {
      const result = await orchestrator().run({
        input: { kind: 'named-pipe', locator: at('fifo') },
        output: { kind: 'regular-file', locator: at('out.txt') },
      });

      expect(result.success).toBe(false);
      expect(result.bytesRead).toBe(0);
      expect(result.inputKind).toBe('named-pipe');
      expect(result.error).toEqual({
        kind: 'UnspecifiedEncodingError',
        message: `Cannot detect the encoding of named-pipe "${at('fifo')}": a source encoding must be given`,
      });
      expect(await fs.pathExists(at('out.txt'))).toBe(false);
    });

    it('should stream caller-owned streams without ending or tagging them', async () => {
      const sink = collector();

      const result = await orchestrator().run({
        input: { kind: 'special-stream', locator: readableOf(Buffer.from('Hi', 'latin1')) },
        output: { kind: 'special-stream', locator: sink.stream },
        sourceOverride: 'ISO8859-1',
      });

      expect(Array.from(sink.bytes())).toEqual([0xc8, 0x89]);
      expect(sink.stream.writableEnded).toBe(false);
      expect(result.success).toBe(true);
      expect(result.tagApplied).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it('should leave a caller-owned input undestroyed when the output fails', async () => {
      const input = readableOf(Buffer.from('Hi', 'latin1'));

      const result = await orchestrator().run({
        input: { kind: 'special-stream', locator: input },
        output: { kind: 'special-stream', locator: failingWritable('broken pipe') },
        sourceOverride: 'ISO8859-1',
      });

      expect(result.error).toEqual({ kind: 'IOError', message: 'broken pipe' });
      expect(input.destroyed).toBe(false);
      input.destroy();
    });

    it('should abort a conversion that runs past the configured deadline', async () => {
      const input = tricklingReadable(40, 20);
      const sink = collector();

      const result = await orchestrator({ config: { deadlineMs: 50 } }).run({
        input: { kind: 'special-stream', locator: input },
        output: { kind: 'special-stream', locator: sink.stream },
        sourceOverride: 'ISO8859-1',
      });
      input.destroy();

      expect(result.success).toBe(false);
      expect(result.error?.kind).toBe('ConversionAbortedError');
      expect(result.error?.message).toMatch(/timeout/);
      expect(result.resolvedBy).toBe('override');
      expect(result.bytesRead).toBeLessThan(40);
      expect(sink.bytes().every((byte) => byte === 0xc1)).toBe(true);
    });

    it('should report a missing input as IOError', async () => {
      const result = await orchestrator().run(fileRequest('missing.txt', 'out.txt'));

      expect(result.success).toBe(false);
      expect(result.error?.kind).toBe('IOError');
      expect(result.error?.message).toMatch(/^Cannot open input ".*missing\.txt": ENOENT/);
      expect(result.resolvedBy).toBe('untagged-default');
    });

    it('should report an output in a missing directory as IOError', async () => {
      await fs.writeFile(at('in.txt'), 'data');

      const result = await orchestrator().run(fileRequest('in.txt', path.join('no-such-dir', 'out.txt')));

      expect(result.success).toBe(false);
      expect(result.error?.kind).toBe('IOError');
      expect(result.error?.message).toMatch(/^Cannot open output /);
    });

    it('should report an unsupported target', async () => {
      await fs.writeFile(at('in.txt'), 'data');

      const result = await orchestrator().run(fileRequest('in.txt', 'out.txt', { target: 'UTF-8' }));

      expect(result.error).toEqual({ kind: 'UnsupportedEncodingError', message: 'Unsupported encoding "UTF-8"' });
      expect(result.encodingDetected).toBeUndefined();
    });

    it('should keep the converted output when tagging fails', async () => {
      await fs.writeFile(at('in.txt'), Buffer.from('Hello', 'latin1'));
      const runner = new ConversionOrchestrator({
        tagStore: new UnsupportedTagStore('linux'),
        env: {},
        config: { untaggedSource: 'ISO8859-1' },
      });

      const result = await runner.run(fileRequest('in.txt', 'out.txt'));

      expect(result.success).toBe(true);
      expect(result.tagApplied).toBeUndefined();
      expect(result.tagError).toEqual({
        kind: 'TagSetError',
        message: `Could not tag "${at('out.txt')}": file tagging is not available on linux`,
      });
      expect(Array.from(await fs.readFile(at('out.txt')))).toEqual([0xc8, 0x85, 0x93, 0x93, 0x96]);
    });

    it('should not tag outputs when tagging is switched off', async () => {
      await fs.writeFile(at('in.txt'), 'data');

      const result = await orchestrator({ config: { tagOutput: false } }).run(fileRequest('in.txt', 'out.txt'));

      expect(result.success).toBe(true);
      expect(result.tagApplied).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it('should honour the unknown-tag policy', async () => {
      await fs.writeFile(at('in.txt'), 'data');
      await store.setTag(at('in.txt'), { ccsid: 1208, isText: true });

      const copied = await orchestrator().run(fileRequest('in.txt', 'copy.txt'));
      const refused = await orchestrator({ config: { unknownTagPolicy: 'fail' } }).run(
        fileRequest('in.txt', 'refused.txt')
      );

      expect(copied).toMatchObject({ success: true, resolvedBy: 'unrecognized-tag', conversionPerformed: false });
      expect(refused.error).toEqual({ kind: 'UnsupportedEncodingError', message: 'Unsupported encoding CCSID 1208' });
    });

    it('should emit resolved and completed events', async () => {
      await fs.writeFile(at('in.txt'), 'data');
      const runner = orchestrator();
      const resolved: Resolution[] = [];
      const completed: ConversionResult[] = [];
      runner.on('resolved', (_request: ConversionRequest, resolution: Resolution) => resolved.push(resolution));
      runner.on('completed', (_request: ConversionRequest, result: ConversionResult) => completed.push(result));

      const result = await runner.run(fileRequest('in.txt', 'out.txt'));

      expect(resolved).toHaveLength(1);
      expect(resolved[0].resolvedBy).toBe('untagged-default');
      expect(completed).toEqual([result]);
    });
  });

  describe('runBatch', () => {
    it('should isolate a failed item from the rest of the batch', async () => {
      await fs.writeFile(at('one.txt'), 'one');
      await fs.writeFile(at('three.txt'), 'three');

      const results = await orchestrator().runBatch([
        fileRequest('one.txt', 'one.out'),
        fileRequest('two.txt', 'two.out'),
        fileRequest('three.txt', 'three.out'),
      ]);

      expect(results.map((result) => result.success)).toEqual([true, false, true]);
      expect(results[1].error?.kind).toBe('IOError');
      expect((await fs.readFile(at('three.out'))).toString()).toBe('three');
    });

    it('should return results in request order', async () => {
      await fs.writeFile(at('a'), 'aa');
      await fs.writeFile(at('b'), 'bbbb');

      const results = await orchestrator().runBatch([fileRequest('b', 'b.out'), fileRequest('a', 'a.out')]);

      expect(results.map((result) => result.bytesRead)).toEqual([4, 2]);
    });

    it('should return an empty list for an empty batch', async () => {
      await expect(orchestrator().runBatch([])).resolves.toEqual([]);
    });
  });

  describe('configuration', () => {
    it('should read settings from the given environment', () => {
      const runner = new ConversionOrchestrator({
        tagStore: store,
        env: { CCSID_CHUNK_SIZE: '512', CCSID_VERIFY_TAGS: 'no' },
      });

      expect(runner.config.chunkSize).toBe(512);
      expect(runner.config.verifyTags).toBe(false);
    });

    it('should type event listeners by event name', () => {
      const runner = orchestrator();
      const listener = jest.fn<void, [ConversionRequest, ConversionResult]>();

      runner.on('completed', listener);

      expect(runner.listenerCount('completed')).toBe(1);
      expect(runner.listenerCount('resolved')).toBe(0);
    });

    it('should reject invalid configuration at construction', () => {
      expect(() => orchestrator({ config: { chunkSize: 0 } })).toThrow(/^Invalid converter configuration: chunkSize/);
    });
  });
});
