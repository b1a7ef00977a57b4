/**
 * Descriptor helpers: classify paths and open the streams behind descriptors.
 */

import { once } from 'events';
import * as fs from 'fs-extra';
import type { Readable, Writable } from 'stream';
import { asError, getErrorMessage } from '../errors/base-error.js';
import { ConversionIOError } from '../errors/conversion-errors.js';
import type { DescriptorKind, InputDescriptor, OutputDescriptor } from './types.js';

/**
 * Kind of the filesystem object at `path`, from stat(2).
 */
export async function detectKind(path: string): Promise<DescriptorKind> {
  const stats = await fs.stat(path);
  if (stats.isFile()) return 'regular-file';
  if (stats.isFIFO()) return 'named-pipe';
  return 'special-stream';
}

/**
 * Build an input descriptor for an existing path.
 *
 * @throws ConversionIOError when the path cannot be stat'ed
 */
export async function describeInput(path: string): Promise<InputDescriptor> {
  try {
    return { kind: await detectKind(path), locator: path };
  } catch (error) {
    throw new ConversionIOError(
      `Cannot access input "${path}": ${getErrorMessage(error)}`,
      path,
      'open',
      asError(error)
    );
  }
}

/**
 * Build an output descriptor. A path that does not exist yet becomes a regular file.
 */
export async function describeOutput(path: string): Promise<OutputDescriptor> {
  if (!(await fs.pathExists(path))) {
    return { kind: 'regular-file', locator: path };
  }
  return { kind: await detectKind(path), locator: path };
}

export interface OpenedStream<S> {
  stream: S;
  /** True when the stream was opened here and must be closed here */
  owned: boolean;
}

export async function openInput(
  descriptor: InputDescriptor,
  chunkSize: number
): Promise<OpenedStream<Readable>> {
  if (typeof descriptor.locator !== 'string') {
    return { stream: descriptor.locator, owned: false };
  }

  const path = descriptor.locator;
  const stream = fs.createReadStream(path, { highWaterMark: chunkSize });
  try {
    await once(stream, 'open');
  } catch (error) {
    stream.destroy();
    throw new ConversionIOError(
      `Cannot open input "${path}": ${getErrorMessage(error)}`,
      path,
      'open',
      asError(error)
    );
  }
  return { stream, owned: true };
}

export async function openOutput(descriptor: OutputDescriptor): Promise<OpenedStream<Writable>> {
  if (typeof descriptor.locator !== 'string') {
    return { stream: descriptor.locator, owned: false };
  }

  const path = descriptor.locator;
  const stream = fs.createWriteStream(path);
  try {
    await once(stream, 'open');
  } catch (error) {
    stream.destroy();
    throw new ConversionIOError(
      `Cannot open output "${path}": ${getErrorMessage(error)}`,
      path,
      'open',
      asError(error)
    );
  }
  return { stream, owned: true };
}
