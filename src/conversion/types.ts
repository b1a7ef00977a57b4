/**
 * Conversion request and result types
 */

import type { Readable, Writable } from 'stream';
import type { EncodingName } from '../encoding/codec.js';
import type { ErrorDetail } from '../errors/conversion-errors.js';
import type { CodePageTag } from '../tagging/tag-store.js';

export type DescriptorKind = 'regular-file' | 'named-pipe' | 'special-stream';

/**
 * Where bytes come from or go to. Only regular files can be tag-inspected
 * or tagged; special streams may be an open Node stream instead of a path.
 */
export type Descriptor<S> =
  | { kind: 'regular-file'; locator: string }
  | { kind: 'named-pipe'; locator: string }
  | { kind: 'special-stream'; locator: string | S };

export type InputDescriptor = Descriptor<Readable>;
export type OutputDescriptor = Descriptor<Writable>;

export interface ConversionRequest {
  input: InputDescriptor;
  output: OutputDescriptor;
  /** Wins over any tag on the input. Required for pipes and special streams. */
  sourceOverride?: EncodingName;
  /** Defaults to the configured target when omitted */
  target?: EncodingName;
}

/**
 * How the effective source encoding was decided
 */
export type ResolvedBy = 'override' | 'tag' | 'untagged-default' | 'unrecognized-tag';

export interface Resolution {
  source: EncodingName;
  target: EncodingName;
  needsConversion: boolean;
  resolvedBy: ResolvedBy;
  /** Tag read from the input, when the input was inspected */
  tag?: CodePageTag;
}

export interface ConversionResult {
  readonly success: boolean;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  /** Effective source encoding; undefined when resolution failed */
  readonly encodingDetected?: EncodingName;
  readonly targetEncoding?: EncodingName;
  readonly resolvedBy?: ResolvedBy;
  readonly conversionPerformed: boolean;
  readonly replacedCharCount: number;
  readonly chunksProcessed: number;
  readonly inputKind: DescriptorKind;
  /** Tag set on a regular-file output */
  readonly tagApplied?: CodePageTag;
  /** Output bytes are correct but the tag could not be set */
  readonly tagError?: ErrorDetail;
  readonly error?: ErrorDetail;
}

export function describeLocator(descriptor: Descriptor<unknown>): string {
  return typeof descriptor.locator === 'string' ? descriptor.locator : `<${descriptor.kind}>`;
}
