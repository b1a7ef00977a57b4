/**
 * Conversion result construction and formatting
 */

import type { ConversionResult, DescriptorKind } from './types.js';

type ResultFields = Partial<ConversionResult> & { inputKind: DescriptorKind };

/**
 * Build a frozen result; counters default to zero.
 */
export function createResult(fields: ResultFields): ConversionResult {
  const result: ConversionResult = {
    success: false,
    bytesRead: 0,
    bytesWritten: 0,
    conversionPerformed: false,
    replacedCharCount: 0,
    chunksProcessed: 0,
    ...fields,
  };
  return Object.freeze(result);
}

/**
 * Copy of `result` with `changes` applied; the original stays untouched.
 */
export function withResult(result: ConversionResult, changes: Partial<ConversionResult>): ConversionResult {
  return Object.freeze({ ...result, ...changes });
}

/**
 * One-line summary for a reporting layer.
 */
export function formatConversionResult(result: ConversionResult): string {
  if (!result.success) {
    const message = result.error ? `${result.error.kind}: ${result.error.message}` : 'unknown error';
    return `Conversion failed after ${result.bytesRead} bytes: ${message}`;
  }

  const route =
    result.encodingDetected && result.targetEncoding
      ? ` (${result.encodingDetected} -> ${result.targetEncoding})`
      : '';
  const verb = result.conversionPerformed ? 'Converted' : 'Copied';
  const parts = [`${verb} ${result.bytesRead} bytes -> ${result.bytesWritten} bytes${route}`];

  if (result.replacedCharCount > 0) {
    parts.push(`${result.replacedCharCount} replaced`);
  }
  if (result.tagError) {
    parts.push(`tag not set: ${result.tagError.message}`);
  } else if (result.tagApplied) {
    parts.push(`tagged CCSID ${result.tagApplied.ccsid}`);
  }

  return parts.join(', ');
}
