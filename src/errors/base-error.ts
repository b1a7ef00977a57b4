/**
 * Base error for the converter and helpers for values thrown by Node.
 *
 * Errors from `fs` and `child_process` may come from another realm (a VM
 * context, a worker), so they are recognized with `types.isNativeError`
 * rather than `instanceof Error`.
 */

import { types } from 'util';

export interface ConverterErrorOptions {
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ConverterError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, options: ConverterErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'ConverterError';
    this.code = code;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: asError(this.cause)?.message,
    };
  }
}

/**
 * The value as an `Error` when it is one, from any realm.
 */
export function asError(value: unknown): Error | undefined {
  return types.isNativeError(value) ? value : undefined;
}

/**
 * Message of a thrown value, whatever was thrown.
 */
export function getErrorMessage(value: unknown): string {
  const error = asError(value);
  if (error) return error.message;
  // DOMException abort reasons are not native errors but carry a message
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message;
  }
  return String(value);
}
