import { ConverterError, getErrorMessage } from './base-error.js';

export type ErrorKind =
  | 'UnspecifiedEncodingError'
  | 'UnsupportedEncodingError'
  | 'IOError'
  | 'TagQueryError'
  | 'TagSetError'
  | 'ConversionAbortedError'
  | 'InvalidOptionError';

export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
}

/**
 * A non-seekable input arrived without an explicit source encoding.
 */
export class UnspecifiedEncodingError extends ConverterError {
  public readonly kind = 'UnspecifiedEncodingError' as const;

  constructor(locator: string, inputKind: string) {
    super(
      'UNSPECIFIED_ENCODING',
      `Cannot detect the encoding of ${inputKind} "${locator}": a source encoding must be given`,
      { context: { locator, inputKind } }
    );
    this.name = 'UnspecifiedEncodingError';
  }
}

/**
 * Encoding name or CCSID that the registry does not know.
 */
export class UnsupportedEncodingError extends ConverterError {
  public readonly kind = 'UnsupportedEncodingError' as const;
  public readonly encoding: string;

  constructor(encoding: string | number) {
    const label = typeof encoding === 'number' ? `CCSID ${encoding}` : `"${encoding}"`;
    super('UNSUPPORTED_ENCODING', `Unsupported encoding ${label}`, {
      context: { encoding },
    });
    this.name = 'UnsupportedEncodingError';
    this.encoding = String(encoding);
  }
}

export class ConversionIOError extends ConverterError {
  public readonly kind = 'IOError' as const;
  public readonly locator: string;
  public readonly operation: 'open' | 'read' | 'write';

  constructor(
    message: string,
    locator: string,
    operation: 'open' | 'read' | 'write',
    cause?: Error
  ) {
    super('IO_ERROR', message, { cause, context: { locator, operation } });
    this.name = 'ConversionIOError';
    this.locator = locator;
    this.operation = operation;
  }
}

export class TagQueryError extends ConverterError {
  public readonly kind = 'TagQueryError' as const;
  public readonly path: string;

  constructor(path: string, message: string, cause?: Error) {
    super('TAG_QUERY_ERROR', `Could not query tag of "${path}": ${message}`, {
      cause,
      context: { path },
    });
    this.name = 'TagQueryError';
    this.path = path;
  }
}

export class TagSetError extends ConverterError {
  public readonly kind = 'TagSetError' as const;
  public readonly path: string;

  constructor(path: string, message: string, cause?: Error) {
    super('TAG_SET_ERROR', `Could not tag "${path}": ${message}`, {
      cause,
      context: { path },
    });
    this.name = 'TagSetError';
    this.path = path;
  }
}

export class ConversionAbortedError extends ConverterError {
  public readonly kind = 'ConversionAbortedError' as const;

  constructor(message = 'Conversion aborted') {
    super('CONVERSION_ABORTED', message);
    this.name = 'ConversionAbortedError';
  }
}

/**
 * An option passed to the engine directly, outside the validated config.
 */
export class InvalidOptionError extends ConverterError {
  public readonly kind = 'InvalidOptionError' as const;
  public readonly option: string;

  constructor(option: string, value: unknown, expected: string) {
    super('INVALID_OPTION', `Invalid ${option} ${String(value)}: expected ${expected}`, {
      context: { option, value },
    });
    this.name = 'InvalidOptionError';
    this.option = option;
  }
}

export type ConversionError =
  | UnspecifiedEncodingError
  | UnsupportedEncodingError
  | ConversionIOError
  | TagQueryError
  | TagSetError
  | ConversionAbortedError
  | InvalidOptionError;

export function isConversionError(error: unknown): error is ConversionError {
  return (
    error instanceof UnspecifiedEncodingError ||
    error instanceof UnsupportedEncodingError ||
    error instanceof ConversionIOError ||
    error instanceof TagQueryError ||
    error instanceof TagSetError ||
    error instanceof ConversionAbortedError ||
    error instanceof InvalidOptionError
  );
}

/**
 * Map any thrown value onto the `{ kind, message }` pair carried by results.
 * Anything that is not one of ours is an I/O failure from the stream layer.
 */
export function toErrorDetail(error: unknown): ErrorDetail {
  if (isConversionError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'IOError', message: getErrorMessage(error) };
}
