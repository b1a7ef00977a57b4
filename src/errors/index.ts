export { ConverterError, asError, getErrorMessage, type ConverterErrorOptions } from './base-error.js';
export {
  ConversionAbortedError,
  ConversionIOError,
  InvalidOptionError,
  TagQueryError,
  TagSetError,
  UnspecifiedEncodingError,
  UnsupportedEncodingError,
  isConversionError,
  toErrorDetail,
} from './conversion-errors.js';
export type { ConversionError, ErrorDetail, ErrorKind } from './conversion-errors.js';
