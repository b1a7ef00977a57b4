/**
 * ccsid-transcoder
 *
 * Detect the code page tag of files and transcode byte streams between
 * ISO8859-1 (CCSID 819) and IBM-1047 (CCSID 1047).
 */

export * from './errors/index.js';
export * from './encoding/index.js';
export * from './tagging/index.js';
export * from './conversion/index.js';
export * from './config/index.js';
export * from './services/index.js';
export { Logger, logger } from './utils/logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './utils/logger.js';
