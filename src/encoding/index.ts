/**
 * Encoding module: codecs, byte tables and the encoding registry
 */

export * from './codec.js';
export * from './single-byte-codec.js';
export * from './registry.js';
