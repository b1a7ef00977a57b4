export * from './types.js';
export * from './result.js';
export * from './descriptors.js';
export * from './encoding-resolver.js';
export * from './stream-converter.js';
export * from './orchestrator.js';
