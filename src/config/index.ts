/**
 * Configuration Module
 */

export * from './converter-config.js';
export * from './env-schema.js';
