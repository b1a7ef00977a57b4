/**
 * Converter configuration
 *
 * Defaults, then environment variables (see env-schema.ts), then explicit
 * overrides; the merged object is validated with Zod.
 */

import { z } from 'zod';
import { ConverterError } from '../errors/base-error.js';
import { parseBooleanEnv } from './env-schema.js';

export const MAX_CHUNK_SIZE = 16 * 1024 * 1024;

export const ConverterConfigSchema = z.object({
  /** Bytes per read while copying or transcoding */
  chunkSize: z.number().int().min(1).max(MAX_CHUNK_SIZE).default(8192),
  /** Tag regular-file outputs with the target CCSID */
  tagOutput: z.boolean().default(true),
  /** Read the tag back after setting it */
  verifyTags: z.boolean().default(true),
  /**
   * Encoding assumed for untagged files. Unset means the file is taken to be
   * in the target encoding already and is copied verbatim.
   */
  untaggedSource: z.string().min(1).optional(),
  /** Files tagged with a CCSID the registry does not know: copy verbatim, or fail */
  unknownTagPolicy: z.enum(['copy', 'fail']).default('copy'),
  /** Abort a single conversion between chunks once this much time has passed */
  deadlineMs: z.number().int().positive().optional(),
  defaultTarget: z.string().min(1).default('IBM-1047'),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

export const DEFAULT_CONVERTER_CONFIG: Readonly<ConverterConfig> = Object.freeze(
  ConverterConfigSchema.parse({})
);

const ENV_KEYS: Record<string, { key: keyof ConverterConfig; type: 'number' | 'boolean' | 'string' }> = {
  CCSID_CHUNK_SIZE: { key: 'chunkSize', type: 'number' },
  CCSID_TAG_OUTPUT: { key: 'tagOutput', type: 'boolean' },
  CCSID_VERIFY_TAGS: { key: 'verifyTags', type: 'boolean' },
  CCSID_UNTAGGED_SOURCE: { key: 'untaggedSource', type: 'string' },
  CCSID_UNKNOWN_TAG_POLICY: { key: 'unknownTagPolicy', type: 'string' },
  CCSID_DEADLINE_MS: { key: 'deadlineMs', type: 'number' },
  CCSID_DEFAULT_TARGET: { key: 'defaultTarget', type: 'string' },
};

/**
 * Raw (unvalidated) configuration values found in `env`.
 * Unparseable values are passed through so that validation reports them.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  for (const [name, { key, type }] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;

    switch (type) {
      case 'number':
        values[key] = Number(raw);
        break;
      case 'boolean':
        values[key] = parseBooleanEnv(raw) ?? raw;
        break;
      case 'string':
        values[key] = raw.trim();
        break;
    }
  }

  return values;
}

/**
 * @throws ConverterError with code INVALID_CONFIG
 */
export function loadConverterConfig(
  overrides: ConverterConfigInput = {},
  env: Record<string, string | undefined> = process.env
): ConverterConfig {
  const merged: Record<string, unknown> = { ...configFromEnv(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = ConverterConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConverterError('INVALID_CONFIG', `Invalid converter configuration: ${issues.join('; ')}`, {
      context: { issues },
    });
  }

  return parsed.data;
}
