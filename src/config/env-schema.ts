/**
 * Environment Variable Schema & Validation
 *
 * Central registry of the environment variables read by the converter.
 * Values are validated against their declared type and range.
 */

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'number' | 'boolean';
  /** Default value (as string, since env vars are always strings) */
  default?: string;
  /** Human-readable description */
  description: string;
  /** Minimum value for numbers */
  min?: number;
  /** Maximum value for numbers */
  max?: number;
  /** Regex pattern for string validation */
  pattern?: RegExp;
}

export const ENV_SCHEMA: EnvVarDef[] = [
  // ---- Conversion ----
  {
    name: 'CCSID_CHUNK_SIZE',
    type: 'number',
    default: '8192',
    description: 'Bytes read per chunk while copying or transcoding',
    min: 1,
    max: 16 * 1024 * 1024,
  },
  {
    name: 'CCSID_DEFAULT_TARGET',
    type: 'string',
    default: 'IBM-1047',
    description: 'Target encoding used when a caller does not name one',
  },
  {
    name: 'CCSID_UNTAGGED_SOURCE',
    type: 'string',
    description: 'Encoding assumed for untagged files (unset: assume already in the target encoding)',
  },
  {
    name: 'CCSID_DEADLINE_MS',
    type: 'number',
    description: 'Abort a single conversion after this many milliseconds',
    min: 1,
  },

  // ---- Tagging ----
  {
    name: 'CCSID_TAG_OUTPUT',
    type: 'boolean',
    default: 'true',
    description: 'Tag regular-file outputs with the target CCSID',
  },
  {
    name: 'CCSID_VERIFY_TAGS',
    type: 'boolean',
    default: 'true',
    description: 'Read the tag back after setting it',
  },
  {
    name: 'CCSID_UNKNOWN_TAG_POLICY',
    type: 'string',
    default: 'copy',
    description: 'What to do with a file tagged with an unregistered CCSID (copy or fail)',
    pattern: /^(copy|fail)$/,
  },

  // ---- Debug ----
  {
    name: 'LOG_LEVEL',
    type: 'string',
    default: 'warn',
    description: 'Logging level (debug, info, warn, error)',
    pattern: /^(debug|info|warn|error)$/,
  },
  {
    name: 'LOG_FORMAT',
    type: 'string',
    default: 'text',
    description: 'Log output format (text or json)',
    pattern: /^(text|json)$/,
  },
];

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

const schemaByName: Map<string, EnvVarDef> = new Map(
  ENV_SCHEMA.map(def => [def.name, def])
);

export function getEnvDef(name: string): EnvVarDef | undefined {
  return schemaByName.get(name);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

/**
 * Validate an environment against the schema.
 *
 * - Values of the wrong type produce **errors**; the loader would reject them.
 * - Out-of-range numbers and pattern mismatches produce **warnings**.
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];

    if (raw === undefined || raw === '') {
      continue;
    }

    switch (def.type) {
      case 'number': {
        const num = Number(raw);
        if (isNaN(num)) {
          errors.push(`${def.name} should be a number but got "${raw}"`);
        } else {
          if (def.min !== undefined && num < def.min) {
            warnings.push(`${def.name}=${raw} is below minimum ${def.min}`);
          }
          if (def.max !== undefined && num > def.max) {
            warnings.push(`${def.name}=${raw} is above maximum ${def.max}`);
          }
        }
        break;
      }
      case 'boolean': {
        if (parseBooleanEnv(raw) === undefined) {
          errors.push(`${def.name} should be a boolean (true/false) but got "${raw}"`);
        }
        break;
      }
      case 'string': {
        if (def.pattern && !def.pattern.test(raw)) {
          warnings.push(`${def.name}="${raw}" does not match expected pattern ${def.pattern}`);
        }
        break;
      }
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}

export function parseBooleanEnv(raw: string): boolean | undefined {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}
