/**
 * Environment variable overrides for configuration.
 *
 * Provides support for ASTERISM_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { resolveConfig } from './parser.js';
import type { Config, ConfigSection } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/** Value types an environment variable can be coerced to. */
export type EnvValueType = 'string' | 'number' | 'boolean';

/** A coerced environment value. */
export type EnvValue = string | number | boolean;

/**
 * Overrides read from the environment, keyed by section and field.
 */
export type EnvOverrides = Partial<Record<ConfigSection, Record<string, EnvValue>>>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvVarMapping {
  readonly section: ConfigSection;
  readonly field: string;
  readonly type: EnvValueType;
  readonly description: string;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Format: ASTERISM_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * Shortcuts come first so that the full form wins when both are set.
 */
const ENV_VAR_MAPPINGS: Record<string, EnvVarMapping> = {
  ASTERISM_MARKER: {
    section: 'parser',
    field: 'marker',
    type: 'string',
    description: 'Override the structural marker (shortcut for ASTERISM_PARSER_MARKER)',
  },
  ASTERISM_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug logging (shortcut for ASTERISM_LOGGING_DEBUG)',
  },

  ASTERISM_PARSER_MARKER: {
    section: 'parser',
    field: 'marker',
    type: 'string',
    description: 'Override the structural marker character',
  },
  ASTERISM_PARSER_FENCE: {
    section: 'parser',
    field: 'fence',
    type: 'string',
    description: 'Override the code fence token',
  },
  ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT: {
    section: 'parser',
    field: 'frontmatter_line_limit',
    type: 'number',
    description: 'Override the last line on which frontmatter may open',
  },
  ASTERISM_RENDER_COLLAPSE_MARKER: {
    section: 'render',
    field: 'collapse_marker',
    type: 'string',
    description: 'Override the suffix of collapsed nodes',
  },
  ASTERISM_CLI_COLORS: {
    section: 'cli',
    field: 'colors',
    type: 'boolean',
    description: 'Enable or disable ANSI colors (true/false)',
  },
  ASTERISM_CLI_UNICODE: {
    section: 'cli',
    field: 'unicode',
    type: 'boolean',
    description: 'Enable or disable box-drawing characters (true/false)',
  },
  ASTERISM_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable or disable debug logging (true/false)',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, type: EnvValueType, envVar: string): EnvValue {
  switch (type) {
    case 'string':
      return value;
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Coerced values from environment variables. */
  overrides: EnvOverrides;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for ASTERISM_* environment variables; empty values are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 * throwing the first one.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ ASTERISM_CLI_COLORS: 'off' });
 * console.log(result.overrides.cli?.colors); // false
 * console.log(result.appliedVars); // ['ASTERISM_CLI_COLORS']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: EnvOverrides = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      const coerced = coerceValue(value, mapping.type, envVar);
      const section = overrides[mapping.section] ?? {};
      section[mapping.field] = coerced;
      overrides[mapping.section] = section;
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Override values go through the same validation as config file values.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 * @throws ConfigParseError if a coerced value is invalid for its field.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // ASTERISM_CLI_UNICODE=false overrides [cli] unicode from the file
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return resolveConfig(overrides, config);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
