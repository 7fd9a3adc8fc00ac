/**
 * TOML configuration parser for asterism.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_PARSER_CONFIG,
  DEFAULT_RENDER_CONFIG,
} from './defaults.js';
import type {
  CliSettingsConfig,
  Config,
  LoggingConfig,
  ParserSettingsConfig,
  RenderSettingsConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Raw, unvalidated configuration keyed by section name. */
export type RawConfig = Record<string, unknown>;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a section is a table.
 *
 * @param value - Value to validate.
 * @param section - Section name for error messages.
 * @returns The table, or undefined when the section is absent.
 * @throws ConfigParseError if the section is present but not a table.
 */
function validateSection(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Parses parser settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the parser section.
 * @param base - Values used for absent fields.
 * @returns Validated parser settings merged over `base`.
 */
function parseParserSettings(
  raw: Record<string, unknown> | undefined,
  base: ParserSettingsConfig
): ParserSettingsConfig {
  const result: ParserSettingsConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('marker' in raw) {
    result.marker = validateString(raw.marker, 'parser.marker');
    if (result.marker.length !== 1 || /[\s0-9A-Za-z[\]]/.test(result.marker)) {
      throw new ConfigParseError(
        `Invalid value for 'parser.marker': must be a single non-alphanumeric, non-space character, got '${result.marker}'`
      );
    }
  }
  if ('fence' in raw) {
    result.fence = validateString(raw.fence, 'parser.fence');
    if (result.fence.trim() === '') {
      throw new ConfigParseError(`Invalid value for 'parser.fence': cannot be empty`);
    }
  }
  if ('frontmatter_line_limit' in raw) {
    result.frontmatter_line_limit = validateNumber(
      raw.frontmatter_line_limit,
      'parser.frontmatter_line_limit'
    );
    if (!Number.isInteger(result.frontmatter_line_limit) || result.frontmatter_line_limit < 1) {
      throw new ConfigParseError(
        `Invalid value for 'parser.frontmatter_line_limit': must be a positive integer, got ${String(result.frontmatter_line_limit)}`
      );
    }
  }

  return result;
}

/**
 * Parses renderer settings from raw TOML data.
 */
function parseRenderSettings(
  raw: Record<string, unknown> | undefined,
  base: RenderSettingsConfig
): RenderSettingsConfig {
  const result: RenderSettingsConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('collapse_marker' in raw) {
    result.collapse_marker = validateString(raw.collapse_marker, 'render.collapse_marker');
    if (result.collapse_marker.trim() === '') {
      throw new ConfigParseError(`Invalid value for 'render.collapse_marker': cannot be empty`);
    }
  }

  return result;
}

/**
 * Parses CLI configuration from raw TOML data.
 */
function parseCliSettings(
  raw: Record<string, unknown> | undefined,
  base: CliSettingsConfig
): CliSettingsConfig {
  const result: CliSettingsConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'cli.colors');
  }
  if ('unicode' in raw) {
    result.unicode = validateBoolean(raw.unicode, 'cli.unicode');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined, base: LoggingConfig): LoggingConfig {
  const result: LoggingConfig = { ...base };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Validates raw section tables and merges them over a base configuration.
 *
 * Unknown sections and keys are ignored.
 *
 * @param raw - Raw configuration keyed by section.
 * @param base - Configuration supplying absent values.
 * @returns The merged configuration.
 * @throws ConfigParseError for invalid field types or values.
 */
export function resolveConfig(raw: RawConfig, base: Config = DEFAULT_CONFIG): Config {
  return {
    parser: parseParserSettings(validateSection(raw.parser, 'parser'), base.parser),
    render: parseRenderSettings(validateSection(raw.render, 'render'), base.render),
    cli: parseCliSettings(validateSection(raw.cli, 'cli'), base.cli),
    logging: parseLogging(validateSection(raw.logging, 'logging'), base.logging),
  };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const toml = `
 * [parser]
 * marker = "+"
 *
 * [cli]
 * colors = false
 * `;
 *
 * const config = parseConfig(toml);
 * console.log(config.parser.marker); // "+"
 * console.log(config.cli.colors); // false
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawConfig;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(
      `Invalid TOML syntax: ${cause?.message ?? String(error)}`,
      cause
    );
  }

  return resolveConfig(parsed);
}

/**
 * Returns a copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.parser.frontmatter_line_limit); // 10
 * ```
 */
export function getDefaultConfig(): Config {
  return {
    parser: { ...DEFAULT_PARSER_CONFIG },
    render: { ...DEFAULT_RENDER_CONFIG },
    cli: { ...DEFAULT_CLI_CONFIG },
    logging: { ...DEFAULT_LOGGING_CONFIG },
  };
}
