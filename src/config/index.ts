/**
 * Configuration module for asterism.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig, resolveConfig } from './parser.js';
export type { RawConfig } from './parser.js';
export type {
  CliSettingsConfig,
  Config,
  ConfigSection,
  LoggingConfig,
  ParserSettingsConfig,
  PartialConfig,
  RenderSettingsConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_PARSER_CONFIG,
  DEFAULT_RENDER_CONFIG,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvOverrides, EnvRecord, EnvValue, EnvValueType } from './env.js';
