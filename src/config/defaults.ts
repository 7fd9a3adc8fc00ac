/**
 * Default configuration values for asterism.toml.
 *
 * @packageDocumentation
 */

import type {
  CliSettingsConfig,
  Config,
  LoggingConfig,
  ParserSettingsConfig,
  RenderSettingsConfig,
} from './types.js';

/**
 * Default parser settings.
 */
export const DEFAULT_PARSER_CONFIG: ParserSettingsConfig = {
  marker: '*',
  fence: '```',
  frontmatter_line_limit: 10,
};

/**
 * Default renderer settings.
 */
export const DEFAULT_RENDER_CONFIG: RenderSettingsConfig = {
  collapse_marker: '[+]',
};

/**
 * Default CLI configuration.
 */
export const DEFAULT_CLI_CONFIG: CliSettingsConfig = {
  colors: true,
  unicode: true,
};

/**
 * Default logging configuration (debug off).
 */
export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  parser: DEFAULT_PARSER_CONFIG,
  render: DEFAULT_RENDER_CONFIG,
  cli: DEFAULT_CLI_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

/** Name of the configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'asterism.toml';
