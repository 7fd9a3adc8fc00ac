/**
 * Configuration types for asterism.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Parser settings.
 */
export interface ParserSettingsConfig {
  /** Structural marker character (default: `*`). */
  marker: string;
  /** Code fence token (default: three backticks). */
  fence: string;
  /** Last line number on which a frontmatter block may open (default: 10). */
  frontmatter_line_limit: number;
}

/**
 * Renderer settings.
 */
export interface RenderSettingsConfig {
  /** Suffix of collapsed nodes with hidden children (default: `[+]`). */
  collapse_marker: string;
}

/**
 * CLI configuration for terminal behavior.
 */
export interface CliSettingsConfig {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  /** Whether to use Unicode box-drawing characters. */
  unicode: boolean;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug log entries are written to stderr. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from asterism.toml.
 */
export interface Config {
  /** Parser settings. */
  parser: ParserSettingsConfig;
  /** Renderer settings. */
  render: RenderSettingsConfig;
  /** CLI settings for terminal behavior. */
  cli: CliSettingsConfig;
  /** Logging settings. */
  logging: LoggingConfig;
}

/** Name of a configuration section. */
export type ConfigSection = keyof Config;

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  parser?: Partial<ParserSettingsConfig>;
  render?: Partial<RenderSettingsConfig>;
  cli?: Partial<CliSettingsConfig>;
  logging?: Partial<LoggingConfig>;
}
