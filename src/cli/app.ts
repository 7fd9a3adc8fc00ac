/**
 * Application context for the asterism CLI.
 */

import { existsSync, readFileSync } from 'node:fs';
import {
  CONFIG_FILE_NAME,
  applyEnvOverrides,
  getDefaultConfig,
  parseConfig,
} from '../config/index.js';
import type { Config, EnvRecord, PartialConfig } from '../config/index.js';
import type { ParserOptions } from '../parser/index.js';
import { Logger } from '../utils/logger.js';
import type { DisplayOptions } from './utils/displayUtils.js';
import type { CliContext } from './types.js';

/**
 * Options for {@link createCliApp}.
 */
export interface CliAppOptions {
  /** Values that win over the environment and the config file. */
  overrides?: PartialConfig;
  /** Environment to read ASTERISM_* overrides from. */
  env?: EnvRecord;
  /** Arguments after the command name. */
  args?: string[];
}

function mergeOverrides(config: Config, overrides: PartialConfig): Config {
  return {
    parser: { ...config.parser, ...overrides.parser },
    render: { ...config.render, ...overrides.render },
    cli: { ...config.cli, ...overrides.cli },
    logging: { ...config.logging, ...overrides.logging },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Creates the CLI context.
 *
 * Precedence: explicit overrides > environment > asterism.toml > defaults. An
 * unreadable config file or invalid environment value is reported as a
 * warning and skipped.
 *
 * @param options - Overrides, environment and arguments.
 * @returns The CLI context.
 */
export function createCliApp(options: CliAppOptions = {}): CliContext {
  let config = getDefaultConfig();

  if (existsSync(CONFIG_FILE_NAME)) {
    try {
      const tomlContent = readFileSync(CONFIG_FILE_NAME, 'utf-8');
      config = parseConfig(tomlContent);
    } catch (error) {
      console.warn(`Warning: Failed to load config from ${CONFIG_FILE_NAME}: ${errorMessage(error)}`);
      console.warn('Using default settings.');
    }
  }

  try {
    config = applyEnvOverrides(config, options.env ?? process.env);
  } catch (error) {
    console.warn(`Warning: Ignoring environment overrides: ${errorMessage(error)}`);
  }

  config = mergeOverrides(config, options.overrides ?? {});

  return {
    args: options.args ?? process.argv.slice(3),
    config,
    logger: new Logger({ component: 'cli', debugMode: config.logging.debug }),
  };
}

/**
 * Parser options derived from the context's configuration.
 */
export function parserOptionsFor(context: CliContext): ParserOptions {
  return {
    marker: context.config.parser.marker,
    fence: context.config.parser.fence,
    frontmatterLineLimit: context.config.parser.frontmatter_line_limit,
    logger: context.logger.child('parser'),
  };
}

/**
 * Terminal display options derived from the context's configuration.
 */
export function displayOptionsFor(context: CliContext): DisplayOptions {
  return {
    colors: context.config.cli.colors,
    unicode: context.config.cli.unicode,
  };
}
