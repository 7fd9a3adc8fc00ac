/**
 * CLI types and interfaces for the asterism CLI.
 */

import type { Config } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  args: string[];

  /**
   * Resolved configuration (defaults, asterism.toml, environment).
   */
  config: Config;

  /**
   * Logger with the configured debug mode.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
