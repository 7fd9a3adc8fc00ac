/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers.
 */

import { displayErrorWithSuggestions, errorContextFor } from '../errors.js';
import type { CliCommandResult } from '../types.js';
import type { DisplayOptions } from './displayUtils.js';

/**
 * Runs a command handler and converts a thrown error into a displayed
 * message with suggestions.
 *
 * @param fn - The handler (sync or async).
 * @param options - Display options for the error output.
 * @param command - Name of the command, shown with the error.
 * @returns The handler's result, or exit code 1 when it threw.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions,
  command?: string
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    const context = errorContextFor(error, command);
    displayErrorWithSuggestions(context.errorMessage ?? String(error), context, options);
    return { exitCode: 1, message: context.errorMessage };
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with the resulting exit code.
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Display options for the error output.
 * @param command - Name of the command, shown with the error.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions,
  command?: string
): void {
  void runWithErrorHandling(fn, options, command).then((result) => {
    process.exit(result.exitCode);
  });
}
