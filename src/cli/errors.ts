/**
 * Error suggestion system for the asterism CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, EnvCoercionError } from '../config/index.js';
import { ConceptSyntaxError, FileAccessError } from '../parser/index.js';
import { ExportError, JsonImportError } from '../render/index.js';
import { paint } from '../render/ansi.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Error types that can occur while running a command.
 */
export type ErrorType = 'file_access' | 'syntax' | 'export' | 'json_import' | 'config' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Error message or description. */
  errorMessage?: string;
  /** Command that failed (optional). */
  command?: string;
  /** Additional error details (optional). */
  details?: {
    /** Source or output file involved. */
    filePath?: string;
    /** 1-based line number of a syntax error. */
    lineNumber?: number;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  file_access: [
    {
      text: 'Check that the file path is spelled correctly',
    },
    {
      text: 'Make sure the file exists and is readable',
      action: 'ls -l <file>',
    },
    {
      text: 'Save the document as UTF-8 text',
    },
  ],

  syntax: [
    {
      text: 'Start the document with an unmarked root concept line',
    },
    {
      text: 'Increase depth one level at a time (* then ** then ***)',
    },
    {
      text: 'Give every marker a title after the space',
    },
    {
      text: 'Validate with verbose output to see the failing line',
      action: 'asterism validate <file> --verbose',
    },
  ],

  export: [
    {
      text: 'Check that the output directory exists',
    },
    {
      text: 'Check write permissions for the output path',
    },
    {
      text: 'Omit --output to print to stdout instead',
    },
  ],

  json_import: [
    {
      text: 'Check that the file was produced by asterism export --format json',
    },
    {
      text: 'Ids must follow the numbering scheme of their parents',
    },
  ],

  config: [
    {
      text: 'Check the syntax of asterism.toml',
    },
    {
      text: 'Check ASTERISM_* environment variables',
      action: 'env | grep ASTERISM_',
    },
  ],

  unknown: [
    {
      text: 'Run again with debug logging for more detail',
      action: 'ASTERISM_DEBUG=1 asterism <command>',
    },
    {
      text: 'Report the issue if it persists',
    },
  ],
};

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('file not found') ||
    lowerMessage.includes('permission denied') ||
    lowerMessage.includes('not valid utf-8') ||
    lowerMessage.includes('not a file')
  ) {
    return 'file_access';
  }

  if (
    lowerMessage.includes('root concept') ||
    lowerMessage.includes('level jump') ||
    lowerMessage.includes('title cannot be empty') ||
    lowerMessage.includes('no valid concepts')
  ) {
    return 'syntax';
  }

  if (lowerMessage.includes('cannot write') || lowerMessage.includes('output path')) {
    return 'export';
  }

  if (lowerMessage.includes('format_version') || lowerMessage.includes('json')) {
    return 'json_import';
  }

  if (
    lowerMessage.includes('toml') ||
    lowerMessage.includes('config') ||
    lowerMessage.includes('environment variable')
  ) {
    return 'config';
  }

  return 'unknown';
}

/**
 * Classifies an error by its class, falling back to its message.
 *
 * @param error - The thrown value.
 * @returns The identified error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof FileAccessError) {
    return 'file_access';
  }
  if (error instanceof ConceptSyntaxError) {
    return 'syntax';
  }
  if (error instanceof ExportError) {
    return 'export';
  }
  if (error instanceof JsonImportError) {
    return 'json_import';
  }
  if (error instanceof ConfigParseError || error instanceof EnvCoercionError) {
    return 'config';
  }
  return inferErrorType(error instanceof Error ? error.message : String(error));
}

/**
 * Builds the suggestion context for a thrown value.
 *
 * @param error - The thrown value.
 * @param command - The command that failed, if known.
 */
export function errorContextFor(error: unknown, command?: string): ErrorContext {
  const context: ErrorContext = {
    errorType: classifyError(error),
    errorMessage: error instanceof Error ? error.message : String(error),
  };
  if (command !== undefined) {
    context.command = command;
  }
  if (error instanceof FileAccessError) {
    context.details = { filePath: error.filePath };
  } else if (error instanceof ConceptSyntaxError && error.lineNumber > 0) {
    context.details = { lineNumber: error.lineNumber };
  } else if (error instanceof ExportError && error.target !== undefined) {
    context.details = { filePath: error.target };
  }
  return context;
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const prefix = paint(`${String(index)}.`, 'yellow', options.colors);
  const actionText =
    suggestion.action !== undefined ? `\n    ${paint(suggestion.action, 'dim', options.colors)}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = getSuggestions(errorType);

  let result = `${paint('Error:', 'red', options.colors)} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${paint('File:', 'yellow', options.colors)} ${context.details.filePath}`;
  }

  if (context.details?.lineNumber !== undefined) {
    result += `\n  ${paint('Line:', 'yellow', options.colors)} ${String(context.details.lineNumber)}`;
  }

  if (context.command !== undefined) {
    result += `\n  ${paint('Command:', 'yellow', options.colors)} ${context.command}`;
  }

  result += `\n\n${paint('Suggestions:', 'bold', options.colors)}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Displays error message with suggestions to console.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}
