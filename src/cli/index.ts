#!/usr/bin/env node

/**
 * asterism CLI entry point.
 *
 * This is the main entry point for the 'asterism' CLI command.
 */

import { createCliApp, displayOptionsFor } from './app.js';
import { handleExportCommand } from './commands/export.js';
import { handleValidateCommand } from './commands/validate.js';
import { handleVersionCommand, getVersionFromPackageJson } from './commands/version.js';
import { handleViewCommand } from './commands/view.js';
import type { CliCommandHandler } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
asterism v${getVersionFromPackageJson()}

USAGE:
  asterism <command> [options]

COMMANDS:
  view        Browse a document interactively
  export      Export a document as a tree, ASCII or JSON
  validate    Check a document's syntax
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version      Show version information

EXAMPLES:
  asterism view physics.outline
  asterism export physics.outline --format json -o physics.json
  asterism validate physics.outline --verbose
`;
  console.log(helpText);
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "asterism help" for usage information.');
}

const COMMAND_HELP: Readonly<Record<string, string>> = {
  view: `
USAGE: asterism view <file>

Browses a document in the terminal.

KEYS:
  up/k, down/j   Move the selection
  enter/space    Show concept details
  e              Expand or collapse the selected concept
  /              Search titles and ids
  n              Next search match
  g              Jump to a concept id
  ?              Toggle help
  q, ctrl-c      Quit

EXAMPLES:
  asterism view physics.outline
`,
  export: `
USAGE: asterism export <file> [options]

Renders a document as a styled tree, a plain ASCII tree or JSON.

OPTIONS:
  --format, -f <format>   tree (default), ascii or json
  --output, -o <path>     Write to a file instead of stdout

EXAMPLES:
  asterism export physics.outline
  asterism export physics.outline --format ascii
  asterism export physics.outline --format json -o physics.json
`,
  validate: `
USAGE: asterism validate <file> [options]

Checks a document's syntax and reports the number of concepts.

OPTIONS:
  --verbose, -v   Show the root concept, maximum depth and parsed tree

EXAMPLES:
  asterism validate physics.outline
  asterism validate physics.outline --verbose
`,
};

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const help = Object.hasOwn(COMMAND_HELP, commandName) ? COMMAND_HELP[commandName] : undefined;
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "asterism help" to see all available commands.');
  }
}

/**
 * Runs a document command with a fresh context.
 */
function runCommand(name: string, handler: CliCommandHandler, commandArgs: string[]): void {
  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    showHelpForCommand(name);
    process.exit(0);
  }
  const context = createCliApp({ args: commandArgs });
  withErrorHandling(() => handler(context), displayOptionsFor(context), name);
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  if (!command) {
    showHelp();
    process.exit(0);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
      process.exit(handleVersionCommand().exitCode);
      break;

    case 'view':
      runCommand('view', (context) => handleViewCommand(context), commandArgs);
      break;

    case 'export':
      runCommand('export', handleExportCommand, commandArgs);
      break;

    case 'validate':
      runCommand('validate', handleValidateCommand, commandArgs);
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
