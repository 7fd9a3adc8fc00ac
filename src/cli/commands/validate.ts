/**
 * Validate command handler for the asterism CLI.
 *
 * Parses a document and reports whether it is well formed.
 */

import { maxDepth } from '../../document/index.js';
import { ConceptSyntaxError, parseFile } from '../../parser/index.js';
import { paint, renderStyledTree } from '../../render/index.js';
import { displayOptionsFor, parserOptionsFor } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { getPositionals, hasFlag } from '../utils/args.js';
import { formatFailure, formatLabel, formatSuccess } from '../utils/displayUtils.js';

/**
 * Handles the validate command.
 *
 * Prints `✓ Valid document: <file>` and the concept count on success; with
 * `--verbose` also the root title, the maximum depth and the parsed tree.
 * Parse failures are reported, never thrown, and give exit code 1.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleValidateCommand(context: CliContext): Promise<CliCommandResult> {
  const { args } = context;
  const display = displayOptionsFor(context);
  const verbose = hasFlag(args, ['--verbose', '-v']);

  const file = getPositionals(args)[0];
  if (file === undefined) {
    const message = 'Missing required argument: <file>';
    console.error(`Error: ${message}`);
    console.error('\nRun "asterism help validate" for usage information.');
    return { exitCode: 1, message };
  }

  try {
    const { root, conceptCount } = await parseFile(file, parserOptionsFor(context));

    console.log(`${formatSuccess('Valid document:', display)} ${file}`);
    console.log(`${formatLabel('Concepts', display)} ${String(conceptCount)}`);

    if (verbose) {
      console.log(`${formatLabel('Root concept', display)} ${root.title}`);
      console.log(`${formatLabel('Max depth', display)} ${String(maxDepth(root))}`);
      console.log();
      const lines = renderStyledTree(root, {
        colors: display.colors,
        unicode: display.unicode,
        collapseMarker: context.config.render.collapse_marker,
        heading: 'Parsed Structure:',
      });
      for (const line of lines) {
        console.log(line);
      }
    }

    context.logger.debug('document_valid', { file, concepts: conceptCount });
    return { exitCode: 0 };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const syntaxError = error instanceof ConceptSyntaxError;

    const heading = syntaxError ? 'Invalid document:' : 'Validation failed:';
    console.error(`${formatFailure(heading, display)} ${file}`);
    console.error(`${paint('Error:', 'red', display.colors)} ${message}`);

    if (verbose && error instanceof ConceptSyntaxError && error.lineNumber > 0) {
      console.error(
        paint(`Tip: Check the syntax around line ${String(error.lineNumber)}`, 'dim', display.colors)
      );
    }

    return { exitCode: 1, message };
  }
}
