/**
 * Export command handler for the asterism CLI.
 *
 * Renders a document as a styled tree, a plain ASCII tree or JSON, to stdout
 * or to a file.
 */

import { basename } from 'node:path';
import { parseFile } from '../../parser/index.js';
import { EXPORT_FORMATS, isExportFormat, renderExport, writeExport } from '../../render/index.js';
import type { ExportFormat } from '../../render/index.js';
import { displayOptionsFor, parserOptionsFor } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { getOptionValue, getPositionals } from '../utils/args.js';
import { formatLabel } from '../utils/displayUtils.js';

const FORMAT_OPTIONS = ['--format', '-f'];
const OUTPUT_OPTIONS = ['--output', '-o'];

/** Format used when `--format` is absent. */
export const DEFAULT_EXPORT_FORMAT: ExportFormat = 'tree';

/**
 * Handles the export command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 * @throws FileAccessError or ConceptSyntaxError when the document cannot be
 * parsed, ExportError when the output file cannot be written.
 */
export async function handleExportCommand(context: CliContext): Promise<CliCommandResult> {
  const { args } = context;
  const display = displayOptionsFor(context);

  const file = getPositionals(args, [...FORMAT_OPTIONS, ...OUTPUT_OPTIONS])[0];
  if (file === undefined) {
    const message = 'Missing required argument: <file>';
    console.error(`Error: ${message}`);
    console.error('\nRun "asterism help export" for usage information.');
    return { exitCode: 1, message };
  }

  const format = getOptionValue(args, FORMAT_OPTIONS) ?? DEFAULT_EXPORT_FORMAT;
  if (!isExportFormat(format)) {
    const message = `Unknown format '${format}'. Expected one of: ${EXPORT_FORMATS.join(', ')}`;
    console.error(`Error: ${message}`);
    return { exitCode: 1, message };
  }

  const output = getOptionValue(args, OUTPUT_OPTIONS);
  const { root } = await parseFile(file, parserOptionsFor(context));
  context.logger.debug('export_started', { file, format, output: output ?? 'stdout' });

  const content = renderExport(root, format, {
    unicode: display.unicode,
    collapseMarker: context.config.render.collapse_marker,
    colors: output === undefined && display.colors,
    heading: `Document: ${basename(file)}`,
  });

  if (output === undefined) {
    console.log(content);
    return { exitCode: 0 };
  }

  await writeExport(output, content);
  console.log(`${formatLabel('Exported to', display)} ${output}`);
  return { exitCode: 0 };
}
