/**
 * Export formats and file output.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';
import { PathValidationError, safeWriteFile } from '../utils/safe-fs.js';
import { exportAsciiTree } from './ascii.js';
import { serializeJson } from './json.js';
import { renderStyledTree } from './styled.js';
import type { StyledTreeOptions } from './types.js';

/** Supported export formats. */
export const EXPORT_FORMATS = ['tree', 'ascii', 'json'] as const;

/** An export format name. */
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/**
 * Checks whether a string names a supported export format.
 */
export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Error class for export failures.
 */
export class ExportError extends Error {
  /** The output path that could not be written, if any. */
  public readonly target: string | undefined;
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ExportError.
   *
   * @param message - Descriptive error message.
   * @param target - The output path, if any.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, target?: string, cause?: Error) {
    super(message);
    this.name = 'ExportError';
    this.target = target;
    this.cause = cause;
  }
}

/**
 * Renders the tree in the requested format.
 *
 * @param root - Tree root.
 * @param format - Output format.
 * @param options - Tree options; `colors`, `current` and `heading` apply to
 * the styled tree only.
 */
export function renderExport(
  root: ConceptNode,
  format: ExportFormat,
  options: StyledTreeOptions = {}
): string {
  switch (format) {
    case 'tree':
      return renderStyledTree(root, options).join('\n');
    case 'ascii':
      return exportAsciiTree(root, {
        unicode: options.unicode,
        collapseMarker: options.collapseMarker,
      });
    case 'json':
      return serializeJson(root);
    default: {
      const exhaustiveCheck: never = format;
      throw new ExportError(`Unsupported export format: ${String(exhaustiveCheck)}`);
    }
  }
}

/**
 * Writes rendered output to a file, with a trailing newline.
 *
 * @param outputPath - Destination file.
 * @param content - Rendered output.
 * @throws ExportError if the file cannot be written.
 */
export async function writeExport(outputPath: string, content: string): Promise<void> {
  try {
    await safeWriteFile(outputPath, content.endsWith('\n') ? content : `${content}\n`);
  } catch (error) {
    if (error instanceof PathValidationError) {
      throw new ExportError(`Invalid output path: ${error.message}`, outputPath, error);
    }
    const cause = error instanceof Error ? error : undefined;
    const code = cause !== undefined && 'code' in cause ? String(cause.code) : undefined;
    const reason =
      code === 'ENOENT'
        ? 'directory does not exist'
        : code === 'EACCES' || code === 'EPERM'
          ? 'permission denied'
          : code === 'EISDIR'
            ? 'path is a directory'
            : (cause?.message ?? String(error));
    throw new ExportError(`Cannot write ${outputPath}: ${reason}`, outputPath, cause);
  }
}
