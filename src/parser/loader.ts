/**
 * Loading outline documents from disk.
 *
 * @packageDocumentation
 */

import { PathValidationError, safeReadFile } from '../utils/safe-fs.js';
import { FileAccessError } from './errors.js';
import { ConceptParser } from './parser.js';
import type { ParsedDocument, ParserOptions } from './parser.js';

/**
 * Reads a file and decodes it as strict UTF-8.
 *
 * A leading byte order mark is dropped.
 *
 * @param filePath - Path to the document.
 * @returns The decoded text.
 * @throws FileAccessError if the file is missing, unreadable or not valid UTF-8.
 */
export async function readDocumentSource(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await safeReadFile(filePath);
  } catch (error) {
    throw toFileAccessError(error, filePath);
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new FileAccessError(
      `File encoding error: ${filePath} is not valid UTF-8`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a document file.
 *
 * @param filePath - Path to the document.
 * @param options - Scanner options.
 * @returns The parsed document.
 * @throws FileAccessError before parsing if the source cannot be read.
 * @throws ConceptSyntaxError on the first structural violation.
 *
 * @example
 * ```typescript
 * const { root, conceptCount } = await parseFile('physics.outline');
 * console.log(`${root.title}: ${conceptCount} concepts`);
 * ```
 */
export async function parseFile(filePath: string, options?: ParserOptions): Promise<ParsedDocument> {
  const text = await readDocumentSource(filePath);
  return new ConceptParser(options).parse(text);
}

function toFileAccessError(error: unknown, filePath: string): FileAccessError {
  if (error instanceof PathValidationError) {
    return new FileAccessError(`Invalid path '${filePath}': ${error.message}`, filePath, error);
  }
  if (!(error instanceof Error)) {
    return new FileAccessError(`Cannot read ${filePath}: ${String(error)}`, filePath);
  }

  const code = 'code' in error ? error.code : undefined;
  switch (code) {
    case 'ENOENT':
      return new FileAccessError(`File not found: ${filePath}`, filePath, error);
    case 'EACCES':
    case 'EPERM':
      return new FileAccessError(`Permission denied: ${filePath}`, filePath, error);
    case 'EISDIR':
      return new FileAccessError(`Not a file: ${filePath}`, filePath, error);
    default:
      return new FileAccessError(`Cannot read ${filePath}: ${error.message}`, filePath, error);
  }
}
