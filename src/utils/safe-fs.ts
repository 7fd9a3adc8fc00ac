/**
 * File system utilities with path validation.
 *
 * Every helper resolves and validates its path before touching the file
 * system, so empty paths and paths containing null bytes are rejected with a
 * {@link PathValidationError} instead of an opaque system error.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes, or
 * does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a file's raw bytes after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export async function safeReadFile(filePath: string): Promise<Buffer> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath);
}

/**
 * Writes text to a file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}
