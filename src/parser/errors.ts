/**
 * Errors raised while loading and parsing outline documents.
 *
 * @packageDocumentation
 */

/**
 * Error raised when a document source cannot be read or decoded.
 *
 * Raised before any parsing begins.
 */
export class FileAccessError extends Error {
  /** Path of the source that could not be read. */
  public readonly filePath: string;
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new FileAccessError.
   *
   * @param message - Descriptive error message.
   * @param filePath - Path of the unreadable source.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, filePath: string, cause?: Error) {
    super(message);
    this.name = 'FileAccessError';
    this.filePath = filePath;
    this.cause = cause;
  }
}

/**
 * Structural violation in an outline document.
 *
 * A single violation invalidates the whole document; no partial tree is
 * returned.
 */
export class ConceptSyntaxError extends Error {
  /** Short description of the violation, without location. */
  public readonly reason: string;
  /** 1-based line number of the offending line, 0 when not tied to a line. */
  public readonly lineNumber: number;
  /** Raw text of the offending line. */
  public readonly lineText: string;

  /**
   * Creates a new ConceptSyntaxError.
   *
   * @param reason - Short description of the violation.
   * @param lineNumber - 1-based line number.
   * @param lineText - Raw text of the offending line.
   */
  constructor(reason: string, lineNumber = 0, lineText = '') {
    super(
      lineNumber > 0 ? `Line ${String(lineNumber)}: ${reason}\n  > ${lineText}` : reason
    );
    this.name = 'ConceptSyntaxError';
    this.reason = reason;
    this.lineNumber = lineNumber;
    this.lineText = lineText;
  }
}
