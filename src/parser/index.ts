/**
 * Parser for asterism outline documents.
 *
 * Turns line-oriented outline text into a validated concept tree.
 *
 * @packageDocumentation
 */

export {
  ConceptParser,
  DEFAULT_FENCE,
  DEFAULT_FRONTMATTER_LINE_LIMIT,
  DEFAULT_MARKER,
  parseDocument,
  parseLines,
} from './parser.js';
export type { ParsedDocument, ParserOptions } from './parser.js';
export { ConceptSyntaxError, FileAccessError } from './errors.js';
export { parseFile, readDocumentSource } from './loader.js';
export { extractMetadata, inferMetadataValue, parseAnnotation } from './metadata.js';
export type { ExtractedTitle } from './metadata.js';
export { isFrontmatterDelimiter, parseFrontmatter } from './frontmatter.js';
export type { Frontmatter } from './frontmatter.js';
export { HierarchyBuilder } from './hierarchy.js';
export type { PlannedConcept, SourceLine } from './hierarchy.js';
