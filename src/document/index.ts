/**
 * Document model for asterism outlines.
 *
 * @packageDocumentation
 */

export { ConceptNode } from './node.js';
export {
  ancestorsOf,
  countConcepts,
  findById,
  maxDepth,
  preOrder,
  visiblePreOrder,
} from './traversal.js';
export {
  formatMetadataValue,
  metadataToPlain,
  metadataValueFromPlain,
  metadataValueToPlain,
  metadataValuesEqual,
} from './metadata.js';
export type {
  ConceptInit,
  ConceptMetadata,
  MetadataKind,
  MetadataValue,
  PlainMetadataValue,
} from './types.js';
