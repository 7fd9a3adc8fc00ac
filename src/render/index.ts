/**
 * Renderers and exporters for concept trees.
 *
 * @packageDocumentation
 */

export { STYLES, paint, stripAnsi } from './ansi.js';
export type { StyleName } from './ansi.js';
export {
  ASCII_GLYPHS,
  UNICODE_GLYPHS,
  getTreeGlyphs,
  isCollapsed,
  layoutTree,
  nodeLabel,
} from './layout.js';
export type { TreeGlyphs, TreeRow } from './layout.js';
export { DEFAULT_COLLAPSE_MARKER } from './types.js';
export type { AsciiTreeOptions, DetailOptions, StyledTreeOptions } from './types.js';
export { exportAsciiTree } from './ascii.js';
export { nodeStyle, renderStyledTree } from './styled.js';
export { NO_DESCRIPTION, renderConceptDetails } from './details.js';
export {
  FORMAT_VERSION,
  JsonImportError,
  exportJson,
  importJson,
  nodeToJson,
  parseJsonDocument,
  serializeJson,
} from './json.js';
export type { ConceptDocumentJson, ConceptNodeJson } from './json.js';
export { EXPORT_FORMATS, ExportError, isExportFormat, renderExport, writeExport } from './export.js';
export type { ExportFormat } from './export.js';
