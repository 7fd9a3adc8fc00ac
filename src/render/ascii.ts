/**
 * Plain-text tree export.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';
import { getTreeGlyphs, isCollapsed, layoutTree, nodeLabel } from './layout.js';
import { DEFAULT_COLLAPSE_MARKER } from './types.js';
import type { AsciiTreeOptions } from './types.js';

/**
 * Renders the tree as indented text with box-drawing connectors.
 *
 * The first line is the root title; every other line is `<id> <title>`.
 * Collapsed nodes with children get the collapse marker and their subtrees
 * are omitted.
 *
 * @param root - Tree root.
 * @param options - Glyph and marker options.
 * @returns Lines joined with `\n`, without a trailing newline.
 *
 * @example
 * ```typescript
 * const { root } = parseDocument('Physics\n* Mechanics\n** Kinematics\n* Optics');
 * console.log(exportAsciiTree(root));
 * // Physics
 * // ├── *1 Mechanics
 * // │   └── *1**1 Kinematics
 * // └── *2 Optics
 * ```
 */
export function exportAsciiTree(root: ConceptNode, options: AsciiTreeOptions = {}): string {
  const marker = options.collapseMarker ?? DEFAULT_COLLAPSE_MARKER;
  const glyphs = getTreeGlyphs(options.unicode ?? true);

  const lines = [isCollapsed(root) ? `${root.title} ${marker}` : root.title];
  for (const row of layoutTree(root, glyphs)) {
    const suffix = row.collapsed ? ` ${marker}` : '';
    lines.push(`${row.prefix}${row.connector}${nodeLabel(row.node)}${suffix}`);
  }
  return lines.join('\n');
}
