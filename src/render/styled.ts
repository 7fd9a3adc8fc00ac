/**
 * Styled tree for terminal display.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';
import { paint } from './ansi.js';
import type { StyleName } from './ansi.js';
import { getTreeGlyphs, isCollapsed, layoutTree, nodeLabel } from './layout.js';
import { DEFAULT_COLLAPSE_MARKER } from './types.js';
import type { StyledTreeOptions } from './types.js';

/**
 * Style of a node label.
 *
 * The current selection wins over every other state; the root is always
 * bold cyan otherwise.
 */
export function nodeStyle(node: ConceptNode, current?: ConceptNode): StyleName {
  if (current !== undefined && node === current) {
    return 'current';
  }
  if (node.isRoot) {
    return 'boldCyan';
  }
  return node.expanded ? 'brightWhite' : 'dimCyan';
}

/**
 * Renders the tree as styled terminal lines.
 *
 * Structure matches {@link exportAsciiTree}: root first, then each visible
 * node with its connectors. Guides are bright blue, the root bold cyan, the
 * current selection black on bright yellow, expanded nodes bright white and
 * collapsed nodes dim cyan. With `colors: false` the lines carry no escape
 * codes.
 *
 * @param root - Tree root.
 * @param options - Style, glyph and selection options.
 * @returns One entry per output line.
 */
export function renderStyledTree(root: ConceptNode, options: StyledTreeOptions = {}): string[] {
  const colors = options.colors ?? true;
  const marker = options.collapseMarker ?? DEFAULT_COLLAPSE_MARKER;
  const glyphs = getTreeGlyphs(options.unicode ?? true);
  const lines: string[] = [];

  if (options.heading !== undefined) {
    lines.push(paint(options.heading, 'bold', colors));
  }

  const rootLabel = isCollapsed(root) ? `${root.title} ${marker}` : root.title;
  lines.push(paint(rootLabel, nodeStyle(root, options.current), colors));

  for (const row of layoutTree(root, glyphs)) {
    const label = row.collapsed ? `${nodeLabel(row.node)} ${marker}` : nodeLabel(row.node);
    const guides = paint(row.prefix + row.connector, 'brightBlue', colors);
    lines.push(guides + paint(label, nodeStyle(row.node, options.current), colors));
  }

  return lines;
}
