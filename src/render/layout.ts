/**
 * Shared tree layout for the text renderers.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';

/**
 * Connector glyphs for drawing a tree.
 */
export interface TreeGlyphs {
  /** Connector before a child that has later siblings. */
  readonly branch: string;
  /** Connector before the last child. */
  readonly last: string;
  /** Continuation under a child that has later siblings. */
  readonly pipe: string;
  /** Continuation under the last child. */
  readonly blank: string;
}

/** Box-drawing glyphs. */
export const UNICODE_GLYPHS: TreeGlyphs = {
  branch: '├── ',
  last: '└── ',
  pipe: '│   ',
  blank: '    ',
};

/** Plain ASCII glyphs for terminals without box-drawing support. */
export const ASCII_GLYPHS: TreeGlyphs = {
  branch: '|-- ',
  last: '`-- ',
  pipe: '|   ',
  blank: '    ',
};

/**
 * Selects the glyph set.
 *
 * @param unicode - Whether box-drawing characters may be used.
 */
export function getTreeGlyphs(unicode: boolean): TreeGlyphs {
  return unicode ? UNICODE_GLYPHS : ASCII_GLYPHS;
}

/**
 * One rendered row below the root.
 */
export interface TreeRow {
  /** Node shown on this row. */
  readonly node: ConceptNode;
  /** Continuation glyphs inherited from ancestors. */
  readonly prefix: string;
  /** Connector glyph for this node. */
  readonly connector: string;
  /** Whether the node hides children because it is collapsed. */
  readonly collapsed: boolean;
}

/**
 * Lays out the visible descendants of `root` in pre-order.
 *
 * Children of collapsed nodes are omitted; the collapsed node itself is
 * flagged when it has children to hide. A collapsed root yields no rows.
 *
 * @param root - Tree root; not included in the rows.
 * @param glyphs - Connector glyphs.
 */
export function layoutTree(root: ConceptNode, glyphs: TreeGlyphs): TreeRow[] {
  const rows: TreeRow[] = [];
  if (root.expanded) {
    appendRows(root, '', glyphs, rows);
  }
  return rows;
}

/**
 * Whether `node` hides children because it is collapsed.
 */
export function isCollapsed(node: ConceptNode): boolean {
  return node.hasChildren && !node.expanded;
}

function appendRows(node: ConceptNode, prefix: string, glyphs: TreeGlyphs, rows: TreeRow[]): void {
  const children = node.children;
  children.forEach((child, index) => {
    const isLast = index === children.length - 1;
    rows.push({
      node: child,
      prefix,
      connector: isLast ? glyphs.last : glyphs.branch,
      collapsed: isCollapsed(child),
    });
    if (child.expanded) {
      appendRows(child, prefix + (isLast ? glyphs.blank : glyphs.pipe), glyphs, rows);
    }
  });
}

/**
 * Label shown for a node: id and title.
 */
export function nodeLabel(node: ConceptNode): string {
  return node.isRoot ? node.title : `${node.id} ${node.title}`;
}
