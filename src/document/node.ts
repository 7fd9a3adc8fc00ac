/**
 * Concept node, the unit of an asterism outline.
 *
 * @packageDocumentation
 */

import type { ConceptInit, ConceptMetadata, MetadataValue } from './types.js';

/** Matches one marker group of an id (a run of non-digit characters). */
const MARKER_GROUP_PATTERN = /\D+/g;

const EMPTY_METADATA: ConceptMetadata = new Map<string, MetadataValue>();

/**
 * A concept in the hierarchy.
 *
 * A node is attached to its parent when it is constructed and can never be
 * detached or moved. Only the {@link ConceptNode.expanded} display flag is
 * mutable after construction.
 *
 * @example
 * ```typescript
 * const root = new ConceptNode({ id: '', title: 'Physics' });
 * const mechanics = new ConceptNode({ id: '*1', title: 'Mechanics' }, root);
 * console.log(root.children[0] === mechanics); // true
 * console.log(mechanics.depth); // 1
 * ```
 */
export class ConceptNode {
  /** Structural address, empty for the root. */
  public readonly id: string;
  /** Single-line label. */
  public readonly title: string;
  /** Free-form description text, possibly empty. */
  public readonly description: string;
  /** Parsed inline metadata. */
  public readonly metadata: ConceptMetadata;
  /** Whether descendants are shown by renderers and the navigator. */
  public expanded: boolean;

  private readonly childNodes: ConceptNode[] = [];

  /**
   * Creates a node and appends it to `parent`'s children.
   *
   * @param init - Node fields.
   * @param parent - Owning node, already part of the tree.
   */
  constructor(init: ConceptInit, parent?: ConceptNode) {
    this.id = init.id;
    this.title = init.title;
    this.description = init.description ?? '';
    this.metadata = init.metadata ?? EMPTY_METADATA;
    this.expanded = init.expanded ?? true;

    if (parent !== undefined) {
      parent.childNodes.push(this);
    }
  }

  /**
   * Children in document order.
   */
  get children(): readonly ConceptNode[] {
    return this.childNodes;
  }

  /**
   * Whether the node has any children.
   */
  get hasChildren(): boolean {
    return this.childNodes.length > 0;
  }

  /**
   * Number of marker groups in the id; 0 for the root.
   */
  get depth(): number {
    return this.id.match(MARKER_GROUP_PATTERN)?.length ?? 0;
  }

  /**
   * Whether this is the document root.
   */
  get isRoot(): boolean {
    return this.id === '';
  }

  /**
   * Flips the expanded flag.
   *
   * @returns The new state.
   */
  toggleExpanded(): boolean {
    this.expanded = !this.expanded;
    return this.expanded;
  }

  /**
   * Title followed by the description, separated by a blank line.
   */
  fullContent(): string {
    if (this.description.trim() === '') {
      return this.title;
    }
    return `${this.title}\n\n${this.description}`;
  }

  toString(): string {
    return this.isRoot ? this.title : `${this.id}: ${this.title}`;
  }
}
