/**
 * Selection, search and expand/collapse over a concept tree.
 *
 * @packageDocumentation
 */

import {
  ancestorsOf,
  findById,
  preOrder,
  visiblePreOrder,
} from '../document/index.js';
import type { ConceptNode } from '../document/index.js';
import { renderConceptDetails, renderStyledTree } from '../render/index.js';
import type { DetailOptions } from '../render/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type {
  NavigatorController,
  NavigatorListener,
  NavigatorOptions,
  SearchResult,
} from './types.js';

/**
 * Whether `node` matches a lower-cased query by title or id.
 */
function matchesQuery(node: ConceptNode, needle: string): boolean {
  return node.title.toLowerCase().includes(needle) || node.id.toLowerCase().includes(needle);
}

/**
 * Interactive state over one parsed tree.
 *
 * The navigator owns the current selection and the last search. It never
 * changes concept content; the only tree mutation is the per-node
 * `expanded` flag.
 *
 * @example
 * ```typescript
 * const navigator = new Navigator(parseDocument(text).root);
 * navigator.search('motion');
 * console.log(navigator.selected.id);
 * console.log(navigator.details({ colors: false }));
 * ```
 */
export class Navigator implements NavigatorController {
  private readonly rootNode: ConceptNode;
  private readonly listener: NavigatorListener | undefined;
  private readonly renderOptions: NavigatorOptions['render'];
  private readonly log: Logger;

  private current: ConceptNode;
  private searchResult: SearchResult | undefined;
  private matchIndex = -1;

  /**
   * Creates a navigator with the root selected.
   *
   * @param root - Tree root.
   * @param options - Listener, render and logger options.
   */
  constructor(root: ConceptNode, options: NavigatorOptions = {}) {
    this.rootNode = root;
    this.current = root;
    this.listener = options.listener;
    this.renderOptions = options.render;
    this.log = (options.logger ?? defaultLogger).child('navigator');
  }

  /** Tree root. */
  get root(): ConceptNode {
    return this.rootNode;
  }

  /** Currently selected node. */
  get selected(): ConceptNode {
    return this.current;
  }

  /** Result of the most recent search, if any. */
  get lastSearch(): SearchResult | undefined {
    return this.searchResult;
  }

  /**
   * Nodes currently shown, in pre-order, root first.
   */
  visibleNodes(): ConceptNode[] {
    return [...visiblePreOrder(this.rootNode)];
  }

  /**
   * Moves the selection by `delta` visible rows, clamped to the first and
   * last row.
   *
   * @returns The new selection.
   */
  moveSelection(delta: number): ConceptNode {
    const visible = this.visibleNodes();
    const index = visible.indexOf(this.current);
    const target = Math.min(Math.max(index + delta, 0), visible.length - 1);
    const next = visible[target] ?? this.rootNode;
    if (next !== this.current) {
      this.setSelected(next);
    }
    return this.current;
  }

  /**
   * Selects a node, expanding any collapsed ancestors so it is visible.
   *
   * @returns False when the node is not part of this tree.
   */
  select(node: ConceptNode): boolean {
    const ancestors = ancestorsOf(this.rootNode, node);
    if (ancestors === undefined) {
      return false;
    }
    for (const ancestor of ancestors) {
      if (!ancestor.expanded) {
        ancestor.expanded = true;
        this.listener?.onToggleExpand?.(ancestor, true);
      }
    }
    this.setSelected(node);
    return true;
  }

  /**
   * Selects the node with the given id.
   *
   * @param id - Exact id, e.g. `*1**2`; surrounding whitespace is ignored.
   * @returns The selected node, or undefined when no node has that id.
   */
  jumpTo(id: string): ConceptNode | undefined {
    const node = findById(this.rootNode, id.trim());
    if (node === undefined) {
      this.log.debug('jump_not_found', { id });
      return undefined;
    }
    this.select(node);
    return node;
  }

  /**
   * Flips the expanded flag of the selected node.
   *
   * @returns The new state.
   */
  toggleExpand(): boolean {
    const expanded = this.current.toggleExpanded();
    this.listener?.onToggleExpand?.(this.current, expanded);
    return expanded;
  }

  /**
   * Case-insensitive substring search over titles and ids of the whole tree,
   * collapsed subtrees included.
   *
   * The first match becomes the selection. A blank query matches nothing.
   */
  search(query: string): SearchResult {
    const needle = query.trim().toLowerCase();
    const matches: ConceptNode[] = [];
    if (needle !== '') {
      for (const node of preOrder(this.rootNode)) {
        if (matchesQuery(node, needle)) {
          matches.push(node);
        }
      }
    }

    const first = matches[0];
    if (first !== undefined) {
      this.select(first);
    }
    this.matchIndex = first === undefined ? -1 : 0;
    this.searchResult = { query, matches, selected: first };

    this.log.debug('search', { query, matchCount: matches.length });
    this.listener?.onSearch?.(this.searchResult);
    return this.searchResult;
  }

  /**
   * Selects the next match of the last search, wrapping to the first.
   *
   * @returns The selected match, or undefined when there is none.
   */
  nextMatch(): ConceptNode | undefined {
    const matches = this.searchResult?.matches ?? [];
    if (matches.length === 0) {
      return undefined;
    }
    this.matchIndex = (this.matchIndex + 1) % matches.length;
    const node = matches[this.matchIndex];
    if (node !== undefined) {
      this.select(node);
    }
    return node;
  }

  /**
   * Detail panel of the selected node.
   */
  details(options: DetailOptions = {}): string {
    return renderConceptDetails(this.current, options);
  }

  /**
   * Styled lines of the visible tree, selection highlighted.
   */
  render(): string[] {
    return renderStyledTree(this.rootNode, { ...this.renderOptions, current: this.current });
  }

  onSelect(delta: number): ConceptNode {
    return this.moveSelection(delta);
  }

  onSearch(query: string): SearchResult {
    return this.search(query);
  }

  onToggleExpand(): boolean {
    return this.toggleExpand();
  }

  private setSelected(node: ConceptNode): void {
    this.current = node;
    this.listener?.onSelect?.(node);
  }
}
