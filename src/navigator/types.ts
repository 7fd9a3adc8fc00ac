/**
 * Navigator interfaces.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';
import type { StyledTreeOptions } from '../render/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Outcome of a search.
 */
export interface SearchResult {
  /** The query as entered. */
  readonly query: string;
  /** Matching nodes in document order. */
  readonly matches: readonly ConceptNode[];
  /** The node selected by the search, if any matched. */
  readonly selected: ConceptNode | undefined;
}

/**
 * Receives navigator state changes.
 *
 * Every method is optional; a host implements only what it displays.
 */
export interface NavigatorListener {
  /** Called after the selection changes. */
  onSelect?(node: ConceptNode): void;
  /** Called after every search, including searches with no matches. */
  onSearch?(result: SearchResult): void;
  /** Called after a node's expanded flag flips. */
  onToggleExpand?(node: ConceptNode, expanded: boolean): void;
}

/**
 * The capabilities a presentation host drives.
 *
 * A terminal session, a test or any other front end calls these methods in
 * response to its own input events.
 */
export interface NavigatorController {
  /** Styled lines of the visible tree with the selection highlighted. */
  render(): string[];
  /** Moves the selection by `delta` visible rows. */
  onSelect(delta: number): ConceptNode;
  /** Runs a search and selects the first match. */
  onSearch(query: string): SearchResult;
  /** Flips the expanded flag of the selected node. */
  onToggleExpand(): boolean;
}

/**
 * Options for {@link Navigator}.
 */
export interface NavigatorOptions {
  /** Receives state changes. */
  readonly listener?: NavigatorListener;
  /** Tree style used by `render()`; the selection is supplied by the navigator. */
  readonly render?: Omit<StyledTreeOptions, 'current'>;
  /** Logger for debug events. */
  readonly logger?: Logger;
}
