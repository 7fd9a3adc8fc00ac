/**
 * Renderer option types.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';

/** Default suffix of collapsed nodes. */
export const DEFAULT_COLLAPSE_MARKER = '[+]';

/**
 * Options for the plain ASCII tree.
 */
export interface AsciiTreeOptions {
  /** Whether to use box-drawing characters. Default: true. */
  readonly unicode?: boolean;
  /** Suffix of collapsed nodes with hidden children. Default: `[+]`. */
  readonly collapseMarker?: string;
}

/**
 * Options for the styled terminal tree.
 */
export interface StyledTreeOptions extends AsciiTreeOptions {
  /** Whether to emit ANSI styles. Default: true. */
  readonly colors?: boolean;
  /** Node highlighted as the current selection. */
  readonly current?: ConceptNode;
  /** Optional heading line printed above the tree. */
  readonly heading?: string;
}

/**
 * Options for concept detail panels.
 */
export interface DetailOptions {
  /** Whether to emit ANSI styles. Default: true. */
  readonly colors?: boolean;
  /** Whether to list metadata below the description. Default: true. */
  readonly showMetadata?: boolean;
}
