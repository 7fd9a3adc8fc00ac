/**
 * Toolkit-independent navigation over concept trees.
 *
 * @packageDocumentation
 */

export { Navigator } from './navigator.js';
export type {
  NavigatorController,
  NavigatorListener,
  NavigatorOptions,
  SearchResult,
} from './types.js';
