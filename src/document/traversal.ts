/**
 * Read-only traversal helpers over a concept tree.
 *
 * All traversals visit nodes in document order, depth-first, pre-order.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from './node.js';

/**
 * Yields every node of the tree rooted at `root`, root first.
 *
 * @param root - Subtree root.
 */
export function* preOrder(root: ConceptNode): Generator<ConceptNode> {
  const stack: ConceptNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }
}

/**
 * Yields the nodes a renderer would show: descendants of collapsed nodes are
 * skipped, the collapsed node itself is included.
 *
 * @param root - Subtree root.
 */
export function* visiblePreOrder(root: ConceptNode): Generator<ConceptNode> {
  yield root;
  if (!root.expanded) {
    return;
  }
  for (const child of root.children) {
    yield* visiblePreOrder(child);
  }
}

/**
 * Counts all nodes of the tree, root included.
 */
export function countConcepts(root: ConceptNode): number {
  let count = 0;
  for (const _node of preOrder(root)) {
    count++;
  }
  return count;
}

/**
 * Largest depth of any node in the tree; 0 for a lone root.
 */
export function maxDepth(root: ConceptNode): number {
  let deepest = 0;
  for (const node of preOrder(root)) {
    deepest = Math.max(deepest, node.depth);
  }
  return deepest;
}

/**
 * Finds a node by exact id.
 *
 * @param root - Tree root.
 * @param id - Structural address to look up.
 * @returns The node, or undefined when no node has that id.
 */
export function findById(root: ConceptNode, id: string): ConceptNode | undefined {
  for (const node of preOrder(root)) {
    if (node.id === id) {
      return node;
    }
  }
  return undefined;
}

/**
 * Returns the chain of ancestors of `target`, outermost first.
 *
 * @param root - Tree root.
 * @param target - Node to locate.
 * @returns Ancestors from the root down to the parent of `target`, or
 * undefined when `target` is not in the tree.
 */
export function ancestorsOf(root: ConceptNode, target: ConceptNode): ConceptNode[] | undefined {
  if (root === target) {
    return [];
  }
  for (const child of root.children) {
    const path = ancestorsOf(child, target);
    if (path !== undefined) {
      return [root, ...path];
    }
  }
  return undefined;
}
