/**
 * Concept detail panel.
 *
 * @packageDocumentation
 */

import { formatMetadataValue } from '../document/index.js';
import type { ConceptNode } from '../document/index.js';
import { paint } from './ansi.js';
import type { DetailOptions } from './types.js';

/** Shown in place of an empty description. */
export const NO_DESCRIPTION = 'No description provided';

/**
 * Renders a concept's title, description and metadata.
 *
 * Layout: `<id>: <title>` (the root shows its title alone), a blank line,
 * the description or {@link NO_DESCRIPTION}, then one `key: value` line per
 * metadata entry after another blank line.
 *
 * @param node - Concept to describe.
 * @param options - Style options.
 */
export function renderConceptDetails(node: ConceptNode, options: DetailOptions = {}): string {
  const colors = options.colors ?? true;
  const showMetadata = options.showMetadata ?? true;

  const heading = node.isRoot
    ? paint(node.title, 'bold', colors)
    : `${paint(node.id, 'boldCyan', colors)}: ${paint(node.title, 'bold', colors)}`;

  let result = `${heading}\n\n`;
  result +=
    node.description.trim() === '' ? paint(NO_DESCRIPTION, 'dim', colors) : node.description;

  if (showMetadata && node.metadata.size > 0) {
    result += '\n';
    for (const [key, value] of node.metadata) {
      result += `\n${paint(key, 'yellow', colors)}: ${formatMetadataValue(value)}`;
    }
  }

  return result;
}
