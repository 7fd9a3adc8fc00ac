/**
 * YAML frontmatter of outline documents.
 *
 * @packageDocumentation
 */

import { load } from 'js-yaml';
import type { Logger } from '../utils/logger.js';

/** Document-level metadata from the frontmatter block. */
export type Frontmatter = Record<string, unknown>;

/** Frontmatter delimiter: three dashes alone on a line. */
const DELIMITER_PATTERN = /^---\s*$/;

/**
 * Whether `line` is a frontmatter delimiter.
 */
export function isFrontmatterDelimiter(line: string): boolean {
  return DELIMITER_PATTERN.test(line);
}

/**
 * Parses the lines between the delimiters.
 *
 * Only a YAML mapping is accepted as frontmatter; anything else, including
 * invalid YAML, yields an empty object and a warning.
 *
 * @param lines - Lines between the delimiters.
 * @param log - Logger receiving warnings.
 * @param startLine - 1-based line number of the opening delimiter.
 */
export function parseFrontmatter(lines: readonly string[], log: Logger, startLine = 1): Frontmatter {
  const content = lines.join('\n');
  if (content.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    log.warn('frontmatter_invalid', {
      line: startLine,
      reason: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (!isMapping(parsed)) {
    log.warn('frontmatter_not_mapping', {
      line: startLine,
      type: Array.isArray(parsed) ? 'array' : typeof parsed,
    });
    return {};
  }
  return parsed;
}

function isMapping(value: unknown): value is Frontmatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
