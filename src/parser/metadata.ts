/**
 * Inline metadata annotations: `Title [priority: high, mastery: 85%, blocked]`.
 *
 * @packageDocumentation
 */

import type { MetadataValue } from '../document/index.js';

/** Matches one bracketed annotation. */
const ANNOTATION_PATTERN = /\[([^\]]+)\]/g;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const TRUE_WORDS = new Set(['true', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', 'no', 'off']);

/**
 * A title with its annotations removed.
 */
export interface ExtractedTitle {
  /** Title text without annotations, trimmed. */
  readonly title: string;
  /** Merged metadata of all annotations, in annotation order. */
  readonly metadata: Map<string, MetadataValue>;
}

/**
 * Infers the type of a single annotation value.
 *
 * Tried in order: percentage, integer, decimal, boolean word, reference,
 * plain string.
 *
 * @param raw - Value text, already trimmed.
 * @param marker - Structural marker character; values starting with it are
 * references.
 */
export function inferMetadataValue(raw: string, marker = '*'): MetadataValue {
  if (raw.endsWith('%')) {
    const body = raw.slice(0, -1).trim();
    if (NUMBER_PATTERN.test(body)) {
      return { kind: 'float', value: Number(body) / 100 };
    }
  }

  if (INTEGER_PATTERN.test(raw)) {
    return { kind: 'integer', value: Number.parseInt(raw, 10) };
  }
  if (DECIMAL_PATTERN.test(raw)) {
    return { kind: 'float', value: Number(raw) };
  }

  const lower = raw.toLowerCase();
  if (TRUE_WORDS.has(lower)) {
    return { kind: 'boolean', value: true };
  }
  if (FALSE_WORDS.has(lower)) {
    return { kind: 'boolean', value: false };
  }

  if (raw.startsWith(marker)) {
    return { kind: 'reference', target: raw };
  }

  return { kind: 'string', value: raw };
}

/**
 * Parses the body of one annotation into `target`.
 *
 * Pairs are comma separated and use `:` or `=`; a bare key means `true`.
 * Later keys overwrite earlier ones.
 *
 * @param body - Text between the brackets.
 * @param target - Map receiving the entries.
 * @param marker - Structural marker character.
 */
export function parseAnnotation(
  body: string,
  target: Map<string, MetadataValue> = new Map(),
  marker = '*'
): Map<string, MetadataValue> {
  for (const segment of body.split(',')) {
    const pair = segment.trim();
    if (pair === '') {
      continue;
    }

    const colon = pair.indexOf(':');
    const equals = pair.indexOf('=');
    const separator = colon !== -1 ? colon : equals;

    if (separator === -1) {
      target.set(pair, { kind: 'boolean', value: true });
      continue;
    }

    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    target.set(key, inferMetadataValue(value, marker));
  }
  return target;
}

/**
 * Removes every bracketed annotation from a title and parses them.
 *
 * @param text - Title text as written on the concept line.
 * @param marker - Structural marker character.
 *
 * @example
 * ```typescript
 * const { title, metadata } = extractMetadata('Kinematics [priority: high, mastery: 85%]');
 * console.log(title); // "Kinematics"
 * console.log(metadata.get('mastery')); // { kind: 'float', value: 0.85 }
 * ```
 */
export function extractMetadata(text: string, marker = '*'): ExtractedTitle {
  const metadata = new Map<string, MetadataValue>();
  for (const match of text.matchAll(ANNOTATION_PATTERN)) {
    const body = match[1];
    if (body !== undefined) {
      parseAnnotation(body, metadata, marker);
    }
  }
  return {
    title: text.replace(ANNOTATION_PATTERN, '').trim(),
    metadata,
  };
}
