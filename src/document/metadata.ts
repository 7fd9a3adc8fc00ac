/**
 * Conversions between typed metadata values and their plain forms.
 *
 * @packageDocumentation
 */

import type {
  ConceptMetadata,
  MetadataValue,
  PlainMetadataValue,
} from './types.js';

/**
 * Converts a metadata value to its JSON form.
 *
 * @param value - Typed value.
 * @returns The underlying string, number or boolean.
 */
export function metadataValueToPlain(value: MetadataValue): PlainMetadataValue {
  switch (value.kind) {
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
      return value.value;
    case 'reference':
      return value.target;
    default: {
      const exhaustiveCheck: never = value;
      return exhaustiveCheck;
    }
  }
}

/**
 * Converts ordered metadata to a plain object, preserving key order.
 *
 * Keys such as `__proto__` are stored as ordinary own entries.
 */
export function metadataToPlain(metadata: ConceptMetadata): Record<string, PlainMetadataValue> {
  return Object.fromEntries(
    [...metadata].map(([key, value]) => [key, metadataValueToPlain(value)] as const)
  );
}

/**
 * Rebuilds a typed value from its JSON form.
 *
 * JSON has a single number type, so an integral number becomes `integer`
 * and any other number `float`. Strings starting with `marker` become
 * references.
 *
 * @param plain - JSON value.
 * @param marker - Structural marker character.
 */
export function metadataValueFromPlain(plain: PlainMetadataValue, marker = '*'): MetadataValue {
  if (typeof plain === 'boolean') {
    return { kind: 'boolean', value: plain };
  }
  if (typeof plain === 'number') {
    return Number.isInteger(plain) ? { kind: 'integer', value: plain } : { kind: 'float', value: plain };
  }
  if (plain.startsWith(marker)) {
    return { kind: 'reference', target: plain };
  }
  return { kind: 'string', value: plain };
}

/**
 * Formats a value for display.
 *
 * Floats keep their fractional form; references are shown with an arrow.
 */
export function formatMetadataValue(value: MetadataValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
    case 'float':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'reference':
      return `→ ${value.target}`;
    default: {
      const exhaustiveCheck: never = value;
      return exhaustiveCheck;
    }
  }
}

/**
 * Structural equality of two metadata values.
 */
export function metadataValuesEqual(a: MetadataValue, b: MetadataValue): boolean {
  if (a.kind === 'reference' || b.kind === 'reference') {
    return a.kind === b.kind && metadataValueToPlain(a) === metadataValueToPlain(b);
  }
  return a.kind === b.kind && a.value === b.value;
}
