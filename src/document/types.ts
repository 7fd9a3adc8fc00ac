/**
 * Document model types for asterism outlines.
 *
 * @packageDocumentation
 */

/**
 * A typed metadata value parsed from a bracketed title annotation.
 *
 * Percentages are stored as `float` fractions (`85%` becomes `0.85`).
 */
export type MetadataValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'reference'; readonly target: string };

/**
 * Discriminant of a {@link MetadataValue}.
 */
export type MetadataKind = MetadataValue['kind'];

/**
 * Ordered metadata of a concept. Insertion order is annotation order.
 */
export type ConceptMetadata = ReadonlyMap<string, MetadataValue>;

/**
 * Plain JSON form of a metadata value.
 */
export type PlainMetadataValue = string | number | boolean;

/**
 * Fields used to construct a concept node.
 */
export interface ConceptInit {
  /** Structural address, empty for the root. */
  readonly id: string;
  /** Single-line label. */
  readonly title: string;
  /** Free-form description text. */
  readonly description?: string;
  /** Parsed inline metadata. */
  readonly metadata?: ConceptMetadata;
  /** Initial display state. */
  readonly expanded?: boolean;
}
