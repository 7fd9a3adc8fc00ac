/**
 * JSON export and import of concept trees.
 *
 * @packageDocumentation
 */

import { LosslessNumber, isLosslessNumber, parse, stringify } from 'lossless-json';
import {
  ConceptNode,
  metadataToPlain,
  metadataValueFromPlain,
  metadataValueToPlain,
} from '../document/index.js';
import type { ConceptMetadata, MetadataValue, PlainMetadataValue } from '../document/index.js';

/** Version tag written to every exported document. */
export const FORMAT_VERSION = '1.0';

/**
 * JSON form of a concept node.
 */
export interface ConceptNodeJson {
  id: string;
  title: string;
  description: string;
  expanded: boolean;
  metadata: Record<string, PlainMetadataValue>;
  children: ConceptNodeJson[];
}

/**
 * JSON form of a whole document.
 */
export interface ConceptDocumentJson {
  root: ConceptNodeJson;
  format_version: string;
}

/**
 * Error class for invalid JSON documents.
 */
export class JsonImportError extends Error {
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new JsonImportError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'JsonImportError';
    this.cause = cause;
  }
}

/**
 * Converts a node and its subtree to JSON form.
 */
export function nodeToJson(node: ConceptNode): ConceptNodeJson {
  return {
    id: node.id,
    title: node.title,
    description: node.description,
    expanded: node.expanded,
    metadata: metadataToPlain(node.metadata),
    children: node.children.map(nodeToJson),
  };
}

/**
 * Converts a tree to the versioned JSON document.
 *
 * @param root - Tree root.
 */
export function exportJson(root: ConceptNode): ConceptDocumentJson {
  return {
    root: nodeToJson(root),
    format_version: FORMAT_VERSION,
  };
}

/** Metadata value as written to JSON text; numbers keep their literal form. */
type SerializedMetadataValue = PlainMetadataValue | LosslessNumber;

/**
 * Numeric literal for a metadata number.
 *
 * Floats always carry a fraction or exponent (`2.0`, `1e+21`) and integers
 * never do, so the kind survives a trip through JSON text.
 */
function numberLiteral(value: number, kind: 'integer' | 'float'): number | LosslessNumber {
  if (!Number.isFinite(value)) {
    return value;
  }
  if (kind === 'integer') {
    return Number.isInteger(value) ? new LosslessNumber(BigInt(value).toString()) : value;
  }
  const text = Object.is(value, -0) ? '-0' : String(value);
  return new LosslessNumber(/[.eE]/.test(text) ? text : `${text}.0`);
}

function serializeMetadata(metadata: ConceptMetadata): Record<string, SerializedMetadataValue> {
  return Object.fromEntries(
    [...metadata].map(([key, value]) => {
      const serialized: SerializedMetadataValue =
        value.kind === 'integer' || value.kind === 'float'
          ? numberLiteral(value.value, value.kind)
          : metadataValueToPlain(value);
      return [key, serialized] as const;
    })
  );
}

interface SerializedNode extends Omit<ConceptNodeJson, 'metadata' | 'children'> {
  metadata: Record<string, SerializedMetadataValue>;
  children: SerializedNode[];
}

function serializeNode(node: ConceptNode): SerializedNode {
  return {
    id: node.id,
    title: node.title,
    description: node.description,
    expanded: node.expanded,
    metadata: serializeMetadata(node.metadata),
    children: node.children.map(serializeNode),
  };
}

/**
 * Serializes a tree to JSON text.
 *
 * Float metadata is written with a fraction (`2.0`) so that
 * {@link parseJsonDocument} reads it back as a float.
 *
 * @param root - Tree root.
 * @param indent - Spaces per indentation level.
 */
export function serializeJson(root: ConceptNode, indent = 2): string {
  const text = stringify({ root: serializeNode(root), format_version: FORMAT_VERSION }, undefined, indent);
  if (text === undefined) {
    throw new Error('JSON serialization produced no output');
  }
  return text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function validateRecord(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new JsonImportError(
      `Invalid type for '${fieldPath}': expected object, got ${describeType(value)}`
    );
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new JsonImportError(`Invalid type for '${fieldPath}': expected string, got ${typeof value}`);
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new JsonImportError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateMetadata(
  value: unknown,
  fieldPath: string,
  marker: string
): Map<string, MetadataValue> {
  const raw = validateRecord(value, fieldPath);
  const metadata = new Map<string, MetadataValue>();
  for (const [key, entry] of Object.entries(raw)) {
    if (typeof entry === 'string' || typeof entry === 'boolean') {
      metadata.set(key, metadataValueFromPlain(entry, marker));
    } else if (typeof entry === 'number' && Number.isFinite(entry)) {
      metadata.set(key, metadataValueFromPlain(entry, marker));
    } else if (isLosslessNumber(entry)) {
      metadata.set(key, numberFromLiteral(entry.value, `${fieldPath}.${key}`));
    } else {
      throw new JsonImportError(
        `Invalid type for '${fieldPath}.${key}': expected string, finite number or boolean`
      );
    }
  }
  return metadata;
}

/**
 * Types a numeric literal by its form: a fraction or exponent means float.
 */
function numberFromLiteral(literal: string, fieldPath: string): MetadataValue {
  const value = Number(literal);
  if (!Number.isFinite(value)) {
    throw new JsonImportError(`Invalid value for '${fieldPath}': number out of range`);
  }
  return /[.eE]/.test(literal) ? { kind: 'float', value } : { kind: 'integer', value };
}

function importNode(
  value: unknown,
  fieldPath: string,
  expectedId: string,
  marker: string,
  parent?: ConceptNode
): ConceptNode {
  const raw = validateRecord(value, fieldPath);

  const id = validateString(raw.id, `${fieldPath}.id`);
  if (id !== expectedId) {
    throw new JsonImportError(
      `Invalid value for '${fieldPath}.id': expected '${expectedId}', got '${id}'`
    );
  }
  const title = validateString(raw.title, `${fieldPath}.title`);
  if (title.trim() === '') {
    throw new JsonImportError(`Invalid value for '${fieldPath}.title': title cannot be empty`);
  }

  const node = new ConceptNode(
    {
      id,
      title,
      description: raw.description === undefined ? '' : validateString(raw.description, `${fieldPath}.description`),
      expanded: raw.expanded === undefined ? true : validateBoolean(raw.expanded, `${fieldPath}.expanded`),
      metadata: raw.metadata === undefined ? new Map() : validateMetadata(raw.metadata, `${fieldPath}.metadata`, marker),
    },
    parent
  );

  const children = raw.children ?? [];
  if (!Array.isArray(children)) {
    throw new JsonImportError(
      `Invalid type for '${fieldPath}.children': expected array, got ${describeType(children)}`
    );
  }
  const childMarker = marker.repeat(node.depth + 1);
  children.forEach((child: unknown, index) => {
    importNode(
      child,
      `${fieldPath}.children[${String(index)}]`,
      `${id}${childMarker}${String(index + 1)}`,
      marker,
      node
    );
  });

  return node;
}

/**
 * Rebuilds a tree from an exported JSON document.
 *
 * Plain numbers are typed by value (integral means integer); numbers read by
 * {@link parseJsonDocument} are typed by their literal form.
 *
 * Ids are checked against the numbering scheme: child `i` (0-based) of a
 * node with id `p` at depth `d` must have id `p` + marker × (d + 1) + (i + 1).
 *
 * @param value - Parsed JSON value.
 * @param marker - Structural marker character used in the ids.
 * @returns The rebuilt root.
 * @throws JsonImportError if the document shape or ids are invalid.
 */
export function importJson(value: unknown, marker = '*'): ConceptNode {
  const document = validateRecord(value, 'document');
  const version = validateString(document.format_version, 'format_version');
  if (version !== FORMAT_VERSION) {
    throw new JsonImportError(
      `Unsupported format_version '${version}': expected '${FORMAT_VERSION}'`
    );
  }
  return importNode(document.root, 'root', '', marker);
}

/**
 * Parses JSON text and rebuilds the tree.
 *
 * @param text - JSON text produced by {@link serializeJson}.
 * @param marker - Structural marker character used in the ids.
 * @throws JsonImportError for invalid JSON syntax or shape.
 */
export function parseJsonDocument(text: string, marker = '*'): ConceptNode {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    throw new JsonImportError(
      `Invalid JSON syntax: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
  return importJson(parsed, marker);
}
