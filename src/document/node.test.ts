/**
 * Tests for the concept node and its metadata helpers.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ConceptNode } from './node.js';
import {
  formatMetadataValue,
  metadataToPlain,
  metadataValueFromPlain,
  metadataValueToPlain,
  metadataValuesEqual,
} from './metadata.js';
import type { MetadataValue } from './types.js';

describe('ConceptNode', () => {
  it('attaches to its parent on construction', () => {
    const root = new ConceptNode({ id: '', title: 'Physics' });
    const mechanics = new ConceptNode({ id: '*1', title: 'Mechanics' }, root);

    expect(root.children).toEqual([mechanics]);
    expect(root.hasChildren).toBe(true);
    expect(mechanics.hasChildren).toBe(false);
  });

  it('applies defaults for optional fields', () => {
    const node = new ConceptNode({ id: '*1', title: 'Mechanics' });

    expect(node.description).toBe('');
    expect(node.metadata.size).toBe(0);
    expect(node.expanded).toBe(true);
  });

  it('derives depth from marker groups', () => {
    expect(new ConceptNode({ id: '', title: 'Root' }).depth).toBe(0);
    expect(new ConceptNode({ id: '*1', title: 'A' }).depth).toBe(1);
    expect(new ConceptNode({ id: '*1**2', title: 'B' }).depth).toBe(2);
    expect(new ConceptNode({ id: '*2**1***10', title: 'C' }).depth).toBe(3);
  });

  it('counts depth for alternative markers', () => {
    expect(new ConceptNode({ id: '-1--3', title: 'Dash' }).depth).toBe(2);
  });

  it('identifies the root by its empty id', () => {
    expect(new ConceptNode({ id: '', title: 'Root' }).isRoot).toBe(true);
    expect(new ConceptNode({ id: '*1', title: 'Child' }).isRoot).toBe(false);
  });

  it('toggles the expanded flag', () => {
    const node = new ConceptNode({ id: '*1', title: 'A' });

    expect(node.toggleExpanded()).toBe(false);
    expect(node.expanded).toBe(false);
    expect(node.toggleExpanded()).toBe(true);
  });

  describe('fullContent', () => {
    it('returns the title alone without a description', () => {
      const node = new ConceptNode({ id: '*1', title: 'Energy', description: '   ' });
      expect(node.fullContent()).toBe('Energy');
    });

    it('joins title and description with a blank line', () => {
      const node = new ConceptNode({ id: '*1', title: 'Energy', description: 'Capacity to do work.' });
      expect(node.fullContent()).toBe('Energy\n\nCapacity to do work.');
    });
  });

  it('formats the id before the title except for the root', () => {
    expect(String(new ConceptNode({ id: '', title: 'Physics' }))).toBe('Physics');
    expect(String(new ConceptNode({ id: '*1**2', title: 'Momentum' }))).toBe('*1**2: Momentum');
  });

  it('depth equals the number of marker groups for any well-formed id', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 1, max: 99 }), { minLength: 1, maxLength: 8 }), (indices) => {
        const id = indices.map((index, level) => `${'*'.repeat(level + 1)}${String(index)}`).join('');
        return new ConceptNode({ id, title: 'x' }).depth === indices.length;
      })
    );
  });
});

describe('metadata helpers', () => {
  const values: MetadataValue[] = [
    { kind: 'string', value: 'high' },
    { kind: 'integer', value: 3 },
    { kind: 'float', value: 0.85 },
    { kind: 'boolean', value: true },
    { kind: 'reference', target: '*2**1' },
  ];

  it('converts values to plain JSON forms', () => {
    expect(values.map(metadataValueToPlain)).toEqual(['high', 3, 0.85, true, '*2**1']);
  });

  it('rebuilds typed values from plain forms', () => {
    expect(metadataValueFromPlain('high')).toEqual({ kind: 'string', value: 'high' });
    expect(metadataValueFromPlain(3)).toEqual({ kind: 'integer', value: 3 });
    expect(metadataValueFromPlain(0.85)).toEqual({ kind: 'float', value: 0.85 });
    expect(metadataValueFromPlain(false)).toEqual({ kind: 'boolean', value: false });
    expect(metadataValueFromPlain('*2**1')).toEqual({ kind: 'reference', target: '*2**1' });
  });

  it('recognises references by the configured marker', () => {
    expect(metadataValueFromPlain('-1', '-')).toEqual({ kind: 'reference', target: '-1' });
    expect(metadataValueFromPlain('*1', '-')).toEqual({ kind: 'string', value: '*1' });
  });

  it('keeps key order when converting to a plain object', () => {
    const metadata = new Map<string, MetadataValue>([
      ['priority', { kind: 'string', value: 'high' }],
      ['mastery', { kind: 'float', value: 0.85 }],
      ['blocked', { kind: 'boolean', value: true }],
    ]);

    const plain = metadataToPlain(metadata);

    expect(Object.keys(plain)).toEqual(['priority', 'mastery', 'blocked']);
    expect(plain).toEqual({ priority: 'high', mastery: 0.85, blocked: true });
  });

  it('formats values for display', () => {
    expect(values.map(formatMetadataValue)).toEqual(['high', '3', '0.85', 'true', '→ *2**1']);
  });

  it('compares values by kind and payload', () => {
    expect(metadataValuesEqual({ kind: 'integer', value: 1 }, { kind: 'integer', value: 1 })).toBe(true);
    expect(metadataValuesEqual({ kind: 'integer', value: 1 }, { kind: 'float', value: 1 })).toBe(false);
    expect(metadataValuesEqual({ kind: 'reference', target: '*1' }, { kind: 'string', value: '*1' })).toBe(
      false
    );
    expect(
      metadataValuesEqual({ kind: 'reference', target: '*1' }, { kind: 'reference', target: '*1' })
    ).toBe(true);
  });
});
