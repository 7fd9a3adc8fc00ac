import { describe, it, expect } from 'vitest';
import { parseDocument } from '../parser/index.js';
import { NO_DESCRIPTION, renderConceptDetails } from './details.js';

const { root } = parseDocument(
  'Physics\nThe study of matter.\n* Energy [priority: high, mastery: 85%, blocked]\nStored work.\n* Momentum'
);

describe('renderConceptDetails', () => {
  it('lists title, description and metadata', () => {
    const energy = root.children[0];
    if (energy === undefined) {
      throw new Error('fixture is missing nodes');
    }

    expect(renderConceptDetails(energy, { colors: false })).toBe(
      '*1: Energy\n\nStored work.\n\npriority: high\nmastery: 0.85\nblocked: true'
    );
  });

  it('can leave metadata out', () => {
    const energy = root.children[0];
    if (energy === undefined) {
      throw new Error('fixture is missing nodes');
    }

    expect(renderConceptDetails(energy, { colors: false, showMetadata: false })).toBe(
      '*1: Energy\n\nStored work.'
    );
  });

  it('shows a placeholder for an empty description', () => {
    const momentum = root.children[1];
    if (momentum === undefined) {
      throw new Error('fixture is missing nodes');
    }

    expect(renderConceptDetails(momentum, { colors: false })).toBe(`*2: Momentum\n\n${NO_DESCRIPTION}`);
  });

  it('shows the root by title alone', () => {
    expect(renderConceptDetails(root, { colors: false })).toBe('Physics\n\nThe study of matter.');
  });

  it('styles the heading and metadata keys', () => {
    const energy = root.children[0];
    if (energy === undefined) {
      throw new Error('fixture is missing nodes');
    }

    const lines = renderConceptDetails(energy).split('\n');

    expect(lines[0]).toBe('\x1b[1;36m*1\x1b[0m: \x1b[1mEnergy\x1b[0m');
    expect(lines[4]).toBe('\x1b[33mpriority\x1b[0m: high');
  });
});
