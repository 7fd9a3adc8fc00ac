import { describe, it, expect } from 'vitest';
import { findById } from '../document/index.js';
import { parseDocument } from '../parser/index.js';
import { stripAnsi } from './ansi.js';
import { exportAsciiTree } from './ascii.js';
import { nodeStyle, renderStyledTree } from './styled.js';

const SOURCE = 'Physics\n* Mechanics\n** Kinematics\n* Optics\n** Lenses';

describe('renderStyledTree', () => {
  it('matches the ASCII tree when colors are off', () => {
    const { root } = parseDocument(SOURCE);

    expect(renderStyledTree(root, { colors: false }).join('\n')).toBe(exportAsciiTree(root));
  });

  it('puts the heading first', () => {
    const { root } = parseDocument('Physics\n* Mechanics');

    expect(renderStyledTree(root, { colors: false, heading: 'Document: physics.outline' })).toEqual([
      'Document: physics.outline',
      'Physics',
      '└── *1 Mechanics',
    ]);
  });

  it('styles guides, root, selection and collapsed nodes', () => {
    const { root } = parseDocument(SOURCE);
    const mechanics = findById(root, '*1');
    const optics = findById(root, '*2');
    if (mechanics === undefined || optics === undefined) {
      throw new Error('fixture is missing nodes');
    }
    optics.expanded = false;

    const lines = renderStyledTree(root, { current: mechanics, heading: 'Tree' });

    expect(lines).toEqual([
      '\x1b[1mTree\x1b[0m',
      '\x1b[1;36mPhysics\x1b[0m',
      '\x1b[94m├── \x1b[0m\x1b[30;103m*1 Mechanics\x1b[0m',
      '\x1b[94m│   └── \x1b[0m\x1b[97m*1**1 Kinematics\x1b[0m',
      '\x1b[94m└── \x1b[0m\x1b[2;36m*2 Optics [+]\x1b[0m',
    ]);
  });

  it('strips to the plain rendering', () => {
    const { root } = parseDocument(SOURCE);

    expect(renderStyledTree(root).map(stripAnsi)).toEqual(renderStyledTree(root, { colors: false }));
  });
});

describe('nodeStyle', () => {
  it('gives the selection priority over the root style', () => {
    const { root } = parseDocument('Physics\n* Mechanics');

    expect(nodeStyle(root)).toBe('boldCyan');
    expect(nodeStyle(root, root)).toBe('current');
  });

  it('distinguishes expanded and collapsed nodes', () => {
    const { root } = parseDocument('Physics\n* Mechanics\n** Kinematics');
    const mechanics = root.children[0];
    if (mechanics === undefined) {
      throw new Error('fixture is missing nodes');
    }

    expect(nodeStyle(mechanics)).toBe('brightWhite');
    mechanics.expanded = false;
    expect(nodeStyle(mechanics)).toBe('dimCyan');
  });

  it('styles a collapsed leaf as collapsed', () => {
    const { root } = parseDocument('Physics\n* Optics');
    const optics = root.children[0];
    if (optics === undefined) {
      throw new Error('fixture is missing nodes');
    }

    optics.expanded = false;

    expect(nodeStyle(optics)).toBe('dimCyan');
  });
});
