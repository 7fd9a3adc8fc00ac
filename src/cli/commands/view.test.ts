/**
 * Tests for the interactive view session.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getDefaultConfig } from '../../config/index.js';
import { parseDocument } from '../../parser/index.js';
import { Logger } from '../../utils/logger.js';
import type { CliContext } from '../types.js';
import { wrapInBox } from '../utils/displayUtils.js';
import { KEYS, ViewSession, handleViewCommand, runViewSession } from './view.js';
import type { TerminalIO } from './view.js';

const SOURCE = 'Physics\n* Mechanics\n** Kinematics\n* Optics';
const display = { colors: false, unicode: true };

function newSession(): ViewSession {
  return new ViewSession(parseDocument(SOURCE).root, display);
}

function fakeIO(keys: string[], lines: string[] = []) {
  const frames: string[] = [];
  const io = {
    readKey: vi.fn(() => Promise.resolve(keys.shift() ?? 'q')),
    readLine: vi.fn((_prompt: string) => Promise.resolve(lines.shift() ?? '')),
    render: vi.fn((frame: string) => {
      frames.push(frame);
    }),
    close: vi.fn(),
  } satisfies TerminalIO;
  return { io, frames };
}

describe('ViewSession', () => {
  describe('handleKey', () => {
    it('moves with j/k and the arrow keys', () => {
      const session = newSession();

      expect(session.handleKey('j')).toBe('continue');
      expect(session.navigator.selected.id).toBe('*1');
      session.handleKey(KEYS.down);
      expect(session.navigator.selected.id).toBe('*1**1');
      session.handleKey('k');
      session.handleKey(KEYS.up);
      expect(session.navigator.selected.isRoot).toBe(true);
    });

    it('opens details on enter and space', () => {
      for (const key of [KEYS.enter, KEYS.newline, KEYS.space]) {
        const session = newSession();
        session.handleKey(key);
        expect(session.panel).toBe('details');
      }
    });

    it('toggles help', () => {
      const session = newSession();

      session.handleKey('?');
      expect(session.panel).toBe('help');
      session.handleKey('?');
      expect(session.panel).toBe('none');
    });

    it('expands and collapses the selection', () => {
      const session = newSession();
      session.handleKey('j');

      session.handleKey('e');
      expect(session.message).toBe('Collapsed *1 Mechanics');
      expect(session.navigator.visibleNodes()).toHaveLength(3);

      session.handleKey('e');
      expect(session.message).toBe('Expanded *1 Mechanics');
    });

    it('clears the message when the selection moves', () => {
      const session = newSession();
      session.handleKey('j');
      session.handleKey('e');

      session.handleKey('j');

      expect(session.message).toBeUndefined();
    });

    it('requests prompts and quits', () => {
      const session = newSession();

      expect(session.handleKey('/')).toBe('search');
      expect(session.handleKey('g')).toBe('jump');
      expect(session.handleKey('x')).toBe('continue');
      expect(session.handleKey('q')).toBe('quit');
      expect(session.handleKey(KEYS.ctrlC)).toBe('quit');
    });
  });

  describe('search and jump', () => {
    it('reports the match count and shows the first match', () => {
      const session = newSession();

      session.submitSearch('ics');

      expect(session.message).toBe('Found 4 matches. Showing: Physics');
      expect(session.panel).toBe('details');
    });

    it('cycles matches with n', () => {
      const session = newSession();
      session.submitSearch('ics');

      session.handleKey('n');

      expect(session.message).toBe('Match 2 of 4: Mechanics');
      expect(session.navigator.selected.id).toBe('*1');
    });

    it('reports searches without matches', () => {
      const session = newSession();

      session.submitSearch('zzz');
      expect(session.message).toBe("No matches found for: 'zzz'");

      session.handleKey('n');
      expect(session.message).toBe('No search results to cycle through');
    });

    it('jumps to ids', () => {
      const session = newSession();

      expect(session.submitJump('*2')?.title).toBe('Optics');
      expect(session.message).toBe('Jumped to *2');
      expect(session.panel).toBe('details');

      session.submitJump('');
      expect(session.message).toBe('Jumped to Physics');
    });

    it('reports unknown ids', () => {
      const session = newSession();

      expect(session.submitJump(' *9 ')).toBeUndefined();
      expect(session.message).toBe("No concept with id '*9'");
    });
  });

  describe('screen', () => {
    it('shows the tree followed by key hints', () => {
      const lines = newSession().screen().split('\n');

      expect(lines.slice(0, 5)).toEqual([
        'Physics',
        '├── *1 Mechanics',
        '│   └── *1**1 Kinematics',
        '└── *2 Optics',
        '',
      ]);
      expect(lines).toHaveLength(6);
      expect(lines[5]).toContain('q quit');
    });

    it('shows the details of the selection in a box', () => {
      const session = newSession();
      session.handleKey('j');
      session.handleKey(KEYS.enter);

      expect(session.screen()).toContain(wrapInBox('*1: Mechanics\n\nNo description provided', display));
    });

    it('shows the status message above the hints', () => {
      const session = newSession();
      session.submitJump('*9');

      const lines = session.screen().split('\n');

      expect(lines.at(-2)).toBe("No concept with id '*9'");
    });

    it('prints the heading first', () => {
      const session = new ViewSession(parseDocument(SOURCE).root, { ...display, heading: 'Document: x' });

      expect(session.screen().split('\n')[0]).toBe('Document: x');
    });
  });
});

describe('runViewSession', () => {
  it('renders a frame per key and reads prompt input', async () => {
    const session = newSession();
    const { io, frames } = fakeIO(['j', '/', 'g', 'q'], ['optics', '*1**1']);

    await runViewSession(session, io);

    expect(frames).toHaveLength(4);
    expect(io.readLine).toHaveBeenNthCalledWith(1, 'Search: ');
    expect(io.readLine).toHaveBeenNthCalledWith(2, 'Jump to id: ');
    expect(session.navigator.selected.id).toBe('*1**1');
    expect(io.close).toHaveBeenCalledTimes(1);
  });

  it('restores the terminal when input fails', async () => {
    const session = newSession();
    const { io } = fakeIO([]);
    io.readKey.mockImplementation(() => Promise.reject(new Error('stdin closed')));

    await expect(runViewSession(session, io)).rejects.toThrow('stdin closed');
    expect(io.close).toHaveBeenCalledTimes(1);
  });
});

describe('handleViewCommand', () => {
  let tempDir: string;
  let source: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'asterism-view-'));
    source = join(tempDir, 'physics.outline');
    await writeFile(source, `${SOURCE}\n`);
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function contextFor(args: string[]): CliContext {
    const config = getDefaultConfig();
    config.cli.colors = false;
    return { args, config, logger: new Logger({ component: 'cli' }) };
  }

  it('browses the file until quit', async () => {
    const { io, frames } = fakeIO(['j', 'q']);

    const result = await handleViewCommand(contextFor([source]), io);

    expect(result).toEqual({ exitCode: 0 });
    expect(frames[0]?.split('\n')[0]).toBe('Document: physics.outline');
    expect(frames).toHaveLength(2);
  });

  it('requires a file argument', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { io } = fakeIO([]);

    const result = await handleViewCommand(contextFor([]), io);

    expect(result).toEqual({ exitCode: 1, message: 'Missing required argument: <file>' });
    expect(io.render).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
