/**
 * View command handler for the asterism CLI.
 *
 * Browses a document in the terminal: a keypress loop drives a
 * {@link Navigator} and redraws the tree with a details or help panel.
 */

import { basename } from 'node:path';
import * as readline from 'node:readline';
import type { ConceptNode } from '../../document/index.js';
import { Navigator } from '../../navigator/index.js';
import type { NavigatorListener, SearchResult } from '../../navigator/index.js';
import { parseFile } from '../../parser/index.js';
import { nodeLabel, paint } from '../../render/index.js';
import { displayOptionsFor, parserOptionsFor } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { getPositionals } from '../utils/args.js';
import { wrapInBox } from '../utils/displayUtils.js';
import type { DisplayOptions } from '../utils/displayUtils.js';

/** Raw key sequences understood by the session. */
export const KEYS = {
  up: '\x1b[A',
  down: '\x1b[B',
  enter: '\r',
  newline: '\n',
  space: ' ',
  ctrlC: '\x03',
} as const;

const HELP_TEXT = [
  'Navigation:',
  '  up/k, down/j   Move the selection',
  '  enter/space    Show concept details',
  '  e              Expand or collapse the selected concept',
  '',
  'Search & Jump:',
  '  /              Search titles and ids',
  '  n              Next search match',
  '  g              Jump to a concept id',
  '',
  'General:',
  '  ?              Toggle this help',
  '  q, ctrl-c      Quit',
].join('\n');

const KEY_HINTS = '↑/↓ move  enter details  e expand  / search  n next  g jump  ? help  q quit';

/**
 * What the loop does after a key.
 */
export type ViewAction = 'continue' | 'quit' | 'search' | 'jump';

/** Panel shown below the tree. */
export type ViewPanel = 'none' | 'details' | 'help';

/**
 * Options for {@link ViewSession}.
 */
export interface ViewSessionOptions extends DisplayOptions {
  /** Suffix of collapsed nodes. */
  collapseMarker?: string;
  /** Heading printed above the tree. */
  heading?: string;
}

/**
 * Terminal state of one view session.
 *
 * Key handling is synchronous and free of I/O; prompts for search and jump
 * input are requested through the returned {@link ViewAction}.
 */
export class ViewSession implements NavigatorListener {
  /** The navigator driven by this session. */
  readonly navigator: Navigator;

  private readonly display: DisplayOptions;
  private panelState: ViewPanel = 'none';
  private messageText: string | undefined;

  constructor(root: ConceptNode, options: ViewSessionOptions) {
    this.display = { colors: options.colors, unicode: options.unicode };
    this.navigator = new Navigator(root, {
      listener: this,
      render: {
        colors: options.colors,
        unicode: options.unicode,
        collapseMarker: options.collapseMarker,
        heading: options.heading,
      },
    });
  }

  /** Panel currently shown. */
  get panel(): ViewPanel {
    return this.panelState;
  }

  /** Status message shown above the key hints. */
  get message(): string | undefined {
    return this.messageText;
  }

  /**
   * Applies one key press.
   *
   * @param key - Raw key sequence as read from the terminal.
   */
  handleKey(key: string): ViewAction {
    switch (key) {
      case KEYS.up:
      case 'k':
        this.navigator.onSelect(-1);
        return 'continue';
      case KEYS.down:
      case 'j':
        this.navigator.onSelect(1);
        return 'continue';
      case KEYS.enter:
      case KEYS.newline:
      case KEYS.space:
        this.panelState = 'details';
        return 'continue';
      case 'e':
        this.navigator.onToggleExpand();
        return 'continue';
      case '/':
        return 'search';
      case 'n':
        this.showNextMatch();
        return 'continue';
      case 'g':
        return 'jump';
      case '?':
        this.panelState = this.panelState === 'help' ? 'none' : 'help';
        return 'continue';
      case 'q':
      case KEYS.ctrlC:
        return 'quit';
      default:
        return 'continue';
    }
  }

  /**
   * Runs a search entered at the prompt.
   */
  submitSearch(query: string): SearchResult {
    return this.navigator.onSearch(query);
  }

  /**
   * Jumps to an id entered at the prompt.
   *
   * @returns The selected node, or undefined for unknown ids.
   */
  submitJump(id: string): ConceptNode | undefined {
    const node = this.navigator.jumpTo(id);
    if (node === undefined) {
      this.messageText = `No concept with id '${id.trim()}'`;
      return undefined;
    }
    this.messageText = `Jumped to ${node.isRoot ? node.title : node.id}`;
    this.panelState = 'details';
    return node;
  }

  /**
   * The full frame: tree, panel, message and key hints.
   */
  screen(): string {
    const lines = this.navigator.render();

    if (this.panelState === 'details') {
      lines.push('', wrapInBox(this.navigator.details({ colors: this.display.colors }), this.display));
    } else if (this.panelState === 'help') {
      lines.push('', wrapInBox(HELP_TEXT, this.display));
    }

    lines.push('');
    if (this.messageText !== undefined) {
      lines.push(paint(this.messageText, 'yellow', this.display.colors));
    }
    lines.push(paint(KEY_HINTS, 'dim', this.display.colors));
    return lines.join('\n');
  }

  onSelect(): void {
    this.messageText = undefined;
  }

  onSearch(result: SearchResult): void {
    if (result.selected === undefined) {
      this.messageText = `No matches found for: '${result.query}'`;
      return;
    }
    this.messageText = `Found ${String(result.matches.length)} matches. Showing: ${result.selected.title}`;
    this.panelState = 'details';
  }

  onToggleExpand(node: ConceptNode, expanded: boolean): void {
    this.messageText = `${expanded ? 'Expanded' : 'Collapsed'} ${nodeLabel(node)}`;
  }

  private showNextMatch(): void {
    const node = this.navigator.nextMatch();
    const matches = this.navigator.lastSearch?.matches ?? [];
    if (node === undefined) {
      this.messageText = 'No search results to cycle through';
      return;
    }
    this.messageText = `Match ${String(matches.indexOf(node) + 1)} of ${String(matches.length)}: ${node.title}`;
    this.panelState = 'details';
  }
}

/**
 * Terminal input and output for a view session.
 * Abstracted for testability.
 */
export interface TerminalIO {
  /** Read a single key press. */
  readKey(): Promise<string>;
  /** Read a line of input after showing a prompt. */
  readLine(prompt: string): Promise<string>;
  /** Replace the screen with a frame. */
  render(frame: string): void;
  /** Restore the terminal. */
  close(): void;
}

/**
 * Line queue over a non-interactive input, such as a pipe.
 */
function createLineQueue(input: NodeJS.ReadableStream): (fallback: string) => Promise<string> {
  const rl = readline.createInterface({ input, terminal: false });
  const buffered: string[] = [];
  const waiting: ((line: string | undefined) => void)[] = [];
  let ended = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next !== undefined) {
      next(line);
    } else {
      buffered.push(line);
    }
  });
  rl.on('close', () => {
    ended = true;
    for (const next of waiting.splice(0)) {
      next(undefined);
    }
  });

  return (fallback) => {
    const line = buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (ended) {
      return Promise.resolve(fallback);
    }
    return new Promise((resolve) => {
      waiting.push((next) => {
        resolve(next ?? fallback);
      });
    });
  };
}

/**
 * Creates a readline-based terminal.
 *
 * On a TTY keys are read in raw mode and prompts use a short-lived readline
 * interface. Otherwise each input line stands for the key given by its first
 * character (an empty line is Enter), and end of input reads as `q`.
 */
export function createTerminalIO(
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout
): TerminalIO {
  const nextLine = input.isTTY ? undefined : createLineQueue(input);

  return {
    readKey(): Promise<string> {
      if (nextLine !== undefined) {
        return nextLine('q').then((line) => line.charAt(0) || KEYS.enter);
      }
      return new Promise((resolve) => {
        input.setRawMode(true);
        input.resume();
        const onData = (buffer: Buffer): void => {
          input.setRawMode(false);
          input.pause();
          input.off('data', onData);
          resolve(buffer.toString('utf-8'));
        };
        input.on('data', onData);
      });
    },
    readLine(prompt: string): Promise<string> {
      if (nextLine !== undefined) {
        output.write(prompt);
        return nextLine('');
      }
      const rl = readline.createInterface({ input, output });
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => {
          rl.close();
          resolve(answer);
        });
      });
    },
    render(frame: string): void {
      output.write(output.isTTY ? `\x1b[2J\x1b[H${frame}\n` : `${frame}\n`);
    },
    close(): void {
      if (input.isTTY) {
        input.setRawMode(false);
      }
      input.pause();
    },
  };
}

/**
 * Runs the keypress loop until the user quits.
 *
 * @param session - Session state.
 * @param io - Terminal to read keys from and draw frames to.
 */
export async function runViewSession(session: ViewSession, io: TerminalIO): Promise<void> {
  try {
    for (;;) {
      io.render(session.screen());
      const action = session.handleKey(await io.readKey());
      if (action === 'quit') {
        return;
      }
      if (action === 'search') {
        session.submitSearch(await io.readLine('Search: '));
      } else if (action === 'jump') {
        session.submitJump(await io.readLine('Jump to id: '));
      }
    }
  } finally {
    io.close();
  }
}

/**
 * Handles the view command.
 *
 * @param context - The CLI context.
 * @param io - Terminal to use; a readline terminal on stdin/stdout by default.
 * @returns A promise resolving to the command result.
 * @throws FileAccessError or ConceptSyntaxError when the document cannot be
 * parsed.
 */
export async function handleViewCommand(
  context: CliContext,
  io?: TerminalIO
): Promise<CliCommandResult> {
  const file = getPositionals(context.args)[0];
  if (file === undefined) {
    const message = 'Missing required argument: <file>';
    console.error(`Error: ${message}`);
    console.error('\nRun "asterism help view" for usage information.');
    return { exitCode: 1, message };
  }

  const { root } = await parseFile(file, parserOptionsFor(context));
  const display = displayOptionsFor(context);
  const session = new ViewSession(root, {
    ...display,
    collapseMarker: context.config.render.collapse_marker,
    heading: `Document: ${basename(file)}`,
  });

  context.logger.debug('view_started', { file });
  await runViewSession(session, io ?? createTerminalIO());
  return { exitCode: 0 };
}
