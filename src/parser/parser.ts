/**
 * Line scanner for asterism outline documents.
 *
 * @packageDocumentation
 */

import type { ConceptNode } from '../document/index.js';
import { countConcepts, maxDepth } from '../document/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { ConceptSyntaxError } from './errors.js';
import { isFrontmatterDelimiter, parseFrontmatter } from './frontmatter.js';
import type { Frontmatter } from './frontmatter.js';
import { HierarchyBuilder } from './hierarchy.js';
import type { PlannedConcept, SourceLine } from './hierarchy.js';
import { extractMetadata } from './metadata.js';

/** Default structural marker character. */
export const DEFAULT_MARKER = '*';

/** Default code fence token. */
export const DEFAULT_FENCE = '```';

/** Default number of leading lines in which frontmatter may open. */
export const DEFAULT_FRONTMATTER_LINE_LIMIT = 10;

/**
 * Options controlling the scanner.
 */
export interface ParserOptions {
  /** Structural marker character. Default: `*`. */
  readonly marker?: string;
  /** Code fence token. Default: three backticks. */
  readonly fence?: string;
  /** Frontmatter may only open within this many leading lines. Default: 10. */
  readonly frontmatterLineLimit?: number;
  /** Logger for diagnostics. */
  readonly logger?: Logger;
}

/**
 * Result of a successful parse.
 */
export interface ParsedDocument {
  /** The single root concept. */
  readonly root: ConceptNode;
  /** Document-level metadata from the frontmatter block. */
  readonly frontmatter: Frontmatter;
  /** Number of concepts, root included. */
  readonly conceptCount: number;
}

type ScanState = 'normal' | 'in_frontmatter' | 'in_code_block';

interface ResolvedOptions {
  readonly marker: string;
  readonly fence: string;
  readonly frontmatterLineLimit: number;
  readonly logger: Logger;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parses outline text into a concept tree.
 *
 * The parser itself only holds options; every call to
 * {@link ConceptParser.parse} runs with fresh counters and stack, so one
 * instance can parse many documents.
 *
 * @example
 * ```typescript
 * const parser = new ConceptParser();
 * const { root } = parser.parse('Physics\n* Mechanics\n** Kinematics\n* Optics');
 * console.log(root.children.map((c) => c.id)); // ['*1', '*2']
 * ```
 */
export class ConceptParser {
  private readonly options: ResolvedOptions;
  private readonly conceptPattern: RegExp;
  private readonly bareMarkerPattern: RegExp;
  private readonly markerRunPattern: RegExp;
  private readonly pureMarkerPattern: RegExp;

  /**
   * Creates a parser.
   *
   * @param options - Scanner options.
   * @throws ConceptSyntaxError if the marker is not a single non-alphanumeric,
   * non-space character or the fence is empty.
   */
  constructor(options: ParserOptions = {}) {
    const marker = options.marker ?? DEFAULT_MARKER;
    if (marker.length !== 1 || /[\s0-9A-Za-z[\]]/.test(marker)) {
      throw new ConceptSyntaxError(
        `marker must be a single non-alphanumeric, non-space character, got '${marker}'`
      );
    }
    const fence = options.fence ?? DEFAULT_FENCE;
    if (fence.trim() === '') {
      throw new ConceptSyntaxError('fence token cannot be empty');
    }

    this.options = {
      marker,
      fence,
      frontmatterLineLimit: options.frontmatterLineLimit ?? DEFAULT_FRONTMATTER_LINE_LIMIT,
      logger: options.logger ?? defaultLogger,
    };

    const m = escapeRegExp(marker);
    this.conceptPattern = new RegExp(`^(${m}+\\S*)\\s+(.*)$`);
    this.bareMarkerPattern = new RegExp(`^(?:${m}+\\d*)+$`);
    this.markerRunPattern = new RegExp(`${m}+`, 'g');
    this.pureMarkerPattern = new RegExp(`^${m}+$`);
  }

  /**
   * Parses a whole document.
   *
   * @param text - Document text; `\n` and `\r\n` line endings are accepted.
   * @returns The parsed document.
   * @throws ConceptSyntaxError on the first structural violation.
   */
  parse(text: string): ParsedDocument {
    return this.parseLines(text.split(/\r?\n/));
  }

  /**
   * Parses a sequence of lines.
   *
   * @param lines - Physical lines without line terminators.
   * @returns The parsed document.
   * @throws ConceptSyntaxError on the first structural violation.
   */
  parseLines(lines: Iterable<string>): ParsedDocument {
    const run = new ScanRun(this);
    let lineNumber = 0;
    for (const line of lines) {
      lineNumber++;
      run.feed(line, lineNumber);
    }
    const document = run.finish();

    this.options.logger.debug('document_parsed', {
      concepts: document.conceptCount,
      maxDepth: maxDepth(document.root),
      lines: lineNumber,
      frontmatterKeys: Object.keys(document.frontmatter),
    });
    return document;
  }

  /** @internal */
  get resolved(): ResolvedOptions {
    return this.options;
  }

  /**
   * Matches a concept line.
   *
   * @returns The marker token and raw title, or undefined for other lines.
   * A marker token standing alone (marker runs and digits only) yields an
   * empty title; other marker-prefixed words are not concept lines.
   * @internal
   */
  matchConcept(line: string): { marker: string; title: string } | undefined {
    const match = this.conceptPattern.exec(line);
    if (match !== null) {
      return { marker: match[1] ?? '', title: match[2] ?? '' };
    }
    if (this.bareMarkerPattern.test(line)) {
      return { marker: line, title: '' };
    }
    return undefined;
  }

  /**
   * Nesting level of a marker token.
   *
   * A token made only of marker characters counts its length (`**` = 2);
   * a numbered token counts its marker groups (`*1**2***3` = 3).
   * @internal
   */
  levelOf(token: string): number {
    if (this.pureMarkerPattern.test(token)) {
      return token.length;
    }
    return token.match(this.markerRunPattern)?.length ?? 0;
  }
}

/**
 * State of one parse: scanner state, description buffer and hierarchy.
 */
class ScanRun {
  private readonly options: ResolvedOptions;
  private readonly builder: HierarchyBuilder;
  private state: ScanState = 'normal';
  private pending: PlannedConcept | undefined;
  private description: string[] = [];
  private frontmatterLines: string[] = [];
  private frontmatterStart = 0;
  private frontmatterSeen = false;
  private frontmatter: Frontmatter = {};

  constructor(private readonly parser: ConceptParser) {
    this.options = parser.resolved;
    this.builder = new HierarchyBuilder(this.options.marker);
  }

  feed(rawLine: string, lineNumber: number): void {
    const line = rawLine.trimEnd();
    const source: SourceLine = { number: lineNumber, text: rawLine };

    if (this.state === 'in_frontmatter') {
      if (isFrontmatterDelimiter(line)) {
        this.closeFrontmatter();
      } else {
        this.frontmatterLines.push(rawLine);
      }
      return;
    }

    if (this.state === 'in_code_block') {
      this.appendDescription(rawLine);
      if (line.startsWith(this.options.fence)) {
        this.state = 'normal';
      }
      return;
    }

    if (
      isFrontmatterDelimiter(line) &&
      !this.frontmatterSeen &&
      this.pending === undefined &&
      lineNumber <= this.options.frontmatterLineLimit
    ) {
      this.state = 'in_frontmatter';
      this.frontmatterSeen = true;
      this.frontmatterStart = lineNumber;
      this.options.logger.debug('frontmatter_opened', { line: lineNumber });
      return;
    }

    if (line.startsWith(this.options.fence)) {
      this.state = 'in_code_block';
      this.appendDescription(rawLine);
      return;
    }

    if (line.trim() === '') {
      if (this.pending !== undefined && this.description.length > 0) {
        this.description.push('');
      }
      return;
    }

    const concept = this.parser.matchConcept(line);
    if (concept !== undefined) {
      if (this.pending === undefined) {
        throw new ConceptSyntaxError(
          'file must start with an unmarked root concept',
          lineNumber,
          rawLine
        );
      }
      this.startConcept(this.parser.levelOf(concept.marker), concept.title, source);
      return;
    }

    if (this.pending === undefined) {
      this.startConcept(0, line.trim(), source);
      return;
    }

    this.description.push(line);
  }

  finish(): ParsedDocument {
    this.commitPending();

    const root = this.builder.rootNode;
    if (root === undefined) {
      throw new ConceptSyntaxError('no valid concepts found');
    }

    return {
      root,
      frontmatter: this.frontmatter,
      conceptCount: countConcepts(root),
    };
  }

  private startConcept(level: number, rawTitle: string, source: SourceLine): void {
    this.commitPending();
    const { title, metadata } = extractMetadata(rawTitle, this.options.marker);
    this.pending = this.builder.plan(level, title, metadata, source);
  }

  private commitPending(): void {
    if (this.pending === undefined) {
      return;
    }
    this.builder.commit(this.pending, this.description.join('\n').trimEnd());
    this.description = [];
  }

  private appendDescription(line: string): void {
    if (this.pending !== undefined) {
      this.description.push(line);
    }
  }

  private closeFrontmatter(): void {
    this.state = 'normal';
    this.frontmatter = parseFrontmatter(
      this.frontmatterLines,
      this.options.logger,
      this.frontmatterStart
    );
    this.frontmatterLines = [];
  }
}

/**
 * Parses a document with a one-off parser.
 *
 * @param text - Document text.
 * @param options - Scanner options.
 * @throws ConceptSyntaxError on the first structural violation.
 */
export function parseDocument(text: string, options?: ParserOptions): ParsedDocument {
  return new ConceptParser(options).parse(text);
}

/**
 * Parses a sequence of physical lines with a one-off parser.
 *
 * @param lines - Lines without terminators, e.g. from a readline stream.
 * @param options - Scanner options.
 * @throws ConceptSyntaxError on the first structural violation.
 */
export function parseLines(lines: Iterable<string>, options?: ParserOptions): ParsedDocument {
  return new ConceptParser(options).parseLines(lines);
}
