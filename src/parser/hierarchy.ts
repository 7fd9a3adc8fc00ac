/**
 * Hierarchy stack and automatic numbering.
 *
 * @packageDocumentation
 */

import { ConceptNode } from '../document/index.js';
import type { MetadataValue } from '../document/index.js';
import { ConceptSyntaxError } from './errors.js';

/**
 * A concept line that passed validation and received its id, waiting for its
 * description to be collected.
 */
export interface PlannedConcept {
  /** Nesting level, 0 for the root. */
  readonly level: number;
  /** Generated structural address. */
  readonly id: string;
  /** Title with annotations removed. */
  readonly title: string;
  /** Parsed annotations. */
  readonly metadata: ReadonlyMap<string, MetadataValue>;
}

/**
 * Location of a source line, used for error reporting.
 */
export interface SourceLine {
  /** 1-based line number. */
  readonly number: number;
  /** Raw line text. */
  readonly text: string;
}

/**
 * Builds a concept tree level by level.
 *
 * Holds the per-level counters and the stack of open ancestors
 * (index 0 = root). One builder serves exactly one parse.
 *
 * Concepts go through two steps: {@link HierarchyBuilder.plan} validates the
 * level and allocates the id when the concept line is read, and
 * {@link HierarchyBuilder.commit} constructs the node once its description is
 * known. The caller commits the pending concept before planning the next one.
 */
export class HierarchyBuilder {
  private readonly stack: ConceptNode[] = [];
  private readonly counters: number[] = [];
  private rootPlanned = false;
  private root: ConceptNode | undefined;

  /**
   * @param marker - Structural marker character used to build ids.
   */
  constructor(private readonly marker: string = '*') {}

  /**
   * The committed root, if any.
   */
  get rootNode(): ConceptNode | undefined {
    return this.root;
  }

  /**
   * Deepest open level, or -1 before the root is committed.
   */
  get openDepth(): number {
    return this.stack.length - 1;
  }

  /**
   * Validates a concept line and allocates its id.
   *
   * @param level - Nesting level from the marker token.
   * @param title - Title with annotations removed.
   * @param metadata - Parsed annotations.
   * @param line - Source line for error reporting.
   * @throws ConceptSyntaxError for an empty title, a second root, a marked
   * concept before the root, or a skipped level.
   */
  plan(
    level: number,
    title: string,
    metadata: ReadonlyMap<string, MetadataValue>,
    line: SourceLine
  ): PlannedConcept {
    if (title.trim() === '') {
      throw new ConceptSyntaxError('concept title cannot be empty', line.number, line.text);
    }

    if (level === 0) {
      if (this.rootPlanned) {
        throw new ConceptSyntaxError(
          'multiple root concepts not allowed',
          line.number,
          line.text
        );
      }
      this.rootPlanned = true;
      return { level, id: '', title, metadata };
    }

    if (!this.rootPlanned) {
      throw new ConceptSyntaxError(
        'file must start with an unmarked root concept',
        line.number,
        line.text
      );
    }

    const maxLevel = this.openDepth + 1;
    if (level > maxLevel) {
      throw new ConceptSyntaxError(
        `invalid level jump: found level ${String(level)}, expected at most ${String(maxLevel)}`,
        line.number,
        line.text
      );
    }

    while (this.counters.length < level) {
      this.counters.push(0);
    }
    this.counters[level - 1] = (this.counters[level - 1] ?? 0) + 1;
    this.counters.length = level;

    return { level, id: this.buildId(level), title, metadata };
  }

  /**
   * Constructs the planned node under its parent and opens it.
   *
   * @param planned - Result of {@link HierarchyBuilder.plan}.
   * @param description - Collected description text.
   * @returns The new node.
   */
  commit(planned: PlannedConcept, description: string): ConceptNode {
    const init = {
      id: planned.id,
      title: planned.title,
      description,
      metadata: planned.metadata,
    };

    if (planned.level === 0) {
      const root = new ConceptNode(init);
      this.root = root;
      this.stack.length = 0;
      this.stack.push(root);
      return root;
    }

    this.stack.length = planned.level;
    const parent = this.stack[planned.level - 1];
    if (parent === undefined) {
      throw new ConceptSyntaxError(`no open parent for level ${String(planned.level)}`);
    }
    const node = new ConceptNode(init, parent);
    this.stack.push(node);
    return node;
  }

  private buildId(level: number): string {
    let id = '';
    for (let i = 0; i < level; i++) {
      id += this.marker.repeat(i + 1) + String(this.counters[i] ?? 0);
    }
    return id;
  }
}
