/**
 * SourceDocument: a text buffer and its syntax tree, kept in step.
 *
 * Every mutation goes through this class. Edits are computed against the
 * text as it was before the batch, mirrored onto the tree as tree-sitter
 * edit descriptors, then the tree is re-parsed incrementally. Callers must
 * not hold on to nodes across a mutation; query the live tree again.
 */

import type Parser from 'tree-sitter';
import {
  advancePoint,
  createParser,
  nodesContaining,
  parseSource,
  pointAt,
} from './parser';
import type { Point, QueryMatch, SyntaxNode, SyntaxTree } from './parser';

export interface TextEdit {
  startIndex: number;
  oldEndIndex: number;
  newEndIndex: number;
  startPosition: Point;
  oldEndPosition: Point;
  newEndPosition: Point;
  /** Replacement text for the range */
  text: string;
}

/** A replacement of `[start, end)` of the current text. */
export interface Replacement {
  start: number;
  end: number;
  text: string;
}

export type ReplacementRule = string | ((match: RegExpMatchArray) => string);

export interface ReplaceOptions {
  /** Stop after this many applied edits */
  limit?: number;
}

export class SourceDocument {
  private readonly parser: Parser;
  private currentText: string;
  private currentTree: SyntaxTree;
  private unsyncedEdits = 0;

  constructor(text: string) {
    this.parser = createParser();
    this.currentText = text;
    this.currentTree = parseSource(text, undefined, this.parser);
  }

  get text(): string {
    return this.currentText;
  }

  get tree(): SyntaxTree {
    return this.currentTree;
  }

  get root(): SyntaxNode {
    return this.currentTree.rootNode;
  }

  /** True while insertions have moved node positions without a re-parse. */
  get hasUnsyncedEdits(): boolean {
    return this.unsyncedEdits > 0;
  }

  /**
   * Replace the whole text and parse it from scratch.
   */
  reset(text: string): void {
    this.currentText = text;
    this.currentTree = parseSource(text, undefined, this.parser);
    this.unsyncedEdits = 0;
  }

  isInsideString(index: number): boolean {
    return nodesContaining(this.root, index).some(node => node.type === 'string');
  }

  query(query: Parser.Query): QueryMatch[] {
    return query.matches(this.root);
  }

  /**
   * Replace every match of `pattern` that does not start inside a string
   * literal. The pattern must be global; empty matches are ignored.
   */
  replaceMatches(pattern: RegExp, replacement: ReplacementRule, options: ReplaceOptions = {}): TextEdit[] {
    if (!pattern.global) {
      throw new Error(`Pattern ${pattern} must have the g flag`);
    }

    const replacements: Replacement[] = [];
    for (const match of this.currentText.matchAll(pattern)) {
      if (options.limit !== undefined && replacements.length >= options.limit) break;

      const matched = match[0];
      if (matched.length === 0) continue;

      const start = match.index ?? 0;
      if (this.isInsideString(start)) continue;

      const text = typeof replacement === 'string'
        ? expandReplacement(replacement, match)
        : replacement(match);
      replacements.push({ start, end: start + matched.length, text });
    }

    if (replacements.length === 0) return [];
    return this.applyEdits(replacements);
  }

  /**
   * Apply non-overlapping replacements given in any order, each expressed
   * against the current (unedited) text. Replacements that would not change
   * the text are dropped. Returns the edits that were applied.
   */
  applyEdits(replacements: Replacement[]): TextEdit[] {
    const ordered = [...replacements].sort((a, b) => a.start - b.start || a.end - b.end);

    const edits: TextEdit[] = [];
    const parts: string[] = [];
    let cursorIndex = 0;
    let cursorPoint: Point = { row: 0, column: 0 };
    // End of the previous replacement, applied or not
    let coveredIndex = 0;

    for (const item of ordered) {
      if (item.start < coveredIndex || item.end < item.start || item.end > this.currentText.length) {
        throw new Error(`Replacement [${item.start}, ${item.end}) overlaps another or is out of range`);
      }
      coveredIndex = item.end;

      const removed = this.currentText.slice(item.start, item.end);
      if (removed === item.text) continue;

      const untouched = this.currentText.slice(cursorIndex, item.start);
      const startPosition = advancePoint(cursorPoint, untouched);
      const oldEndPosition = advancePoint(startPosition, removed);

      edits.push({
        startIndex: item.start,
        oldEndIndex: item.end,
        newEndIndex: item.start + item.text.length,
        startPosition,
        oldEndPosition,
        newEndPosition: advancePoint(startPosition, item.text),
        text: item.text,
      });
      parts.push(untouched, item.text);

      cursorIndex = item.end;
      cursorPoint = oldEndPosition;
    }

    if (edits.length === 0) return [];

    parts.push(this.currentText.slice(cursorIndex));
    this.currentText = parts.join('');

    // Descriptors use pre-batch coordinates: apply the last one first so the
    // earlier ones still point at unchanged text.
    for (let i = edits.length - 1; i >= 0; i--) {
      this.currentTree.edit(edits[i]);
    }
    this.unsyncedEdits += edits.length;
    this.sync();

    return edits;
  }

  /**
   * Insert `text` at `index` and shift the tree's node positions to match,
   * without re-parsing. Call `sync()` once the batch is done.
   */
  insertText(index: number, text: string): TextEdit {
    if (index < 0 || index > this.currentText.length) {
      throw new Error(`Insertion index ${index} is out of range`);
    }

    const startPosition = pointAt(this.currentText, index);
    const edit: TextEdit = {
      startIndex: index,
      oldEndIndex: index,
      newEndIndex: index + text.length,
      startPosition,
      oldEndPosition: startPosition,
      newEndPosition: advancePoint(startPosition, text),
      text,
    };

    this.currentText = this.currentText.slice(0, index) + text + this.currentText.slice(index);
    this.currentTree.edit(edit);
    this.unsyncedEdits++;
    return edit;
  }

  /** Re-parse incrementally if edits are pending. */
  sync(): void {
    if (this.unsyncedEdits === 0) return;
    this.currentTree = parseSource(this.currentText, this.currentTree, this.parser);
    this.unsyncedEdits = 0;
  }
}

/**
 * Expand `$&`, `$1`…`$99` and `$<name>` in a replacement template.
 */
function expandReplacement(template: string, match: RegExpMatchArray): string {
  return template.replace(/\$(?:(&)|(\d{1,2})|<([^>]+)>|(\$))/g, (
    token: string,
    whole: string | undefined,
    group: string | undefined,
    name: string | undefined,
    dollar: string | undefined,
  ) => {
    if (whole) return match[0];
    if (dollar) return '$';
    if (group) return match[Number(group)] ?? '';
    if (name) return match.groups?.[name] ?? '';
    return token;
  });
}
