/**
 * Structural spacing: two blank lines between top-level declarations
 * where the GDScript style guide asks for them.
 *
 * Query matches are collected first and turned into insertion points; the
 * insertions are then applied from the end of the text backwards so no
 * point is invalidated by an earlier one. Blank lines already present
 * count toward the two, so the pass is idempotent.
 */

import { lazyQuery, pointAt } from '@gdfmt/syntax';
import type { QueryMatch, SourceDocument, SyntaxNode } from '@gdfmt/syntax';

/** A function, constructor or class after any declaration, with the comments and annotations between them. */
const BEFORE_CALLABLE_QUERY = lazyQuery(`
(([(variable_statement) (function_definition) (class_definition) (signal_statement)
   (const_statement) (enum_definition) (constructor_definition)]) @first
  .
  (([(comment) (annotation)])* @trivia
  .
  ([(function_definition) (constructor_definition) (class_definition)]) @second))
`);

/** A member declaration directly after a function, constructor or class. */
const AFTER_CALLABLE_QUERY = lazyQuery(`
(([(constructor_definition) (function_definition) (class_definition)]) @first
  .
  ([(variable_statement) (signal_statement) (const_statement) (enum_definition)]) @second)
`);

const REQUIRED_BLANK_LINES = 2;

export interface SpacingInsertion {
  /** Line start where newlines go */
  index: number;
  newlines: number;
}

/**
 * Insertion points for the current document, sorted by descending index.
 */
export function findSpacingInsertions(document: SourceDocument): SpacingInsertion[] {
  const text = document.text;
  const targets = new Set<number>();

  for (const match of document.query(BEFORE_CALLABLE_QUERY())) {
    const first = capture(match, 'first');
    const second = capture(match, 'second');
    if (!first || !second) continue;

    const trivia = match.captures.filter(c => c.name === 'trivia').map(c => c.node);
    const target = resolveTarget(text, first, second, attachedTrivia(first, trivia, second));
    if (target !== null) targets.add(target);
  }

  for (const match of document.query(AFTER_CALLABLE_QUERY())) {
    const first = capture(match, 'first');
    const second = capture(match, 'second');
    if (!first || !second) continue;

    const target = resolveTarget(text, first, second, second);
    if (target !== null) targets.add(target);
  }

  const insertions: SpacingInsertion[] = [];
  for (const index of targets) {
    const newlines = REQUIRED_BLANK_LINES - Math.min(REQUIRED_BLANK_LINES, blankLinesBefore(text, index));
    if (newlines > 0) insertions.push({ index, newlines });
  }
  return insertions.sort((a, b) => b.index - a.index);
}

/**
 * Insert the missing blank lines and re-parse. Returns the number of
 * insertion points that changed the text.
 */
export function ensureDeclarationSpacing(document: SourceDocument): number {
  const insertions = findSpacingInsertions(document);
  const newline = lineEnding(document.text);
  for (const insertion of insertions) {
    document.insertText(insertion.index, newline.repeat(insertion.newlines));
  }
  document.sync();
  return insertions.length;
}

/** The line ending of the first line; files written on Windows keep CRLF. */
function lineEnding(text: string): string {
  const newline = text.indexOf('\n');
  return newline > 0 && text[newline - 1] === '\r' ? '\r\n' : '\n';
}

function capture(match: QueryMatch, name: string): SyntaxNode | undefined {
  return match.captures.find(c => c.name === name)?.node;
}

/**
 * The comments and annotations that belong to `second`: the unbroken run of
 * lines directly above it, stopping at anything on the first declaration's
 * last line.
 */
function attachedTrivia(first: SyntaxNode, trivia: SyntaxNode[], second: SyntaxNode): SyntaxNode | null {
  let attached: SyntaxNode | null = null;
  let nextRow = second.startPosition.row;

  for (let i = trivia.length - 1; i >= 0; i--) {
    const node = trivia[i];
    if (node.startPosition.row <= lastRow(first)) break;
    if (node.endPosition.row + 1 !== nextRow && node.endPosition.row !== nextRow) break;
    attached = node;
    nextRow = node.startPosition.row;
  }
  return attached;
}

function resolveTarget(text: string, first: SyntaxNode, second: SyntaxNode, anchor: SyntaxNode | null): number | null {
  const target = anchor ? lineStart(text, anchor.startIndex) : firstContentLineAfter(text, first.endIndex);
  if (target === null) return null;
  if (target < first.endIndex || target > second.startIndex) return null;
  if (pointAt(text, target).row <= lastRow(first)) return null;
  return target;
}

/** Last row holding text of `node`; a node may end at column 0 of the next line. */
function lastRow(node: SyntaxNode): number {
  const { row, column } = node.endPosition;
  return column === 0 && row > node.startPosition.row ? row - 1 : row;
}

function lineStart(text: string, index: number): number {
  return text.lastIndexOf('\n', index - 1) + 1;
}

function nextLineStart(text: string, index: number): number | null {
  if (index > 0 && text[index - 1] === '\n') return index;
  const newline = text.indexOf('\n', index);
  return newline === -1 ? null : newline + 1;
}

function lineEnd(text: string, index: number): number {
  const newline = text.indexOf('\n', index);
  return newline === -1 ? text.length : newline;
}

function firstContentLineAfter(text: string, index: number): number | null {
  let position = nextLineStart(text, index);
  while (position !== null && position < text.length) {
    const end = lineEnd(text, position);
    if (text.slice(position, end).trim() !== '') return position;
    position = end < text.length ? end + 1 : null;
  }
  return null;
}

/** Blank lines immediately above the line starting at `index`. */
function blankLinesBefore(text: string, index: number): number {
  let count = 0;
  let end = index - 1;
  while (end >= 0) {
    const start = end === 0 ? 0 : text.lastIndexOf('\n', end - 1) + 1;
    if (text.slice(start, end).trim() !== '') break;
    count++;
    end = start - 1;
  }
  return count;
}
