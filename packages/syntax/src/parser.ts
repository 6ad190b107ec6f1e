/**
 * GDScript parser adapter: thin layer over tree-sitter.
 *
 * The grammar tolerates malformed input: syntax errors become ERROR nodes
 * in a best-effort tree, never exceptions. Only a failure inside the
 * binding itself throws.
 */

import Parser from 'tree-sitter';
import GDScript from 'tree-sitter-gdscript';

export type SyntaxTree = Parser.Tree;
export type SyntaxNode = Parser.SyntaxNode;
export type Point = Parser.Point;
export type QueryMatch = Parser.QueryMatch;

// The binding reads strings through a fixed-size buffer; size it to the input
// so large files are not split into chunks mid-token.
const MIN_BUFFER_SIZE = 32 * 1024;

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(GDScript);
  return parser;
}

/**
 * Parse `text`, reusing `previous` when it has been edited to match.
 */
export function parseSource(text: string, previous?: SyntaxTree, parser: Parser = createParser()): SyntaxTree {
  const bufferSize = Math.max(MIN_BUFFER_SIZE, text.length * 2 + 1);
  return parser.parse(text, previous, { bufferSize });
}

/**
 * Compile a query against the GDScript grammar on first use and keep it for
 * the life of the process. A malformed query throws at that first use.
 */
export function lazyQuery(source: string): () => Parser.Query {
  let compiled: Parser.Query | null = null;
  return () => {
    if (compiled === null) {
      compiled = new Parser.Query(GDScript, source);
    }
    return compiled;
  };
}

/**
 * Smallest-first chain of nodes whose range strictly contains `index`
 * (`startIndex <= index < endIndex`), starting at the root.
 */
export function nodesContaining(root: SyntaxNode, index: number): SyntaxNode[] {
  const chain: SyntaxNode[] = [];
  let current: SyntaxNode | null = root;
  while (current !== null && current.startIndex <= index && index < current.endIndex) {
    chain.push(current);
    current = current.children.find(child => child.startIndex <= index && index < child.endIndex) ?? null;
  }
  return chain.reverse();
}

/** True when the tree contains an ERROR node anywhere. */
export function containsSyntaxError(node: SyntaxNode): boolean {
  if (node.type === 'ERROR') return true;
  return node.children.some(child => containsSyntaxError(child));
}

/**
 * Row/column of `index` in `text`; columns count string indices.
 */
export function pointAt(text: string, index: number): Point {
  let row = 0;
  let lineStart = 0;
  for (let i = 0; i < index; i++) {
    if (text.charCodeAt(i) === 10) {
      row++;
      lineStart = i + 1;
    }
  }
  return { row, column: index - lineStart };
}

/**
 * Advance `start` over `text`: a newline moves to the next row at column 0,
 * anything else moves one column right.
 */
export function advancePoint(start: Point, text: string): Point {
  let { row, column } = start;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      row++;
      column = 0;
    } else {
      column++;
    }
  }
  return { row, column };
}
