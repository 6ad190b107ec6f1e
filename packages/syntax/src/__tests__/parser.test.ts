import { describe, it, expect } from 'vitest';
import {
  advancePoint,
  containsSyntaxError,
  createParser,
  lazyQuery,
  nodesContaining,
  parseSource,
  pointAt,
} from '../index';

describe('parseSource', () => {
  it('parses a script into a source node', () => {
    const tree = parseSource('extends Node\n\nvar speed = 10\n');
    expect(tree.rootNode.type).toBe('source');
    expect(tree.rootNode.namedChildren.map(n => n.type)).toEqual(['extends_statement', 'variable_statement']);
  });

  it('returns a best-effort tree for malformed input', () => {
    const tree = parseSource('func broken(:\n\tpass\n');
    expect(containsSyntaxError(tree.rootNode)).toBe(true);
  });

  it('reports no syntax error for valid input', () => {
    const tree = parseSource('func ok():\n\tpass\n');
    expect(containsSyntaxError(tree.rootNode)).toBe(false);
  });

  it('reuses a parser across calls', () => {
    const parser = createParser();
    const first = parseSource('var a = 1\n', undefined, parser);
    const second = parseSource('var b = 2\n', undefined, parser);
    expect(first.rootNode.text).toBe('var a = 1\n');
    expect(second.rootNode.text).toBe('var b = 2\n');
  });
});

describe('lazyQuery', () => {
  it('compiles once and returns the same query', () => {
    const getQuery = lazyQuery('(function_definition) @fn');
    expect(getQuery()).toBe(getQuery());
  });

  it('finds matches in a tree', () => {
    const getQuery = lazyQuery('(function_definition) @fn');
    const tree = parseSource('func a():\n\tpass\n\n\nfunc b():\n\tpass\n');
    expect(getQuery().matches(tree.rootNode)).toHaveLength(2);
  });
});

describe('nodesContaining', () => {
  it('lists containing nodes smallest first, ending at the root', () => {
    const tree = parseSource('var s = "abc"\n');
    const chain = nodesContaining(tree.rootNode, 10);
    expect(chain[chain.length - 1].type).toBe('source');
    expect(chain.some(node => node.type === 'string')).toBe(true);
  });

  it('returns nothing past the end of the text', () => {
    const tree = parseSource('var x = 1\n');
    expect(nodesContaining(tree.rootNode, 100)).toEqual([]);
  });
});

describe('pointAt', () => {
  it('counts rows and columns', () => {
    expect(pointAt('ab\ncd\nef', 0)).toEqual({ row: 0, column: 0 });
    expect(pointAt('ab\ncd\nef', 4)).toEqual({ row: 1, column: 1 });
    expect(pointAt('ab\ncd\nef', 6)).toEqual({ row: 2, column: 0 });
  });
});

describe('advancePoint', () => {
  it('moves columns on plain text', () => {
    expect(advancePoint({ row: 2, column: 3 }, 'abc')).toEqual({ row: 2, column: 6 });
  });

  it('resets the column after a newline', () => {
    expect(advancePoint({ row: 2, column: 3 }, 'a\nbc')).toEqual({ row: 3, column: 2 });
  });

  it('is the identity for empty text', () => {
    expect(advancePoint({ row: 1, column: 1 }, '')).toEqual({ row: 1, column: 1 });
  });
});
