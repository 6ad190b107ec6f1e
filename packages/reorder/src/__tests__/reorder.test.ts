import { describe, it, expect } from 'vitest';
import { ReorderError } from '@gdfmt/core';
import { parseSource } from '@gdfmt/syntax';
import { classifyNode, compareDeclarations, reorderDeclarations } from '../index';
import type { Classification } from '../index';

function classifyFirst(source: string): Classification | null {
  return classifyNode(parseSource(source).rootNode.namedChildren[0]);
}

describe('classifyNode', () => {
  it('classifies class annotations', () => {
    expect(classifyFirst('@tool\n')).toEqual({ kind: 'classAnnotation', name: '@tool', isPrivate: false });
  });

  it('leaves member annotations unclassified', () => {
    expect(classifyFirst('@export\nvar a = 1\n')).toBeNull();
  });

  it('classifies signals and their privacy', () => {
    expect(classifyFirst('signal _hidden\n')).toEqual({ kind: 'signal', name: '_hidden', isPrivate: true });
  });

  it('classifies variables by flavor', () => {
    expect(classifyFirst('var speed = 10\n')?.kind).toBe('regularVariable');
    expect(classifyFirst('static var count = 0\n')?.kind).toBe('staticVariable');
    expect(classifyFirst('@onready var label = $Label\n')?.kind).toBe('onreadyVariable');
    expect(classifyFirst('@export var health = 3\n')?.kind).toBe('exportVariable');
  });

  it('ignores annotation and modifier text inside a variable value', () => {
    expect(classifyFirst('var tag = "@onready"\n')?.kind).toBe('regularVariable');
    expect(classifyFirst('var hint = "@export static var"\n')?.kind).toBe('regularVariable');
  });

  it('ignores modifier text inside a method body', () => {
    const method = classifyFirst('func describe():\n\treturn "static func"\n');
    expect(method?.kind === 'method' ? method.methodType : null).toBe('custom');
  });

  it('uses preceding annotations for a variable', () => {
    const node = parseSource('var health = 3\n').rootNode.namedChildren[0];
    expect(classifyNode(node, ['@export'])?.kind).toBe('exportVariable');
  });

  it('classifies methods by type', () => {
    expect(classifyFirst('func _ready():\n\tpass\n')).toEqual({
      kind: 'method',
      name: '_ready',
      isPrivate: true,
      methodType: 'builtinVirtual',
      builtinRank: 3,
    });
    expect(classifyFirst('static func make():\n\tpass\n')).toMatchObject({ methodType: 'staticFunction' });
    expect(classifyFirst('func _static_init():\n\tpass\n')).toMatchObject({ methodType: 'staticInit' });
    expect(classifyFirst('func jump():\n\tpass\n')).toMatchObject({ methodType: 'custom', builtinRank: 0 });
  });

  it('classifies constants and enums', () => {
    expect(classifyFirst('const MAX_SPEED = 10\n')).toEqual({ kind: 'constant', name: 'MAX_SPEED', isPrivate: false });
    expect(classifyFirst('enum State { IDLE, RUN }\n')).toEqual({ kind: 'enum', name: 'State', isPrivate: false });
  });

  it('classifies inner classes', () => {
    expect(classifyFirst('class Item:\n\tvar id = 0\n')).toEqual({ kind: 'innerClass', name: 'Item', isPrivate: false });
  });
});

describe('compareDeclarations', () => {
  const method = (name: string, methodType: 'builtinVirtual' | 'custom', builtinRank = 0): Classification => ({
    kind: 'method',
    name,
    isPrivate: name.startsWith('_'),
    methodType,
    builtinRank,
  });

  it('orders built-in virtual methods by their rank', () => {
    expect(compareDeclarations(method('_ready', 'builtinVirtual', 3), method('_init', 'builtinVirtual', 1))).toBeGreaterThan(0);
  });

  it('puts built-in virtual methods before custom ones', () => {
    expect(compareDeclarations(method('_ready', 'builtinVirtual', 3), method('attack', 'custom'))).toBeLessThan(0);
  });

  it('puts public members before pseudo-private ones', () => {
    expect(compareDeclarations(method('_helper', 'custom'), method('zap', 'custom'))).toBeGreaterThan(0);
  });

  it('sorts by name last', () => {
    expect(compareDeclarations(method('attack', 'custom'), method('block', 'custom'))).toBeLessThan(0);
  });

  it('puts @tool before @icon', () => {
    const icon: Classification = { kind: 'classAnnotation', name: '@icon("res://icon.svg")', isPrivate: false };
    const tool: Classification = { kind: 'classAnnotation', name: '@tool', isPrivate: false };
    expect(compareDeclarations(icon, tool)).toBeGreaterThan(0);
  });
});

describe('reorderDeclarations', () => {
  it('orders members per the style guide', () => {
    expect(reorderDeclarations('extends Node\n\nfunc _ready():\n\tpass\n\nvar speed = 10\n\nsignal died\n')).toBe(
      'extends Node\n\nsignal died\n\nvar speed = 10\n\n\nfunc _ready():\n\tpass\n'
    );
  });

  it('keeps variables of one group together without blank lines', () => {
    expect(reorderDeclarations('var b = 2\nvar a = 1\n')).toBe('var a = 1\nvar b = 2\n');
  });

  it('moves comments with the declaration they precede', () => {
    expect(reorderDeclarations('func jump():\n\tpass\n# Movement speed\nvar speed = 10\n')).toBe(
      '# Movement speed\nvar speed = 10\n\n\nfunc jump():\n\tpass\n'
    );
  });

  it('moves standalone annotations with their variable', () => {
    expect(reorderDeclarations('var a = 1\n@export\nvar b = 2\n')).toBe('@export\nvar b = 2\n\nvar a = 1\n');
  });

  it('places built-in callbacks before custom methods', () => {
    const source = 'func jump():\n\tpass\n\n\nfunc _process(delta):\n\tpass\n\n\nfunc _ready():\n\tpass\n';
    expect(reorderDeclarations(source)).toBe(
      'func _ready():\n\tpass\n\n\nfunc _process(delta):\n\tpass\n\n\nfunc jump():\n\tpass\n'
    );
  });

  it('keeps the class docstring after extends', () => {
    expect(reorderDeclarations('## A player.\nextends Node\nvar a = 1\n')).toBe(
      'extends Node\n## A player.\n\nvar a = 1\n'
    );
  });

  it('refuses files with syntax errors', () => {
    expect(() => reorderDeclarations('func broken(:\n\tpass\n')).toThrow(ReorderError);
  });
});
