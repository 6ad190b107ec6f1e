/**
 * Declaration Classification
 *
 * Maps a top-level node to its place in the GDScript style guide's order:
 * header, signals, enums, constants, variables by flavor, methods by type,
 * inner classes. Names come from the grammar's `name` field when present,
 * otherwise from the declaration text.
 */

import type { SyntaxNode } from '@gdfmt/syntax';

// ============================================================================
// Types
// ============================================================================

export type DeclarationKind =
  | 'classAnnotation'
  | 'className'
  | 'extends'
  | 'docstring'
  | 'signal'
  | 'enum'
  | 'constant'
  | 'staticVariable'
  | 'exportVariable'
  | 'regularVariable'
  | 'onreadyVariable'
  | 'method'
  | 'innerClass'
  | 'unknown';

/** Method types, in the order they are emitted. */
export type MethodType = 'staticInit' | 'staticFunction' | 'builtinVirtual' | 'custom';

export type Classification =
  | {
      kind: 'method';
      name: string;
      isPrivate: boolean;
      methodType: MethodType;
      /** 1-based position in BUILTIN_VIRTUAL_METHODS; 0 for other methods */
      builtinRank: number;
    }
  | {
      kind: Exclude<DeclarationKind, 'method'>;
      name: string;
      isPrivate: boolean;
    };

/** Spacing groups used when the declarations are written back out. */
export type DeclarationGroup =
  | 'header'
  | 'signal'
  | 'enum'
  | 'constant'
  | 'staticVariable'
  | 'exportVariable'
  | 'regularVariable'
  | 'onreadyVariable'
  | 'method'
  | 'innerClass';

// ============================================================================
// Ordering tables
// ============================================================================

/** Engine callbacks, in the order they should appear. */
export const BUILTIN_VIRTUAL_METHODS: readonly string[] = [
  '_init',
  '_enter_tree',
  '_ready',
  '_process',
  '_physics_process',
  '_exit_tree',
  '_input',
  '_unhandled_input',
  '_gui_input',
  '_draw',
  '_notification',
  '_get_configuration_warnings',
  '_validate_property',
  '_get_property_list',
  '_property_can_revert',
  '_property_get_revert',
  '_get',
  '_set',
  '_to_string',
];

const KIND_PRIORITY: Record<Exclude<DeclarationKind, 'method'>, number> = {
  classAnnotation: 1,
  className: 2,
  extends: 3,
  docstring: 4,
  signal: 5,
  enum: 6,
  constant: 7,
  staticVariable: 8,
  exportVariable: 9,
  regularVariable: 10,
  onreadyVariable: 11,
  innerClass: 16,
  unknown: 255,
};

const METHOD_PRIORITY: Record<MethodType, number> = {
  staticInit: 12,
  staticFunction: 13,
  builtinVirtual: 14,
  custom: 15,
};

const METHOD_TYPE_ORDER: readonly MethodType[] = ['staticInit', 'staticFunction', 'builtinVirtual', 'custom'];

const CLASS_ANNOTATIONS = ['@tool', '@icon', '@static_unload'];

/** Lower sorts first. */
export function getPriority(classification: Classification): number {
  if (classification.kind === 'method') {
    return METHOD_PRIORITY[classification.methodType];
  }
  return KIND_PRIORITY[classification.kind];
}

export function methodTypeRank(type: MethodType): number {
  return METHOD_TYPE_ORDER.indexOf(type);
}

export function getGroup(classification: Classification): DeclarationGroup {
  switch (classification.kind) {
    case 'classAnnotation':
    case 'className':
    case 'extends':
    case 'docstring':
      return 'header';
    case 'method':
    case 'unknown':
      return 'method';
    default:
      return classification.kind;
  }
}

/** `@tool` first, then `@icon`, then any other class annotation. */
export function classAnnotationRank(text: string): number {
  if (text.startsWith('@tool')) return 0;
  if (text.startsWith('@icon')) return 1;
  return 2;
}

export function getBuiltinVirtualRank(name: string): number {
  return BUILTIN_VIRTUAL_METHODS.indexOf(name) + 1;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify a top-level node. `annotations` are the standalone annotation
 * lines directly preceding it; they decide a variable's flavor just like
 * inline ones. Returns null for nodes that only attach to a declaration
 * (comments and member annotations).
 */
export function classifyNode(node: SyntaxNode, annotations: readonly string[] = []): Classification | null {
  const text = node.text;

  switch (node.type) {
    case 'annotation':
      return CLASS_ANNOTATIONS.some(prefix => text.startsWith(prefix))
        ? { kind: 'classAnnotation', name: text, isPrivate: false }
        : null;
    case 'comment':
    case 'region_start':
    case 'region_end':
      return null;
    case 'class_name_statement':
      return { kind: 'className', name: text.split('extends')[0].trim(), isPrivate: false };
    case 'extends_statement':
      return { kind: 'extends', name: text, isPrivate: false };
    case 'signal_statement':
      return named('signal', extractName(node, 'signal', /[(:\s]/, 'unknown_signal'));
    case 'enum_definition':
      return named('enum', extractName(node, 'enum', /[{\s]/, 'unnamed_enum'));
    case 'const_statement':
      return named('constant', extractName(node, 'const', /[=:\s]/, 'unknown_const'));
    case 'variable_statement':
      return classifyVariable(node, annotations);
    case 'function_definition':
    case 'constructor_definition':
      return classifyMethod(node);
    case 'class_definition':
      return named('innerClass', extractName(node, 'class', /[:\s]/, 'unknown_class'));
    default:
      return { kind: 'unknown', name: text, isPrivate: false };
  }
}

function named(kind: Exclude<DeclarationKind, 'method'>, name: string): Classification {
  return { kind, name, isPrivate: name.startsWith('_') };
}

function classifyVariable(node: SyntaxNode, annotations: readonly string[]): Classification {
  const name = extractName(node, 'var', /[:=\s]/, 'unknown_var');
  const decorators = [...inlineAnnotations(node), ...annotations];
  const hasAnnotation = (prefix: string) => decorators.some(text => text.startsWith(prefix));

  if (hasAnnotation('@export')) return named('exportVariable', name);
  if (hasAnnotation('@onready')) return named('onreadyVariable', name);
  if (/\bstatic\s*$/.test(declarationHead(node, 'var'))) return named('staticVariable', name);
  return named('regularVariable', name);
}

/**
 * Annotations written on the declaration's own line. The grammar nests them
 * directly or under a wrapper node; without either, the text ahead of the
 * keyword stands in.
 */
function inlineAnnotations(node: SyntaxNode): string[] {
  const found: string[] = [];
  for (const child of node.namedChildren) {
    if (child.type === 'annotation') {
      found.push(child.text);
    } else if (child.namedChildren.some(inner => inner.type === 'annotation')) {
      found.push(...child.namedChildren.filter(inner => inner.type === 'annotation').map(inner => inner.text));
    }
  }
  if (found.length > 0) return found;

  const head = declarationHead(node, 'var').trim();
  return head.startsWith('@') ? [head] : [];
}

/** Declaration text ahead of the first `keyword`, where modifiers live. */
function declarationHead(node: SyntaxNode, keyword: string): string {
  const start = node.text.search(new RegExp(`\\b${keyword}\\b`));
  return start === -1 ? '' : node.text.slice(0, start);
}

function classifyMethod(node: SyntaxNode): Classification {
  const name = node.type === 'constructor_definition'
    ? '_init'
    : extractName(node, 'func', /\(/, 'unknown_func');
  const builtinRank = getBuiltinVirtualRank(name);

  let methodType: MethodType = 'custom';
  if (name === '_static_init') {
    methodType = 'staticInit';
  } else if (/\bstatic\s*$/.test(declarationHead(node, 'func'))) {
    methodType = 'staticFunction';
  } else if (builtinRank > 0) {
    methodType = 'builtinVirtual';
  }

  return {
    kind: 'method',
    name,
    isPrivate: name.startsWith('_'),
    methodType,
    builtinRank: methodType === 'builtinVirtual' ? builtinRank : 0,
  };
}

/**
 * Name from the `name` field, or the word after `keyword` up to the first
 * `terminator` character.
 */
function extractName(node: SyntaxNode, keyword: string, terminator: RegExp, fallback: string): string {
  const field = node.childForFieldName('name');
  if (field && field.text.length > 0) {
    return field.text;
  }

  const text = node.text;
  const start = text.search(new RegExp(`\\b${keyword}\\s`));
  if (start === -1) return fallback;

  const rest = text.slice(start + keyword.length).trimStart();
  const end = rest.search(terminator);
  const name = (end === -1 ? rest : rest.slice(0, end)).trim();
  return name.length > 0 ? name : fallback;
}
