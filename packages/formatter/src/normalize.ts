/**
 * Normalization rules for safe mode.
 *
 * Some structure changes are intended: the pipeline drops dangling
 * semicolons, and an engine may pull a standalone annotation onto the
 * variable it decorates. Each such change is a named rule that rewrites the
 * input fingerprint into the shape the output is expected to have. Rules
 * are pure and leave their argument untouched.
 *
 * The registry is versioned; bump NORMALIZATION_RULESET_VERSION whenever a
 * rule is added or its behavior changes.
 */

import { parseSource } from '@gdfmt/syntax';
import type { Fingerprint } from '@gdfmt/types';
import { buildFingerprint } from './fingerprint';

export const NORMALIZATION_RULESET_VERSION = 1;

export const TRAILING_SEMICOLONS = 'trailing-semicolons';
export const INLINE_VARIABLE_ANNOTATIONS = 'inline-variable-annotations';

export interface NormalizationRule {
  id: string;
  /** Ruleset version that introduced the rule */
  since: number;
  description: string;
  apply(fingerprint: Fingerprint, source: string): Fingerprint;
}

const rules = new Map<string, NormalizationRule>();

export function registerNormalizationRule(rule: NormalizationRule): void {
  if (rules.has(rule.id)) {
    throw new Error(`Normalization rule "${rule.id}" is already registered`);
  }
  rules.set(rule.id, rule);
}

export function getNormalizationRule(id: string): NormalizationRule | undefined {
  return rules.get(id);
}

export function listNormalizationRules(): NormalizationRule[] {
  return [...rules.values()];
}

/**
 * Apply the named rules in registry order. `source` is the text the
 * fingerprint was built from.
 */
export function normalizeFingerprint(
  fingerprint: Fingerprint,
  source: string,
  ruleIds: readonly string[],
): Fingerprint {
  const requested = new Set(ruleIds);
  for (const id of requested) {
    if (!rules.has(id)) {
      const known = [...rules.keys()].join(', ');
      throw new Error(`Unknown normalization rule "${id}" (known: ${known})`);
    }
  }

  let result = fingerprint;
  for (const rule of rules.values()) {
    if (requested.has(rule.id)) {
      result = rule.apply(result, source);
    }
  }
  return result;
}

/**
 * Rebuild the tree bottom-up, letting `transform` rewrite each child list.
 */
function rewriteChildren(
  fingerprint: Fingerprint,
  transform: (children: Fingerprint[]) => Fingerprint[],
): Fingerprint {
  const children = transform(fingerprint.children.map(child => rewriteChildren(child, transform)));
  return { ...fingerprint, children };
}

// ============================================================================
// trailing-semicolons
// ============================================================================

const LINE_TERMINATOR = /[\n\r\u2028\u2029]/;
const SEMICOLON_TAIL = /^(\s*;)*$/;

/** True when only whitespace and semicolons follow `index` on its line. */
function isSemicolonTail(source: string, index: number): boolean {
  const rest = source.slice(index);
  const terminator = rest.search(LINE_TERMINATOR);
  const line = terminator === -1 ? rest : rest.slice(0, terminator);
  return SEMICOLON_TAIL.test(line);
}

registerNormalizationRule({
  id: TRAILING_SEMICOLONS,
  since: 1,
  description: 'Drop semicolon tokens that end a line; the postprocess pass deletes them',
  apply: (fingerprint, source) =>
    rewriteChildren(fingerprint, children =>
      children.filter(child => !(child.kind === ';' && !child.named && isSemicolonTail(source, child.endIndex))),
    ),
});

// ============================================================================
// inline-variable-annotations
// ============================================================================

interface AnnotationShape {
  /** Wrapper node the grammar puts around inline annotations, if any */
  wrapper: Pick<Fingerprint, 'grammarId' | 'kind' | 'named'> | null;
}

let inlineShape: AnnotationShape | null | undefined;

/**
 * Learn from the grammar where an inline annotation lives inside a
 * variable statement. Null when the grammar keeps it outside.
 */
function getInlineShape(): AnnotationShape | null {
  if (inlineShape !== undefined) return inlineShape;

  const probe = buildFingerprint(parseSource('@export var x = 1\n').rootNode);
  const statement = findFirst(probe, node => node.kind === 'variable_statement');
  const first = statement?.children[0];

  if (!first) {
    inlineShape = null;
  } else if (first.kind === 'annotation') {
    inlineShape = { wrapper: null };
  } else if (first.children.some(child => child.kind === 'annotation')) {
    inlineShape = { wrapper: { grammarId: first.grammarId, kind: first.kind, named: first.named } };
  } else {
    inlineShape = null;
  }
  return inlineShape;
}

function findFirst(root: Fingerprint, predicate: (node: Fingerprint) => boolean): Fingerprint | undefined {
  if (predicate(root)) return root;
  for (const child of root.children) {
    const found = findFirst(child, predicate);
    if (found) return found;
  }
  return undefined;
}

function isAnnotation(node: Fingerprint): boolean {
  return node.kind === 'annotation' && node.named;
}

/**
 * Move the annotations standing on the lines directly above a variable
 * statement into that statement.
 */
function inlineAnnotations(children: Fingerprint[], shape: AnnotationShape): Fingerprint[] {
  const result: Fingerprint[] = [];
  let index = 0;

  while (index < children.length) {
    const child = children[index];
    if (!isAnnotation(child)) {
      result.push(child);
      index++;
      continue;
    }

    let end = index;
    while (end < children.length && isAnnotation(children[end])) end++;
    const run = children.slice(index, end);
    const target = children[end];

    // Only the row-contiguous tail of the run that touches the variable moves
    let split = run.length;
    if (target && target.kind === 'variable_statement') {
      let expectedRow = target.row;
      while (split > 0 && run[split - 1].endRow + 1 === expectedRow) {
        split--;
        expectedRow = run[split].row;
      }
    }

    result.push(...run.slice(0, split));
    if (split < run.length && target) {
      result.push(attachAnnotations(target, run.slice(split), shape));
      index = end + 1;
    } else {
      index = end;
    }
  }

  return result;
}

function attachAnnotations(statement: Fingerprint, annotations: Fingerprint[], shape: AnnotationShape): Fingerprint {
  if (shape.wrapper === null) {
    return { ...statement, children: [...annotations, ...statement.children] };
  }

  const [first, ...rest] = statement.children;
  if (first && first.grammarId === shape.wrapper.grammarId) {
    const merged: Fingerprint = { ...first, children: [...annotations, ...first.children] };
    return { ...statement, children: [merged, ...rest] };
  }

  const last = annotations[annotations.length - 1];
  const wrapper: Fingerprint = {
    ...shape.wrapper,
    startIndex: annotations[0].startIndex,
    endIndex: last.endIndex,
    row: annotations[0].row,
    endRow: last.endRow,
    children: annotations,
  };
  return { ...statement, children: [wrapper, ...statement.children] };
}

registerNormalizationRule({
  id: INLINE_VARIABLE_ANNOTATIONS,
  since: 1,
  description: 'Treat annotations on the lines above a variable as written inline with it',
  apply: fingerprint => {
    const shape = getInlineShape();
    if (shape === null) return fingerprint;
    return rewriteChildren(fingerprint, children => inlineAnnotations(children, shape));
  },
});
