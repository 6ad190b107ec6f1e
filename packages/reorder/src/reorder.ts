/**
 * Declaration reordering per the GDScript style guide.
 *
 * Top-level nodes are classified, comments and member annotations are
 * attached to the declaration that follows them, and the declarations are
 * sorted and written back with group spacing. Files that do not parse
 * cleanly are refused.
 */

import { ReorderError } from '@gdfmt/core';
import { containsSyntaxError, parseSource } from '@gdfmt/syntax';
import type { SyntaxNode } from '@gdfmt/syntax';
import {
  classAnnotationRank,
  classifyNode,
  getGroup,
  getPriority,
  methodTypeRank,
} from './classify';
import type { Classification, DeclarationGroup } from './classify';

export interface Declaration {
  classification: Classification;
  /** Comments and annotations that preceded the declaration */
  leading: string[];
  text: string;
  /** Comments moved along after the declaration, e.g. a closing #endregion */
  trailing: string[];
}

/**
 * Reorder the top-level declarations of `source`.
 */
export function reorderDeclarations(source: string): string {
  const tree = parseSource(source);
  const root = tree.rootNode;

  if (containsSyntaxError(root)) {
    const error = findErrorNode(root);
    throw new ReorderError('cannot reorder a file with syntax errors', error ? error.startPosition.row + 1 : undefined);
  }

  const declarations = collectDeclarations(root.namedChildren, source);
  return renderDeclarations(sortDeclarations(declarations));
}

// ============================================================================
// Collection
// ============================================================================

function isComment(node: SyntaxNode): boolean {
  return node.type === 'comment' || node.type === 'region_start' || node.type === 'region_end';
}

function isRegionStart(text: string): boolean {
  return text.trimStart().startsWith('#region');
}

function isRegionEnd(node: SyntaxNode): boolean {
  return node.type === 'region_end' || (node.type === 'comment' && node.text.trimStart().startsWith('#endregion'));
}

/**
 * `##` comments above the first declaration, ignoring the header lines
 * (`class_name`, `extends` and annotations) in between.
 */
function findClassDocstring(nodes: readonly SyntaxNode[]): Set<SyntaxNode> {
  const docstring = new Set<SyntaxNode>();
  for (const node of nodes) {
    if (node.type === 'comment') {
      if (node.text.trimStart().startsWith('##')) docstring.add(node);
      continue;
    }
    if (node.type === 'class_name_statement' || node.type === 'extends_statement' || node.type === 'annotation') {
      continue;
    }
    break;
  }
  return docstring;
}

export function collectDeclarations(nodes: readonly SyntaxNode[], source: string): Declaration[] {
  const docstringNodes = findClassDocstring(nodes);
  const docstringText = [...docstringNodes].map(node => node.text).join('\n');
  let docstringPlaced = docstringNodes.size === 0;

  const declarations: Declaration[] = [];
  let pending: SyntaxNode[] = [];
  let regionEnd: string | null = null;
  let previous: { declaration: Declaration; node: SyntaxNode } | null = null;

  const placeDocstring = (): void => {
    if (docstringPlaced) return;
    declarations.push({
      classification: { kind: 'docstring', name: docstringText, isPrivate: false },
      leading: [],
      text: docstringText,
      trailing: [],
    });
    docstringPlaced = true;
  };

  for (const node of nodes) {
    if (docstringNodes.has(node)) continue;

    // A comment on the same line as the previous declaration stays with it
    if (
      node.type === 'comment' &&
      previous &&
      previous.node.endPosition.column > 0 &&
      node.startPosition.row === previous.node.endPosition.row
    ) {
      previous.declaration.text = source.slice(previous.node.startIndex, node.endIndex);
      continue;
    }

    if (isRegionEnd(node)) {
      regionEnd = node.text;
      continue;
    }

    if (isComment(node)) {
      pending.push(node);
      continue;
    }

    const annotations = pending.filter(p => p.type === 'annotation').map(p => p.text);
    const classification = classifyNode(node, annotations);

    if (node.type === 'annotation') {
      if (classification) {
        declarations.push({ classification, leading: [], text: node.text, trailing: [] });
      } else {
        pending.push(node);
      }
      continue;
    }

    if (classification === null) {
      pending.push(node);
      continue;
    }

    if (classification.kind !== 'className' && classification.kind !== 'extends' && classification.kind !== 'unknown') {
      placeDocstring();
    }

    if (regionEnd !== null) {
      attachRegionEnd(declarations, regionEnd);
      regionEnd = null;
    }

    const declaration: Declaration = {
      classification,
      leading: pending.map(p => p.text),
      text: node.text,
      trailing: [],
    };
    declarations.push(declaration);
    pending = [];
    previous = { declaration, node };

    if (classification.kind === 'extends') {
      placeDocstring();
    }
  }

  placeDocstring();

  if (regionEnd !== null) {
    attachRegionEnd(declarations, regionEnd);
  }

  // Comments after the last declaration stay at the end of the file
  if (pending.length > 0) {
    const text = pending.map(p => p.text).join('\n');
    declarations.push({
      classification: { kind: 'unknown', name: text, isPrivate: false },
      leading: [],
      text,
      trailing: [],
    });
  }

  return declarations;
}

/** Attach `#endregion` to the latest method whose leading comments open a region. */
function attachRegionEnd(declarations: Declaration[], text: string): void {
  for (let i = declarations.length - 1; i >= 0; i--) {
    const declaration = declarations[i];
    if (declaration.classification.kind === 'method' && declaration.leading.some(isRegionStart)) {
      declaration.trailing.push(text);
      return;
    }
  }
  declarations.push({
    classification: { kind: 'unknown', name: text, isPrivate: false },
    leading: [],
    text,
    trailing: [],
  });
}

function findErrorNode(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR') return node;
  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) return found;
  }
  return null;
}

// ============================================================================
// Sorting
// ============================================================================

export function compareDeclarations(a: Classification, b: Classification): number {
  const byPriority = getPriority(a) - getPriority(b);
  if (byPriority !== 0) return byPriority;

  if (a.kind === 'method' && b.kind === 'method') {
    const byType = methodTypeRank(a.methodType) - methodTypeRank(b.methodType);
    if (byType !== 0) return byType;
    const byRank = a.builtinRank - b.builtinRank;
    if (byRank !== 0) return byRank;
  }

  const byPrivacy = Number(a.isPrivate) - Number(b.isPrivate);
  if (byPrivacy !== 0) return byPrivacy;

  if (a.kind === 'classAnnotation' && b.kind === 'classAnnotation') {
    return classAnnotationRank(a.name) - classAnnotationRank(b.name);
  }
  if (a.kind === 'unknown' || b.kind === 'unknown') return 0;

  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Stable sort, so equal declarations keep their source order. */
export function sortDeclarations(declarations: readonly Declaration[]): Declaration[] {
  return [...declarations].sort((a, b) => compareDeclarations(a.classification, b.classification));
}

// ============================================================================
// Rendering
// ============================================================================

function separatorBefore(current: Declaration, previousGroup: DeclarationGroup | null): string {
  if (previousGroup === null) return '';

  const group = getGroup(current.classification);
  const isMethod = current.classification.kind === 'method';
  const isInnerClass = current.classification.kind === 'innerClass';

  const needsSpacing = previousGroup !== group || isMethod || (isInnerClass && previousGroup === 'innerClass');
  if (!needsSpacing) return '';

  if (isMethod) return '\n\n';
  if (isInnerClass && (previousGroup === 'method' || previousGroup === 'innerClass')) return '\n\n';
  return '\n';
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export function renderDeclarations(declarations: readonly Declaration[]): string {
  let output = '';
  let previousGroup: DeclarationGroup | null = null;

  for (const declaration of declarations) {
    output += separatorBefore(declaration, previousGroup);
    for (const line of declaration.leading) output += withNewline(line);
    output += withNewline(declaration.text);
    for (const line of declaration.trailing) output += withNewline(line);
    previousGroup = getGroup(declaration.classification);
  }

  return output.length > 0 ? withNewline(output) : output;
}
