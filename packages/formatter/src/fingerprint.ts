/**
 * Structural fingerprints for safe mode.
 *
 * A fingerprint is the syntax tree reduced to grammar ids and child shape.
 * Two fingerprints are equivalent when every level has the same number of
 * children and every position carries the same grammar id.
 */

import type { SyntaxNode } from '@gdfmt/syntax';
import type { ComparisonResult, Fingerprint, FingerprintMismatch, MismatchReason } from '@gdfmt/types';

export interface FingerprintOptions {
  /** Keep the text of leaf nodes and compare it as well */
  includeLeafText?: boolean;
}

export function buildFingerprint(node: SyntaxNode, options: FingerprintOptions = {}): Fingerprint {
  const children = node.children.map(child => buildFingerprint(child, options));
  const fingerprint: Fingerprint = {
    grammarId: node.grammarId,
    kind: node.type,
    named: node.isNamed,
    startIndex: node.startIndex,
    endIndex: node.endIndex,
    row: node.startPosition.row,
    endRow: node.endPosition.row,
    children,
  };
  if (options.includeLeafText && children.length === 0) {
    fingerprint.text = node.text;
  }
  return fingerprint;
}

/**
 * Walk both fingerprints depth-first and stop at the first difference.
 */
export function compareFingerprints(expected: Fingerprint, actual: Fingerprint): ComparisonResult {
  if (expected.grammarId !== actual.grammarId) {
    return mismatch('grammar-id', expected, actual);
  }

  const stack: Array<[Fingerprint, Fingerprint]> = [[expected, actual]];
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [left, right] = next;

    if (left.children.length !== right.children.length) {
      return mismatch('child-count', left, right);
    }

    for (let i = 0; i < left.children.length; i++) {
      const leftChild = left.children[i];
      const rightChild = right.children[i];
      if (leftChild.grammarId !== rightChild.grammarId) {
        return mismatch('grammar-id', leftChild, rightChild);
      }
      if (leftChild.text !== undefined && rightChild.text !== undefined && leftChild.text !== rightChild.text) {
        return mismatch('leaf-text', leftChild, rightChild);
      }
      stack.push([leftChild, rightChild]);
    }
  }

  return { equivalent: true };
}

function mismatch(reason: MismatchReason, expected: Fingerprint, actual: Fingerprint): ComparisonResult {
  const result: FingerprintMismatch = {
    reason,
    expectedKind: expected.kind,
    actualKind: actual.kind,
    expectedRow: expected.row,
    actualRow: actual.row,
    detail: describeMismatch(reason, expected, actual),
  };
  return { equivalent: false, mismatch: result };
}

function describeMismatch(reason: MismatchReason, expected: Fingerprint, actual: Fingerprint): string {
  switch (reason) {
    case 'child-count':
      return `${expected.children.length} children expected, ${actual.children.length} found`;
    case 'grammar-id':
      return `grammar id ${expected.grammarId} expected, ${actual.grammarId} found`;
    case 'leaf-text':
      return `text ${JSON.stringify(expected.text)} expected, ${JSON.stringify(actual.text)} found`;
  }
}
