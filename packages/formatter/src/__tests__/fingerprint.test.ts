import { describe, it, expect } from 'vitest';
import { parseSource } from '@gdfmt/syntax';
import type { ComparisonResult } from '@gdfmt/types';
import { buildFingerprint, compareFingerprints } from '../fingerprint';
import type { FingerprintOptions } from '../fingerprint';
import {
  INLINE_VARIABLE_ANNOTATIONS,
  NORMALIZATION_RULESET_VERSION,
  TRAILING_SEMICOLONS,
  getNormalizationRule,
  listNormalizationRules,
  normalizeFingerprint,
} from '../normalize';

function fingerprint(source: string, options: FingerprintOptions = {}) {
  return buildFingerprint(parseSource(source).rootNode, options);
}

function compare(expected: string, actual: string, options: FingerprintOptions = {}): ComparisonResult {
  return compareFingerprints(fingerprint(expected, options), fingerprint(actual, options));
}

describe('buildFingerprint', () => {
  it('keeps anonymous children', () => {
    const fp = fingerprint('var a = 1\n');
    const statement = fp.children[0];
    expect(statement.kind).toBe('variable_statement');
    expect(statement.children.some(child => !child.named)).toBe(true);
  });

  it('records leaf text only when asked', () => {
    expect(fingerprint('var a = 1\n').children[0].children[0].text).toBeUndefined();
    expect(fingerprint('var a = 1\n', { includeLeafText: true }).children[0].children[0].text).toBe('var');
  });
});

describe('compareFingerprints', () => {
  it('treats whitespace changes as equivalent', () => {
    expect(compare('var a=1\n', 'var a = 1\n')).toEqual({ equivalent: true });
  });

  it('reports a changed child count', () => {
    const result = compare('var a = 1\n', 'var a = 1\nvar b = 2\n');
    expect(result.equivalent).toBe(false);
    if (!result.equivalent) {
      expect(result.mismatch.reason).toBe('child-count');
      expect(result.mismatch.expectedKind).toBe('source');
      expect(result.mismatch.detail).toMatch(/^\d+ children expected, \d+ found$/);
    }
  });

  it('reports a changed node kind', () => {
    const result = compare('var a = 1\n', 'const a = 1\n');
    expect(result.equivalent).toBe(false);
    if (!result.equivalent) {
      expect(result.mismatch.reason).toBe('grammar-id');
      expect(result.mismatch.expectedKind).toBe('variable_statement');
      expect(result.mismatch.actualKind).toBe('const_statement');
    }
  });

  it('compares leaf text when recorded', () => {
    expect(compare('var a = 1\n', 'var b = 1\n')).toEqual({ equivalent: true });
    const strict = compare('var a = 1\n', 'var b = 1\n', { includeLeafText: true });
    expect(strict.equivalent).toBe(false);
    if (!strict.equivalent) {
      expect(strict.mismatch.reason).toBe('leaf-text');
    }
  });
});

describe('normalizeFingerprint', () => {
  it('registers the built-in rules under the current version', () => {
    expect(NORMALIZATION_RULESET_VERSION).toBe(1);
    expect(listNormalizationRules().map(rule => rule.id)).toEqual([TRAILING_SEMICOLONS, INLINE_VARIABLE_ANNOTATIONS]);
    expect(getNormalizationRule(TRAILING_SEMICOLONS)?.since).toBe(1);
  });

  it('drops semicolons that end a line', () => {
    const source = 'var a = 1;\n';
    const normalized = normalizeFingerprint(fingerprint(source), source, [TRAILING_SEMICOLONS]);
    expect(compareFingerprints(normalized, fingerprint('var a = 1\n'))).toEqual({ equivalent: true });
  });

  it('keeps the input fingerprint unchanged', () => {
    const source = 'var a = 1;\n';
    const original = fingerprint(source);
    const before = JSON.stringify(original);
    normalizeFingerprint(original, source, [TRAILING_SEMICOLONS]);
    expect(JSON.stringify(original)).toBe(before);
  });

  it('treats an annotation above a variable as inline', () => {
    const source = '@export\nvar a = 1\n';
    const normalized = normalizeFingerprint(fingerprint(source), source, [INLINE_VARIABLE_ANNOTATIONS]);
    expect(compareFingerprints(normalized, fingerprint('@export var a = 1\n'))).toEqual({ equivalent: true });
  });

  it('throws on an unknown rule id', () => {
    const source = 'var a = 1\n';
    expect(() => normalizeFingerprint(fingerprint(source), source, ['no-such-rule'])).toThrow(
      'Unknown normalization rule "no-such-rule"'
    );
  });
});
