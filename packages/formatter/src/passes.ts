/**
 * Regex passes run before and after the engine. Every pass goes through
 * SourceDocument.replaceMatches, so matches starting inside a string
 * literal are left alone and the tree stays current.
 */

import type { ReplacementRule, SourceDocument } from '@gdfmt/syntax';
import { ensureDeclarationSpacing } from './spacing';

export interface TextPass {
  name: string;
  pattern: RegExp;
  replacement: ReplacementRule;
  limit?: number;
  /** Skip the pass unless the text passes this check */
  appliesTo?: (text: string) => boolean;
}

/** Blank lines between the `extends` line and the first member. */
export const EXTENDS_BLANK_LINES: TextPass = {
  name: 'extends-blank-lines',
  pattern: /^([^#\n]*extends )([A-Za-z0-9_.]+|"[^"\n]*")(\r?\n)(?:\r?\n)+/gm,
  replacement: '$1$2$3',
  limit: 1,
};

export const WHITESPACE_ONLY_LINES: TextPass = {
  name: 'whitespace-only-lines',
  pattern: /^[ \t]+(?=\r?$)/gm,
  replacement: '',
};

export const DANGLING_SEMICOLONS: TextPass = {
  name: 'dangling-semicolons',
  pattern: /(\s*;)+(?=\r?$)/gm,
  replacement: '',
  appliesTo: text => text.includes(';'),
};

/** Three or more consecutive blank lines become two, in the run's own line ending. */
export const EXCESS_BLANK_LINES: TextPass = {
  name: 'excess-blank-lines',
  pattern: /(\r?\n){4,}/g,
  replacement: '$1$1$1',
};

export const PREPROCESS_PASSES: readonly TextPass[] = [EXTENDS_BLANK_LINES];

export const POSTPROCESS_PASSES: readonly TextPass[] = [
  WHITESPACE_ONLY_LINES,
  DANGLING_SEMICOLONS,
  EXCESS_BLANK_LINES,
];

export function runPass(document: SourceDocument, pass: TextPass): number {
  if (pass.appliesTo && !pass.appliesTo(document.text)) return 0;
  return document.replaceMatches(pass.pattern, pass.replacement, { limit: pass.limit }).length;
}

export function preprocess(document: SourceDocument): void {
  for (const pass of PREPROCESS_PASSES) {
    runPass(document, pass);
  }
}

/**
 * Cleanup passes, then structural spacing on the cleaned text.
 */
export function postprocess(document: SourceDocument): void {
  for (const pass of POSTPROCESS_PASSES) {
    runPass(document, pass);
  }
  ensureDeclarationSpacing(document);
}
