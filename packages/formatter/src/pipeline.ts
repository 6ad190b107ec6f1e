/**
 * Pipeline orchestrator.
 *
 * One SourceDocument per call carries the text through preprocessing, the
 * engine, postprocessing, optional reordering and optional verification.
 * Nothing here touches the file system; errors propagate as FormatError
 * subclasses and reorder failures come back as warnings.
 */

import {
  EncodingError,
  EngineError,
  FormatError,
  FormatterConfigSchema,
  StructureChangedError,
  describeError,
} from '@gdfmt/core';
import { reorderDeclarations } from '@gdfmt/reorder';
import { SourceDocument } from '@gdfmt/syntax';
import type { Fingerprint, FormatReport, FormatterConfig, ReorderWarning } from '@gdfmt/types';
import { PassthroughEngine } from './engine';
import type { EngineInput, PrettyPrinter } from './engine';
import { buildFingerprint, compareFingerprints } from './fingerprint';
import { TRAILING_SEMICOLONS, normalizeFingerprint } from './normalize';
import { postprocess, preprocess } from './passes';

export type Reorderer = (source: string) => string;

export interface FormatOptions {
  config?: Partial<FormatterConfig>;
  /** Defaults to the passthrough engine */
  engine?: PrettyPrinter;
  /** Ruleset handed to the engine, e.g. a Topiary query file */
  ruleset?: string | null;
  /** Defaults to the style-guide reorderer */
  reorderer?: Reorderer;
  /** Replaces the engine's own normalization rules in safe mode */
  normalizations?: readonly string[];
}

/** Rules every safe-mode run applies, whatever the engine. */
const PIPELINE_NORMALIZATIONS: readonly string[] = [TRAILING_SEMICOLONS];

/**
 * Format GDScript source. Reorder warnings go to stderr.
 */
export function formatGdscript(source: string, options: FormatOptions = {}): string {
  const report = formatGdscriptWithReport(source, options);
  for (const warning of report.warnings) {
    console.warn(`  [warn] ${warning.message}`);
  }
  return report.output;
}

export function formatGdscriptWithReport(source: string, options: FormatOptions = {}): FormatReport {
  const config = FormatterConfigSchema.parse(options.config ?? {});
  const engine = options.engine ?? new PassthroughEngine();
  const document = new SourceDocument(source);
  const warnings: ReorderWarning[] = [];

  const expected = config.safe
    ? normalizeFingerprint(
        buildFingerprint(document.root),
        source,
        [...PIPELINE_NORMALIZATIONS, ...(options.normalizations ?? engine.normalizations)],
      )
    : null;

  preprocess(document);

  const bytes = runEngine(engine, {
    tree: document.tree,
    source: document.text,
    ruleset: options.ruleset ?? null,
    indent: { style: config.indentStyle, size: config.indentSize },
  });
  document.reset(decodeUtf8(bytes));

  postprocess(document);

  if (config.reorder) {
    const reorderer = options.reorderer ?? reorderDeclarations;
    try {
      document.reset(reorderer(document.text));
    } catch (err: unknown) {
      warnings.push({
        type: 'reorder',
        message: `Code reordering failed: ${describeError(err)}. Returning formatted code without reordering.`,
      });
    }
  }

  if (expected) {
    verifyStructure(expected, document);
  }

  const output = document.text;
  return { output, changed: output !== source, warnings };
}

function runEngine(engine: PrettyPrinter, input: EngineInput): Uint8Array {
  try {
    return engine.format(input);
  } catch (err: unknown) {
    if (err instanceof FormatError) throw err;
    throw new EngineError(describeError(err), engine.name);
  }
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err: unknown) {
    throw new EncodingError(`engine output is not valid UTF-8 (${describeError(err)})`);
  }
}

function verifyStructure(expected: Fingerprint, document: SourceDocument): void {
  document.sync();
  const result = compareFingerprints(expected, buildFingerprint(document.root));
  if (!result.equivalent) {
    throw new StructureChangedError(result.mismatch);
  }
}
