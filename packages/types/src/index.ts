/**
 * @gdfmt/types: Shared type definitions for gdfmt
 *
 * The vocabulary every package agrees on: formatter configuration,
 * indentation policy, structural fingerprints and pipeline warnings.
 */

// ============================================================================
// Configuration
// ============================================================================

export type IndentStyle = 'tabs' | 'spaces';

export interface IndentPolicy {
  style: IndentStyle;
  /** Number of spaces per level; ignored for tabs */
  size: number;
}

export interface FormatterConfig {
  indentStyle: IndentStyle;
  indentSize: number;
  /** Sort top-level declarations per the GDScript style guide */
  reorder: boolean;
  /** Verify that the output parses to the same structure as the input */
  safe: boolean;
}

export type EngineKind = 'topiary' | 'none';

export interface EngineConfig {
  kind: EngineKind;
  /** Executable used for the topiary engine */
  command: string;
  /** Topiary query file for GDScript */
  queryPath: string | null;
  /** User Nickel configuration merged under the generated indent settings */
  configurationPath: string | null;
  /** Normalization rule ids to apply before safe-mode comparison; null keeps the engine default */
  normalizations: string[] | null;
}

// ============================================================================
// Structure
// ============================================================================

/**
 * Reduced syntax tree used by safe mode. Only `grammarId` and the child
 * shape are compared; the rest serves diagnostics and normalization rules.
 */
export interface Fingerprint {
  grammarId: number;
  kind: string;
  named: boolean;
  startIndex: number;
  endIndex: number;
  row: number;
  endRow: number;
  children: Fingerprint[];
  text?: string;
}

export type MismatchReason = 'child-count' | 'grammar-id' | 'leaf-text';

export interface FingerprintMismatch {
  reason: MismatchReason;
  expectedKind: string;
  actualKind: string;
  /** Zero-based row of the node in the original input */
  expectedRow: number;
  /** Zero-based row of the node in the formatted output */
  actualRow: number;
  detail: string;
}

export type ComparisonResult =
  | { equivalent: true }
  | { equivalent: false; mismatch: FingerprintMismatch };

// ============================================================================
// Pipeline results
// ============================================================================

export type FormatStage = 'preprocess' | 'engine' | 'decode' | 'postprocess' | 'reorder' | 'verify';

export interface ReorderWarning {
  type: 'reorder';
  message: string;
}

export interface FormatReport {
  output: string;
  changed: boolean;
  warnings: ReorderWarning[];
}
