/**
 * gdfmt error types.
 *
 * One base class for every failure that aborts formatting a file, with a
 * subclass per stage that can fail. Reorder problems are not errors here:
 * the pipeline downgrades them to warnings.
 */

import type { FingerprintMismatch, FormatStage } from '@gdfmt/types';

export class FormatError extends Error {
  public readonly stage: FormatStage;

  constructor(message: string, stage: FormatStage) {
    super(message);
    this.name = 'FormatError';
    this.stage = stage;
  }
}

/** The pretty-printing engine rejected the input or failed to run. */
export class EngineError extends FormatError {
  public readonly engine: string;

  constructor(message: string, engine: string) {
    super(`Engine error (${engine}): ${message}`, 'engine');
    this.name = 'EngineError';
    this.engine = engine;
  }
}

/** The engine produced bytes that are not valid UTF-8. */
export class EncodingError extends FormatError {
  constructor(message: string) {
    super(`Encoding error: ${message}`, 'decode');
    this.name = 'EncodingError';
  }
}

/** Safe mode found that the output no longer has the input's structure. */
export class StructureChangedError extends FormatError {
  public readonly mismatch: FingerprintMismatch;

  constructor(mismatch: FingerprintMismatch) {
    super(
      `Structure changed: expected ${mismatch.expectedKind} (input line ${mismatch.expectedRow + 1}), ` +
        `found ${mismatch.actualKind} (output line ${mismatch.actualRow + 1}): ${mismatch.detail}`,
      'verify'
    );
    this.name = 'StructureChangedError';
    this.mismatch = mismatch;
  }
}

export class ReorderError extends Error {
  public readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `Reorder error at line ${line}: ${message}` : `Reorder error: ${message}`);
    this.name = 'ReorderError';
    this.line = line;
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);
  return raw.trim().replace(/\s*\n\s*/g, ' ');
}
