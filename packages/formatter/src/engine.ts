/**
 * Pretty-printing engines.
 *
 * The engine is the black box between preprocessing and postprocessing:
 * it receives the current tree, text, ruleset and indentation policy and
 * returns raw bytes. Decoding is the pipeline's job, so an engine that
 * emits broken UTF-8 surfaces as an EncodingError rather than mojibake.
 */

import { execFileSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { EngineError } from '@gdfmt/core';
import type { SyntaxTree } from '@gdfmt/syntax';
import type { IndentPolicy } from '@gdfmt/types';
import { INLINE_VARIABLE_ANNOTATIONS } from './normalize';

export interface EngineInput {
  tree: SyntaxTree;
  source: string;
  /** Ruleset identifier, e.g. a Topiary query file; null for the engine default */
  ruleset: string | null;
  indent: IndentPolicy;
}

export interface PrettyPrinter {
  readonly name: string;
  /** Normalization rule ids describing structure changes this engine makes on purpose */
  readonly normalizations: readonly string[];
  format(input: EngineInput): Uint8Array;
}

export function indentUnit(indent: IndentPolicy): string {
  return indent.style === 'tabs' ? '\t' : ' '.repeat(indent.size);
}

// ============================================================================
// Passthrough
// ============================================================================

/**
 * Returns the input unchanged, leaving all work to the pre- and
 * postprocessing passes.
 */
export class PassthroughEngine implements PrettyPrinter {
  readonly name = 'none';
  readonly normalizations: readonly string[] = [];

  format(input: EngineInput): Uint8Array {
    return Buffer.from(input.source, 'utf-8');
  }
}

// ============================================================================
// Topiary
// ============================================================================

export interface TopiaryEngineOptions {
  /** Executable name or path (default: topiary) */
  command?: string;
  /** Nickel configuration declaring the gdscript language and grammar */
  configurationPath?: string | null;
  normalizations?: readonly string[];
}

const TOPIARY_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs the `topiary` CLI on stdin. Indentation is passed through a
 * generated Nickel configuration that overrides the gdscript indent.
 */
export class TopiaryEngine implements PrettyPrinter {
  readonly name = 'topiary';
  readonly normalizations: readonly string[];
  private readonly command: string;
  private readonly configurationPath: string | null;

  constructor(options: TopiaryEngineOptions = {}) {
    this.command = options.command ?? 'topiary';
    this.configurationPath = options.configurationPath ?? null;
    this.normalizations = options.normalizations ?? [INLINE_VARIABLE_ANNOTATIONS];
  }

  format(input: EngineInput): Uint8Array {
    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gdfmt-topiary-'));
    try {
      const configFile = path.join(workDir, 'languages.ncl');
      fs.writeFileSync(configFile, buildTopiaryConfiguration(input.indent, this.configurationPath));

      return execFileSync(this.command, buildTopiaryArgs(configFile, input.ruleset), {
        input: input.source,
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: TOPIARY_MAX_BUFFER,
      });
    } catch (err: unknown) {
      throw new EngineError(getProcessErrorMessage(err), this.name);
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }
}

export function buildTopiaryArgs(configFile: string, ruleset: string | null): string[] {
  const args = [
    'format',
    '--configuration', configFile,
    '--language', 'gdscript',
    '--tolerate-parsing-errors',
    '--skip-idempotence',
  ];
  if (ruleset) {
    args.push('--query', ruleset);
  }
  return args;
}

/**
 * Nickel source that sets the gdscript indent, on top of the user's own
 * configuration when one is given.
 */
export function buildTopiaryConfiguration(indent: IndentPolicy, configurationPath: string | null): string {
  const override = `{ languages.gdscript.indent | force = ${nickelString(indentUnit(indent))} }`;
  if (!configurationPath) {
    return `${override}\n`;
  }
  return `(import ${nickelString(path.resolve(configurationPath))}) & ${override}\n`;
}

function nickelString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\t/g, '\\t')
    .replace(/%/g, '\\%');
  return `"${escaped}"`;
}

/** Extract a human-readable message from a child-process error. */
export function getProcessErrorMessage(error: unknown): string {
  const fallback = 'Unknown engine failure.';
  if (!(error instanceof Error)) return fallback;

  const stderr = 'stderr' in error ? error.stderr : undefined;
  if (typeof stderr === 'string' || Buffer.isBuffer(stderr)) {
    const text = stderr.toString().trim();
    if (text.length > 0) {
      return text;
    }
  }

  return error.message.trim() || fallback;
}
