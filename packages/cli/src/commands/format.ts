/**
 * gdfmt [files...]
 *
 * Formats GDScript files, or stdin when no file is given. Prints the result
 * by default; --write rewrites files in place and --check only reports.
 */

import * as fs from 'node:fs';
import { describeError } from '@gdfmt/core';
import type { ConfigFile } from '@gdfmt/core';
import { PassthroughEngine, TopiaryEngine, formatGdscriptWithReport } from '@gdfmt/formatter';
import type { FormatOptions, PrettyPrinter } from '@gdfmt/formatter';
import type { EngineConfig, ReorderWarning } from '@gdfmt/types';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { applyFlags, loadConfig } from '../config';
import { getPositionals } from '../flags';

/** Flags that take a value, so the value is not mistaken for a file. */
export const VALUE_FLAGS = ['--config', '--format', '--indent-size', '--engine', '--query'];

const STDIN_LABEL = '<stdin>';

interface FileResult {
  file: string;
  changed: boolean;
  written: boolean;
  warnings: string[];
  error?: string;
}

export function createEngine(config: EngineConfig): PrettyPrinter {
  if (config.kind === 'none') {
    return new PassthroughEngine();
  }
  return new TopiaryEngine({
    command: config.command,
    configurationPath: config.configurationPath,
    normalizations: config.normalizations ?? undefined,
  });
}

export function buildFormatOptions(config: ConfigFile): FormatOptions {
  return {
    config: config.formatter,
    engine: createEngine(config.engine),
    ruleset: config.engine.queryPath,
  };
}

export async function formatCommand(options: CLIOptions, args: string[]): Promise<number> {
  const config = applyFlags(loadConfig(options.configPath), args);
  const formatOptions = buildFormatOptions(config);

  const checkMode = args.includes('--check');
  const writeMode = args.includes('--write');
  if (checkMode && writeMode) {
    throw new CLIError('--check and --write cannot be used together.');
  }

  const files = getPositionals(args, VALUE_FLAGS);
  const useStdin = files.length === 0 || (files.length === 1 && files[0] === '-');
  if (useStdin && writeMode) {
    throw new CLIError('--write needs at least one file path.');
  }

  const inputs: Array<{ file: string; read: () => Promise<string> }> = useStdin
    ? [{ file: STDIN_LABEL, read: readStdin }]
    : files.map(file => ({ file, read: async () => readSourceFile(file) }));

  const results: FileResult[] = [];
  const outputs: string[] = [];

  // One file at a time, reported in input order
  for (const input of inputs) {
    const result: FileResult = { file: input.file, changed: false, written: false, warnings: [] };
    results.push(result);

    try {
      const source = await input.read();
      const report = formatGdscriptWithReport(source, formatOptions);
      result.changed = report.changed;
      result.warnings = report.warnings.map((warning: ReorderWarning) => warning.message);

      if (writeMode && report.changed) {
        fs.writeFileSync(input.file, report.output);
        result.written = true;
      } else if (!checkMode && !writeMode) {
        outputs.push(report.output);
      }
    } catch (err: unknown) {
      if (err instanceof CLIError) throw err;
      result.error = describeError(err);
    }
  }

  if (options.format === 'json') {
    console.log(JSON.stringify({ mode: checkMode ? 'check' : writeMode ? 'write' : 'print', results, outputs }, null, 2));
  } else {
    for (const output of outputs) {
      process.stdout.write(output);
    }
    reportText(results, checkMode, writeMode);
  }

  if (results.some(r => r.error !== undefined)) return EXIT_CODE.RUNTIME_ERROR;
  if (checkMode && results.some(r => r.changed)) return EXIT_CODE.UNFORMATTED;
  return EXIT_CODE.SUCCESS;
}

function reportText(results: FileResult[], checkMode: boolean, writeMode: boolean): void {
  for (const result of results) {
    for (const warning of result.warnings) {
      console.warn(`  [warn] ${result.file}: ${warning}`);
    }
    if (result.error !== undefined) {
      console.error(`  [error] ${result.file}: ${result.error}`);
      continue;
    }
    if (checkMode) {
      if (result.changed) {
        console.log(`  [warn] ${result.file} is not formatted.`);
      } else {
        console.log(`  [ok] ${result.file} is formatted.`);
      }
    } else if (writeMode) {
      console.log(result.written ? `  [ok] Reformatted ${result.file}` : `  [ok] ${result.file} unchanged`);
    }
  }

  if (checkMode && results.some(r => r.changed && r.error === undefined)) {
    console.log('  Run: gdfmt <files> --write');
  }
}

function readSourceFile(file: string): string {
  if (!fs.existsSync(file)) {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFileSync(file, 'utf-8');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
