/**
 * gdfmt CLI
 *
 * Formats GDScript through a pretty-printing engine plus corrective passes,
 * with optional declaration reordering and structure verification.
 */

import { initCommand } from './commands/init';
import { formatCommand } from './commands/format';
import { getFlag } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

const HELP = `
gdfmt - GDScript formatter

Usage:
  gdfmt [files...] [options]       Format files (stdin when no file is given) and print the result
  gdfmt [files...] --check         Report files that are not formatted (exit 1)
  gdfmt [files...] --write         Rewrite files in place
  gdfmt init [--force]             Write gdfmt.json with the default configuration
  gdfmt --help                     Show this help
  gdfmt --version                  Show version

Options:
  --config <path>        Path to the config file (default: gdfmt.json)
  --format <type>        Output format: text, json (default: text)
  --use-spaces           Indent with spaces instead of tabs
  --indent-size <n>      Spaces per indentation level (default: 4)
  --reorder              Reorder top-level declarations per the GDScript style guide
  --safe                 Fail when formatting would change the code structure
  --engine <name>        Pretty-printing engine: topiary, none (default: topiary)
  --query <path>         Topiary query file for GDScript
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  UNFORMATTED: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

export interface CLIOptions {
  /** Explicit config file; null looks for gdfmt.json in the working directory */
  configPath: string | null;
  format: 'text' | 'json';
}

export async function run(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`gdfmt v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const rawFormat = getFlag(args, '--format') || 'text';
  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath: getFlag(args, '--config') ?? null,
    format: rawFormat,
  };

  if (args[0] === 'init') {
    return initCommand(options, args.slice(1));
  }

  return formatCommand(options, args);
}
