/**
 * gdfmt.json Config Loader
 *
 * Reads the project configuration, validates it with the core schemas and
 * layers command-line flags on top.
 */

import * as fs from 'node:fs';
import { ConfigFileSchema, formatIssues } from '@gdfmt/core';
import type { ConfigFile } from '@gdfmt/core';
import { listNormalizationRules } from '@gdfmt/formatter';
import { CLIError } from './index';
import { getFlag } from './flags';

export const CONFIG_FILE = 'gdfmt.json';

const DEFAULT_CONFIG: ConfigFile = ConfigFileSchema.parse({});

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from `configPath`, or gdfmt.json in the working directory.
 * A missing default file or unreadable JSON falls back to defaults; an
 * explicit path that does not exist or a schema violation is an error.
 */
export function loadConfig(configPath: string | null): ConfigFile {
  const configFile = configPath ?? CONFIG_FILE;

  if (!fs.existsSync(configFile)) {
    if (configPath !== null) {
      throw new CLIError(`Config file not found: ${configFile}`);
    }
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch {
    console.warn(`Warning: Failed to parse ${configFile}, using defaults`);
    return DEFAULT_CONFIG;
  }

  return validateConfig(parsed, configFile);
}

function validateConfig(raw: unknown, source: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error).map(issue => `  - ${issue}`).join('\n');
    throw new CLIError(`Invalid configuration (${source}):\n${issues}`);
  }

  const known = new Set(listNormalizationRules().map(rule => rule.id));
  const unknown = (result.data.engine.normalizations ?? []).filter(id => !known.has(id));
  if (unknown.length > 0) {
    throw new CLIError(
      `Invalid configuration (${source}): unknown normalization rule(s) ${unknown.join(', ')}. ` +
        `Known: ${[...known].join(', ')}`
    );
  }

  return result.data;
}

/**
 * Apply command-line overrides and validate the result again.
 */
export function applyFlags(config: ConfigFile, args: string[]): ConfigFile {
  const formatter = { ...config.formatter };
  const engine = { ...config.engine };

  if (args.includes('--use-spaces')) formatter.indentStyle = 'spaces';
  if (args.includes('--reorder')) formatter.reorder = true;
  if (args.includes('--safe')) formatter.safe = true;

  const indentSize = getFlag(args, '--indent-size');
  if (indentSize !== undefined) formatter.indentSize = Number(indentSize);

  const engineKind = getFlag(args, '--engine');
  const queryPath = getFlag(args, '--query');
  if (queryPath !== undefined) engine.queryPath = queryPath;

  return validateConfig(
    { formatter, engine: { ...engine, kind: engineKind ?? engine.kind } },
    'command line'
  );
}

/**
 * Get the default config as JSON string (for init command).
 */
export function getDefaultConfigJSON(): string {
  return JSON.stringify(DEFAULT_CONFIG, null, 2);
}

export { DEFAULT_CONFIG };
