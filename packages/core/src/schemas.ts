/**
 * Zod validation schemas for gdfmt configuration.
 *
 * Every field has a default, so an empty object parses to the default
 * configuration and a partial file only overrides what it names.
 */

import { z } from 'zod';
import type { EngineConfig, FormatterConfig } from '@gdfmt/types';

// ============================================================================
// Formatter
// ============================================================================

export const FormatterConfigSchema = z.object({
  indentStyle: z.enum(['tabs', 'spaces']).default('tabs'),
  indentSize: z.number()
    .int("indentSize must be an integer")
    .positive("indentSize must be positive")
    .max(16, "indentSize must be at most 16")
    .default(4),
  reorder: z.boolean().default(false),
  safe: z.boolean().default(false),
});

// ============================================================================
// Engine
// ============================================================================

export const EngineConfigSchema = z.object({
  kind: z.enum(['topiary', 'none']).default('topiary'),
  command: z.string().min(1).default('topiary'),
  queryPath: z.string().min(1).nullable().default(null),
  configurationPath: z.string().min(1).nullable().default(null),
  normalizations: z.array(z.string().min(1)).nullable().default(null),
});

// ============================================================================
// Config file
// ============================================================================

export const ConfigFileSchema = z.object({
  formatter: FormatterConfigSchema.default({}),
  engine: EngineConfigSchema.default({}),
}).superRefine((data, ctx) => {
  if (data.formatter.safe && data.formatter.reorder) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['formatter'],
      message: 'safe and reorder cannot be enabled together: reordering changes the structure safe mode verifies',
    });
  }
});

export interface ConfigFile {
  formatter: FormatterConfig;
  engine: EngineConfig;
}

export const DEFAULT_FORMATTER_CONFIG: FormatterConfig = FormatterConfigSchema.parse({});

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
