/**
 * conftree.json Config Loader
 *
 * Loads parser settings from a JSON file and applies command-line
 * overrides. A missing file means defaults; an invalid one is an error.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { DEFAULT_EXCLUDE_PATTERNS } from '@conftree/parser';
import { CLIError } from './index';
import { getFlag, getFlagValues } from './flags';

// ============================================================================
// Config Schema
// ============================================================================

export const ConftreeConfigSchema = z.object({
  /** Suffix of the files read from input directories */
  extension: z.string().min(1).default('.conf'),
  /** Filename substrings that are never parsed */
  exclude: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDE_PATTERNS]),
  /** JSON output indentation */
  indent: z.number().int().min(0).max(10).default(4),
  /** Exit non-zero when unexpected lines were reported */
  failOnWarnings: z.boolean().default(false),
}).strict();

export type ConftreeConfig = z.infer<typeof ConftreeConfigSchema>;

// ============================================================================
// Config Loading
// ============================================================================

export function loadConfig(configFile: string): ConftreeConfig {
  if (!fs.existsSync(configFile)) {
    return ConftreeConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CLIError(`Failed to read ${configFile}: ${msg}`);
  }

  const result = ConftreeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CLIError(`Invalid config ${configFile}:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

/**
 * Applies --exclude (repeatable, replaces the list), --indent and --ci.
 */
export function applyFlagOverrides(config: ConftreeConfig, args: string[], ciMode: boolean): ConftreeConfig {
  const exclude = getFlagValues(args, '--exclude');
  const rawIndent = getFlag(args, '--indent');

  let indent = config.indent;
  if (rawIndent !== undefined) {
    const parsed = ConftreeConfigSchema.shape.indent.safeParse(Number(rawIndent));
    if (!parsed.success) {
      throw new CLIError(`Invalid --indent value: ${rawIndent}. Use an integer from 0 to 10.`);
    }
    indent = parsed.data;
  }

  return {
    ...config,
    exclude: exclude.length > 0 ? exclude : config.exclude,
    indent,
    failOnWarnings: config.failOnWarnings || ciMode,
  };
}
