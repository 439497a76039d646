/**
 * Steps shared by the parse and check commands.
 */

import { ConfigParseError, parseConfigFiles } from '@conftree/parser';
import type { Diagnostic, ParseResult } from '@conftree/parser';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { applyFlagOverrides, loadConfig } from '../config';
import type { ConftreeConfig } from '../config';
import { getPositionals } from '../flags';
import { readConfigFiles } from '../inputs';

export type ParseOutcome =
  | { ok: true; config: ConftreeConfig; result: ParseResult }
  | { ok: false; exitCode: number };

export function loadAndParse(options: CLIOptions, args: string[], usage: string): ParseOutcome {
  const inputs = getPositionals(args);
  if (inputs.length === 0) {
    throw new CLIError(usage);
  }

  const config = applyFlagOverrides(loadConfig(options.configPath), args, options.ciMode);
  const files = readConfigFiles(inputs, config.extension);
  if (files.length === 0) {
    throw new CLIError(`No ${config.extension} files found in: ${inputs.join(', ')}`);
  }

  try {
    return { ok: true, config, result: parseConfigFiles(files, { exclude: config.exclude }) };
  } catch (e: unknown) {
    if (e instanceof ConfigParseError) {
      if (options.format === 'json') {
        console.log(JSON.stringify({ error: e.message, file: e.file ?? null }, null, 2));
      } else {
        console.error(`  [error] ${e.file ?? 'input'}: ${e.message}`);
      }
      return { ok: false, exitCode: EXIT_CODE.RUNTIME_ERROR };
    }
    throw e;
  }
}

export function printDiagnostics(diagnostics: Diagnostic[], options: CLIOptions): void {
  if (options.quiet) return;
  for (const d of diagnostics) {
    console.warn(`  [warn] ${d.file}: unexpected line in '${d.object}': ${d.line.trim()}`);
  }
}

export function exitCodeFor(result: ParseResult, config: ConftreeConfig): number {
  return result.diagnostics.length > 0 && config.failOnWarnings ? EXIT_CODE.WARNINGS : EXIT_CODE.SUCCESS;
}
