/**
 * conftree parse <path...>
 *
 * Parses .conf files into one JSON document, written to --out or stdout.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { stringifyDocument } from '@conftree/parser';
import type { CLIOptions } from '../index';
import { getFlag } from '../flags';
import { exitCodeFor, loadAndParse, printDiagnostics } from './shared';

const USAGE = 'Usage: conftree parse <file|dir...> [--out <file>]\nExample: conftree parse ./config/bigip1 --out bigip1.json';

export async function parseCommand(options: CLIOptions, args: string[]): Promise<number> {
  const outcome = loadAndParse(options, args, USAGE);
  if (!outcome.ok) {
    return outcome.exitCode;
  }

  const { config, result } = outcome;
  const output = stringifyDocument(result.document, config.indent);
  const outPath = getFlag(args, '--out');

  printDiagnostics(result.diagnostics, options);

  if (!outPath) {
    // The document is the only thing on stdout
    console.log(output);
    return exitCodeFor(result, config);
  }

  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  fs.writeFileSync(outPath, `${output}\n`);

  if (options.format === 'json') {
    console.log(JSON.stringify({
      output: outPath,
      parsedFiles: result.parsedFiles,
      skippedFiles: result.skippedFiles,
      objects: result.document.size,
      diagnostics: result.diagnostics,
    }, null, 2));
  } else {
    console.log(`  [ok] Wrote ${result.document.size} objects to ${outPath}`);
    console.log(`     Parsed: ${result.parsedFiles.join(', ')}`);
    if (result.skippedFiles.length > 0) {
      console.log(`     Skipped: ${result.skippedFiles.join(', ')}`);
    }
    if (result.diagnostics.length > 0) {
      console.log(`     Unexpected lines: ${result.diagnostics.length}`);
    }
  }

  return exitCodeFor(result, config);
}
