/**
 * conftree check <path...>
 *
 * Parses without writing output and reports unexpected lines.
 * With --ci (or failOnWarnings) any unexpected line fails the run.
 */

import type { CLIOptions } from '../index';
import { exitCodeFor, loadAndParse, printDiagnostics } from './shared';

const USAGE = 'Usage: conftree check <file|dir...> [--ci]\nExample: conftree check ./config/bigip1 --ci';

export async function checkCommand(options: CLIOptions, args: string[]): Promise<number> {
  const outcome = loadAndParse(options, args, USAGE);
  if (!outcome.ok) {
    return outcome.exitCode;
  }

  const { config, result } = outcome;
  const status = result.diagnostics.length === 0 ? 'PASS' : 'WARN';

  if (options.format === 'json') {
    console.log(JSON.stringify({
      status,
      parsedFiles: result.parsedFiles,
      skippedFiles: result.skippedFiles,
      objects: result.document.size,
      diagnostics: result.diagnostics,
    }, null, 2));
    return exitCodeFor(result, config);
  }

  printDiagnostics(result.diagnostics, options);
  console.log('');
  if (status === 'PASS') {
    console.log(`  [ok] ${result.document.size} objects from ${result.parsedFiles.length} files`);
  } else {
    console.log(`  [warn] ${result.document.size} objects from ${result.parsedFiles.length} files, ${result.diagnostics.length} unexpected lines`);
  }
  if (result.skippedFiles.length > 0) {
    console.log(`     Skipped: ${result.skippedFiles.join(', ')}`);
  }
  console.log('');

  return exitCodeFor(result, config);
}
