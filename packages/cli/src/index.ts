/**
 * conftree CLI
 *
 * Converts brace-delimited appliance configuration files into one JSON document.
 */

import { ConfigParseError } from '@conftree/parser';
import { parseCommand } from './commands/parse';
import { checkCommand } from './commands/check';
import { DEFAULT_CONFIG_FILE, getFlag } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

const HELP = `
conftree - appliance configuration to JSON

Usage:
  conftree parse <file|dir...> [--out <file>]
                                   Parse .conf files and write the merged JSON document
  conftree check <file|dir...>     Parse without writing and report unexpected lines
  conftree --help                  Show this help
  conftree --version               Show version

Options:
  --config <file>    Path to config file (default: ${DEFAULT_CONFIG_FILE})
  --format <type>    Output format: text, json (default: text)
  --out <file>       parse only: write the document here instead of stdout
  --exclude <text>   Skip files whose name contains <text> (repeatable, replaces defaults)
  --indent <n>       JSON indentation (default: 4)
  --ci               Exit non-zero when unexpected lines were reported
  --quiet            Do not print unexpected-line warnings
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  WARNINGS: 1,
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

export interface FatalError {
  message: string;
  exitCode: number;
}

/**
 * Maps an error that escaped `run` to its stderr line and exit code.
 * Parse failures name the file that stopped the batch.
 */
export function describeFatalError(err: unknown): FatalError {
  if (err instanceof CLIError) {
    return { message: `conftree: ${err.message}`, exitCode: err.exitCode };
  }
  if (err instanceof ConfigParseError && err.file !== undefined) {
    return { message: `conftree: ${err.file}: ${err.message}`, exitCode: EXIT_CODE.RUNTIME_ERROR };
  }
  const msg = err instanceof Error ? err.message : String(err);
  return { message: `conftree: ${msg}`, exitCode: EXIT_CODE.RUNTIME_ERROR };
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
  ciMode: boolean;
  quiet: boolean;
}

export async function run(args: string[]): Promise<number> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`conftree v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const rawFormat = getFlag(args, '--format') || 'text';
  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath: getFlag(args, '--config') || DEFAULT_CONFIG_FILE,
    format: rawFormat,
    ciMode: args.includes('--ci'),
    quiet: args.includes('--quiet'),
  };

  const command = args[0];
  const restArgs = args.slice(1);

  switch (command) {
    case 'parse':
      return parseCommand(options, restArgs);
    case 'check':
      return checkCommand(options, restArgs);
    default:
      throw new CLIError(`Unknown command: ${command}\n${HELP}`);
  }
}
