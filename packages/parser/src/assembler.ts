/**
 * Document assembler — parses a set of configuration files and merges
 * their root objects into one document.
 *
 * Each file is parsed with its own state, so callers may parse files
 * independently and merge the results in a fixed order.
 */

import type {
  BuildContext,
  ConfigDocument,
  ConfigFileSet,
  FileParseResult,
  ParseOptions,
  ParseResult,
  RawFile,
} from './types';
import { ConfigParseError } from './errors';
import { preprocessLines } from './preprocessor';
import { groupRootObjects } from './grouper';
import { buildObject } from './builder';

/** Certificate directory marker, script-config file, license file. */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = ['Common_d', 'bigip_script.conf', '.license'];

export function isExcludedFile(name: string, patterns: readonly string[] = DEFAULT_EXCLUDE_PATTERNS): boolean {
  return patterns.some(pattern => name.includes(pattern));
}

/** Parses one file. Throws ConfigSyntaxError on malformed input. */
export function parseConfigFile(name: string, text: string): FileParseResult {
  const context: BuildContext = { file: name, diagnostics: [] };
  const objects: ConfigDocument = new Map();

  for (const group of groupRootObjects(preprocessLines(text))) {
    const [title, value] = buildObject(group, context);
    objects.set(title, value);
  }

  return { objects, diagnostics: context.diagnostics };
}

export function parseConfigFiles(files: ConfigFileSet, options: ParseOptions = {}): ParseResult {
  const exclude = options.exclude ?? DEFAULT_EXCLUDE_PATTERNS;
  const result: ParseResult = {
    document: new Map(),
    diagnostics: [],
    parsedFiles: [],
    skippedFiles: [],
  };

  for (const file of toRawFiles(files)) {
    if (isExcludedFile(file.name, exclude)) {
      result.skippedFiles.push(file.name);
      continue;
    }

    let parsed: FileParseResult;
    try {
      parsed = parseConfigFile(file.name, file.text);
    } catch (err: unknown) {
      throw new ConfigParseError(err, file.name);
    }

    // Later files overwrite same-named root objects
    for (const [title, value] of parsed.objects) {
      result.document.set(title, value);
    }
    result.diagnostics.push(...parsed.diagnostics);
    result.parsedFiles.push(file.name);
  }

  return result;
}

export function parseAll(files: ConfigFileSet, options?: ParseOptions): ConfigDocument {
  return parseConfigFiles(files, options).document;
}

function toRawFiles(files: ConfigFileSet): RawFile[] {
  if (Array.isArray(files)) return files;
  return Object.entries(files).map(([name, text]) => ({ name, text }));
}
