/**
 * Body line classification.
 *
 * Every line of an object body is classified once, in a fixed order of
 * precedence, before the builder acts on it. The order matters: a line
 * ending in `{` is a nested object even if it would also read as a flag.
 */

import { braceTokens, countChar, countIndent, splitProperty, INDENT } from './text';

export type LineShape =
  | { kind: 'nested' }
  | { kind: 'empty-object'; key: string }
  | { kind: 'pseudo-array'; key: string; items: string[] }
  | { kind: 'flag'; key: string }
  | { kind: 'multiline-open' }
  | { kind: 'property'; key: string; value: string }
  | { kind: 'unexpected' };

const FULLY_QUOTED_RE = /^"[\s\S]*"$/;

export function classifyBodyLine(line: string, bodyLength: number): LineShape {
  const trimmed = line.trim();

  if (line.endsWith('{') && bodyLength !== 1) {
    return { kind: 'nested' };
  }

  if (trimmed.endsWith('{ }')) {
    return { kind: 'empty-object', key: keyBeforeBrace(line) };
  }

  if (line.includes('{') && line.includes('}') && !line.includes('"')) {
    return { kind: 'pseudo-array', key: keyBeforeBrace(line), items: braceTokens(line) };
  }

  if ((!trimmed.includes(' ') || FULLY_QUOTED_RE.test(trimmed)) && !line.includes('}')) {
    return { kind: 'flag', key: trimmed };
  }

  if (countIndent(line) === INDENT.length) {
    if (hasOddQuotes(line)) {
      return { kind: 'multiline-open' };
    }
    const [key, value] = splitProperty(line);
    return { kind: 'property', key, value };
  }

  return { kind: 'unexpected' };
}

export function hasOddQuotes(line: string): boolean {
  return countChar(line, '"') % 2 === 1;
}

function keyBeforeBrace(line: string): string {
  return line.split('{')[0].trim();
}
