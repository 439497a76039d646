/**
 * Root grouper — splits preprocessed lines into one line range per
 * root-level object.
 */

import { MissingClosingBraceError } from './errors';
import { braceBalance, isRuleHeader } from './text';

/** Rule body lines whose braces are not structural. */
const RULE_NON_STRUCTURAL = ['#', 'set', 'STREAM'];

export function groupRootObjects(lines: string[]): string[][] {
  const groups: string[][] = [];

  for (let i = 0; i < lines.length; i++) {
    const header = lines[i];
    if (header.startsWith(' ')) continue;

    if (header.includes('{') && header.includes('}')) {
      groups.push([header]);
    } else if (header.trim().endsWith('{')) {
      const end = findGroupEnd(lines, i);
      groups.push(lines.slice(i, end + 1));
      i = end;
    }
  }

  return groups;
}

/**
 * Index of the line closing the object opened at `start`.
 *
 * Running into another rule header before the braces balance ends the group
 * on the line before it. This is best-effort recovery for unterminated rules.
 */
function findGroupEnd(lines: string[], start: number): number {
  const header = lines[start];
  const inRule = isRuleHeader(header);
  let balance = 1;
  let i = start;

  while (balance !== 0) {
    i++;
    if (i >= lines.length) {
      throw new MissingClosingBraceError(header);
    }
    const line = lines[i];
    const trimmed = line.trim();

    if (!(inRule && RULE_NON_STRUCTURAL.some(prefix => trimmed.startsWith(prefix)))) {
      balance += braceBalance(stripQuoted(trimmed));
    }

    if (isRuleHeader(line)) {
      return i - 1;
    }
  }

  return i;
}

/** Removes escaped quotes, then every double-quoted substring. */
export function stripQuoted(text: string): string {
  return text.replace(/\\"/g, '').replace(/"[^"]*"/g, '');
}
