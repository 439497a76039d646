/**
 * Line-level text helpers shared by the preprocessor, grouper and builder.
 */

const RULE_MARKERS = ['ltm rule', 'gtm rule', 'pem irule'];
const OPAQUE_MARKERS = ['cli script', 'sys crypto cert-order-manager'];

/** Indentation of one nesting level in normalized input. */
export const INDENT = '    ';

/** True when the text contains the header of an ltm/gtm/pem rule. */
export function isRuleHeader(text: string): boolean {
  return RULE_MARKERS.some(marker => text.includes(marker));
}

/** Objects whose bodies use quoting the grammar cannot represent. */
export function isOpaqueObject(title: string): boolean {
  return OPAQUE_MARKERS.some(marker => title.includes(marker));
}

export function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

/** `{` minus `}`. */
export function braceBalance(text: string): number {
  return countChar(text, '{') - countChar(text, '}');
}

export function countIndent(line: string): number {
  return line.length - line.trimStart().length;
}

/** Object name with the trailing `{`, `{ }` or `{}` removed. */
export function getTitle(header: string): string {
  return header.replace(/\s?\{\s?}?$/, '').trim();
}

/** Removes one nesting level from every indented line. */
export function removeIndent(lines: string[]): string[] {
  return lines.map(line => (countIndent(line) > 1 ? line.slice(INDENT.length) : line));
}

/** Whitespace-separated tokens between the first `{` and the following `}`. */
export function braceTokens(line: string): string[] {
  const inner = line.split('{')[1]?.split('}')[0] ?? '';
  return splitTokens(inner);
}

export function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter(token => token !== '');
}

/**
 * Splits a property line into its first token and the rest.
 * The rest keeps its original spacing.
 */
export function splitProperty(line: string): [string, string] {
  const trimmed = line.trim();
  const match = trimmed.match(/^(\S+)\s+([\s\S]*)$/);
  if (!match) return [trimmed, ''];
  return [match[1], match[2]];
}
