/**
 * Object builder — converts one object's line range into a (title, value)
 * pair, recursing into nested objects.
 */

import type { BuildContext, ConfigValue, EmptyObjectValue, ScalarStringValue } from './types';
import { MissingClosingBraceError, UnclosedQuoteError } from './errors';
import { classifyBodyLine, hasOddQuotes } from './line-shapes';
import {
  INDENT,
  getTitle,
  isOpaqueObject,
  isRuleHeader,
  removeIndent,
  splitProperty,
  splitTokens,
} from './text';

const EXTERNAL_MONITOR_PREFIX = 'gtm monitor external';
const USER_DEFINED_KEY = 'user-defined';

/**
 * Builds the value of the object whose header is `lines[0]`.
 * The last line is expected to close it.
 */
export function buildObject(lines: string[], context: BuildContext): [string, ConfigValue] {
  const header = lines[0];
  const title = getTitle(header);

  // Header without a body: `name { }`, a one-line pseudo-array, or a
  // group cut short by a missing or mis-indented closing brace.
  if (lines.length <= 1) {
    const shape = classifyBodyLine(header, 1);
    if (shape.kind === 'pseudo-array' && shape.items.length > 0) {
      return [shape.key, { type: 'list', items: shape.items }];
    }
    return [title, emptyObject()];
  }

  const body = lines.slice(1, -1);

  if (isRuleHeader(title)) {
    return [title, { type: 'text', value: body.join('\n') }];
  }

  if (title.includes('monitor min')) {
    return [title, { type: 'list', items: splitTokens(body.map(line => line.trim()).join(' ')) }];
  }

  if (isOpaqueObject(title)) {
    return [title, emptyObject()];
  }

  return [title, { type: 'map', entries: buildEntries(title, body, context) }];
}

function buildEntries(title: string, body: string[], context: BuildContext): Map<string, ConfigValue> {
  const entries = new Map<string, ConfigValue>();
  let anonymousCount = 0;

  for (let i = 0; i < body.length; i++) {
    const line = body[i];
    const shape = classifyBodyLine(line, body.length);

    switch (shape.kind) {
      case 'nested': {
        const end = body.indexOf(`${INDENT}}`, i);
        if (end === -1) {
          throw new MissingClosingBraceError(line);
        }
        const child = removeIndent(body.slice(i, end + 1));
        if (child[0] === '{') {
          child[0] = `${anonymousCount} {`;
          anonymousCount++;
        }
        const [key, value] = buildObject(child, context);
        entries.set(key, value);
        i = end;
        break;
      }
      case 'empty-object':
        entries.set(shape.key, emptyObject());
        break;
      case 'pseudo-array':
        entries.set(shape.key, { type: 'list', items: shape.items });
        break;
      case 'flag':
        entries.set(shape.key, scalar(''));
        break;
      case 'multiline-open': {
        const end = findQuoteClose(body, i);
        const [key, value] = joinMultiline(body.slice(i, end + 1));
        entries.set(key, scalar(value));
        i = end;
        break;
      }
      case 'property':
        if (title.startsWith(EXTERNAL_MONITOR_PREFIX) && shape.key === USER_DEFINED_KEY) {
          mergeUserDefined(entries, shape.value);
        } else {
          entries.set(shape.key, scalar(shape.value));
        }
        break;
      case 'unexpected':
        context.diagnostics.push({ kind: 'UnexpectedLine', file: context.file, object: title, line });
        break;
    }
  }

  return entries;
}

function findQuoteClose(body: string[], start: number): number {
  for (let j = start + 1; j < body.length; j++) {
    if (hasOddQuotes(body[j])) return j;
  }
  throw new UnclosedQuoteError(body[start]);
}

function joinMultiline(chunk: string[]): [string, string] {
  const [key, first] = splitProperty(chunk[0]);
  return [key, [first, ...chunk.slice(1)].join('\n')];
}

// Repeated `user-defined NAME value` lines accumulate; a repeated NAME overwrites.
function mergeUserDefined(entries: Map<string, ConfigValue>, value: string): void {
  const existing = entries.get(USER_DEFINED_KEY);
  const userDefined = existing?.type === 'map' ? existing.entries : new Map<string, ConfigValue>();
  const [name, argument] = splitProperty(value);
  userDefined.set(name, scalar(argument));
  entries.set(USER_DEFINED_KEY, { type: 'map', entries: userDefined });
}

function emptyObject(): EmptyObjectValue {
  return { type: 'empty' };
}

function scalar(value: string): ScalarStringValue {
  return { type: 'scalar', value };
}
