/**
 * JSON projection of a parsed document.
 */

import type { ConfigDocument, ConfigValue, JsonObject, JsonValue } from './types';

export function valueToJson(value: ConfigValue): JsonValue {
  switch (value.type) {
    case 'empty':
      return {};
    case 'text':
    case 'scalar':
      return value.value;
    case 'list':
      return [...value.items];
    case 'map':
      return mapToJson(value.entries);
  }
}

/**
 * Plain-object projection. Integer-like keys come first in a plain object;
 * use stringifyDocument where key order matters.
 */
export function toJson(document: ConfigDocument): JsonObject {
  return mapToJson(document);
}

function mapToJson(entries: Map<string, ConfigValue>): JsonObject {
  // fromEntries defines own properties, so a `__proto__` key stays a key
  return Object.fromEntries([...entries].map(([key, value]) => [key, valueToJson(value)]));
}

/**
 * Serializes in `Map` order, laid out the way `JSON.stringify(value, null, indent)` would.
 */
export function stringifyDocument(document: ConfigDocument, indent = 4): string {
  return writeMap(document, ' '.repeat(indent), '');
}

function writeValue(value: ConfigValue, gap: string, pad: string): string {
  switch (value.type) {
    case 'empty':
      return '{}';
    case 'text':
    case 'scalar':
      return JSON.stringify(value.value);
    case 'list':
      return writeBlock('[', ']', value.items.map(item => JSON.stringify(item)), gap, pad);
    case 'map':
      return writeMap(value.entries, gap, pad);
  }
}

function writeMap(entries: Map<string, ConfigValue>, gap: string, pad: string): string {
  const separator = gap === '' ? ':' : ': ';
  const members = [...entries].map(
    ([key, value]) => `${JSON.stringify(key)}${separator}${writeValue(value, gap, pad + gap)}`
  );
  return writeBlock('{', '}', members, gap, pad);
}

function writeBlock(open: string, close: string, members: string[], gap: string, pad: string): string {
  if (members.length === 0) return `${open}${close}`;
  if (gap === '') return `${open}${members.join(',')}${close}`;
  const inner = pad + gap;
  return `${open}\n${inner}${members.join(`,\n${inner}`)}\n${pad}${close}`;
}
