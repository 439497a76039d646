/**
 * Configuration document model.
 *
 * Values produced by the object builder and merged by the assembler.
 * `Map` keeps insertion order for integer-like keys, which plain
 * objects would reorder.
 */

// ============================================================================
// Value Tree
// ============================================================================

export interface EmptyObjectValue {
  type: 'empty';
}

/** Verbatim multi-line body of a script or rule. */
export interface RawTextValue {
  type: 'text';
  value: string;
}

/** Pseudo-array or flattened `monitor min` token list. */
export interface TokenListValue {
  type: 'list';
  items: string[];
}

export interface ObjectMapValue {
  type: 'map';
  entries: Map<string, ConfigValue>;
}

export interface ScalarStringValue {
  type: 'scalar';
  value: string;
}

export type ConfigValue =
  | EmptyObjectValue
  | RawTextValue
  | TokenListValue
  | ObjectMapValue
  | ScalarStringValue;

export type ConfigDocument = Map<string, ConfigValue>;

// ============================================================================
// Input
// ============================================================================

export interface RawFile {
  name: string;
  text: string;
}

/** Filename → raw text, or an ordered list of files. */
export type ConfigFileSet = Record<string, string> | RawFile[];

// ============================================================================
// Diagnostics & Results
// ============================================================================

export interface Diagnostic {
  kind: 'UnexpectedLine';
  file: string;
  /** Title of the object whose body held the line */
  object: string;
  line: string;
}

export interface BuildContext {
  file: string;
  diagnostics: Diagnostic[];
}

export interface FileParseResult {
  objects: ConfigDocument;
  diagnostics: Diagnostic[];
}

export interface ParseOptions {
  /** Filename substrings that exclude a file from parsing. Replaces the defaults. */
  exclude?: string[];
}

export interface ParseResult {
  document: ConfigDocument;
  diagnostics: Diagnostic[];
  parsedFiles: string[];
  skippedFiles: string[];
}

// ============================================================================
// JSON Projection
// ============================================================================

export type JsonValue = string | string[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}
