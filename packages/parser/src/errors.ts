/**
 * Parser error types.
 *
 * Structured errors for malformed configuration text. Every syntax error
 * is fatal for the whole batch; the assembler wraps it in ConfigParseError.
 */

export type SyntaxErrorKind = 'MissingClosingBrace' | 'UnclosedQuote' | 'MalformedDirective';

export class ConfigSyntaxError extends Error {
  public readonly kind: SyntaxErrorKind;
  public readonly line: string;

  constructor(kind: SyntaxErrorKind, message: string, line: string) {
    super(`${message}: '${line}'`);
    this.name = 'ConfigSyntaxError';
    this.kind = kind;
    this.line = line;
  }
}

export class MissingClosingBraceError extends ConfigSyntaxError {
  constructor(header: string) {
    super('MissingClosingBrace', "Missing or mis-indented '}' for line", header);
    this.name = 'MissingClosingBraceError';
  }
}

export class UnclosedQuoteError extends ConfigSyntaxError {
  constructor(line: string) {
    super('UnclosedQuote', 'Unclosed quote in multiline string starting at', line);
    this.name = 'UnclosedQuoteError';
  }
}

export class MalformedDirectiveError extends ConfigSyntaxError {
  constructor(line: string) {
    super('MalformedDirective', 'Malformed topology directive', line);
    this.name = 'MalformedDirectiveError';
  }
}

export const PARSE_ERROR_PREFIX = 'Error parsing input file, see the following error:\n';

export class ConfigParseError extends Error {
  public readonly file: string | undefined;

  constructor(cause: unknown, file?: string) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${PARSE_ERROR_PREFIX}${detail}`, { cause });
    this.name = 'ConfigParseError';
    this.file = file;
  }
}
