/**
 * Errors raised while compiling DSL source.
 *
 * Every user-facing failure is a `CompileError` subclass carrying the source
 * position; its message is prefixed with `Line N, column M:`.
 * `InternalCompilerError` is kept outside that hierarchy: it means the
 * compiler itself produced an AST it cannot generate from.
 */

export abstract class CompileError extends Error {
  readonly line: number;
  readonly column: number;
  /** Message without the position prefix */
  readonly detail: string;

  constructor(detail: string, line: number, column: number) {
    super(`Line ${line}, column ${column}: ${detail}`);
    this.name = new.target.name;
    this.detail = detail;
    this.line = line;
    this.column = column;
  }
}

/** Unrecognized character sequence in the source text. */
export class LexError extends CompileError {
  readonly text: string;

  constructor(detail: string, line: number, column: number, text: string) {
    super(detail, line, column);
    this.text = text;
  }
}

/** Token mismatch, unexpected end of input, or nesting beyond the limit. */
export class ParseError extends CompileError {
  /** Image of the offending token, or "end of input" */
  readonly found: string;
  /** 1-based index of the statement being parsed */
  readonly statementIndex: number;

  constructor(detail: string, line: number, column: number, found: string, statementIndex: number) {
    super(detail, line, column);
    this.found = found;
    this.statementIndex = statementIndex;
  }
}

/** Well-formed syntax that breaks a cross-statement or vocabulary rule. */
export class SemanticError extends CompileError {
  /** Alias the error is about, when there is one */
  readonly alias?: string;

  constructor(detail: string, line: number, column: number, alias?: string) {
    super(detail, line, column);
    this.alias = alias;
  }
}

export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(`Internal compiler error: ${message}`);
    this.name = "InternalCompilerError";
  }
}
