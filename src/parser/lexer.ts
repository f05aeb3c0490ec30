/**
 * Chevrotain Lexer for the ontoflow DSL.
 *
 * Whitespace is skipped. `#` comments are routed to the "comments" group, so
 * the parser never sees them but the AST builder can still place them.
 */
import { createToken, Lexer, tokenMatcher, type IToken, type TokenType } from "chevrotain";
import { LexError } from "../errors.js";
import type { Token, TokenKind } from "../types.js";

// ── Categories ─────────────────────────────────────────────────────────────

export const Keyword = createToken({ name: "Keyword", pattern: Lexer.NA });
export const AdditiveOperator = createToken({ name: "AdditiveOperator", label: "'+' or '-'", pattern: Lexer.NA });
export const MultiplicativeOperator = createToken({ name: "MultiplicativeOperator", label: "'*' or '/'", pattern: Lexer.NA });

// ── Whitespace & comments ──────────────────────────────────────────────────

export const WS = createToken({
  name: "WS",
  pattern: /[ \t\r\n]+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  group: "comments",
});

// ── Identifiers (defined first, keywords reference them via longer_alt) ────────

// A hyphen is part of a name unless it starts the `->` arrow.
export const Identifier = createToken({
  name: "Identifier",
  label: "identifier",
  pattern: /[A-Za-z_](?:[A-Za-z0-9_]|-(?!>))*/,
});

// ── Keywords ───────────────────────────────────────────────────────────────

function keyword(word: string): TokenType {
  return createToken({
    name: word,
    pattern: new RegExp(word),
    longer_alt: Identifier,
    categories: [Keyword],
  });
}

export const LoadCsvKw     = keyword("LOAD_CSV");
export const MapColumnsKw  = keyword("MAP_COLUMNS");
export const NormalizeKw   = keyword("NORMALIZE");
export const AggregateKw   = keyword("AGGREGATE");
export const ByKw          = keyword("BY");
export const IntoKw        = keyword("INTO");
export const AggSumKw      = keyword("AGG_SUM");
export const TakeFirstKw   = keyword("TAKE_FIRST");
export const AggCountKw    = keyword("AGG_COUNT");
export const TimeWindowKw  = keyword("TIME_WINDOW");
export const FromKw        = keyword("FROM");
export const UnitConvertKw = keyword("UNIT_CONVERT");
export const ToKw          = keyword("TO");
export const UsingKw       = keyword("USING");
export const EnrichKw      = keyword("ENRICH");
export const WithKw        = keyword("WITH");
export const MatchKw       = keyword("MATCH");
export const OnKw          = keyword("ON");
export const OutputKw      = keyword("OUTPUT");
export const AsKw          = keyword("AS");
export const ComputeKw     = keyword("COMPUTE");
export const ForKw         = keyword("FOR");
export const GroupKw       = keyword("GROUP");
export const ValidateKw    = keyword("VALIDATE");

/** Keywords that open a top-level statement. */
export const statementKeywords = [
  LoadCsvKw,
  NormalizeKw,
  AggregateKw,
  UnitConvertKw,
  EnrichKw,
  ComputeKw,
  ValidateKw,
];

// ── Operators & punctuation ────────────────────────────────────────────────

export const Arrow    = createToken({ name: "Arrow",    pattern: /->/, label: "'->'" });
export const Plus     = createToken({ name: "Plus",     pattern: /\+/, categories: [AdditiveOperator], label: "'+'" });
export const Minus    = createToken({ name: "Minus",    pattern: /-/,  categories: [AdditiveOperator], label: "'-'" });
export const Star     = createToken({ name: "Star",     pattern: /\*/, categories: [MultiplicativeOperator], label: "'*'" });
export const Slash    = createToken({ name: "Slash",    pattern: /\//, categories: [MultiplicativeOperator], label: "'/'" });
export const LCurly   = createToken({ name: "LCurly",   pattern: /\{/, label: "'{'" });
export const RCurly   = createToken({ name: "RCurly",   pattern: /\}/, label: "'}'" });
export const LSquare  = createToken({ name: "LSquare",  pattern: /\[/, label: "'['" });
export const RSquare  = createToken({ name: "RSquare",  pattern: /\]/, label: "']'" });
export const LParen   = createToken({ name: "LParen",   pattern: /\(/, label: "'('" });
export const RParen   = createToken({ name: "RParen",   pattern: /\)/, label: "')'" });
export const Colon    = createToken({ name: "Colon",    pattern: /:/, label: "':'" });
export const Comma    = createToken({ name: "Comma",    pattern: /,/, label: "','" });
export const Dot      = createToken({ name: "Dot",      pattern: /\./, label: "'.'" });

// ── Literals ───────────────────────────────────────────────────────────────

export const StringLiteral = createToken({
  name: "StringLiteral",
  label: "string",
  pattern: /"(?:[^"\\]|\\[\s\S])*"/,
  line_breaks: true,
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  label: "number",
  pattern: /\d+(?:\.\d+)?/,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  WS,
  Comment,
  // Arrow before Minus so `->` is never split
  Arrow,
  Plus,
  Minus,
  Star,
  Slash,
  LCurly,
  RCurly,
  LSquare,
  RSquare,
  LParen,
  RParen,
  Colon,
  Comma,
  Dot,
  StringLiteral,
  NumberLiteral,
  // Keywords before Identifier (longer_alt prevents prefix stealing)
  LoadCsvKw,
  MapColumnsKw,
  NormalizeKw,
  AggregateKw,
  ByKw,
  IntoKw,
  AggSumKw,
  TakeFirstKw,
  AggCountKw,
  TimeWindowKw,
  FromKw,
  UnitConvertKw,
  ToKw,
  UsingKw,
  EnrichKw,
  WithKw,
  MatchKw,
  OnKw,
  OutputKw,
  AsKw,
  ComputeKw,
  ForKw,
  GroupKw,
  ValidateKw,
  Identifier,
  // Categories are never matched directly but must be known to the parser
  Keyword,
  AdditiveOperator,
  MultiplicativeOperator,
];

export const OntoflowLexer = new Lexer(allTokens, {
  positionTracking: "full",
});

// ═══════════════════════════════════════════════════════════════════════════
//  Public token stream
// ═══════════════════════════════════════════════════════════════════════════

export type LexResult = {
  tokens: IToken[];
  comments: IToken[];
};

/**
 * Run the Chevrotain lexer and fail on the first unrecognized lexeme.
 */
export function lex(source: string): LexResult {
  const result = OntoflowLexer.tokenize(source);
  if (result.errors.length > 0) {
    const e = result.errors[0];
    const text = source.slice(e.offset, e.offset + Math.max(e.length, 1));
    throw new LexError(`Unexpected character sequence "${text}"`, e.line ?? 1, e.column ?? 1, text);
  }
  return { tokens: result.tokens, comments: result.groups["comments"] ?? [] };
}

/** Decode the escapes of a string literal image and drop its quotes. */
export function unquote(image: string): string {
  return image.slice(1, -1).replace(/\\([\s\S])/g, (_, ch: string) => {
    switch (ch) {
      case "n": return "\n";
      case "t": return "\t";
      case "r": return "\r";
      default: return ch;
    }
  });
}

function kindOf(token: IToken): TokenKind {
  if (tokenMatcher(token, Keyword)) return "keyword";
  if (tokenMatcher(token, Identifier)) return "identifier";
  if (tokenMatcher(token, StringLiteral)) return "string";
  if (tokenMatcher(token, NumberLiteral)) return "number";
  if (tokenMatcher(token, AdditiveOperator) || tokenMatcher(token, MultiplicativeOperator)) return "operator";
  return "punctuation";
}

function valueOf(token: IToken, kind: TokenKind): string | number {
  if (kind === "string") return unquote(token.image);
  if (kind === "number") return Number(token.image);
  return token.image;
}

/**
 * Tokenize DSL source into the public token stream.
 *
 * Every call returns a fresh array, so the stream can be restarted at will.
 * Comments and whitespace are dropped; the last token is always `eof`.
 */
export function tokenize(source: string): Token[] {
  const { tokens } = lex(source);
  const out: Token[] = tokens.map((t) => {
    const kind = kindOf(t);
    return {
      kind,
      text: t.image,
      value: valueOf(t, kind),
      line: t.startLine ?? 1,
      column: t.startColumn ?? 1,
      offset: t.startOffset,
    };
  });
  const end = endPosition(source);
  out.push({ kind: "eof", text: "", value: "", line: end.line, column: end.column, offset: source.length });
  return out;
}

/** 1-based line/column just past the last character of the source. */
export function endPosition(source: string): { line: number; column: number } {
  const lines = source.split(/\r?\n/);
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}
