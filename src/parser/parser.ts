/**
 * Chevrotain CstParser + imperative CST→AST visitor for the ontoflow DSL.
 *
 * The grammar only checks shape. The visitor walks statements in source
 * order, resolves aliases against a per-parse `AliasRegistry` and raises
 * `SemanticError` for everything the grammar cannot express.
 */
import {
  CstParser,
  EOF,
  tokenLabel,
  tokenMatcher,
  type CstNode,
  type IParserErrorMessageProvider,
  type IToken,
  type TokenType,
} from "chevrotain";
import {
  allTokens,
  lex,
  statementKeywords,
  unquote,
  endPosition,
  AdditiveOperator,
  AggCountKw,
  AggSumKw,
  AggregateKw,
  Arrow,
  AsKw,
  ByKw,
  Colon,
  Comma,
  ComputeKw,
  Dot,
  EnrichKw,
  ForKw,
  FromKw,
  GroupKw,
  Identifier,
  IntoKw,
  LCurly,
  LParen,
  LSquare,
  LoadCsvKw,
  MapColumnsKw,
  MatchKw,
  MultiplicativeOperator,
  NormalizeKw,
  NumberLiteral,
  OnKw,
  OutputKw,
  RCurly,
  RParen,
  RSquare,
  StringLiteral,
  TakeFirstKw,
  TimeWindowKw,
  ToKw,
  UnitConvertKw,
  UsingKw,
  ValidateKw,
  WithKw,
} from "./lexer.js";
import { InternalCompilerError, ParseError, SemanticError } from "../errors.js";
import { AliasRegistry, type CompileWarning, type SourcePosition } from "../registry.js";
import { factorRowAlias } from "../utils.js";
import type {
  AggregateStatement,
  AggregationClause,
  AggregationFunction,
  BinaryOperator,
  ColumnMapping,
  CommentStatement,
  ComputeFunction,
  ComputeStatement,
  EnrichStatement,
  Expression,
  ExpressionShape,
  FieldNormalization,
  LoadStatement,
  NormalizeStatement,
  OutputField,
  Program,
  Statement,
  TimeWindow,
  TimeWindowMode,
  UnitConvertStatement,
  UnitRef,
  ValidateStatement,
  ValueRewrite,
} from "../types.js";

// ═══════════════════════════════════════════════════════════════════════════
//  Error messages
// ═══════════════════════════════════════════════════════════════════════════

function describeFound(token: IToken): string {
  return tokenMatcher(token, EOF) ? "end of input" : `"${token.image}"`;
}

function describeExpected(types: TokenType[]): string {
  const labels = [...new Set(types.map((t) => tokenLabel(t)))];
  return labels.length === 1 ? labels[0] : `one of ${labels.join(", ")}`;
}

const STATEMENT_LIST = statementKeywords.map((t) => tokenLabel(t)).join(", ");

const errorMessageProvider: IParserErrorMessageProvider = {
  buildMismatchTokenMessage({ expected, actual }) {
    return `Expected ${describeExpected([expected])} but found ${describeFound(actual)}`;
  },
  buildNotAllInputParsedMessage({ firstRedundant }) {
    return `Expected a statement (${STATEMENT_LIST}) but found ${describeFound(firstRedundant)}`;
  },
  buildNoViableAltMessage({ expectedPathsPerAlt, actual }) {
    const firsts = expectedPathsPerAlt.flatMap((paths) => paths.flatMap((path) => path.slice(0, 1)));
    return `Expected ${describeExpected(firsts)} but found ${describeFound(actual[0])}`;
  },
  buildEarlyExitMessage({ expectedIterationPaths, actual }) {
    const firsts = expectedIterationPaths.flatMap((path) => path.slice(0, 1));
    return `Expected at least one ${describeExpected(firsts)} but found ${describeFound(actual[0])}`;
  },
};

// ═══════════════════════════════════════════════════════════════════════════
//  Grammar (CstParser)
// ═══════════════════════════════════════════════════════════════════════════

class OntoflowParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      maxLookahead: 2,
      errorMessageProvider,
    });
    this.performSelfAnalysis();
  }

  // ── Top-level ──────────────────────────────────────────────────────────

  public program = this.RULE("program", () => {
    this.MANY(() => this.SUBRULE(this.statement));
  });

  public statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.loadStatement) },
      { ALT: () => this.SUBRULE(this.normalizeStatement) },
      { ALT: () => this.SUBRULE(this.aggregateStatement) },
      { ALT: () => this.SUBRULE(this.unitConvertStatement) },
      { ALT: () => this.SUBRULE(this.enrichStatement) },
      { ALT: () => this.SUBRULE(this.computeStatement) },
      { ALT: () => this.SUBRULE(this.validateStatement) },
    ]);
  });

  // ── LOAD_CSV ───────────────────────────────────────────────────────────

  /** LOAD_CSV "path" AS alias [MAP_COLUMNS { src -> dst, ... }] */
  public loadStatement = this.RULE("loadStatement", () => {
    this.CONSUME(LoadCsvKw);
    this.CONSUME(StringLiteral, { LABEL: "path" });
    this.CONSUME(AsKw);
    this.CONSUME(Identifier, { LABEL: "alias" });
    this.OPTION(() => {
      this.CONSUME(MapColumnsKw, { LABEL: "mapColumns" });
      this.CONSUME(LCurly);
      this.MANY(() => {
        this.SUBRULE(this.columnMapping);
        this.OPTION2(() => this.CONSUME(Comma));
      });
      this.CONSUME(RCurly);
    });
  });

  public columnMapping = this.RULE("columnMapping", () => {
    this.CONSUME(Identifier, { LABEL: "source" });
    this.CONSUME(Arrow);
    this.CONSUME2(Identifier, { LABEL: "target" });
  });

  // ── NORMALIZE ──────────────────────────────────────────────────────────

  /** NORMALIZE alias { field: { "old": "new", ... }, ... } */
  public normalizeStatement = this.RULE("normalizeStatement", () => {
    this.CONSUME(NormalizeKw);
    this.CONSUME(Identifier, { LABEL: "target" });
    this.CONSUME(LCurly, { LABEL: "body" });
    this.MANY(() => {
      this.SUBRULE(this.fieldNormalization);
      this.OPTION(() => this.CONSUME(Comma));
    });
    this.CONSUME(RCurly);
  });

  public fieldNormalization = this.RULE("fieldNormalization", () => {
    this.CONSUME(Identifier, { LABEL: "field" });
    this.CONSUME(Colon);
    this.CONSUME(LCurly);
    this.MANY(() => {
      this.SUBRULE(this.valueRewrite);
      this.OPTION(() => this.CONSUME(Comma));
    });
    this.CONSUME(RCurly);
  });

  public valueRewrite = this.RULE("valueRewrite", () => {
    this.SUBRULE(this.literalValue, { LABEL: "from" });
    this.CONSUME(Colon);
    this.SUBRULE2(this.literalValue, { LABEL: "to" });
  });

  /** A value written as a string or as a bare word */
  public literalValue = this.RULE("literalValue", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(Identifier) },
    ]);
  });

  // ── AGGREGATE ──────────────────────────────────────────────────────────

  /**
   * AGGREGATE source BY [k1, k2] INTO target
   *   AGG_SUM(f) AS a  TAKE_FIRST(f) AS b  AGG_COUNT() AS c
   *   [TIME_WINDOW mode FROM field INTO alias]
   */
  public aggregateStatement = this.RULE("aggregateStatement", () => {
    this.CONSUME(AggregateKw);
    this.CONSUME(Identifier, { LABEL: "source" });
    this.CONSUME(ByKw);
    this.SUBRULE(this.identifierList, { LABEL: "groupBy" });
    this.CONSUME(IntoKw);
    this.CONSUME2(Identifier, { LABEL: "target" });
    this.MANY(() => this.SUBRULE(this.aggregationClause));
    this.OPTION(() => this.SUBRULE(this.timeWindowClause));
  });

  public aggregationClause = this.RULE("aggregationClause", () => {
    this.OR([
      { ALT: () => this.CONSUME(AggSumKw,    { LABEL: "function" }) },
      { ALT: () => this.CONSUME(TakeFirstKw, { LABEL: "function" }) },
      { ALT: () => this.CONSUME(AggCountKw,  { LABEL: "function" }) },
    ]);
    this.CONSUME(LParen);
    this.OPTION(() => this.CONSUME(Identifier, { LABEL: "field" }));
    this.CONSUME(RParen);
    this.CONSUME(AsKw);
    this.CONSUME2(Identifier, { LABEL: "alias" });
  });

  public timeWindowClause = this.RULE("timeWindowClause", () => {
    this.CONSUME(TimeWindowKw);
    this.CONSUME(Identifier, { LABEL: "mode" });
    this.CONSUME(FromKw);
    this.CONSUME2(Identifier, { LABEL: "sourceField" });
    this.CONSUME(IntoKw);
    this.CONSUME3(Identifier, { LABEL: "alias" });
  });

  // ── UNIT_CONVERT ───────────────────────────────────────────────────────

  /** UNIT_CONVERT alias.field FROM unit TO unit USING "table.csv" */
  public unitConvertStatement = this.RULE("unitConvertStatement", () => {
    this.CONSUME(UnitConvertKw);
    this.CONSUME(Identifier, { LABEL: "target" });
    this.CONSUME(Dot);
    this.CONSUME2(Identifier, { LABEL: "field" });
    this.CONSUME(FromKw);
    this.SUBRULE(this.literalValue, { LABEL: "fromUnit" });
    this.CONSUME(ToKw);
    this.SUBRULE2(this.literalValue, { LABEL: "toUnit" });
    this.CONSUME(UsingKw);
    this.CONSUME(StringLiteral, { LABEL: "table" });
  });

  // ── ENRICH ─────────────────────────────────────────────────────────────

  /** ENRICH source WITH table MATCH ON key OUTPUT target AS { f: expr, ... } */
  public enrichStatement = this.RULE("enrichStatement", () => {
    this.CONSUME(EnrichKw);
    this.CONSUME(Identifier, { LABEL: "source" });
    this.CONSUME(WithKw);
    this.SUBRULE(this.literalValue, { LABEL: "factorTable" });
    this.CONSUME(MatchKw);
    this.CONSUME(OnKw);
    this.CONSUME2(Identifier, { LABEL: "matchKey" });
    this.CONSUME(OutputKw);
    this.CONSUME3(Identifier, { LABEL: "target" });
    this.CONSUME(AsKw);
    this.CONSUME(LCurly, { LABEL: "body" });
    this.MANY(() => {
      this.SUBRULE(this.outputField);
      this.OPTION(() => this.CONSUME(Comma));
    });
    this.CONSUME(RCurly);
  });

  public outputField = this.RULE("outputField", () => {
    this.CONSUME(Identifier, { LABEL: "name" });
    this.CONSUME(Colon);
    this.SUBRULE(this.expression, { LABEL: "value" });
  });

  // ── COMPUTE ────────────────────────────────────────────────────────────

  /** COMPUTE result FOR source GROUP BY (key | [k1, k2]) INTO target AS fn(field) */
  public computeStatement = this.RULE("computeStatement", () => {
    this.CONSUME(ComputeKw);
    this.CONSUME(Identifier, { LABEL: "result" });
    this.CONSUME(ForKw);
    this.CONSUME2(Identifier, { LABEL: "source" });
    this.CONSUME(GroupKw);
    this.CONSUME(ByKw);
    this.OR([
      { ALT: () => this.SUBRULE(this.identifierList, { LABEL: "groupBy" }) },
      { ALT: () => this.CONSUME3(Identifier, { LABEL: "groupKey" }) },
    ]);
    this.CONSUME(IntoKw);
    this.CONSUME4(Identifier, { LABEL: "target" });
    this.CONSUME(AsKw);
    this.CONSUME5(Identifier, { LABEL: "function" });
    this.CONSUME(LParen);
    this.CONSUME6(Identifier, { LABEL: "field" });
    this.CONSUME(RParen);
  });

  // ── VALIDATE ───────────────────────────────────────────────────────────

  /** VALIDATE alias WITH "rule" */
  public validateStatement = this.RULE("validateStatement", () => {
    this.CONSUME(ValidateKw);
    this.CONSUME(Identifier, { LABEL: "target" });
    this.CONSUME(WithKw);
    this.CONSUME(StringLiteral, { LABEL: "rule" });
  });

  // ── Shared sub-rules ──────────────────────────────────────────────────

  /** [a, b, c], possibly empty; the visitor decides whether that is allowed */
  public identifierList = this.RULE("identifierList", () => {
    this.CONSUME(LSquare);
    this.MANY(() => {
      this.CONSUME(Identifier, { LABEL: "item" });
      this.OPTION(() => this.CONSUME(Comma));
    });
    this.CONSUME(RSquare);
  });

  // ── Expressions (lowest to highest precedence) ─────────────────────────

  /** operand ((+|-) operand)* */
  public expression = this.RULE("expression", () => {
    this.SUBRULE(this.multiplicativeExpression, { LABEL: "operand" });
    this.MANY(() => {
      this.CONSUME(AdditiveOperator, { LABEL: "operator" });
      this.SUBRULE2(this.multiplicativeExpression, { LABEL: "operand" });
    });
  });

  /** operand ((*|/) operand)* */
  public multiplicativeExpression = this.RULE("multiplicativeExpression", () => {
    this.SUBRULE(this.atom, { LABEL: "operand" });
    this.MANY(() => {
      this.CONSUME(MultiplicativeOperator, { LABEL: "operator" });
      this.SUBRULE2(this.atom, { LABEL: "operand" });
    });
  });

  public atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: "string" }) },
      { ALT: () => this.CONSUME(NumberLiteral, { LABEL: "number" }) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression, { LABEL: "inner" });
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.SUBRULE(this.reference) },
    ]);
  });

  /** name | alias.field | fn(field) */
  public reference = this.RULE("reference", () => {
    this.CONSUME(Identifier, { LABEL: "head" });
    this.OPTION(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(Dot);
            this.CONSUME2(Identifier, { LABEL: "field" });
          },
        },
        {
          ALT: () => {
            this.CONSUME(LParen);
            this.CONSUME3(Identifier, { LABEL: "argument" });
            this.CONSUME(RParen);
          },
        },
      ]);
    });
  });
}

// Chevrotain parsers are built once and reused; parsing is synchronous, so
// no two parses ever share its input.
const parserInstance = new OntoflowParser();

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_MAX_EXPRESSION_DEPTH = 64;

export type ParseOptions = {
  /** Deepest parenthesis nesting accepted in expressions (default 64) */
  maxExpressionDepth?: number;
};

export type ParseResult = {
  program: Program;
  registry: AliasRegistry;
  warnings: CompileWarning[];
};

/**
 * Parse DSL text into a Program.
 *
 * Fails on the first LexError, ParseError or SemanticError; never returns a
 * partial program.
 */
export function parseDsl(text: string, options: ParseOptions = {}): ParseResult {
  // 1. Lex
  const { tokens, comments } = lex(text);

  // 2. Bound nesting before the recursive rules run
  checkNestingDepth(tokens, options.maxExpressionDepth ?? DEFAULT_MAX_EXPRESSION_DEPTH);

  // 3. Parse
  parserInstance.input = tokens;
  const cst = parserInstance.program();
  if (parserInstance.errors.length > 0) {
    const e = parserInstance.errors[0];
    throw toParseError(e.message, e.token, tokens, text);
  }

  // 4. Visit → AST
  const registry = new AliasRegistry();
  const program = toProgram(cst, comments, registry);
  return { program, registry, warnings: registry.warnings };
}

function statementIndexAt(tokens: IToken[], offset: number): number {
  let count = 0;
  for (const t of tokens) {
    if (t.startOffset > offset) break;
    if (statementKeywords.some((kw) => tokenMatcher(t, kw))) count++;
  }
  return Math.max(count, 1);
}

function toParseError(message: string, token: IToken, tokens: IToken[], text: string): ParseError {
  if (tokenMatcher(token, EOF) || Number.isNaN(token.startOffset)) {
    const end = endPosition(text);
    return new ParseError(message, end.line, end.column, "end of input", statementIndexAt(tokens, text.length));
  }
  return new ParseError(
    message,
    token.startLine ?? 1,
    token.startColumn ?? 1,
    token.image,
    statementIndexAt(tokens, token.startOffset),
  );
}

function checkNestingDepth(tokens: IToken[], maxDepth: number): void {
  let depth = 0;
  for (const t of tokens) {
    if (tokenMatcher(t, LParen)) {
      depth++;
      if (depth > maxDepth) {
        throw new ParseError(
          `Expression nesting exceeds the limit of ${maxDepth} levels`,
          t.startLine ?? 1,
          t.startColumn ?? 1,
          t.image,
          statementIndexAt(tokens, t.startOffset),
        );
      }
    } else if (tokenMatcher(t, RParen)) {
      depth = Math.max(depth - 1, 0);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//  CST → AST transformation (imperative visitor)
// ═══════════════════════════════════════════════════════════════════════════

// ── Token / CST node helpers ────────────────────────────────────────────

function isToken(element: CstNode | IToken): element is IToken {
  return "image" in element;
}

function subs(node: CstNode, ruleName: string): CstNode[] {
  return (node.children[ruleName] ?? []).filter((c): c is CstNode => !isToken(c));
}

function sub(node: CstNode, ruleName: string): CstNode | undefined {
  return subs(node, ruleName)[0];
}

function toks(node: CstNode, tokenName: string): IToken[] {
  return (node.children[tokenName] ?? []).filter(isToken);
}

function tok(node: CstNode, tokenName: string): IToken | undefined {
  return toks(node, tokenName)[0];
}

function requireSub(node: CstNode, ruleName: string): CstNode {
  const found = sub(node, ruleName);
  if (!found) throw new InternalCompilerError(`"${node.name}" has no "${ruleName}" child`);
  return found;
}

function requireTok(node: CstNode, tokenName: string): IToken {
  const found = tok(node, tokenName);
  if (!found) throw new InternalCompilerError(`"${node.name}" has no "${tokenName}" token`);
  return found;
}

function findFirstToken(node: CstNode): IToken | undefined {
  let first: IToken | undefined;
  for (const children of Object.values(node.children)) {
    for (const child of children) {
      const candidate = isToken(child) ? child : findFirstToken(child);
      if (candidate && (!first || candidate.startOffset < first.startOffset)) first = candidate;
    }
  }
  return first;
}

function pos(token: IToken): SourcePosition {
  return { line: token.startLine ?? 1, column: token.startColumn ?? 1 };
}

function semantic(message: string, token: IToken, alias?: string): SemanticError {
  const p = pos(token);
  return new SemanticError(message, p.line, p.column, alias);
}

/** String literals lose their quotes; bare words are taken verbatim. */
function literalText(node: CstNode): { text: string; quoted: boolean; token: IToken } {
  const str = tok(node, "StringLiteral");
  if (str) return { text: unquote(str.image), quoted: true, token: str };
  const id = requireTok(node, "Identifier");
  return { text: id.image, quoted: false, token: id };
}

function assertUnique(seen: Set<string>, name: string, token: IToken, what: string): void {
  if (seen.has(name)) throw semantic(`Duplicate ${what} "${name}"`, token);
  seen.add(name);
}

// ── Main AST builder ────────────────────────────────────────────────────

type BuildContext = {
  registry: AliasRegistry;
  /** 1-based index of the statement being built */
  index: number;
};

type StatementBuilder = (node: CstNode, ctx: BuildContext) => Statement;

const builders: [string, StatementBuilder][] = [
  ["loadStatement", buildLoad],
  ["normalizeStatement", buildNormalize],
  ["aggregateStatement", buildAggregate],
  ["unitConvertStatement", buildUnitConvert],
  ["enrichStatement", buildEnrich],
  ["computeStatement", buildCompute],
  ["validateStatement", buildValidate],
];

function toProgram(cst: CstNode, comments: IToken[], registry: AliasRegistry): Program {
  // Statements come in source order; comments are interleaved by offset.
  type Tagged = { offset: number; statement: Statement };
  const tagged: Tagged[] = [];

  subs(cst, "statement").forEach((node, i) => {
    const ctx: BuildContext = { registry, index: i + 1 };
    tagged.push({ offset: findFirstToken(node)?.startOffset ?? 0, statement: buildStatement(node, ctx) });
  });
  for (const c of comments) {
    const statement: CommentStatement = { kind: "comment", text: c.image.slice(1).trim() };
    tagged.push({ offset: c.startOffset, statement });
  }
  tagged.sort((a, b) => a.offset - b.offset);

  return { statements: tagged.map((t) => t.statement) };
}

function buildStatement(node: CstNode, ctx: BuildContext): Statement {
  for (const [ruleName, build] of builders) {
    const inner = sub(node, ruleName);
    if (inner) return build(inner, ctx);
  }
  throw new InternalCompilerError("statement node without a known statement rule");
}

// ── LOAD_CSV ────────────────────────────────────────────────────────────

function buildLoad(node: CstNode, ctx: BuildContext): LoadStatement {
  const pathTok = requireTok(node, "path");
  const aliasTok = requireTok(node, "alias");
  const alias = aliasTok.image;

  const columns: ColumnMapping[] = [];
  const targets = new Set<string>();
  for (const m of subs(node, "columnMapping")) {
    const source = requireTok(m, "source");
    const target = requireTok(m, "target");
    assertUnique(targets, target.image, target, "MAP_COLUMNS destination");
    columns.push({ source: source.image, target: target.image });
  }
  const mapKw = tok(node, "mapColumns");
  if (mapKw && columns.length === 0) {
    throw semantic("MAP_COLUMNS requires at least one column mapping", mapKw, alias);
  }

  ctx.registry.register(alias, "load", ctx.index, columns.map((c) => c.target), pos(aliasTok), columns.length === 0);
  return { kind: "load", path: unquote(pathTok.image), alias, columns };
}

// ── NORMALIZE ───────────────────────────────────────────────────────────

function buildNormalize(node: CstNode, ctx: BuildContext): NormalizeStatement {
  const targetTok = requireTok(node, "target");
  const target = targetTok.image;
  ctx.registry.require(target, pos(targetTok));

  const fields: FieldNormalization[] = [];
  const seenFields = new Set<string>();
  for (const f of subs(node, "fieldNormalization")) {
    const fieldTok = requireTok(f, "field");
    assertUnique(seenFields, fieldTok.image, fieldTok, "NORMALIZE field");
    ctx.registry.useField(target, fieldTok.image, pos(fieldTok));

    const rewrites: ValueRewrite[] = [];
    const seenValues = new Set<string>();
    for (const r of subs(f, "valueRewrite")) {
      const from = literalText(requireSub(r, "from"));
      const to = literalText(requireSub(r, "to"));
      assertUnique(seenValues, from.text, from.token, `value for field "${fieldTok.image}":`);
      rewrites.push({ from: from.text, to: to.text });
    }
    if (rewrites.length === 0) {
      throw semantic(`NORMALIZE field "${fieldTok.image}" needs at least one "old": "new" pair`, fieldTok, target);
    }
    fields.push({ field: fieldTok.image, rewrites });
  }
  if (fields.length === 0) {
    throw semantic(`NORMALIZE ${target} needs at least one field block`, requireTok(node, "body"), target);
  }

  return { kind: "normalize", target, fields };
}

// ── AGGREGATE ───────────────────────────────────────────────────────────

const TIME_WINDOW_MODES = new Map<string, TimeWindowMode>([
  ["hour", "hour"],
  ["hourly", "hour"],
  ["day", "day"],
  ["daily", "day"],
  ["week", "week"],
  ["weekly", "week"],
  ["month", "month"],
  ["monthly", "month"],
  ["year", "year"],
  ["yearly", "year"],
]);

function aggregationFunction(token: IToken): AggregationFunction {
  if (tokenMatcher(token, AggSumKw)) return "sum";
  if (tokenMatcher(token, TakeFirstKw)) return "first";
  if (tokenMatcher(token, AggCountKw)) return "count";
  throw new InternalCompilerError(`"${token.image}" is not an aggregation keyword`);
}

function buildAggregate(node: CstNode, ctx: BuildContext): AggregateStatement {
  const sourceTok = requireTok(node, "source");
  const targetTok = requireTok(node, "target");
  const source = sourceTok.image;
  const target = targetTok.image;
  ctx.registry.require(source, pos(sourceTok));

  const outputs = new Set<string>();
  const groupBy: string[] = [];
  for (const key of toks(requireSub(node, "groupBy"), "item")) {
    assertUnique(outputs, key.image, key, "grouping key");
    ctx.registry.useField(source, key.image, pos(key));
    groupBy.push(key.image);
  }
  if (groupBy.length === 0) {
    throw semantic(`AGGREGATE ${source} requires at least one grouping key`, sourceTok, source);
  }

  let timeWindow: TimeWindow | undefined;
  const tw = sub(node, "timeWindowClause");
  if (tw) {
    const modeTok = requireTok(tw, "mode");
    const fieldTok = requireTok(tw, "sourceField");
    const aliasTok = requireTok(tw, "alias");
    const mode = TIME_WINDOW_MODES.get(modeTok.image.toLowerCase());
    if (!mode) {
      throw semantic(
        `Unsupported TIME_WINDOW mode "${modeTok.image}" (expected hourly, daily, weekly, monthly or yearly)`,
        modeTok,
      );
    }
    ctx.registry.useField(source, fieldTok.image, pos(fieldTok));
    assertUnique(outputs, aliasTok.image, aliasTok, "output field");
    timeWindow = { mode, modeName: modeTok.image, sourceField: fieldTok.image, alias: aliasTok.image };
  }

  const aggregations: AggregationClause[] = [];
  for (const clause of subs(node, "aggregationClause")) {
    const fnTok = requireTok(clause, "function");
    const fieldTok = tok(clause, "field");
    const aliasTok = requireTok(clause, "alias");
    const fn = aggregationFunction(fnTok);
    if (!fieldTok && fn !== "count") {
      throw semantic(`${fnTok.image} requires a field`, fnTok);
    }
    if (fieldTok) ctx.registry.useField(source, fieldTok.image, pos(fieldTok));
    assertUnique(outputs, aliasTok.image, aliasTok, "output field");
    aggregations.push(
      fieldTok ? { function: fn, field: fieldTok.image, alias: aliasTok.image } : { function: fn, alias: aliasTok.image },
    );
  }
  if (aggregations.length === 0) {
    throw semantic(`AGGREGATE into ${target} requires at least one aggregation clause`, targetTok, target);
  }

  const fields = [...groupBy, ...(timeWindow ? [timeWindow.alias] : []), ...aggregations.map((a) => a.alias)];
  ctx.registry.register(target, "aggregate", ctx.index, fields, pos(targetTok));

  const stmt: AggregateStatement = { kind: "aggregate", source, groupBy, target, aggregations };
  if (timeWindow) stmt.timeWindow = timeWindow;
  return stmt;
}

// ── UNIT_CONVERT ────────────────────────────────────────────────────────

function buildUnitConvert(node: CstNode, ctx: BuildContext): UnitConvertStatement {
  const targetTok = requireTok(node, "target");
  const fieldTok = requireTok(node, "field");
  const target = targetTok.image;
  ctx.registry.require(target, pos(targetTok));
  ctx.registry.useField(target, fieldTok.image, pos(fieldTok));

  const from = literalText(requireSub(node, "fromUnit"));
  const to = literalText(requireSub(node, "toUnit"));
  const fromRef: UnitRef = from.quoted ? { kind: "literal", value: from.text } : { kind: "field", name: from.text };
  if (fromRef.kind === "field") ctx.registry.useField(target, fromRef.name, pos(from.token));

  return {
    kind: "unitConvert",
    target,
    field: fieldTok.image,
    from: fromRef,
    to: { name: to.text, quoted: to.quoted },
    table: unquote(requireTok(node, "table").image),
  };
}

// ── ENRICH ──────────────────────────────────────────────────────────────

/** Which names an ENRICH output expression may qualify fields with. */
type ReferenceScope = {
  registry: AliasRegistry;
  source: string;
  factorNames: Set<string>;
};

function buildEnrich(node: CstNode, ctx: BuildContext): EnrichStatement {
  const sourceTok = requireTok(node, "source");
  const keyTok = requireTok(node, "matchKey");
  const targetTok = requireTok(node, "target");
  const source = sourceTok.image;
  const target = targetTok.image;
  ctx.registry.require(source, pos(sourceTok));
  ctx.registry.useField(source, keyTok.image, pos(keyTok));

  const factorTable = literalText(requireSub(node, "factorTable")).text;
  const scope: ReferenceScope = {
    registry: ctx.registry,
    source,
    factorNames: new Set([factorTable, factorRowAlias(factorTable)]),
  };

  const outputs: OutputField[] = [];
  const seen = new Set<string>();
  for (const field of subs(node, "outputField")) {
    const nameTok = requireTok(field, "name");
    assertUnique(seen, nameTok.image, nameTok, "output field");
    outputs.push({ name: nameTok.image, value: buildExpression(requireSub(field, "value"), scope) });
  }
  if (outputs.length === 0) {
    throw semantic(`ENRICH output ${target} needs at least one field`, requireTok(node, "body"), target);
  }

  ctx.registry.register(target, "enrich", ctx.index, outputs.map((o) => o.name), pos(targetTok));
  return { kind: "enrich", source, factorTable, matchKey: keyTok.image, target, outputs };
}

// ── COMPUTE ─────────────────────────────────────────────────────────────

const COMPUTE_FUNCTIONS = new Map<string, ComputeFunction>([
  ["sum", "sum"],
  ["avg", "avg"],
  ["min", "min"],
  ["max", "max"],
  ["count", "count"],
]);

function buildCompute(node: CstNode, ctx: BuildContext): ComputeStatement {
  const resultTok = requireTok(node, "result");
  const sourceTok = requireTok(node, "source");
  const targetTok = requireTok(node, "target");
  const fnTok = requireTok(node, "function");
  const fieldTok = requireTok(node, "field");
  const source = sourceTok.image;
  const target = targetTok.image;
  ctx.registry.require(source, pos(sourceTok));

  const list = sub(node, "groupBy");
  const keyToks = list ? toks(list, "item") : toks(node, "groupKey");
  const groupBy: string[] = [];
  const seen = new Set<string>();
  for (const key of keyToks) {
    assertUnique(seen, key.image, key, "grouping key");
    ctx.registry.useField(source, key.image, pos(key));
    groupBy.push(key.image);
  }
  if (groupBy.length === 0) {
    throw semantic(`COMPUTE ${resultTok.image} requires at least one grouping key`, resultTok);
  }
  if (seen.has(resultTok.image)) {
    throw semantic(`COMPUTE result "${resultTok.image}" clashes with a grouping key`, resultTok);
  }

  const fn = COMPUTE_FUNCTIONS.get(fnTok.image.toLowerCase());
  if (!fn) {
    throw semantic(
      `Unsupported aggregation function "${fnTok.image}" (expected one of ${[...COMPUTE_FUNCTIONS.keys()].join(", ")})`,
      fnTok,
    );
  }
  ctx.registry.useField(source, fieldTok.image, pos(fieldTok));

  ctx.registry.register(target, "compute", ctx.index, [...groupBy, resultTok.image], pos(targetTok));
  return {
    kind: "compute",
    result: resultTok.image,
    source,
    groupBy,
    target,
    function: fn,
    field: fieldTok.image,
  };
}

// ── VALIDATE ────────────────────────────────────────────────────────────

function buildValidate(node: CstNode, ctx: BuildContext): ValidateStatement {
  const targetTok = requireTok(node, "target");
  ctx.registry.require(targetTok.image, pos(targetTok));
  return { kind: "validate", target: targetTok.image, rule: unquote(requireTok(node, "rule").image) };
}

// ── Expressions ─────────────────────────────────────────────────────────

function shapeOf(expr: Expression): ExpressionShape {
  switch (expr.kind) {
    case "string": return "string";
    case "number": return "number";
    case "binary": return expr.shape;
    default: return "unknown";
  }
}

const OPERATORS = new Map<string, BinaryOperator>([
  ["+", "+"],
  ["-", "-"],
  ["*", "*"],
  ["/", "/"],
]);

function binaryOperator(token: IToken): BinaryOperator {
  const operator = OPERATORS.get(token.image);
  if (!operator) throw new InternalCompilerError(`"${token.image}" is not a binary operator`);
  return operator;
}

/**
 * `+` on a string operand is concatenation; two numbers add; anything else
 * involving an identifier is left to the target language's own `+`.
 */
function combine(opTok: IToken, left: Expression, right: Expression): Expression {
  const operator = binaryOperator(opTok);
  const l = shapeOf(left);
  const r = shapeOf(right);
  let shape: ExpressionShape;
  if (operator === "+") {
    shape = l === "string" || r === "string" ? "string" : l === "number" && r === "number" ? "number" : "unknown";
  } else {
    if (l === "string" || r === "string") {
      throw semantic(`Operator "${operator}" cannot be applied to a string`, opTok);
    }
    shape = l === "number" && r === "number" ? "number" : "unknown";
  }
  return { kind: "binary", operator, left, right, shape };
}

/** Left-fold `operand (operator operand)*` into a left-associative tree. */
function foldOperands(node: CstNode, scope: ReferenceScope, build: (n: CstNode, s: ReferenceScope) => Expression): Expression {
  const operands = subs(node, "operand");
  const operators = toks(node, "operator");
  if (operands.length !== operators.length + 1) {
    throw new InternalCompilerError(`"${node.name}" has ${operands.length} operands for ${operators.length} operators`);
  }
  let result = build(operands[0], scope);
  operators.forEach((op, i) => {
    result = combine(op, result, build(operands[i + 1], scope));
  });
  return result;
}

function buildExpression(node: CstNode, scope: ReferenceScope): Expression {
  return foldOperands(node, scope, buildMultiplicative);
}

function buildMultiplicative(node: CstNode, scope: ReferenceScope): Expression {
  return foldOperands(node, scope, buildAtom);
}

/** Source digits without redundant leading zeros. */
function numberText(image: string): string {
  return image.replace(/^0+(?=\d)/, "");
}

function buildAtom(node: CstNode, scope: ReferenceScope): Expression {
  const str = tok(node, "string");
  if (str) return { kind: "string", value: unquote(str.image) };
  const num = tok(node, "number");
  if (num) return { kind: "number", value: Number(num.image), text: numberText(num.image) };
  const inner = sub(node, "inner");
  if (inner) return buildExpression(inner, scope);
  return buildReference(requireSub(node, "reference"), scope);
}

function buildReference(node: CstNode, scope: ReferenceScope): Expression {
  const head = requireTok(node, "head");
  const field = tok(node, "field");
  const argument = tok(node, "argument");

  if (argument) {
    scope.registry.useField(scope.source, argument.image, pos(argument));
    return { kind: "call", name: head.image, argument: argument.image };
  }
  if (field) {
    if (head.image === scope.source) {
      scope.registry.useField(scope.source, field.image, pos(field));
    } else if (!scope.factorNames.has(head.image)) {
      const allowed = [scope.source, ...scope.factorNames].map((n) => `"${n}"`).join(", ");
      throw semantic(`Unknown reference "${head.image}.${field.image}": fields must be qualified with ${allowed}`, head, head.image);
    }
    return { kind: "identifier", qualifier: head.image, name: field.image };
  }
  scope.registry.useField(scope.source, head.image, pos(head));
  return { kind: "identifier", name: head.image };
}
