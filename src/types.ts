// ── Tokens ──────────────────────────────────────────────────────────────────

export type TokenKind =
  | "keyword"
  | "identifier"
  | "string"
  | "number"
  | "operator"
  | "punctuation"
  | "eof";

/**
 * A lexical unit of DSL source.
 *
 * `text` is the raw image; `value` is the decoded value (unquoted string,
 * parsed number, or the image itself for everything else).
 */
export type Token = {
  kind: TokenKind;
  text: string;
  value: string | number;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  offset: number;
};

// ── Expressions ─────────────────────────────────────────────────────────────

export type BinaryOperator = "+" | "-" | "*" | "/";

/**
 * Best-effort static kind of an expression's value, computed bottom-up from
 * literals. Identifiers and function calls are always "unknown".
 */
export type ExpressionShape = "string" | "number" | "unknown";

/** `field` or `alias.field` */
export type IdentifierExpression = {
  kind: "identifier";
  name: string;
  qualifier?: string;
};

export type StringLiteral = {
  kind: "string";
  value: string;
};

/** `text` keeps every written digit; `value` may round past 2^53. */
export type NumberLiteral = {
  kind: "number";
  value: number;
  text: string;
};

export type BinaryExpression = {
  kind: "binary";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
  shape: ExpressionShape;
};

/** `name(argument)`: exactly one bare field argument */
export type FunctionCall = {
  kind: "call";
  name: string;
  argument: string;
};

export type Expression =
  | IdentifierExpression
  | StringLiteral
  | NumberLiteral
  | BinaryExpression
  | FunctionCall;

// ── Statements ──────────────────────────────────────────────────────────────

/** `src -> dst` inside MAP_COLUMNS */
export type ColumnMapping = {
  source: string;
  target: string;
};

/**
 * LOAD_CSV "level1.csv" AS measurement MAP_COLUMNS { factory -> factory_id }
 *
 * An empty `columns` list means the clause was omitted (pass-through).
 */
export type LoadStatement = {
  kind: "load";
  path: string;
  alias: string;
  columns: ColumnMapping[];
};

export type ValueRewrite = {
  from: string;
  to: string;
};

export type FieldNormalization = {
  field: string;
  rewrites: ValueRewrite[];
};

/** NORMALIZE measurement { fuel: { "gass": "gas" } } */
export type NormalizeStatement = {
  kind: "normalize";
  target: string;
  fields: FieldNormalization[];
};

export type AggregationFunction = "sum" | "first" | "count";

export type AggregationClause = {
  function: AggregationFunction;
  /** Absent only for a bare AGG_COUNT() */
  field?: string;
  alias: string;
};

export type TimeWindowMode = "hour" | "day" | "week" | "month" | "year";

export type TimeWindow = {
  mode: TimeWindowMode;
  /** Mode exactly as written, kept for formatting */
  modeName: string;
  sourceField: string;
  alias: string;
};

/**
 * AGGREGATE measurement BY [factory_id] INTO activity
 *   AGG_SUM(value) AS value
 *   TIME_WINDOW monthly FROM time INTO period
 */
export type AggregateStatement = {
  kind: "aggregate";
  source: string;
  groupBy: string[];
  target: string;
  aggregations: AggregationClause[];
  timeWindow?: TimeWindow;
};

/**
 * The FROM unit. A bare identifier names the node field holding the unit;
 * a quoted string is a literal unit name.
 */
export type UnitRef =
  | { kind: "field"; name: string }
  | { kind: "literal"; value: string };

/** The TO unit is always a unit name; `quoted` records how it was written. */
export type TargetUnit = {
  name: string;
  quoted: boolean;
};

/** UNIT_CONVERT activity.value FROM unit TO "kwh" USING "conv_table.csv" */
export type UnitConvertStatement = {
  kind: "unitConvert";
  target: string;
  field: string;
  from: UnitRef;
  to: TargetUnit;
  table: string;
};

export type OutputField = {
  name: string;
  value: Expression;
};

/**
 * ENRICH activity WITH emission_factor_table MATCH ON fuel
 *   OUTPUT emission AS { scope: emission_factor.scope }
 */
export type EnrichStatement = {
  kind: "enrich";
  source: string;
  factorTable: string;
  matchKey: string;
  target: string;
  outputs: OutputField[];
};

export type ComputeFunction = "sum" | "avg" | "min" | "max" | "count";

/** COMPUTE total FOR emission GROUP BY scope INTO report AS sum(value) */
export type ComputeStatement = {
  kind: "compute";
  result: string;
  source: string;
  groupBy: string[];
  target: string;
  function: ComputeFunction;
  field: string;
};

/** VALIDATE ghg_report WITH "total_equals_sum" */
export type ValidateStatement = {
  kind: "validate";
  target: string;
  rule: string;
};

/** A `#` line comment; generates nothing */
export type CommentStatement = {
  kind: "comment";
  text: string;
};

export type Statement =
  | LoadStatement
  | NormalizeStatement
  | AggregateStatement
  | UnitConvertStatement
  | EnrichStatement
  | ComputeStatement
  | ValidateStatement
  | CommentStatement;

export type StatementKind = Statement["kind"];

/** Statement order is execution order. */
export type Program = {
  statements: Statement[];
};
