import type {
  AggregateStatement,
  AggregationClause,
  BinaryExpression,
  ComputeStatement,
  EnrichStatement,
  Expression,
  LoadStatement,
  NormalizeStatement,
  Program,
  Statement,
  TargetUnit,
  UnitConvertStatement,
  UnitRef,
} from "./types.js";

/**
 * Serialize a Program back to canonical DSL text.
 *
 * Parsing the result yields a structurally equal Program. A comment stays
 * attached to the statement after it; other statements are separated by a
 * blank line.
 */
export function formatProgram(program: Program): string {
  if (program.statements.length === 0) return "";

  let out = "";
  program.statements.forEach((statement, i) => {
    if (i > 0) out += program.statements[i - 1].kind === "comment" ? "\n" : "\n\n";
    out += formatStatement(statement);
  });
  return out + "\n";
}

export function formatStatement(statement: Statement): string {
  switch (statement.kind) {
    case "comment":
      return statement.text ? `# ${statement.text}` : "#";
    case "load":
      return formatLoad(statement);
    case "normalize":
      return formatNormalize(statement);
    case "aggregate":
      return formatAggregate(statement);
    case "unitConvert":
      return formatUnitConvert(statement);
    case "enrich":
      return formatEnrich(statement);
    case "compute":
      return formatCompute(statement);
    case "validate":
      return `VALIDATE ${statement.target} WITH ${quote(statement.rule)}`;
  }
}

// ── Literals ────────────────────────────────────────────────────────────

/** Double-quoted DSL string, escaped so the lexer decodes it back to `value`. */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}

/**
 * Bare word when it cannot be mistaken for a keyword, quoted otherwise.
 * Keywords are all upper case, so any lower-case letter or digit is enough.
 */
function word(value: string): string {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(value) && /[a-z0-9]/.test(value) ? value : quote(value);
}

// ── Statements ──────────────────────────────────────────────────────────

function formatLoad(stmt: LoadStatement): string {
  const head = `LOAD_CSV ${quote(stmt.path)} AS ${stmt.alias}`;
  if (stmt.columns.length === 0) return head;
  const mappings = stmt.columns.map((c) => `${c.source} -> ${c.target}`);
  return `${head} MAP_COLUMNS {\n${mappings.map((m) => `  ${m}`).join(",\n")}\n}`;
}

function formatNormalize(stmt: NormalizeStatement): string {
  const fields = stmt.fields.map(({ field, rewrites }) => {
    const pairs = rewrites.map((r) => `${quote(r.from)}: ${quote(r.to)}`).join(", ");
    return `  ${field}: { ${pairs} }`;
  });
  return `NORMALIZE ${stmt.target} {\n${fields.join(",\n")}\n}`;
}

const AGGREGATION_KEYWORDS: Record<AggregationClause["function"], string> = {
  sum: "AGG_SUM",
  first: "TAKE_FIRST",
  count: "AGG_COUNT",
};

function formatAggregate(stmt: AggregateStatement): string {
  const lines = [`AGGREGATE ${stmt.source} BY [${stmt.groupBy.join(", ")}] INTO ${stmt.target}`];
  for (const a of stmt.aggregations) {
    lines.push(`  ${AGGREGATION_KEYWORDS[a.function]}(${a.field ?? ""}) AS ${a.alias}`);
  }
  if (stmt.timeWindow) {
    const tw = stmt.timeWindow;
    lines.push(`  TIME_WINDOW ${tw.modeName} FROM ${tw.sourceField} INTO ${tw.alias}`);
  }
  return lines.join("\n");
}

function formatUnit(ref: UnitRef): string {
  return ref.kind === "field" ? ref.name : quote(ref.value);
}

function formatTargetUnit(unit: TargetUnit): string {
  return unit.quoted ? quote(unit.name) : unit.name;
}

function formatUnitConvert(stmt: UnitConvertStatement): string {
  return (
    `UNIT_CONVERT ${stmt.target}.${stmt.field} FROM ${formatUnit(stmt.from)} ` +
    `TO ${formatTargetUnit(stmt.to)} USING ${quote(stmt.table)}`
  );
}

function formatEnrich(stmt: EnrichStatement): string {
  const outputs = stmt.outputs.map((o) => `    ${o.name}: ${formatExpression(o.value)}`);
  return [
    `ENRICH ${stmt.source} WITH ${word(stmt.factorTable)} MATCH ON ${stmt.matchKey}`,
    `  OUTPUT ${stmt.target} AS {`,
    outputs.join(",\n"),
    "  }",
  ].join("\n");
}

function formatCompute(stmt: ComputeStatement): string {
  const keys = stmt.groupBy.length === 1 ? stmt.groupBy[0] : `[${stmt.groupBy.join(", ")}]`;
  return (
    `COMPUTE ${stmt.result} FOR ${stmt.source} GROUP BY ${keys} ` +
    `INTO ${stmt.target} AS ${stmt.function}(${stmt.field})`
  );
}

// ── Expressions ─────────────────────────────────────────────────────────

const PRECEDENCE = { "+": 1, "-": 1, "*": 2, "/": 2 } as const;

function formatOperand(parent: BinaryExpression, child: Expression, side: "left" | "right"): string {
  const text = formatExpression(child);
  if (child.kind !== "binary") return text;
  const parentPrec = PRECEDENCE[parent.operator];
  const childPrec = PRECEDENCE[child.operator];
  return childPrec < parentPrec || (side === "right" && childPrec === parentPrec) ? `(${text})` : text;
}

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case "identifier":
      return expr.qualifier === undefined ? expr.name : `${expr.qualifier}.${expr.name}`;
    case "string":
      return quote(expr.value);
    case "number":
      return expr.text;
    case "call":
      return `${expr.name}(${expr.argument})`;
    case "binary":
      return `${formatOperand(expr, expr.left, "left")} ${expr.operator} ${formatOperand(expr, expr.right, "right")}`;
  }
}
