/**
 * Cypher generator: turns a parsed Program into ordered Cypher blocks.
 *
 * One block per non-comment statement. A block opens with a `// KIND: …`
 * trace line, ends every Cypher statement with `;` and never contains a
 * blank line.
 */
import { InternalCompilerError } from "./errors.js";
import type { ReadonlyAliasRegistry } from "./registry.js";
import type {
  AggregateStatement,
  AggregationClause,
  BinaryExpression,
  BinaryOperator,
  ComputeStatement,
  EnrichStatement,
  Expression,
  LoadStatement,
  NormalizeStatement,
  Program,
  Statement,
  TimeWindow,
  UnitConvertStatement,
  UnitRef,
  ValidateStatement,
} from "./types.js";
import { factorRowAlias, provenanceRelationship } from "./utils.js";

/**
 * Generate one Cypher block per non-comment statement, in program order.
 */
export function generateCypherBlocks(program: Program, registry: ReadonlyAliasRegistry): string[] {
  const blocks: string[] = [];
  for (const statement of program.statements) {
    const lines = generateStatement(statement, registry);
    if (lines) blocks.push(lines.join("\n"));
  }
  return blocks;
}

/** Blocks joined by a blank line, with a trailing newline. */
export function joinBlocks(blocks: string[]): string {
  return blocks.length === 0 ? "" : `${blocks.join("\n\n")}\n`;
}

function generateStatement(statement: Statement, registry: ReadonlyAliasRegistry): string[] | undefined {
  switch (statement.kind) {
    case "comment":
      return undefined;
    case "load":
      return generateLoad(statement, registry);
    case "normalize":
      return generateNormalize(statement);
    case "aggregate":
      return generateAggregate(statement);
    case "unitConvert":
      return generateUnitConvert(statement);
    case "enrich":
      return generateEnrich(statement);
    case "compute":
      return generateCompute(statement);
    case "validate":
      return generateValidate(statement);
    default: {
      const unknown: never = statement;
      throw new InternalCompilerError(`unknown statement kind ${JSON.stringify(unknown)}`);
    }
  }
}

// ── Rendering helpers ───────────────────────────────────────────────────

const PLAIN_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Cypher keywords that cannot stand bare as a variable, key or label. */
const RESERVED = new Set([
  "all", "and", "as", "asc", "ascending", "by", "call", "case", "contains", "create",
  "csv", "delete", "desc", "descending", "detach", "distinct", "else", "end", "ends",
  "exists", "false", "fieldterminator", "foreach", "from", "headers", "in", "is", "limit",
  "load", "match", "merge", "not", "null", "on", "optional", "or", "order", "remove",
  "return", "set", "skip", "starts", "then", "true", "union", "unwind", "using", "when",
  "where", "with", "xor", "yield",
]);

/** Single-quoted Cypher string literal. */
export function cypherString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `'${escaped}'`;
}

/** Label, property or variable name; backtick-quoted unless plain and not a keyword. */
export function cypherName(name: string): string {
  return PLAIN_NAME.test(name) && !RESERVED.has(name.toLowerCase()) ? name : `\`${name.replace(/`/g, "``")}\``;
}

/** `preferred`, or the first `preferred_N` that no projection already names. */
function freeVariable(preferred: string, taken: readonly string[]): string {
  let name = preferred;
  for (let n = 1; taken.includes(name); n++) name = `${preferred}_${n}`;
  return name;
}

function trace(kind: string, subject: string): string {
  return `// ${kind}: ${subject.replace(/[\r\n]+/g, " ")}`;
}

function prop(variable: string, field: string): string {
  return `${variable}.${cypherName(field)}`;
}

/** Append `;` to the last line of a statement. */
function terminate(lines: string[]): string[] {
  if (lines.length === 0) throw new InternalCompilerError("empty Cypher statement");
  const last = lines.length - 1;
  return lines.map((line, i) => (i === last ? `${line};` : line));
}

/** `{\n  k: v,\n  …\n}` continuation lines appended to `head`. */
function mapLiteral(head: string, entries: [string, string][]): string[] {
  return [
    `${head} {`,
    ...entries.map(([k, v], i) => `  ${cypherName(k)}: ${v}${i < entries.length - 1 ? "," : ""}`),
    "})",
  ];
}

// ── LOAD_CSV ────────────────────────────────────────────────────────────

function factoryColumn(stmt: LoadStatement, registry: ReadonlyAliasRegistry): string | undefined {
  if (stmt.columns.length > 0) {
    return (
      stmt.columns.find((c) => c.target === "factory_id")?.source ??
      stmt.columns.find((c) => c.source === "factory")?.source
    );
  }
  const fields = registry.get(stmt.alias)?.fields ?? [];
  return ["factory", "factory_id"].find((f) => fields.includes(f));
}

function generateLoad(stmt: LoadStatement, registry: ReadonlyAliasRegistry): string[] {
  const label = cypherName(stmt.alias);
  const lines = [
    trace("LOAD_CSV", `${stmt.path} AS ${stmt.alias}`),
    `LOAD CSV WITH HEADERS FROM ${cypherString(`file:///${stmt.path}`)} AS row`,
  ];

  let entries: [string, string][];
  if (stmt.columns.length > 0) {
    entries = stmt.columns.map((c) => [c.target, prop("row", c.source)]);
  } else {
    const entry = registry.get(stmt.alias);
    if (!entry) throw new InternalCompilerError(`alias "${stmt.alias}" is not registered`);
    entries = entry.fields.map((f) => [f, prop("row", f)]);
  }

  const factory = factoryColumn(stmt, registry);
  const body: string[] = [];
  if (factory !== undefined) body.push(`MERGE (f:factory {id: ${prop("row", factory)}})`);
  if (entries.length === 0) {
    body.push(`CREATE (m:${label})`, "SET m += row");
  } else {
    body.push(...mapLiteral(`CREATE (m:${label}`, entries));
  }
  if (factory !== undefined) body.push("MERGE (m)-[:AT_FACTORY]->(f)");

  return [...lines, ...terminate(body)];
}

// ── NORMALIZE ───────────────────────────────────────────────────────────

function generateNormalize(stmt: NormalizeStatement): string[] {
  if (stmt.fields.length === 0) throw new InternalCompilerError(`NORMALIZE ${stmt.target} has no fields`);
  const label = cypherName(stmt.target);
  const lines = [trace("NORMALIZE", stmt.target)];
  for (const { field, rewrites } of stmt.fields) {
    for (const { from, to } of rewrites) {
      lines.push(
        ...terminate([
          `MATCH (n:${label})`,
          `WHERE ${prop("n", field)} = ${cypherString(from)}`,
          `SET ${prop("n", field)} = ${cypherString(to)}`,
        ]),
      );
    }
  }
  return lines;
}

// ── AGGREGATE ───────────────────────────────────────────────────────────

function timeBucket(tw: TimeWindow, m: string): string {
  const source = `datetime(${prop(m, tw.sourceField)})`;
  return tw.mode === "hour"
    ? `datetime.truncate('hour', ${source})`
    : `date.truncate(${cypherString(tw.mode)}, ${source})`;
}

function aggregationExpression(clause: AggregationClause, m: string): string {
  switch (clause.function) {
    case "sum":
    case "first":
      if (clause.field === undefined) {
        throw new InternalCompilerError(`${clause.function} aggregation "${clause.alias}" has no field`);
      }
      return clause.function === "sum" ? `sum(${prop(m, clause.field)})` : `collect(${prop(m, clause.field)})[0]`;
    case "count":
      return clause.field === undefined ? "count(*)" : `count(${prop(m, clause.field)})`;
  }
}

function generateAggregate(stmt: AggregateStatement): string[] {
  if (stmt.groupBy.length === 0) throw new InternalCompilerError(`AGGREGATE ${stmt.source} has no grouping keys`);
  if (stmt.aggregations.length === 0) {
    throw new InternalCompilerError(`AGGREGATE ${stmt.source} has no aggregation clauses`);
  }

  const aliases = [
    ...stmt.groupBy,
    ...(stmt.timeWindow ? [stmt.timeWindow.alias] : []),
    ...stmt.aggregations.map((c) => c.alias),
  ];
  const m = freeVariable("m", aliases);
  const a = freeVariable("a", aliases);

  const projections: [string, string][] = stmt.groupBy.map((k) => [prop(m, k), k]);
  if (stmt.timeWindow) projections.push([timeBucket(stmt.timeWindow, m), stmt.timeWindow.alias]);
  for (const clause of stmt.aggregations) projections.push([aggregationExpression(clause, m), clause.alias]);

  const body = [
    `MATCH (${m}:${cypherName(stmt.source)})`,
    "WITH",
    ...projections.map(([expr, alias], i) => `  ${expr} AS ${cypherName(alias)}${i < projections.length - 1 ? "," : ""}`),
    ...mapLiteral(
      `CREATE (${a}:${cypherName(stmt.target)}`,
      projections.map(([, alias]) => [alias, cypherName(alias)]),
    ),
  ];
  if (stmt.groupBy.includes("factory_id")) {
    body.push(`WITH ${a}`, `MATCH (f:factory {id: ${a}.factory_id})`, `MERGE (${a})-[:AT_FACTORY]->(f)`);
  }
  return [trace("AGGREGATE", `${stmt.source} -> ${stmt.target}`), ...terminate(body)];
}

// ── UNIT_CONVERT ────────────────────────────────────────────────────────

function unitName(ref: UnitRef): string {
  return ref.kind === "field" ? ref.name : ref.value;
}

function generateUnitConvert(stmt: UnitConvertStatement): string[] {
  const to = cypherString(stmt.to.name);
  const unitField = stmt.from.kind === "field" ? stmt.from.name : "unit";
  const conditions =
    stmt.from.kind === "field"
      ? [`conv.from_unit = ${prop("n", stmt.from.name)}`]
      : [`${prop("n", unitField)} = ${cypherString(stmt.from.value)}`, `conv.from_unit = ${cypherString(stmt.from.value)}`];
  conditions.push(`conv.to_unit = ${to}`);

  const value = prop("n", stmt.field);
  return [
    trace(
      "UNIT_CONVERT",
      `${stmt.target}.${stmt.field} FROM ${unitName(stmt.from)} TO ${stmt.to.name} USING ${stmt.table}`,
    ),
    ...terminate([
      `LOAD CSV WITH HEADERS FROM ${cypherString(`file:///${stmt.table}`)} AS conv`,
      `MATCH (n:${cypherName(stmt.target)})`,
      `WHERE ${conditions.join(" AND ")}`,
      `SET ${value} = ${value} * toFloat(conv.factor), ${prop("n", unitField)} = ${to}`,
    ]),
  ];
}

// ── ENRICH ──────────────────────────────────────────────────────────────

type Resolver = (qualifier: string | undefined) => string;

const PRECEDENCE: Record<BinaryOperator, number> = { "+": 1, "-": 1, "*": 2, "/": 2 };

function isStringShaped(expr: Expression): boolean {
  return expr.kind === "string" || (expr.kind === "binary" && expr.shape === "string");
}

function renderOperand(parent: BinaryExpression, child: Expression, side: "left" | "right", resolve: Resolver): string {
  const rendered = renderExpression(child, resolve);
  if (parent.operator === "+" && parent.shape === "string" && !isStringShaped(child)) {
    return `toString(${rendered})`;
  }
  if (child.kind !== "binary") return rendered;
  const parentPrec = PRECEDENCE[parent.operator];
  const childPrec = PRECEDENCE[child.operator];
  const needsParens = childPrec < parentPrec || (side === "right" && childPrec === parentPrec);
  return needsParens ? `(${rendered})` : rendered;
}

export function renderExpression(expr: Expression, resolve: Resolver): string {
  switch (expr.kind) {
    case "identifier":
      return prop(resolve(expr.qualifier), expr.name);
    case "string":
      return cypherString(expr.value);
    case "number":
      return expr.text;
    case "call":
      return `${cypherName(expr.name)}(${prop(resolve(undefined), expr.argument)})`;
    case "binary":
      return `${renderOperand(expr, expr.left, "left", resolve)} ${expr.operator} ${renderOperand(expr, expr.right, "right", resolve)}`;
  }
}

function generateEnrich(stmt: EnrichStatement): string[] {
  if (stmt.outputs.length === 0) throw new InternalCompilerError(`ENRICH ${stmt.source} has no output fields`);
  const factorNames = new Set([stmt.factorTable, factorRowAlias(stmt.factorTable)]);
  const resolve: Resolver = (qualifier) => {
    if (qualifier === undefined || qualifier === stmt.source) return "a";
    if (factorNames.has(qualifier)) return "ef";
    throw new InternalCompilerError(`reference qualifier "${qualifier}" is not in scope`);
  };

  return [
    trace("ENRICH", `${stmt.source} WITH ${stmt.factorTable} -> ${stmt.target}`),
    ...terminate([
      `MATCH (a:${cypherName(stmt.source)}), (ef:${cypherName(stmt.factorTable)})`,
      `WHERE ${prop("a", stmt.matchKey)} = ${prop("ef", stmt.matchKey)}`,
      ...mapLiteral(
        `CREATE (e:${cypherName(stmt.target)}`,
        stmt.outputs.map((o) => [o.name, renderExpression(o.value, resolve)]),
      ),
      `MERGE (e)-[:${cypherName(provenanceRelationship(stmt.source))}]->(a)`,
    ]),
  ];
}

// ── COMPUTE ─────────────────────────────────────────────────────────────

function generateCompute(stmt: ComputeStatement): string[] {
  if (stmt.groupBy.length === 0) throw new InternalCompilerError(`COMPUTE ${stmt.result} has no grouping keys`);
  const result = cypherName(stmt.result);
  const keys = stmt.groupBy.map(cypherName);
  const n = freeVariable("n", [...stmt.groupBy, stmt.result]);
  const g = freeVariable("g", [...stmt.groupBy, stmt.result]);
  const projections = [
    ...stmt.groupBy.map((k, i) => `${prop(n, k)} AS ${keys[i]}`),
    `${stmt.function}(${prop(n, stmt.field)}) AS ${result}`,
  ];
  return [
    trace("COMPUTE", `${stmt.result} FOR ${stmt.source} -> ${stmt.target}`),
    ...terminate([
      `MATCH (${n}:${cypherName(stmt.source)})`,
      `WITH ${projections.join(", ")}`,
      `MERGE (${g}:${cypherName(stmt.target)} {${keys.map((k) => `${k}: ${k}`).join(", ")}})`,
      `SET ${g}.${result} = ${result}`,
    ]),
  ];
}

// ── VALIDATE ────────────────────────────────────────────────────────────

function generateValidate(stmt: ValidateStatement): string[] {
  return [
    trace("VALIDATE", `${stmt.target} WITH ${stmt.rule}`),
    `// Rule ${cypherString(stmt.rule).replace(/[\r\n]+/g, " ")} is not enforced; matching nodes are returned`,
    ...terminate([`MATCH (n:${cypherName(stmt.target)})`, "RETURN n"]),
  ];
}
