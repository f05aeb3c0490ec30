/**
 * Parser tests: every statement form, expression precedence, and the
 * syntax and semantic errors the AST builder raises.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseDsl } from "../src/parser/index.js";
import { ParseError, SemanticError } from "../src/errors.js";
import type { EnrichStatement, Expression } from "../src/types.js";

const MEASUREMENT = `LOAD_CSV "level1.csv" AS measurement MAP_COLUMNS {
  factory -> factory_id,
  product -> product_id,
  type -> fuel,
  amount -> value,
  unit -> unit,
  ts -> time
}`;

const ACTIVITY = `LOAD_CSV "activity.csv" AS activity MAP_COLUMNS { id -> id, fuel -> fuel, value -> value }`;

function onlyEnrich(source: string): EnrichStatement {
  const stmt = parseDsl(source).program.statements.find((s) => s.kind === "enrich");
  assert.ok(stmt && stmt.kind === "enrich");
  return stmt;
}

function outputExpression(expr: string): Expression {
  const stmt = onlyEnrich(`${ACTIVITY}
ENRICH activity WITH emission_factor_table MATCH ON fuel OUTPUT emission AS { x: ${expr} }`);
  return stmt.outputs[0].value;
}

function assertSemantic(source: string, pattern: RegExp, alias?: string) {
  assert.throws(
    () => parseDsl(source),
    (err: unknown) => {
      assert.ok(err instanceof SemanticError, `expected SemanticError, got ${String(err)}`);
      assert.match(err.message, pattern);
      if (alias !== undefined) assert.equal(err.alias, alias);
      return true;
    },
  );
}

// ── Statements ──────────────────────────────────────────────────────────

describe("parser: LOAD_CSV", () => {
  it("parses a load with column mappings", () => {
    const { program, registry } = parseDsl(
      `LOAD_CSV "level1.csv" AS measurement MAP_COLUMNS { factory -> factory_id, type -> fuel }`,
    );
    assert.deepEqual(program.statements, [
      {
        kind: "load",
        path: "level1.csv",
        alias: "measurement",
        columns: [
          { source: "factory", target: "factory_id" },
          { source: "type", target: "fuel" },
        ],
      },
    ]);
    assert.deepEqual(registry.get("measurement"), {
      alias: "measurement",
      kind: "load",
      statementIndex: 1,
      fields: ["factory_id", "fuel"],
      open: false,
    });
  });

  it("accepts mappings without separating commas", () => {
    const { program } = parseDsl(`LOAD_CSV "a.csv" AS m MAP_COLUMNS { a -> b c -> d }`);
    assert.deepEqual(program.statements[0], {
      kind: "load",
      path: "a.csv",
      alias: "m",
      columns: [
        { source: "a", target: "b" },
        { source: "c", target: "d" },
      ],
    });
  });

  it("registers a load without MAP_COLUMNS as an open alias", () => {
    const { registry } = parseDsl(`LOAD_CSV "raw.csv" AS raw`);
    assert.equal(registry.get("raw")?.open, true);
    assert.deepEqual(registry.get("raw")?.fields, []);
  });

  it("merges fields when the same alias is loaded twice", () => {
    const { registry } = parseDsl(`LOAD_CSV "a.csv" AS m MAP_COLUMNS { a -> x }
LOAD_CSV "b.csv" AS m MAP_COLUMNS { b -> y }`);
    assert.deepEqual(registry.get("m")?.fields, ["x", "y"]);
    assert.equal(registry.get("m")?.statementIndex, 1);
  });

  it("rejects an empty MAP_COLUMNS block", () => {
    assertSemantic(`LOAD_CSV "a.csv" AS m MAP_COLUMNS { }`, /MAP_COLUMNS requires at least one column mapping/);
  });

  it("rejects duplicate mapping destinations", () => {
    assertSemantic(
      `LOAD_CSV "a.csv" AS m MAP_COLUMNS { a -> x, b -> x }`,
      /Duplicate MAP_COLUMNS destination "x"/,
    );
  });
});

describe("parser: NORMALIZE", () => {
  it("parses string and bare-word values", () => {
    const { program } = parseDsl(`${MEASUREMENT}
NORMALIZE measurement { fuel: { "gass": "gas", diesel_oil: diesel }, unit: { "KWH": "kwh" } }`);
    assert.deepEqual(program.statements[1], {
      kind: "normalize",
      target: "measurement",
      fields: [
        {
          field: "fuel",
          rewrites: [
            { from: "gass", to: "gas" },
            { from: "diesel_oil", to: "diesel" },
          ],
        },
        { field: "unit", rewrites: [{ from: "KWH", to: "kwh" }] },
      ],
    });
  });

  it("requires the target to be defined", () => {
    assertSemantic(`NORMALIZE measurement { fuel: { "a": "b" } }`, /Unknown alias "measurement"/, "measurement");
  });

  it("rejects an empty body", () => {
    assertSemantic(`${MEASUREMENT}\nNORMALIZE measurement { }`, /needs at least one field block/);
  });

  it("rejects an empty value map", () => {
    assertSemantic(`${MEASUREMENT}\nNORMALIZE measurement { fuel: { } }`, /needs at least one "old": "new" pair/);
  });

  it("rejects a repeated old value", () => {
    assertSemantic(
      `${MEASUREMENT}\nNORMALIZE measurement { fuel: { "a": "b", "a": "c" } }`,
      /Duplicate value for field "fuel": "a"/,
    );
  });
});

describe("parser: AGGREGATE", () => {
  it("parses aggregations and a time window", () => {
    const { program, registry } = parseDsl(`${MEASUREMENT}
AGGREGATE measurement BY [factory_id, product_id] INTO activity
  AGG_SUM(value) AS value
  TAKE_FIRST(unit) AS unit
  AGG_COUNT() AS n
  TIME_WINDOW monthly FROM time INTO period`);
    assert.deepEqual(program.statements[1], {
      kind: "aggregate",
      source: "measurement",
      groupBy: ["factory_id", "product_id"],
      target: "activity",
      aggregations: [
        { function: "sum", field: "value", alias: "value" },
        { function: "first", field: "unit", alias: "unit" },
        { function: "count", alias: "n" },
      ],
      timeWindow: { mode: "month", modeName: "monthly", sourceField: "time", alias: "period" },
    });
    assert.deepEqual(registry.get("activity")?.fields, ["factory_id", "product_id", "period", "value", "unit", "n"]);
  });

  it("normalizes time window mode names", () => {
    const { program } = parseDsl(`${MEASUREMENT}
AGGREGATE measurement BY [factory_id] INTO a AGG_COUNT() AS n TIME_WINDOW Hourly FROM time INTO h`);
    const stmt = program.statements[1];
    assert.ok(stmt.kind === "aggregate");
    assert.equal(stmt.timeWindow?.mode, "hour");
    assert.equal(stmt.timeWindow?.modeName, "Hourly");
  });

  it("rejects an unsupported time window mode", () => {
    assertSemantic(
      `${MEASUREMENT}\nAGGREGATE measurement BY [factory_id] INTO a AGG_COUNT() AS n TIME_WINDOW fortnightly FROM time INTO p`,
      /Unsupported TIME_WINDOW mode "fortnightly"/,
    );
  });

  it("rejects an empty grouping list", () => {
    assertSemantic(
      `${MEASUREMENT}\nAGGREGATE measurement BY [] INTO a AGG_COUNT() AS n`,
      /requires at least one grouping key/,
    );
  });

  it("rejects an aggregate without aggregation clauses", () => {
    assertSemantic(
      `${MEASUREMENT}\nAGGREGATE measurement BY [factory_id] INTO a`,
      /AGGREGATE into a requires at least one aggregation clause/,
    );
  });

  it("requires a field for TAKE_FIRST and AGG_SUM", () => {
    assertSemantic(`${MEASUREMENT}\nAGGREGATE measurement BY [factory_id] INTO a TAKE_FIRST() AS f`, /TAKE_FIRST requires a field/);
    assertSemantic(`${MEASUREMENT}\nAGGREGATE measurement BY [factory_id] INTO a AGG_SUM() AS f`, /AGG_SUM requires a field/);
  });

  it("rejects output aliases that collide", () => {
    assertSemantic(
      `${MEASUREMENT}\nAGGREGATE measurement BY [factory_id] INTO a AGG_SUM(value) AS factory_id`,
      /Duplicate output field "factory_id"/,
    );
  });
});

describe("parser: UNIT_CONVERT", () => {
  it("records whether units are fields or literals", () => {
    const { program } = parseDsl(`${MEASUREMENT}
UNIT_CONVERT measurement.value FROM unit TO "kwh" USING "conv_table.csv"`);
    assert.deepEqual(program.statements[1], {
      kind: "unitConvert",
      target: "measurement",
      field: "value",
      from: { kind: "field", name: "unit" },
      to: { name: "kwh", quoted: true },
      table: "conv_table.csv",
    });
  });

  it("keeps a bare TO unit as a unit name", () => {
    const { program } = parseDsl(`${MEASUREMENT}
UNIT_CONVERT measurement.value FROM "mwh" TO kwh USING "conv.csv"`);
    const stmt = program.statements[1];
    assert.ok(stmt.kind === "unitConvert");
    assert.deepEqual(stmt.from, { kind: "literal", value: "mwh" });
    assert.deepEqual(stmt.to, { name: "kwh", quoted: false });
  });
});

describe("parser: ENRICH", () => {
  it("parses output expressions with qualified references", () => {
    const stmt = onlyEnrich(`${ACTIVITY}
ENRICH activity WITH emission_factor_table MATCH ON fuel
  OUTPUT emission AS {
    id: "em_" + activity.id,
    value: activity.value * emission_factor.factor,
    scope: emission_factor_table.scope
  }`);
    assert.deepEqual(stmt, {
      kind: "enrich",
      source: "activity",
      factorTable: "emission_factor_table",
      matchKey: "fuel",
      target: "emission",
      outputs: [
        {
          name: "id",
          value: {
            kind: "binary",
            operator: "+",
            left: { kind: "string", value: "em_" },
            right: { kind: "identifier", qualifier: "activity", name: "id" },
            shape: "string",
          },
        },
        {
          name: "value",
          value: {
            kind: "binary",
            operator: "*",
            left: { kind: "identifier", qualifier: "activity", name: "value" },
            right: { kind: "identifier", qualifier: "emission_factor", name: "factor" },
            shape: "unknown",
          },
        },
        { name: "scope", value: { kind: "identifier", qualifier: "emission_factor_table", name: "scope" } },
      ],
    });
  });

  it("accepts a quoted factor table name", () => {
    const stmt = onlyEnrich(`${ACTIVITY}
ENRICH activity WITH "factors" MATCH ON fuel OUTPUT e AS { k: factors.k }`);
    assert.equal(stmt.factorTable, "factors");
  });

  it("registers the output fields on the target", () => {
    const { registry } = parseDsl(`${ACTIVITY}
ENRICH activity WITH ef MATCH ON fuel OUTPUT emission AS { scope: ef.scope, value: value }`);
    assert.deepEqual(registry.get("emission")?.fields, ["scope", "value"]);
    assert.equal(registry.get("emission")?.kind, "enrich");
  });

  it("fails when the source alias is not defined yet", () => {
    assert.throws(
      () => parseDsl(`ENRICH activity WITH ef MATCH ON fuel OUTPUT e AS { x: fuel }`),
      (err: unknown) => {
        assert.ok(err instanceof SemanticError);
        assert.equal(err.alias, "activity");
        assert.equal(err.line, 1);
        assert.equal(err.column, 8);
        return true;
      },
    );
  });

  it("rejects references with an unknown qualifier", () => {
    assertSemantic(
      `${ACTIVITY}\nENRICH activity WITH emission_factor_table MATCH ON fuel OUTPUT e AS { x: other.x }`,
      /Unknown reference "other\.x"/,
      "other",
    );
  });

  it("rejects an empty output block", () => {
    assertSemantic(`${ACTIVITY}\nENRICH activity WITH ef MATCH ON fuel OUTPUT e AS { }`, /needs at least one field/);
  });
});

describe("parser: COMPUTE", () => {
  it("parses a single group key and lower-cases the function", () => {
    const { program, registry } = parseDsl(`${ACTIVITY}
COMPUTE total FOR activity GROUP BY fuel INTO report AS SUM(value)`);
    assert.deepEqual(program.statements[1], {
      kind: "compute",
      result: "total",
      source: "activity",
      groupBy: ["fuel"],
      target: "report",
      function: "sum",
      field: "value",
    });
    assert.deepEqual(registry.get("report")?.fields, ["fuel", "total"]);
  });

  it("parses a bracketed group key list", () => {
    const { program } = parseDsl(`${ACTIVITY}
COMPUTE total FOR activity GROUP BY [fuel, id] INTO report AS avg(value)`);
    const stmt = program.statements[1];
    assert.ok(stmt.kind === "compute");
    assert.deepEqual(stmt.groupBy, ["fuel", "id"]);
    assert.equal(stmt.function, "avg");
  });

  it("merges several results computed into one report", () => {
    const { registry } = parseDsl(`${ACTIVITY}
COMPUTE total FOR activity GROUP BY fuel INTO report AS sum(value)
COMPUTE biggest FOR activity GROUP BY fuel INTO report AS max(value)`);
    assert.deepEqual(registry.get("report")?.fields, ["fuel", "total", "biggest"]);
  });

  it("rejects an unsupported function", () => {
    assertSemantic(
      `${ACTIVITY}\nCOMPUTE total FOR activity GROUP BY fuel INTO report AS median(value)`,
      /Unsupported aggregation function "median" \(expected one of sum, avg, min, max, count\)/,
    );
  });
});

describe("parser: VALIDATE and comments", () => {
  it("parses a validate statement", () => {
    const { program } = parseDsl(`${ACTIVITY}\nVALIDATE activity WITH "non_negative"`);
    assert.deepEqual(program.statements[1], { kind: "validate", target: "activity", rule: "non_negative" });
  });

  it("keeps comments in source order", () => {
    const { program } = parseDsl(`# header
${ACTIVITY} # trailing
#
VALIDATE activity WITH "r"`);
    assert.deepEqual(
      program.statements.map((s) => (s.kind === "comment" ? `#${s.text}` : s.kind)),
      ["#header", "load", "#trailing", "#", "validate"],
    );
  });

  it("parses an empty program", () => {
    assert.deepEqual(parseDsl("").program, { statements: [] });
    assert.deepEqual(parseDsl("  \n# only a comment\n").program, {
      statements: [{ kind: "comment", text: "only a comment" }],
    });
  });
});

// ── Cross-statement rules ───────────────────────────────────────────────

describe("parser: alias rules", () => {
  it("rejects redefinition by a different statement kind", () => {
    assert.throws(
      () =>
        parseDsl(`LOAD_CSV "a.csv" AS m
AGGREGATE m BY [k] INTO m AGG_COUNT() AS n`),
      (err: unknown) => {
        assert.ok(err instanceof SemanticError);
        assert.equal(
          err.detail,
          'Alias "m" was already defined by a LOAD_CSV statement (statement 1) and cannot be redefined by a AGGREGATE statement',
        );
        assert.equal(err.line, 2);
        assert.equal(err.column, 25);
        return true;
      },
    );
  });

  it("warns about unknown fields on closed aliases", () => {
    const { warnings } = parseDsl(`LOAD_CSV "a.csv" AS m MAP_COLUMNS { type -> fuel }
NORMALIZE m { colour: { "red": "Red" } }`);
    assert.deepEqual(warnings, [{ message: 'Field "colour" is not known on "m"', line: 2, column: 15 }]);
  });

  it("learns fields on open aliases without warning", () => {
    const { warnings, registry } = parseDsl(`LOAD_CSV "raw.csv" AS raw
NORMALIZE raw { colour: { "red": "Red" } }`);
    assert.deepEqual(warnings, []);
    assert.deepEqual(registry.get("raw")?.fields, ["colour"]);
  });
});

// ── Expressions ─────────────────────────────────────────────────────────

describe("parser: expressions", () => {
  it("binds * tighter than +", () => {
    assert.deepEqual(outputExpression("2 + 3 * 4"), {
      kind: "binary",
      operator: "+",
      left: { kind: "number", value: 2, text: "2" },
      right: {
        kind: "binary",
        operator: "*",
        left: { kind: "number", value: 3, text: "3" },
        right: { kind: "number", value: 4, text: "4" },
        shape: "number",
      },
      shape: "number",
    });
  });

  it("groups a product of references before a sum", () => {
    const expr = outputExpression("activity.value * emission_factor.factor + value");
    assert.ok(expr.kind === "binary");
    assert.equal(expr.operator, "+");
    assert.deepEqual(expr.left, {
      kind: "binary",
      operator: "*",
      left: { kind: "identifier", qualifier: "activity", name: "value" },
      right: { kind: "identifier", qualifier: "emission_factor", name: "factor" },
      shape: "unknown",
    });
    assert.deepEqual(expr.right, { kind: "identifier", name: "value" });
  });

  it("is left-associative", () => {
    assert.deepEqual(outputExpression("10 - 4 - 3"), {
      kind: "binary",
      operator: "-",
      left: {
        kind: "binary",
        operator: "-",
        left: { kind: "number", value: 10, text: "10" },
        right: { kind: "number", value: 4, text: "4" },
        shape: "number",
      },
      right: { kind: "number", value: 3, text: "3" },
      shape: "number",
    });
  });

  it("honours parentheses", () => {
    const expr = outputExpression("(2 + 3) * 4");
    assert.ok(expr.kind === "binary");
    assert.equal(expr.operator, "*");
    assert.equal(expr.left.kind, "binary");
  });

  it("parses function calls and bare fields", () => {
    assert.deepEqual(outputExpression("toUpper(fuel)"), { kind: "call", name: "toUpper", argument: "fuel" });
    assert.deepEqual(outputExpression("value"), { kind: "identifier", name: "value" });
  });

  it("keeps the digits of number literals beyond double precision", () => {
    assert.deepEqual(outputExpression("9007199254740993"), {
      kind: "number",
      value: 9007199254740992,
      text: "9007199254740993",
    });
    assert.deepEqual(outputExpression("007.50"), { kind: "number", value: 7.5, text: "7.50" });
  });

  it("rejects arithmetic on strings", () => {
    assertSemantic(
      `${ACTIVITY}\nENRICH activity WITH ef MATCH ON fuel OUTPUT e AS { x: "a" - 1 }`,
      /Operator "-" cannot be applied to a string/,
    );
  });

  it("accepts nesting up to the limit and rejects deeper nesting", () => {
    const nested = (n: number) => `${"(".repeat(n)}1${")".repeat(n)}`;
    assert.deepEqual(outputExpression(nested(64)), { kind: "number", value: 1, text: "1" });
    assert.throws(
      () => outputExpression(nested(65)),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(err.detail, "Expression nesting exceeds the limit of 64 levels");
        return true;
      },
    );
  });

  it("honours a custom nesting limit", () => {
    assert.throws(
      () => parseDsl(`${ACTIVITY}\nENRICH activity WITH ef MATCH ON fuel OUTPUT e AS { x: ((1)) }`, { maxExpressionDepth: 1 }),
      ParseError,
    );
  });
});

// ── Syntax errors ───────────────────────────────────────────────────────

describe("parser: syntax errors", () => {
  it("reports the offending token", () => {
    assert.throws(
      () => parseDsl(`LOAD_CSV level1.csv AS m`),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(err.message, 'Line 1, column 10: Expected string but found "level1"');
        assert.equal(err.found, "level1");
        assert.equal(err.statementIndex, 1);
        return true;
      },
    );
  });

  it("reports end of input", () => {
    assert.throws(
      () => parseDsl(`VALIDATE x WITH`),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(err.found, "end of input");
        assert.equal(err.line, 1);
        assert.equal(err.column, 16);
        assert.equal(err.detail, "Expected string but found end of input");
        return true;
      },
    );
  });

  it("counts statements when reporting the index", () => {
    assert.throws(
      () => parseDsl(`${ACTIVITY}\nVALIDATE activity WITH "r"\nVALIDATE activity "r"`),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(err.statementIndex, 3);
        assert.equal(err.line, 3);
        assert.equal(err.column, 19);
        return true;
      },
    );
  });

  it("rejects input that does not start a statement", () => {
    assert.throws(
      () => parseDsl(`FOO`),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.equal(
          err.detail,
          'Expected a statement (LOAD_CSV, NORMALIZE, AGGREGATE, UNIT_CONVERT, ENRICH, COMPUTE, VALIDATE) but found "FOO"',
        );
        return true;
      },
    );
  });
});
