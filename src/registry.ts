import { SemanticError } from "./errors.js";
import type { StatementKind } from "./types.js";

/**
 * What the compiler knows about one alias (a node label).
 *
 * `fields` keeps insertion order so generated text is deterministic.
 * An `open` entry comes from a LOAD_CSV without MAP_COLUMNS: its columns are
 * unknown, so referenced fields are learned instead of checked.
 */
export type AliasEntry = {
  alias: string;
  kind: StatementKind;
  /** 1-based index of the statement that first registered the alias */
  statementIndex: number;
  fields: readonly string[];
  open: boolean;
};

export type SourcePosition = { line: number; column: number };

/** A non-fatal finding, such as a reference to a field nobody declared. */
export type CompileWarning = {
  message: string;
  line: number;
  column: number;
};

/** The view code generation gets: lookups only. */
export interface ReadonlyAliasRegistry {
  get(alias: string): AliasEntry | undefined;
  has(alias: string): boolean;
  entries(): AliasEntry[];
}

type MutableEntry = {
  alias: string;
  kind: StatementKind;
  statementIndex: number;
  fields: Set<string>;
  open: boolean;
};

/**
 * Program-scoped alias table. One instance per compile, populated in statement
 * order while the AST is built.
 */
export class AliasRegistry implements ReadonlyAliasRegistry {
  private readonly table = new Map<string, MutableEntry>();
  readonly warnings: CompileWarning[] = [];

  /**
   * Register `alias` as produced by a statement of `kind`.
   *
   * Re-registration by the same statement kind merges the field sets;
   * a different kind is rejected.
   */
  register(
    alias: string,
    kind: StatementKind,
    statementIndex: number,
    fields: readonly string[],
    pos: SourcePosition,
    open = false,
  ): void {
    const existing = this.table.get(alias);
    if (existing) {
      if (existing.kind !== kind) {
        throw new SemanticError(
          `Alias "${alias}" was already defined by a ${describeKind(existing.kind)} statement (statement ${existing.statementIndex}) and cannot be redefined by a ${describeKind(kind)} statement`,
          pos.line,
          pos.column,
          alias,
        );
      }
      for (const f of fields) existing.fields.add(f);
      existing.open = existing.open && open;
      return;
    }
    this.table.set(alias, { alias, kind, statementIndex, fields: new Set(fields), open });
  }

  /** Fail unless an earlier statement registered `alias`. */
  require(alias: string, pos: SourcePosition): void {
    if (!this.table.has(alias)) {
      throw new SemanticError(
        `Unknown alias "${alias}": it must be defined by an earlier LOAD_CSV, AGGREGATE, ENRICH or COMPUTE statement`,
        pos.line,
        pos.column,
        alias,
      );
    }
  }

  /**
   * Record a reference to `alias.field`. Open entries learn the field; closed
   * entries that lack it get a warning.
   */
  useField(alias: string, field: string, pos: SourcePosition): void {
    const entry = this.table.get(alias);
    if (!entry || entry.fields.has(field)) return;
    if (entry.open) {
      entry.fields.add(field);
      return;
    }
    this.warnings.push({
      message: `Field "${field}" is not known on "${alias}"`,
      line: pos.line,
      column: pos.column,
    });
  }

  get(alias: string): AliasEntry | undefined {
    const entry = this.table.get(alias);
    return entry ? freeze(entry) : undefined;
  }

  has(alias: string): boolean {
    return this.table.has(alias);
  }

  entries(): AliasEntry[] {
    return [...this.table.values()].map(freeze);
  }
}

function freeze(entry: MutableEntry): AliasEntry {
  return {
    alias: entry.alias,
    kind: entry.kind,
    statementIndex: entry.statementIndex,
    fields: [...entry.fields],
    open: entry.open,
  };
}

const KIND_KEYWORDS: Record<StatementKind, string> = {
  load: "LOAD_CSV",
  normalize: "NORMALIZE",
  aggregate: "AGGREGATE",
  unitConvert: "UNIT_CONVERT",
  enrich: "ENRICH",
  compute: "COMPUTE",
  validate: "VALIDATE",
  comment: "comment",
};

export function describeKind(kind: StatementKind): string {
  return KIND_KEYWORDS[kind];
}
