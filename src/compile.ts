import { generateCypherBlocks, joinBlocks } from "./cypher-codegen.js";
import { parseDsl } from "./parser/index.js";
import type { AliasRegistry, CompileWarning } from "./registry.js";
import type { Program } from "./types.js";

/**
 * Structured logger interface for compiler events.
 * Accepts any compatible logger: pino, winston, bunyan, `console`, etc.
 * All methods default to silent no-ops when no logger is provided.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const noop = (): void => {};

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export type CompileOptions = {
  /** Receives phase summaries (debug) and unknown-field warnings (warn) */
  logger?: Logger;
  /** Deepest parenthesis nesting accepted in expressions (default 64) */
  maxExpressionDepth?: number;
};

export type ParsedProgram = {
  program: Program;
  registry: AliasRegistry;
  warnings: CompileWarning[];
};

export type CompileResult = {
  program: Program;
  /** One Cypher block per non-comment statement */
  blocks: string[];
  /** Blocks joined by a blank line, with a trailing newline */
  output: string;
  warnings: CompileWarning[];
};

/**
 * Lex, parse and resolve aliases. Throws the first `CompileError`.
 */
export function parseProgram(source: string, options: CompileOptions = {}): ParsedProgram {
  const logger = options.logger ?? silentLogger;
  const parsed = parseDsl(source, { maxExpressionDepth: options.maxExpressionDepth });
  logger.debug(
    "[ontoflow] parsed %d statement(s), %d alias(es)",
    parsed.program.statements.length,
    parsed.registry.entries().length,
  );
  for (const w of parsed.warnings) {
    logger.warn("[ontoflow] line %d, column %d: %s", w.line, w.column, w.message);
  }
  return parsed;
}

export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const logger = options.logger ?? silentLogger;
  const { program, registry, warnings } = parseProgram(source, options);
  const blocks = generateCypherBlocks(program, registry);
  logger.debug("[ontoflow] generated %d Cypher block(s)", blocks.length);
  return { program, blocks, output: joinBlocks(blocks), warnings };
}

/** DSL source in, Cypher text out. */
export function compileToCypher(source: string, options: CompileOptions = {}): string {
  return compile(source, options).output;
}
