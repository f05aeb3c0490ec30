export { compile, compileToCypher, parseProgram, silentLogger } from "./compile.js";
export type { CompileOptions, CompileResult, Logger, ParsedProgram } from "./compile.js";
export { cypherName, cypherString, generateCypherBlocks, joinBlocks } from "./cypher-codegen.js";
export { formatExpression, formatProgram } from "./dsl-format.js";
export {
  CompileError,
  InternalCompilerError,
  LexError,
  ParseError,
  SemanticError,
} from "./errors.js";
export { DEFAULT_MAX_EXPRESSION_DEPTH, parseDsl, tokenize } from "./parser/index.js";
export { AliasRegistry } from "./registry.js";
export type { AliasEntry, CompileWarning, ReadonlyAliasRegistry } from "./registry.js";
export type * from "./types.js";
