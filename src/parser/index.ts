/**
 * Chevrotain-based parser for the ontoflow DSL.
 *
 * Re-exports the public parse function as well as the lexer for direct access.
 */
export { parseDsl, DEFAULT_MAX_EXPRESSION_DEPTH } from "./parser.js";
export type { ParseOptions, ParseResult } from "./parser.js";
export { OntoflowLexer, allTokens, tokenize } from "./lexer.js";
