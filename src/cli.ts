#!/usr/bin/env node

/**
 * ontoflow CLI - compiles a DSL file to Cypher.
 *
 *   ontoflow <input.dsl> [-o|--output <file>] [--verbose] [--version] [--help]
 *
 * Cypher goes to the output file or stdout; progress, warnings and errors go
 * to stderr.
 */

import { readFile, realpath, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { format } from "node:util";
import { compile, type Logger } from "./compile.js";
import { CompileError } from "./errors.js";

const USAGE = [
  "Usage: ontoflow <input.dsl> [-o|--output <file>] [--verbose]",
  "  -o, --output <file>  Write Cypher to <file> instead of stdout",
  "  --verbose            Log compiler phases to stderr",
  "  --version            Print the version and exit",
  "  --help               Print this message and exit",
].join("\n");

/** Everything the CLI touches outside the compiler. */
export interface CliIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, text: string): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
  version(): Promise<string>;
}

type CliArgs =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "compile"; input: string; output?: string; verbose: boolean };

class UsageError extends Error {}

function parseArgs(argv: string[]): CliArgs {
  let input: string | undefined;
  let output: string | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg === "--version") return { kind: "version" };
    if (arg === "--verbose") {
      verbose = true;
    } else if (arg === "-o" || arg === "--output") {
      if (i + 1 >= argv.length) throw new UsageError(`${arg} requires a file argument`);
      output = argv[++i];
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option '${arg}'`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new UsageError(`Unexpected argument '${arg}'`);
    }
  }

  if (input === undefined) throw new UsageError("Missing input file");
  return { kind: "compile", input, output, verbose };
}

function stderrLogger(io: CliIO, verbose: boolean): Logger {
  const write = (...args: unknown[]): void => io.stderr(`${format(...args)}\n`);
  return {
    debug: verbose ? write : () => {},
    info: write,
    warn: (...args: unknown[]) => write("warning:", format(...args)),
    error: write,
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the CLI against `argv` (arguments after the script name).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`Error: ${err.message}\n${USAGE}\n`);
    return 1;
  }

  if (args.kind === "help") {
    io.stdout(`${USAGE}\n`);
    return 0;
  }
  if (args.kind === "version") {
    io.stdout(`${await io.version()}\n`);
    return 0;
  }

  const logger = stderrLogger(io, args.verbose);

  let source: string;
  try {
    source = await io.readFile(args.input);
  } catch (err) {
    io.stderr(`Error: cannot read ${args.input}: ${describeError(err)}\n`);
    return 1;
  }

  let output: string;
  let blockCount: number;
  try {
    logger.debug("Compiling %s", args.input);
    const result = compile(source, { logger });
    output = result.output;
    blockCount = result.blocks.length;
  } catch (err) {
    if (!(err instanceof CompileError)) throw err;
    io.stderr(`${err.name} in ${args.input}: ${err.message}\n`);
    return 1;
  }

  if (args.output === undefined) {
    io.stdout(output);
    return 0;
  }
  try {
    await io.writeFile(args.output, output);
  } catch (err) {
    io.stderr(`Error: cannot write ${args.output}: ${describeError(err)}\n`);
    return 1;
  }
  io.stderr(`Wrote ${blockCount} Cypher block(s) to ${args.output}\n`);
  return 0;
}

// ── Process entry point ─────────────────────────────────────────────────

async function readPackageVersion(): Promise<string> {
  const pkg: unknown = JSON.parse(await readFile(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

export const nodeIO: CliIO = {
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: (path, text) => writeFile(path, text, "utf-8"),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  version: readPackageVersion,
};

async function isMainModule(): Promise<boolean> {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  const [self, invoked] = await Promise.all([
    realpath(fileURLToPath(import.meta.url)),
    realpath(resolve(entry)).catch(() => resolve(entry)),
  ]);
  return self === invoked;
}

if (await isMainModule()) {
  process.exitCode = await runCli(process.argv.slice(2), nodeIO);
}
