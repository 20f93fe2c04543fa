import type { Program } from "./ast";
import { type Diagnostic, Diagnostics } from "./diagnostics";
import { Lexer } from "./lexer";
import { DEFAULT_MAX_DEPTH, Parser } from "./parser";
import type { Token } from "./tokens";

export type ParseOptions = {
  filePath?: string;
  maxDepth?: number;
};

export type TokenizeOutput = {
  tokens: Token[];
  diagnostics: readonly Diagnostic[];
};

export type ParseResult = {
  program: Program;
  tokens: Token[];
  diagnostics: readonly Diagnostic[];
  // true when no error was reported (warnings allowed)
  ok: boolean;
};

export const DEFAULT_FILE_PATH = "<source>";

export function tokenize(
  source: string,
  opts: ParseOptions = {}
): TokenizeOutput {
  const filePath = opts.filePath ?? DEFAULT_FILE_PATH;
  const diags = new Diagnostics(filePath, source);
  const tokens = new Lexer(filePath, source, diags).tokenize();
  return { tokens, diagnostics: diags.all };
}

/**
 * Lexes and parses one source text. Always returns a program; when `ok` is
 * false it holds the statements that survived error recovery.
 */
export function parseSource(
  source: string,
  opts: ParseOptions = {}
): ParseResult {
  const filePath = opts.filePath ?? DEFAULT_FILE_PATH;
  const diags = new Diagnostics(filePath, source);
  const tokens = new Lexer(filePath, source, diags).tokenize();
  const program = new Parser(tokens, diags, {
    maxDepth: opts.maxDepth ?? DEFAULT_MAX_DEPTH,
  }).parseProgram();
  return { program, tokens, diagnostics: diags.all, ok: diags.wellFormed };
}

export type { Program } from "./ast";
export type { Diagnostic } from "./diagnostics";
export type { Token } from "./tokens";
export { formatAst, formatTokens } from "./ast_printer";
export { formatDiagnostic, formatDiagnostics } from "./pretty_diagnostics";
export { InvariantError } from "./errors";
