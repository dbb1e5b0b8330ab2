import { readFile } from "node:fs/promises";
import { Lexer } from "./lexer/lexer.js";
import { Parser, type ParseOptions } from "./parser/parser.js";
import type { Token } from "./lexer/tokens.js";
import type { Value } from "./value/value.js";
import { DiagnosticError, type Diagnostic } from "./errors/diagnostic.js";

export interface TranslateOptions extends ParseOptions {
  /** Stop after lexing and return the token stream. */
  emitTokens?: boolean;
}

export interface TranslateResult {
  tokens?: Token[];
  value?: Value;
  /** At most one entry: translation stops at the first error. */
  errors: Diagnostic[];
  /** Non-fatal diagnostics. The value is still produced. */
  warnings: Diagnostic[];
}

/**
 * Translate a source string into a value tree.
 */
export function translate(
  source: string,
  filename: string = "<stdin>",
  options: TranslateOptions = {},
): TranslateResult {
  // 1. Lex
  let tokens: Token[];
  try {
    tokens = new Lexer(source, filename).tokenize();
  } catch (e) {
    if (e instanceof DiagnosticError) return { errors: [e.diagnostic], warnings: [] };
    throw e;
  }

  if (options.emitTokens) {
    return { tokens, errors: [], warnings: [] };
  }

  // 2. Parse and resolve constants
  try {
    const { value, warnings } = new Parser(tokens, options).parse();
    return { tokens, value, errors: [], warnings };
  } catch (e) {
    if (e instanceof DiagnosticError) return { tokens, errors: [e.diagnostic], warnings: [] };
    throw e;
  }
}

/**
 * Read a UTF-8 file and translate it. I/O failures reject; they are not diagnostics.
 */
export async function translateFile(
  filePath: string,
  options: TranslateOptions = {},
): Promise<TranslateResult & { source: string }> {
  const source = await readFile(filePath, "utf-8");
  return { ...translate(source, filePath, options), source };
}
