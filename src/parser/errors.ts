import type { Diagnostic } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import { describeToken, TokenKind, type Token } from "../lexer/tokens.js";

export function unexpectedToken(token: Token, expected: string, help?: string): Diagnostic {
  return error("UnexpectedToken", `Expected ${expected}, found ${describeToken(token)}`, token.span, help);
}

export function unknownConstant(token: Token, name: string): Diagnostic {
  return error(
    "UnknownConstant",
    `Unknown constant '${name}'`,
    token.span,
    "Constants must be defined with (def name value); before the value that references them",
  );
}

export function trailingInput(token: Token): Diagnostic {
  return error(
    "TrailingInput",
    `Unexpected ${describeToken(token)} after the root value`,
    token.span,
    "A file holds constant definitions followed by exactly one value",
  );
}

export function valueHint(token: Token): string | undefined {
  // Point at the construct the author most likely meant
  switch (token.kind) {
    case TokenKind.Identifier:
      return `Constant references are written as $${token.value}$`;
    case TokenKind.LBrace:
      return "Dictionaries open with '@{'";
    case TokenKind.Def:
      return "Constant definitions are written as (def name value); before the root value";
    default:
      return undefined;
  }
}
