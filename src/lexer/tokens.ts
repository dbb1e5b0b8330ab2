export enum TokenKind {
  // Literals
  BinaryLiteral = "BinaryLiteral",
  StringLiteral = "StringLiteral",
  ConstRef = "ConstRef",

  // Identifiers
  Identifier = "Identifier",

  // Keywords
  Array = "array",
  Def = "def",

  // Delimiters
  DictOpen = "@{",
  LBrace = "{",
  RBrace = "}",
  LParen = "(",
  RParen = ")",

  // Punctuation
  Comma = ",",
  Eq = "=",
  Semicolon = ";",

  // Special
  EOF = "EOF",
}

export interface Token {
  kind: TokenKind;
  /** Raw source slice, delimiters included. */
  value: string;
  span: {
    start: { offset: number; line: number; column: number };
    end: { offset: number; line: number; column: number };
    source: string;
  };
}

// Kinds whose enum value is the literal source text
function isFixedText(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.BinaryLiteral:
    case TokenKind.StringLiteral:
    case TokenKind.ConstRef:
    case TokenKind.Identifier:
    case TokenKind.EOF:
      return false;
    default:
      return true;
  }
}

export function describeToken(token: Token): string {
  if (token.kind === TokenKind.EOF) return "end of input";
  if (isFixedText(token.kind)) return `'${token.value}'`;
  return `${token.kind} '${token.value}'`;
}
