import { TokenKind, type Token } from "../lexer/tokens.js";
import type { Diagnostic } from "../errors/diagnostic.js";
import { DiagnosticError, error, warning } from "../errors/diagnostic.js";
import { trailingInput, unexpectedToken, unknownConstant, valueHint } from "./errors.js";
import { array, dict, integer, text, valueToString, type Value } from "../value/value.js";

export interface ParseOptions {
  /** Treat a second `(def name ...)` for the same name as an error instead of a warning. */
  rejectDuplicateConstants?: boolean;
}

export type ConstantTable = Map<string, Value>;

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private warnings: Diagnostic[] = [];
  // Lives for one parse() call only.
  private constants: ConstantTable = new Map();
  private options: ParseOptions;

  constructor(tokens: Token[], options: ParseOptions = {}) {
    this.tokens = tokens;
    this.options = options;
  }

  /**
   * Throws DiagnosticError on the first problem; there is no recovery.
   * Each call starts over with an empty constant table.
   */
  parse(): { value: Value; warnings: Diagnostic[] } {
    this.pos = 0;
    this.warnings = [];
    this.constants = new Map();
    const value = this.parseProgram();
    return { value, warnings: this.warnings };
  }

  // ============================================================
  // Program
  // ============================================================

  private parseProgram(): Value {
    while (this.peek().kind === TokenKind.LParen && this.peekNext().kind === TokenKind.Def) {
      this.parseConstDef();
    }

    const root = this.parseValue();

    if (!this.isAtEnd()) {
      throw new DiagnosticError(trailingInput(this.peek()));
    }
    return root;
  }

  private parseConstDef(): void {
    this.expect(TokenKind.LParen);
    this.expect(TokenKind.Def);
    const name = this.expect(TokenKind.Identifier, "a constant name");
    const value = this.parseValue();
    this.expect(TokenKind.RParen);
    this.expect(TokenKind.Semicolon);

    const previous = this.constants.get(name.value);
    if (previous !== undefined) {
      if (this.options.rejectDuplicateConstants) {
        throw new DiagnosticError(error(
          "DuplicateConstant",
          `Constant '${name.value}' is already defined`,
          name.span,
          "Each constant may be defined only once",
        ));
      }
      this.warnings.push(warning(
        "DuplicateConstant",
        `Constant '${name.value}' is redefined`,
        name.span,
        `The earlier value ${valueToString(previous)} is replaced`,
      ));
    }
    this.constants.set(name.value, value);
  }

  // ============================================================
  // Values
  // ============================================================

  private parseValue(): Value {
    const tok = this.peek();

    switch (tok.kind) {
      case TokenKind.BinaryLiteral:
        this.advance();
        // The lexer guarantees "0b" or "0B" followed by binary digits.
        return integer(BigInt(`0b${tok.value.slice(2)}`));
      case TokenKind.StringLiteral:
        this.advance();
        return text(tok.value.slice(2, -2));
      case TokenKind.ConstRef:
        return this.resolveConstRef();
      case TokenKind.Array:
        return this.parseArray();
      case TokenKind.DictOpen:
        return this.parseDict();
      default:
        throw new DiagnosticError(unexpectedToken(tok, "a value", valueHint(tok)));
    }
  }

  private resolveConstRef(): Value {
    const tok = this.advance();
    const name = tok.value.slice(1, -1);
    const value = this.constants.get(name);
    if (value === undefined) {
      throw new DiagnosticError(unknownConstant(tok, name));
    }
    return value;
  }

  private parseArray(): Value {
    this.expect(TokenKind.Array);
    this.expect(TokenKind.LParen);
    const items: Value[] = [];
    if (this.peek().kind !== TokenKind.RParen) {
      items.push(this.parseValue());
      while (this.peek().kind === TokenKind.Comma) {
        this.advance();
        items.push(this.parseValue());
      }
    }
    this.expect(TokenKind.RParen);
    return array(items);
  }

  private parseDict(): Value {
    this.expect(TokenKind.DictOpen);
    const entries = new Map<string, Value>();
    while (this.peek().kind === TokenKind.Identifier) {
      const key = this.advance();
      this.expect(TokenKind.Eq);
      const value = this.parseValue();
      this.expect(TokenKind.Semicolon);
      // A repeated key keeps its first position and takes the later value.
      entries.set(key.value, value);
    }
    this.expect(TokenKind.RBrace);
    return dict(entries);
  }

  // ============================================================
  // Helpers
  // ============================================================

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private peekNext(): Token {
    return this.tokens[this.pos + 1] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const tok = this.peek();
    if (!this.isAtEnd()) this.pos++;
    return tok;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private expect(kind: TokenKind, description: string = `'${kind}'`): Token {
    const tok = this.peek();
    if (tok.kind === kind) return this.advance();
    throw new DiagnosticError(unexpectedToken(tok, description));
  }
}
