import { TokenKind, type Token } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";
import { DiagnosticError, error, makeSpan } from "../errors/diagnostic.js";

export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.source.length) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) break;
      tokens.push(this.nextToken());
    }
    tokens.push(this.makeToken(TokenKind.EOF, this.pos, this.line, this.col));
    return tokens;
  }

  private nextToken(): Token {
    const ch = this.source[this.pos];

    if (ch === "$") return this.readConstRef();
    if (ch === "[") return this.readString();
    if (ch === "0") return this.readBinary();
    if (this.isIdentStart(ch)) return this.readIdentOrKeyword();

    return this.readPunctuation();
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
      this.advance();
    }

    const keyword = KEYWORDS.get(this.source.slice(startPos, this.pos));
    if (keyword !== undefined) {
      return this.makeToken(keyword, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Identifier, startPos, startLine, startCol);
  }

  // $name$
  private readConstRef(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    if (!this.isIdentStart(this.charAt(1))) {
      this.fail(startPos, startLine, startCol, "Constant references are written as $name$");
    }
    this.advance(); // skip '$'
    while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
      this.advance();
    }
    if (this.source[this.pos] !== "$") {
      this.fail(startPos, startLine, startCol, "Constant references are written as $name$");
    }
    this.advance(); // skip closing '$'
    return this.makeToken(TokenKind.ConstRef, startPos, startLine, startCol);
  }

  // [[text]], closed by the first "]]"
  private readString(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    const close = this.charAt(1) === "[" ? this.source.indexOf("]]", this.pos + 2) : -1;
    if (close === -1) {
      this.fail(startPos, startLine, startCol, "String literals are written as [[text]]");
    }

    while (this.pos < close + 2) {
      this.advance();
    }
    return this.makeToken(TokenKind.StringLiteral, startPos, startLine, startCol);
  }

  // 0b1010 or 0B1010
  private readBinary(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    const marker = this.charAt(1);
    if ((marker !== "b" && marker !== "B") || !this.isBinaryDigit(this.charAt(2))) {
      this.fail(startPos, startLine, startCol, "Numbers are binary literals such as 0b1010");
    }
    this.advance(); // skip '0'
    this.advance(); // skip 'b'
    while (this.pos < this.source.length && this.isBinaryDigit(this.source[this.pos])) {
      this.advance();
    }
    return this.makeToken(TokenKind.BinaryLiteral, startPos, startLine, startCol);
  }

  private readPunctuation(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];

    if (ch === "@" && this.charAt(1) === "{") {
      this.advance();
      this.advance();
      return this.makeToken(TokenKind.DictOpen, startPos, startLine, startCol);
    }

    let kind: TokenKind;
    switch (ch) {
      case "{": kind = TokenKind.LBrace; break;
      case "}": kind = TokenKind.RBrace; break;
      case "(": kind = TokenKind.LParen; break;
      case ")": kind = TokenKind.RParen; break;
      case ",": kind = TokenKind.Comma; break;
      case "=": kind = TokenKind.Eq; break;
      case ";": kind = TokenKind.Semicolon; break;
      default:
        this.fail(startPos, startLine, startCol);
    }
    this.advance();
    return this.makeToken(kind, startPos, startLine, startCol);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n" || ch === "\f") {
        this.advance();
      } else {
        break;
      }
    }
  }

  private fail(offset: number, line: number, column: number, help?: string): never {
    // Report astral characters whole rather than as a lone surrogate.
    const codePoint = this.source.codePointAt(offset);
    const ch = codePoint === undefined ? "" : String.fromCodePoint(codePoint);
    const span = makeSpan(
      this.filename,
      offset,
      offset + ch.length,
      line,
      column,
      line,
      column + ch.length,
    );
    // Messages report the UTF-8 byte offset; the span keeps the string index.
    const byteOffset = Buffer.byteLength(this.source.slice(0, offset), "utf8");
    throw new DiagnosticError(
      error("LexError", `Unexpected character '${ch}' at offset ${byteOffset}`, span, help),
    );
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos++;
    }
  }

  private charAt(ahead: number): string {
    return this.source.charAt(this.pos + ahead);
  }

  private makeToken(kind: TokenKind, startPos: number, startLine: number, startCol: number): Token {
    return {
      kind,
      value: this.source.slice(startPos, this.pos),
      span: {
        start: { offset: startPos, line: startLine, column: startCol },
        end: { offset: this.pos, line: this.line, column: this.col },
        source: this.filename,
      },
    };
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isIdentPart(ch: string): boolean {
    return this.isIdentStart(ch) || (ch >= "0" && ch <= "9");
  }

  private isBinaryDigit(ch: string): boolean {
    return ch === "0" || ch === "1";
  }
}
