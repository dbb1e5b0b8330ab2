import { TokenKind } from "./tokens.js";

export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["array", TokenKind.Array],
  ["def", TokenKind.Def],
]);
