export { translate, translateFile, type TranslateOptions, type TranslateResult } from "./translator.js";
export { Lexer } from "./lexer/lexer.js";
export { TokenKind, type Token } from "./lexer/tokens.js";
export { Parser, type ParseOptions, type ConstantTable } from "./parser/parser.js";
export { type Value, integer, text, array, dict, valueToString } from "./value/value.js";
export { toPlain, serialize, type PlainValue } from "./value/json.js";
export { DiagnosticError, type Diagnostic, type DiagnosticCode, type Span } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
export { runSelfTests, SELF_TEST_CASES, type SelfTestCase } from "./selftest.js";
