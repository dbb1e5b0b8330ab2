export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error" | "warning";

export type DiagnosticCode =
  | "LexError"
  | "UnexpectedToken"
  | "UnknownConstant"
  | "TrailingInput"
  | "DuplicateConstant";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  span: Span;
  help?: string;
}

export function error(code: DiagnosticCode, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", code, message, span, help };
}

export function warning(code: DiagnosticCode, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "warning", code, message, span, help };
}

/**
 * Thrown by the lexer and parser on the first fatal problem.
 * `translate()` catches it and reports the diagnostic; nothing resumes after it.
 */
export class DiagnosticError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "DiagnosticError";
    this.diagnostic = diagnostic;
  }
}

export function makeSpan(
  source: string,
  startOffset: number,
  endOffset: number,
  startLine: number,
  startCol: number,
  endLine: number,
  endCol: number,
): Span {
  return {
    start: { offset: startOffset, line: startLine, column: startCol },
    end: { offset: endOffset, line: endLine, column: endCol },
    source,
  };
}
