import { codeFrame } from "./pretty_diagnostics";

export type Severity = "error" | "warning";

export type SourceSpan = {
  filePath: string;
  start: number;
  end: number;
  line: number;
  col: number;
};

export type LexicalErrorKind =
  | "UnterminatedString"
  | "UnterminatedChar"
  | "InvalidEscapeSequence"
  | "InvalidNumberFormat"
  | "UnknownCharacter";

export type SyntaxErrorKind =
  | "UnexpectedToken"
  | "MissingToken"
  | "UnexpectedEOF"
  | "NestingTooDeep";

export type WarningKind = "EmptyStatement";

export type DiagnosticDetail =
  | { family: "lexical"; kind: LexicalErrorKind }
  | {
      family: "syntax";
      kind: "UnexpectedToken";
      expected: readonly string[];
      found: string;
    }
  | { family: "syntax"; kind: "MissingToken"; expected: string }
  | { family: "syntax"; kind: "UnexpectedEOF"; expected: readonly string[] }
  | { family: "syntax"; kind: "NestingTooDeep"; limit: number }
  | { family: "syntax"; kind: WarningKind };

export type DiagnosticKind = DiagnosticDetail["kind"];

export type Diagnostic = DiagnosticDetail & {
  severity: Severity;
  message: string;
  span: SourceSpan;
  // offending line plus a caret line under the column
  snippet: string;
};

export class Diagnostics {
  private readonly list: Diagnostic[] = [];

  constructor(
    readonly filePath: string,
    private readonly source: string
  ) {}

  error(detail: DiagnosticDetail, message: string, span: SourceSpan) {
    this.push("error", detail, message, span);
  }

  warning(detail: DiagnosticDetail, message: string, span: SourceSpan) {
    this.push("warning", detail, message, span);
  }

  /** In source order; lexer and parser reports interleave by offset. */
  get all(): readonly Diagnostic[] {
    return [...this.list].sort((a, b) => a.span.start - b.span.start);
  }

  get errors(): readonly Diagnostic[] {
    return this.all.filter((d) => d.severity === "error");
  }

  get warnings(): readonly Diagnostic[] {
    return this.all.filter((d) => d.severity === "warning");
  }

  get hasErrors(): boolean {
    return this.list.some((d) => d.severity === "error");
  }

  get wellFormed(): boolean {
    return !this.hasErrors;
  }

  private push(
    severity: Severity,
    detail: DiagnosticDetail,
    message: string,
    span: SourceSpan
  ) {
    this.list.push({
      ...detail,
      severity,
      message,
      span,
      snippet: codeFrame(this.source, span.line, span.col),
    });
  }
}
