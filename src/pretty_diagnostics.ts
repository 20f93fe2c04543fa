import type { Diagnostic } from "./diagnostics";

export type FormatDiagnosticOptions = {
  contextLines?: number;
};

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? src.length;
  const end = lineStarts[idx + 1] ?? src.length;
  return src.slice(start, end).replace(/\r?\n$/, "");
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

// Tabs are copied into the padding so the caret lines up under any tab width.
function caretLine(lineText: string, col: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  let pad = "";
  for (let i = 0; i < safeCol - 1; i++) {
    pad += lineText[i] === "\t" ? "\t" : " ";
  }
  return `${" ".repeat(lineNoWidth)} | ${pad}^`;
}

/**
 * Renders the source around `line` with a caret under `col`.
 *
 * ```
 * 3 | int x = 5 6;
 *   |           ^
 * ```
 */
export function codeFrame(
  source: string,
  line: number,
  col: number,
  opts: FormatDiagnosticOptions = {}
): string {
  const contextLines = opts.contextLines ?? 0;
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.max(1, Math.min(line, lineStarts.length));
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lineStarts.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;

  const lines: string[] = [];
  for (let ln = startLine; ln <= endLine; ln++) {
    const txt = getLineText(source, lineStarts, ln);
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${txt}`);
    if (ln === lineNo) lines.push(caretLine(txt, col, lineNoWidth));
  }
  return lines.join("\n");
}

function header(diag: Diagnostic): string {
  const { filePath, line, col } = diag.span;
  return `${filePath}:${line}:${col} ${diag.severity}[${diag.kind}]: ${diag.message}`;
}

/**
 * Formats a single diagnostic into a human-friendly message with a code frame.
 *
 * Without `source` the snippet captured at report time is used; with it,
 * `opts.contextLines` surrounding lines can be shown as well.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const frame =
    source === undefined
      ? diag.snippet
      : codeFrame(source, diag.span.line, diag.span.col, opts);
  return `${header(diag)}\n${frame}`;
}

export function formatDiagnostics(
  diags: readonly Diagnostic[],
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  return diags.map((d) => formatDiagnostic(d, source, opts)).join("\n\n");
}
