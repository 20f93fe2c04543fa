import type { Diagnostics, LexicalErrorKind } from "./diagnostics";
import { InvariantError } from "./errors";
import {
  KEYWORDS,
  ONE_CHAR_OPERATORS,
  PUNCTUATION,
  TWO_CHAR_OPERATORS,
  type Token,
  type TokenKind,
} from "./tokens";

/** Columns a tab advances. Columns are otherwise counted per UTF-16 unit. */
export const TAB_WIDTH = 1;

// Unknown characters are skipped up to whitespace or one of these.
const DELIMITERS = new Set([";", ",", "(", ")", "{", "}", "[", "]"]);

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\"],
  ['"', '"'],
  ["'", "'"],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["0", "\0"],
]);

const INT_RE = /^(?:0|[1-9][0-9]*)$/;
const FLOAT_RE =
  /^(?:(?:0|[1-9][0-9]*)(?:\.[0-9]+)?[eE][+-]?[0-9]+|(?:0|[1-9][0-9]*)\.[0-9]+|\.[0-9]+(?:[eE][+-]?[0-9]+)?)$/;

type Mark = { start: number; line: number; col: number };

type QuotedFault = { kind: LexicalErrorKind; message: string; at: Mark };

export class Lexer {
  private i = 0;
  private line = 1;
  private col = 1;

  constructor(
    private readonly filePath: string,
    private readonly src: string,
    private readonly diags: Diagnostics
  ) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (!this.isEOF()) {
      const before = this.i;
      const tok = this.scanToken();
      if (tok) tokens.push(tok);
      if (this.i === before) {
        throw new InvariantError(`lexer stalled at offset ${before}`);
      }
    }
    tokens.push(this.makeToken("eof", this.mark()));
    return tokens;
  }

  private scanToken(): Token | undefined {
    const ch = this.peek();
    if (this.isWhitespace(ch)) {
      this.advance();
      return undefined;
    }
    if (ch === "/" && this.peek2() === "/") {
      this.readLineComment();
      return undefined;
    }

    const at = this.mark();

    if (ch === '"') return this.readQuoted(at, '"');
    if (ch === "'") return this.readQuoted(at, "'");

    if (this.isDigit(ch) || (ch === "." && this.isDigit(this.peek2()))) {
      return this.readNumber(at);
    }

    if (this.isIdentStart(ch)) return this.readIdentOrKeyword(at);

    const punct = PUNCTUATION.get(ch);
    if (punct) {
      this.advance();
      return this.makeToken(punct, at);
    }

    // maximal munch: two-char operators win over their one-char prefix
    if (TWO_CHAR_OPERATORS.has(ch + this.peek2())) {
      this.advance();
      this.advance();
      return this.makeToken("op", at);
    }
    if (ONE_CHAR_OPERATORS.has(ch)) {
      this.advance();
      return this.makeToken("op", at);
    }

    return this.readUnknown(at);
  }

  private readLineComment() {
    while (!this.isEOF() && this.peek() !== "\n") {
      this.advance();
    }
  }

  private readIdentOrKeyword(at: Mark): Token {
    this.advance();
    while (!this.isEOF() && this.isIdentPart(this.peek())) this.advance();
    const text = this.src.slice(at.start, this.i);
    const kind = KEYWORDS.get(text) ?? "ident";
    if (kind === "bool") return this.makeToken(kind, at, text === "true");
    return this.makeToken(kind, at);
  }

  private readNumber(at: Mark): Token {
    // Take the whole number-looking run so `1.2.3` or `12ab` is one fault.
    while (!this.isEOF()) {
      const c = this.peek();
      const prev = this.src[this.i - 1];
      if (this.isIdentPart(c) || c === ".") {
        this.advance();
      } else if ((c === "+" || c === "-") && (prev === "e" || prev === "E")) {
        this.advance();
      } else {
        break;
      }
    }

    const text = this.src.slice(at.start, this.i);
    if (INT_RE.test(text)) {
      const value = Number.parseInt(text, 10);
      if (Number.isSafeInteger(value)) return this.makeToken("int", at, value);
      return this.fail(
        "InvalidNumberFormat",
        `Integer literal '${text}' is out of range`,
        at
      );
    }
    if (FLOAT_RE.test(text)) {
      return this.makeToken("float", at, Number(text));
    }
    return this.fail(
      "InvalidNumberFormat",
      `Invalid number format '${text}'`,
      at
    );
  }

  private readQuoted(at: Mark, quote: '"' | "'"): Token {
    const isChar = quote === "'";
    this.advance(); // opening quote
    let value = "";
    let fault: QuotedFault | undefined;

    while (true) {
      if (this.isEOF() || this.peek() === "\n") {
        fault ??= isChar
          ? {
              kind: "UnterminatedChar",
              message: "Unterminated character literal",
              at,
            }
          : {
              kind: "UnterminatedString",
              message: "Unterminated string literal",
              at,
            };
        break;
      }

      const c = this.peek();
      if (c === quote) {
        this.advance();
        break;
      }

      if (c === "\\") {
        const escAt = this.mark();
        this.advance();
        // a backslash at the end of the line leaves the literal unterminated
        if (this.isEOF() || this.peek() === "\n") continue;
        const decoded = this.readEscape();
        if (decoded === undefined) {
          fault ??= {
            kind: "InvalidEscapeSequence",
            message: `Invalid escape sequence '${this.src.slice(escAt.start, this.i)}'`,
            at: escAt,
          };
        } else {
          value += decoded;
        }
        continue;
      }

      value += c;
      this.advance();
    }

    if (!fault && isChar && value.length !== 1) {
      fault = {
        kind: "UnterminatedChar",
        message:
          value.length === 0
            ? "Empty character literal"
            : "Character literal must contain exactly one character",
        at,
      };
    }

    if (fault) return this.fail(fault.kind, fault.message, fault.at, at);
    return this.makeToken(isChar ? "char" : "string", at, value);
  }

  // Expects the cursor just past a backslash; consumes the escape body.
  private readEscape(): string | undefined {
    const c = this.peek();
    const simple = SIMPLE_ESCAPES.get(c);
    if (simple !== undefined) {
      this.advance();
      return simple;
    }
    if (c === "x") {
      const hi = this.src[this.i + 1] ?? "";
      const lo = this.src[this.i + 2] ?? "";
      if (this.isHexDigit(hi) && this.isHexDigit(lo)) {
        this.advance();
        this.advance();
        this.advance();
        return String.fromCharCode(Number.parseInt(hi + lo, 16));
      }
    }
    this.advance();
    return undefined;
  }

  private readUnknown(at: Mark): Token {
    const ch = this.peek();
    this.advance();
    while (
      !this.isEOF() &&
      !this.isWhitespace(this.peek()) &&
      !DELIMITERS.has(this.peek())
    ) {
      this.advance();
    }
    return this.fail("UnknownCharacter", `Unknown character '${ch}'`, at);
  }

  /**
   * Reports a lexical fault and returns an `invalid` token spanning the
   * lexeme that started at `tokenAt` (defaults to the fault position).
   */
  private fail(
    kind: LexicalErrorKind,
    message: string,
    faultAt: Mark,
    tokenAt: Mark = faultAt
  ): Token {
    this.diags.error({ family: "lexical", kind }, message, {
      filePath: this.filePath,
      start: faultAt.start,
      end: this.i,
      line: faultAt.line,
      col: faultAt.col,
    });
    return this.makeToken("invalid", tokenAt);
  }

  private makeToken(
    kind: TokenKind,
    at: Mark,
    value?: number | string | boolean
  ): Token {
    const tok: Token = {
      kind,
      text: this.src.slice(at.start, this.i),
      start: at.start,
      end: this.i,
      line: at.line,
      col: at.col,
    };
    if (value !== undefined) tok.value = value;
    return tok;
  }

  private mark(): Mark {
    return { start: this.i, line: this.line, col: this.col };
  }

  private advance() {
    const ch = this.src[this.i];
    this.i++;
    if (ch === "\n") {
      this.line++;
      this.col = 1;
    } else if (ch === "\t") {
      this.col += TAB_WIDTH;
    } else {
      this.col++;
    }
  }

  private peek(): string {
    return this.src[this.i] ?? "";
  }

  private peek2(): string {
    return this.src[this.i + 1] ?? "";
  }

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private isWhitespace(ch: string): boolean {
    return ch === " " || ch === "\t" || ch === "\r" || ch === "\n";
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isHexDigit(ch: string): boolean {
    return /^[0-9a-fA-F]$/.test(ch);
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isIdentPart(ch: string): boolean {
    return this.isIdentStart(ch) || this.isDigit(ch);
  }
}
