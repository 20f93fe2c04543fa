import { describe, it, expect } from "vitest";
import { Diagnostics } from "../../diagnostics";
import { tokenize } from "../../index";
import { Lexer } from "../../lexer";

const kinds = (src: string) => tokenize(src).tokens.map((t) => t.kind);

describe("Lexer", () => {
  it("should scan every statement keyword", () => {
    expect(
      kinds("agr varna jabtak tabtak do break continue return dikhao likho")
    ).toEqual([
      "kw_agr",
      "kw_varna",
      "kw_jabtak",
      "kw_tabtak",
      "kw_do",
      "kw_break",
      "kw_continue",
      "kw_return",
      "kw_dikhao",
      "kw_likho",
      "eof",
    ]);
  });

  it("should scan type names and boolean literals", () => {
    const { tokens } = tokenize("int float bool string char true false");
    expect(tokens.map((t) => t.kind)).toEqual([
      "type",
      "type",
      "type",
      "type",
      "type",
      "bool",
      "bool",
      "eof",
    ]);
    expect(tokens[5].value).toBe(true);
    expect(tokens[6].value).toBe(false);
  });

  it("should treat keywords as exact, case-sensitive spellings", () => {
    expect(kinds("Agr agrx if while")).toEqual([
      "ident",
      "ident",
      "ident",
      "ident",
      "eof",
    ]);
  });

  it("should record text and 1-based positions", () => {
    const { tokens, diagnostics } = tokenize("int x = 5;");
    expect(diagnostics).toEqual([]);
    expect(tokens.map((t) => [t.kind, t.text, t.line, t.col])).toEqual([
      ["type", "int", 1, 1],
      ["ident", "x", 1, 5],
      ["op", "=", 1, 7],
      ["int", "5", 1, 9],
      ["semicolon", ";", 1, 10],
      ["eof", "", 1, 11],
    ]);
    expect(tokens[3].value).toBe(5);
  });

  it("should prefer two-character operators", () => {
    const { tokens } = tokenize("a+=b++ <= c && !d");
    expect(tokens.map((t) => t.text)).toEqual([
      "a",
      "+=",
      "b",
      "++",
      "<=",
      "c",
      "&&",
      "!",
      "d",
      "",
    ]);
  });

  it("should decode integer and float literals", () => {
    const { tokens, diagnostics } = tokenize("0 42 3.14 .5 1e3 2.5E-2");
    expect(diagnostics).toEqual([]);
    expect(tokens.map((t) => [t.kind, t.value])).toEqual([
      ["int", 0],
      ["int", 42],
      ["float", 3.14],
      ["float", 0.5],
      ["float", 1000],
      ["float", 0.025],
      ["eof", undefined],
    ]);
  });

  it("should reject malformed numbers as a single lexeme", () => {
    const { tokens, diagnostics } = tokenize("1.2.3 12ab");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["invalid", "1.2.3"],
      ["invalid", "12ab"],
      ["eof", ""],
    ]);
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      ["InvalidNumberFormat", 1, "Invalid number format '1.2.3'"],
      ["InvalidNumberFormat", 7, "Invalid number format '12ab'"],
    ]);
  });

  it("should reject exponents and fractions without digits", () => {
    const { tokens, diagnostics } = tokenize("1e 1e+ 1.");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["invalid", "1e"],
      ["invalid", "1e+"],
      ["invalid", "1."],
      ["eof", ""],
    ]);
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      ["InvalidNumberFormat", 1, "Invalid number format '1e'"],
      ["InvalidNumberFormat", 4, "Invalid number format '1e+'"],
      ["InvalidNumberFormat", 8, "Invalid number format '1.'"],
    ]);
  });

  it("should reject integers a number cannot hold exactly", () => {
    const ok = tokenize("9007199254740991");
    expect(ok.diagnostics).toEqual([]);
    expect(ok.tokens[0]).toMatchObject({ kind: "int", value: 9007199254740991 });

    const { tokens, diagnostics } = tokenize("9007199254740993");
    expect(tokens.map((t) => t.kind)).toEqual(["invalid", "eof"]);
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      [
        "InvalidNumberFormat",
        1,
        "Integer literal '9007199254740993' is out of range",
      ],
    ]);
  });

  it("should decode escapes in string and char literals", () => {
    const { tokens, diagnostics } = tokenize(String.raw`"a\tb\x41" 'x' '\n'`);
    expect(diagnostics).toEqual([]);
    expect(tokens.map((t) => [t.kind, t.value])).toEqual([
      ["string", "a\tbA"],
      ["char", "x"],
      ["char", "\n"],
      ["eof", undefined],
    ]);
  });

  it("should report an unterminated string at its opening quote", () => {
    const { tokens, diagnostics } = tokenize('dikhao("abc);');
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["kw_dikhao", "dikhao"],
      ["lparen", "("],
      ["invalid", '"abc);'],
      ["eof", ""],
    ]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("UnterminatedString");
    expect(diagnostics[0].message).toBe("Unterminated string literal");
    expect([diagnostics[0].span.line, diagnostics[0].span.col]).toEqual([1, 8]);
  });

  it("should stop a string at the end of the line", () => {
    const { tokens, diagnostics } = tokenize('"open\nint x;');
    expect(tokens.map((t) => t.kind)).toEqual([
      "invalid",
      "type",
      "ident",
      "semicolon",
      "eof",
    ]);
    expect(diagnostics.map((d) => d.kind)).toEqual(["UnterminatedString"]);
  });

  it("should report an invalid escape at the backslash", () => {
    const { tokens, diagnostics } = tokenize(String.raw`"a\qb"`);
    expect(tokens[0].kind).toBe("invalid");
    expect(tokens[0].text).toBe(String.raw`"a\qb"`);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("InvalidEscapeSequence");
    expect(diagnostics[0].message).toBe(String.raw`Invalid escape sequence '\q'`);
    expect(diagnostics[0].span.col).toBe(3);
  });

  it("should decode the nul and quote escapes", () => {
    const { tokens, diagnostics } = tokenize(String.raw`"\0" '\''`);
    expect(diagnostics).toEqual([]);
    expect(tokens.map((t) => [t.kind, t.value])).toEqual([
      ["string", "\0"],
      ["char", "'"],
      ["eof", undefined],
    ]);
  });

  it("should reject hex escapes without two hex digits", () => {
    const { tokens, diagnostics } = tokenize('"\\x4" "\\xg1"');
    expect(tokens.map((t) => t.kind)).toEqual(["invalid", "invalid", "eof"]);
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      ["InvalidEscapeSequence", 2, "Invalid escape sequence '\\x'"],
      ["InvalidEscapeSequence", 8, "Invalid escape sequence '\\x'"],
    ]);
  });

  it("should report an unterminated char literal at the end of a line", () => {
    const { tokens, diagnostics } = tokenize("'a\nint x;");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["invalid", "'a"],
      ["type", "int"],
      ["ident", "x"],
      ["semicolon", ";"],
      ["eof", ""],
    ]);
    expect(diagnostics.map((d) => [d.kind, d.span.line, d.span.col, d.message])).toEqual([
      ["UnterminatedChar", 1, 1, "Unterminated character literal"],
    ]);
  });

  it("should report an unterminated char literal at the end of input", () => {
    const { tokens, diagnostics } = tokenize("'a");
    expect(tokens.map((t) => t.kind)).toEqual(["invalid", "eof"]);
    expect(diagnostics.map((d) => [d.kind, d.span.col])).toEqual([
      ["UnterminatedChar", 1],
    ]);
  });

  it("should reject empty and multi-character char literals", () => {
    const { diagnostics } = tokenize("'' 'ab'");
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      ["UnterminatedChar", 1, "Empty character literal"],
      [
        "UnterminatedChar",
        4,
        "Character literal must contain exactly one character",
      ],
    ]);
  });

  it("should skip unknown characters up to a delimiter", () => {
    const { tokens, diagnostics } = tokenize("int x = 5 @ 3; #abc;");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["type", "int"],
      ["ident", "x"],
      ["op", "="],
      ["int", "5"],
      ["invalid", "@"],
      ["int", "3"],
      ["semicolon", ";"],
      ["invalid", "#abc"],
      ["semicolon", ";"],
      ["eof", ""],
    ]);
    expect(diagnostics.map((d) => [d.kind, d.span.col, d.message])).toEqual([
      ["UnknownCharacter", 11, "Unknown character '@'"],
      ["UnknownCharacter", 16, "Unknown character '#'"],
    ]);
  });

  it("should skip comments and track lines", () => {
    const { tokens } = tokenize("int a; // note\n  a = 1;");
    expect(tokens.map((t) => [t.text, t.line, t.col])).toEqual([
      ["int", 1, 1],
      ["a", 1, 5],
      [";", 1, 6],
      ["a", 2, 3],
      ["=", 2, 5],
      ["1", 2, 7],
      [";", 2, 8],
      ["", 2, 9],
    ]);
  });

  it("should advance one column per tab", () => {
    const { tokens } = tokenize("\tx");
    expect([tokens[0].line, tokens[0].col]).toEqual([1, 2]);
  });

  it("should always end with a single eof token", () => {
    const diags = new Diagnostics("empty.sl", "");
    const tokens = new Lexer("empty.sl", "", diags).tokenize();
    expect(tokens).toEqual([
      { kind: "eof", text: "", start: 0, end: 0, line: 1, col: 1 },
    ]);
    expect(diags.all).toEqual([]);
  });
});
