import { describe, it, expect } from "vitest";
import { positionOf, type Expr, type Stmt } from "../../ast";
import { Diagnostics } from "../../diagnostics";
import { InvariantError } from "../../errors";
import { parseSource } from "../../index";
import { Parser } from "../../parser";

// Compact prefix form, e.g. `(+ 2 (* 3 4))`.
function show(e: Expr): string {
  const kind: string = e.kind;
  switch (e.kind) {
    case "Binary":
      return `(${e.op} ${show(e.left)} ${show(e.right)})`;
    case "Unary":
      return `(${e.op} ${show(e.operand)})`;
    case "Conditional":
      return `(? ${show(e.cond)} ${show(e.thenExpr)} ${show(e.elseExpr)})`;
    case "Postfix":
      switch (e.op.kind) {
        case "increment":
          return `(post++ ${show(e.operand)})`;
        case "decrement":
          return `(post-- ${show(e.operand)})`;
        case "index":
          return `(index ${show(e.operand)} ${show(e.op.index)})`;
        case "call":
          return `(call ${[e.operand, ...e.op.args].map(show).join(" ")})`;
      }
      break;
    case "Literal":
      return e.raw;
    case "Identifier":
      return e.name;
    case "ArrayLiteral":
      return `[${e.elements.map(show).join(" ")}]`;
  }
  throw new Error(`unexpected expression ${kind}`);
}

function parseOk(src: string): Stmt[] {
  const result = parseSource(src);
  expect(result.diagnostics).toEqual([]);
  expect(result.ok).toBe(true);
  return result.program.statements;
}

function expr(src: string): string {
  const [stmt] = parseOk(`${src};`);
  if (stmt.kind !== "ExpressionStatement") {
    throw new Error(`expected an expression statement, got ${stmt.kind}`);
  }
  return show(stmt.expr);
}

describe("Parser expressions", () => {
  it("should bind * tighter than +", () => {
    expect(expr("2 + 3 * 4")).toBe("(+ 2 (* 3 4))");
  });

  it("should bind comparisons tighter than &&", () => {
    expect(expr("1 < 2 && 3 > 2")).toBe("(&& (< 1 2) (> 3 2))");
  });

  it("should fold same-precedence operators to the left", () => {
    expect(expr("1 - 2 - 3")).toBe("(- (- 1 2) 3)");
    expect(expr("a == b != c")).toBe("(!= (== a b) c)");
  });

  it("should bind && tighter than ||", () => {
    expect(expr("a || b && c")).toBe("(|| a (&& b c))");
  });

  it("should honor parentheses", () => {
    expect(expr("(1 + 2) * 3")).toBe("(* (+ 1 2) 3)");
  });

  it("should parse prefix operators", () => {
    expect(expr("-x * !y")).toBe("(* (- x) (! y))");
    expect(expr("- -x")).toBe("(- (- x))");
    expect(expr("x++ + ++y")).toBe("(+ (post++ x) (++ y))");
  });

  it("should parse the conditional operator right-associatively", () => {
    expect(expr("a ? b : c ? d : e")).toBe("(? a b (? c d e))");
    expect(expr("x > 0 ? x : -x")).toBe("(? (> x 0) x (- x))");
  });

  it("should parse index, call and array literal forms", () => {
    expect(expr("xs[i + 1]")).toBe("(index xs (+ i 1))");
    expect(expr("f(1, g(2))")).toBe("(call f 1 (call g 2))");
    expect(expr("[1, 2, 3]")).toBe("[1 2 3]");
    expect(expr("[]")).toBe("[]");
  });

  it("should chain postfix forms left to right", () => {
    expect(expr("a[0][1](x)++")).toBe(
      "(post++ (call (index (index a 0) 1) x))"
    );
  });

  it("should keep literal values and raw text", () => {
    const [stmt] = parseOk('"hi";');
    expect(stmt).toMatchObject({
      kind: "ExpressionStatement",
      expr: { kind: "Literal", literalKind: "string", value: "hi", raw: '"hi"' },
    });
  });
});

describe("Parser statements", () => {
  it("should parse declarations", () => {
    const [a, b, c] = parseOk("int x = 5;\nfloat[] xs = [1.5];\nchar c;");
    expect(a).toMatchObject({
      kind: "Declaration",
      varType: { name: "int", isArray: false },
      name: "x",
      init: { kind: "Literal", value: 5 },
      span: { line: 1, col: 1 },
    });
    expect(b).toMatchObject({
      kind: "Declaration",
      varType: { name: "float", isArray: true },
      name: "xs",
      init: { kind: "ArrayLiteral" },
    });
    expect(c).toMatchObject({ kind: "Declaration", name: "c", init: undefined });
  });

  it("should parse assignments to names and indexed elements", () => {
    const [a, b] = parseOk("x += 2;\nxs[0] = 1;");
    expect(a).toMatchObject({
      kind: "Assignment",
      op: "+=",
      target: { kind: "Identifier", name: "x" },
      expr: { kind: "Literal", value: 2 },
    });
    expect(b).toMatchObject({
      kind: "Assignment",
      op: "=",
      target: { kind: "Postfix", op: { kind: "index" } },
    });
  });

  it("should position nodes at their leftmost token", () => {
    const [decl, assign] = parseOk("int x = 5;\n  y = x * 2;");
    expect(positionOf(decl)).toEqual({ line: 1, col: 1 });
    expect(positionOf(assign)).toEqual({ line: 2, col: 3 });
    expect(assign).toMatchObject({
      kind: "Assignment",
      span: { line: 2, col: 3 },
      expr: { kind: "Binary", span: { line: 2, col: 7 } },
    });
  });

  it("should start a parenthesised expression at its opening paren", () => {
    const [product, bump] = parseOk("(a + b) * c;\n(x)++;");
    expect(positionOf(product)).toEqual({ line: 1, col: 1 });
    expect(positionOf(bump)).toEqual({ line: 2, col: 1 });
    expect(product).toMatchObject({
      kind: "ExpressionStatement",
      span: { start: 0, end: 12 },
      expr: {
        kind: "Binary",
        op: "*",
        span: { start: 0, line: 1, col: 1 },
        left: { kind: "Binary", op: "+", span: { start: 0, end: 7, col: 1 } },
      },
    });
    expect(bump).toMatchObject({
      kind: "ExpressionStatement",
      span: { start: 13, line: 2, col: 1 },
      expr: {
        kind: "Postfix",
        span: { start: 13, line: 2, col: 1 },
        operand: { kind: "Identifier", name: "x", span: { start: 13, end: 16 } },
      },
    });
  });

  it("should attach varna to the nearest agr", () => {
    const [outer] = parseOk("agr (a) agr (b) s1; varna s2;");
    if (outer.kind !== "If") throw new Error("expected If");
    expect(outer.elseBranch).toBeUndefined();
    expect(outer.thenBranch).toMatchObject({
      kind: "If",
      cond: { kind: "Identifier", name: "b" },
      elseBranch: {
        kind: "ExpressionStatement",
        expr: { kind: "Identifier", name: "s2" },
      },
    });
  });

  it("should parse while and do-while loops", () => {
    const [w, d] = parseOk(
      "jabtak (i < 3) i++;\ndo { i--; } jabtak (i > 0);"
    );
    expect(w).toMatchObject({
      kind: "While",
      cond: { kind: "Binary", op: "<" },
      body: { kind: "ExpressionStatement" },
    });
    expect(d).toMatchObject({
      kind: "DoWhile",
      body: { kind: "Block" },
      cond: { kind: "Binary", op: ">" },
    });
  });

  it("should parse a complete for loop", () => {
    const [loop] = parseOk("tabtak (int i = 0; i < 10; i++) { dikhao(i); }");
    expect(loop).toMatchObject({
      kind: "For",
      init: { kind: "Declaration", name: "i" },
      cond: { kind: "Binary", op: "<" },
      update: [{ kind: "Postfix", op: { kind: "increment" } }],
      body: { kind: "Block", statements: [{ kind: "Print" }] },
    });
  });

  it("should accept a for loop with empty init and update", () => {
    const result = parseSource("tabtak(;true;) { break; }");
    expect(result.ok).toBe(true);
    expect(result.diagnostics).toEqual([]);
    const [loop] = result.program.statements;
    if (loop.kind !== "For") throw new Error("expected For");
    expect(loop.init).toBeUndefined();
    expect(loop.update).toEqual([]);
    expect(loop.cond).toMatchObject({ kind: "Literal", value: true });
    expect(loop.body).toMatchObject({
      kind: "Block",
      statements: [{ kind: "Break" }],
    });
  });

  it("should parse assignment init, several updates and an empty body", () => {
    const result = parseSource("tabtak (i = 0; ; i += 2, --j) ;");
    expect(result.ok).toBe(true);
    expect(result.diagnostics.map((d) => [d.severity, d.kind, d.span.col])).toEqual([
      ["warning", "EmptyStatement", 31],
    ]);
    expect(result.program.statements[0]).toMatchObject({
      kind: "For",
      init: { kind: "Assignment", op: "=" },
      cond: undefined,
      update: [
        { kind: "Assignment", op: "+=" },
        { kind: "Unary", op: "--", operand: { name: "j" } },
      ],
      body: { kind: "Block", statements: [] },
    });
  });

  it("should parse return, print, input and jumps", () => {
    const stmts = parseOk(
      "return;\nreturn x + 1;\ndikhao();\ndikhao(\"a\", 1);\nlikho(n);\nbreak;\ncontinue;"
    );
    expect(stmts.map((s) => s.kind)).toEqual([
      "Return",
      "Return",
      "Print",
      "Print",
      "Input",
      "Break",
      "Continue",
    ]);
    expect(stmts[0]).toMatchObject({ value: undefined });
    expect(stmts[1]).toMatchObject({ value: { kind: "Binary", op: "+" } });
    expect(stmts[2]).toMatchObject({ args: [] });
    expect(stmts[3]).toMatchObject({ args: [{ value: "a" }, { value: 1 }] });
    expect(stmts[4]).toMatchObject({ target: { name: "n" } });
  });

  it("should parse nested blocks", () => {
    const [block] = parseOk("{ int a; { a = 1; } }");
    expect(block).toMatchObject({
      kind: "Block",
      statements: [
        { kind: "Declaration" },
        { kind: "Block", statements: [{ kind: "Assignment" }] },
      ],
    });
  });

  it("should return an empty program for empty or comment-only input", () => {
    for (const src of ["", "  // nothing here\n"]) {
      const result = parseSource(src);
      expect(result.program.statements).toEqual([]);
      expect(result.diagnostics).toEqual([]);
      expect(result.ok).toBe(true);
    }
  });

  it("should refuse a token stream without eof", () => {
    const diags = new Diagnostics("x.sl", "x");
    expect(
      () =>
        new Parser(
          [{ kind: "ident", text: "x", start: 0, end: 1, line: 1, col: 1 }],
          diags
        )
    ).toThrow(InvariantError);
  });
});
