import {
  isIndexExpr,
  type AssignOp,
  type AssignTarget,
  type Assignment,
  type BinaryOp,
  type Block,
  type BreakStmt,
  type ContinueStmt,
  type Declaration,
  type DoWhileStmt,
  type Expr,
  type ExprStmt,
  type ForStmt,
  type Identifier,
  type IfStmt,
  type InputStmt,
  type PrintStmt,
  type Program,
  type ReturnStmt,
  type Span,
  type StepExpr,
  type Stmt,
  type UnaryOp,
  type WhileStmt,
} from "./ast";
import type { DiagnosticDetail, Diagnostics, SourceSpan } from "./diagnostics";
import { InvariantError } from "./errors";
import {
  describeKind,
  describeToken,
  isTypeName,
  type Token,
  type TokenKind,
} from "./tokens";

export const DEFAULT_MAX_DEPTH = 256;

export type ParserOptions = {
  maxDepth?: number;
};

const PRECEDENCE: Record<BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
  "%": 6,
};

const ASSIGN_OPS: readonly string[] = ["=", "+=", "-=", "*=", "/="];
const UNARY_OPS: readonly string[] = ["!", "-", "+", "++", "--"];

// Keywords that can only begin a statement; recovery resumes at them.
const STATEMENT_KEYWORDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "type",
  "kw_agr",
  "kw_jabtak",
  "kw_tabtak",
  "kw_do",
  "kw_break",
  "kw_continue",
  "kw_return",
  "kw_dikhao",
  "kw_likho",
]);

function isAssignOp(text: string): text is AssignOp {
  return ASSIGN_OPS.includes(text);
}

function isUnaryOp(text: string): text is UnaryOp {
  return UNARY_OPS.includes(text);
}

function isBinaryOp(text: string): text is BinaryOp {
  return Object.prototype.hasOwnProperty.call(PRECEDENCE, text);
}

function listExpected(expected: readonly string[]): string {
  if (expected.length <= 1) return expected.join("");
  return `${expected.slice(0, -1).join(", ")} or ${expected[expected.length - 1]}`;
}

type Pos = { start: number; line: number; col: number };

/**
 * Recursive-descent parser with precedence climbing for binary operators.
 *
 * Expected syntax errors never throw: a production that cannot continue
 * reports once and returns `undefined`, and the enclosing statement list
 * resynchronizes (panic mode).
 */
export class Parser {
  private i = 0;
  private depth = 0;
  private aborted = false;
  // index of the token the last syntax error was reported at
  private lastErrorAt = -1;
  private readonly maxDepth: number;

  constructor(
    private readonly tokens: Token[],
    private readonly diags: Diagnostics,
    opts: ParserOptions = {}
  ) {
    if (tokens.at(-1)?.kind !== "eof") {
      throw new InvariantError("token stream must end with an eof token");
    }
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parseProgram(): Program {
    const first = this.cur();
    const statements = this.parseStatementList(false);
    return {
      kind: "Program",
      span: {
        start: first.start,
        end: this.cur().end,
        line: first.line,
        col: first.col,
      },
      statements,
    };
  }

  // --- Statements ---

  private parseStatementList(inBlock: boolean): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.is("eof") && !(inBlock && this.is("rbrace"))) {
      if (this.is("semicolon")) {
        this.warnEmptyStatement(this.next());
        continue;
      }
      const before = this.i;
      const stmt = this.parseStatement();
      if (stmt) {
        statements.push(stmt);
        continue;
      }
      if (this.aborted) break;
      this.synchronize(before);
    }
    return statements;
  }

  /**
   * Panic-mode recovery: skip to `;` (consumed) or to a token a statement
   * can resume at. Always consumes at least one token when the failed
   * statement consumed none.
   */
  private synchronize(failedAt: number) {
    if (this.i === failedAt && !this.is("eof")) this.next();
    while (!this.is("eof")) {
      if (this.is("semicolon")) {
        this.next();
        return;
      }
      if (this.isSyncPoint()) return;
      this.next();
    }
  }

  private parseStatement(): Stmt | undefined {
    return this.nested(() => {
      switch (this.cur().kind) {
        case "type":
          return this.parseDeclarationStmt();
        case "kw_agr":
          return this.parseIf();
        case "kw_jabtak":
          return this.parseWhile();
        case "kw_do":
          return this.parseDoWhile();
        case "kw_tabtak":
          return this.parseFor();
        case "kw_break":
        case "kw_continue":
          return this.parseJump();
        case "kw_return":
          return this.parseReturn();
        case "kw_dikhao":
          return this.parsePrint();
        case "kw_likho":
          return this.parseInput();
        case "lbrace":
          return this.parseBlock();
        default:
          return this.parseSimpleStmt();
      }
    });
  }

  // Body of a control construct; a lone `;` is an empty block.
  private parseBody(): Stmt | undefined {
    if (this.is("semicolon")) {
      const t = this.next();
      this.warnEmptyStatement(t);
      return { kind: "Block", span: this.tokenSpan(t), statements: [] };
    }
    return this.parseStatement();
  }

  private parseBlock(): Block | undefined {
    const start = this.next(); // {
    const statements = this.parseStatementList(true);
    if (this.aborted || !this.expect("rbrace")) return undefined;
    return { kind: "Block", span: this.spanFrom(start), statements };
  }

  private parseDeclarationStmt(): Declaration | undefined {
    const decl = this.parseDeclaration();
    return decl && this.terminated(decl);
  }

  private parseDeclaration(): Declaration | undefined {
    const typeTok = this.next();
    const typeName = typeTok.text;
    if (!isTypeName(typeName)) {
      throw new InvariantError(`type token '${typeName}' is not a type name`);
    }

    let isArray = false;
    if (this.is("lbracket")) {
      this.next();
      if (!this.expect("rbracket")) return undefined;
      isArray = true;
    }

    const nameTok = this.expectIdent();
    if (!nameTok) return undefined;

    let init: Expr | undefined;
    if (this.isOp("=")) {
      this.next();
      init = this.parseExpr();
      if (!init) return undefined;
    }

    return {
      kind: "Declaration",
      span: this.spanFrom(typeTok),
      varType: { name: typeName, isArray },
      name: nameTok.text,
      init,
    };
  }

  private parseIf(): IfStmt | undefined {
    const start = this.next(); // agr
    const cond = this.parseParenCondition();
    if (!cond) return undefined;
    const thenBranch = this.parseBody();
    if (!thenBranch) return undefined;

    // Taking `varna` here binds it to the nearest unmatched `agr`.
    let elseBranch: Stmt | undefined;
    if (this.is("kw_varna")) {
      this.next();
      elseBranch = this.parseBody();
      if (!elseBranch) return undefined;
    }

    return {
      kind: "If",
      span: this.spanFrom(start),
      cond,
      thenBranch,
      elseBranch,
    };
  }

  private parseWhile(): WhileStmt | undefined {
    const start = this.next(); // jabtak
    const cond = this.parseParenCondition();
    if (!cond) return undefined;
    const body = this.parseBody();
    if (!body) return undefined;
    return { kind: "While", span: this.spanFrom(start), cond, body };
  }

  private parseDoWhile(): DoWhileStmt | undefined {
    const start = this.next(); // do
    const body = this.parseBody();
    if (!body || !this.expect("kw_jabtak")) return undefined;
    const cond = this.parseParenCondition();
    if (!cond) return undefined;
    return this.terminated<DoWhileStmt>({
      kind: "DoWhile",
      span: this.spanFrom(start),
      body,
      cond,
    });
  }

  private parseFor(): ForStmt | undefined {
    const start = this.next(); // tabtak
    if (!this.expect("lparen")) return undefined;

    let init: Declaration | Assignment | undefined;
    if (this.is("semicolon")) {
      this.next();
    } else {
      init = this.is("type")
        ? this.parseDeclaration()
        : this.parseAssignmentExpr();
      if (!init || !this.expect("semicolon")) return undefined;
    }

    let cond: Expr | undefined;
    if (!this.is("semicolon")) {
      cond = this.parseExpr();
      if (!cond) return undefined;
    }
    if (!this.expect("semicolon")) return undefined;

    const update: StepExpr[] = [];
    if (!this.is("rparen")) {
      while (true) {
        const step = this.parseStep();
        if (!step) return undefined;
        update.push(step);
        if (!this.is("comma")) break;
        this.next();
      }
    }
    if (!this.expect("rparen")) return undefined;

    const body = this.parseBody();
    if (!body) return undefined;

    return {
      kind: "For",
      span: this.spanFrom(start),
      init,
      cond,
      update,
      body,
    };
  }

  private parseJump(): Stmt | undefined {
    const t = this.next();
    const span = this.tokenSpan(t);
    return this.terminated<BreakStmt | ContinueStmt>(
      t.kind === "kw_break"
        ? { kind: "Break", span }
        : { kind: "Continue", span }
    );
  }

  private parseReturn(): ReturnStmt | undefined {
    const start = this.next(); // return
    let value: Expr | undefined;
    if (!this.is("semicolon")) {
      value = this.parseExpr();
      if (!value) return undefined;
    }
    return this.terminated<ReturnStmt>({
      kind: "Return",
      span: this.spanFrom(start),
      value,
    });
  }

  private parsePrint(): PrintStmt | undefined {
    const start = this.next(); // dikhao
    if (!this.expect("lparen")) return undefined;
    const args = this.parseExprList("rparen");
    if (!args || !this.expect("rparen")) return undefined;
    return this.terminated<PrintStmt>({
      kind: "Print",
      span: this.spanFrom(start),
      args,
    });
  }

  private parseInput(): InputStmt | undefined {
    const start = this.next(); // likho
    if (!this.expect("lparen")) return undefined;
    const nameTok = this.expectIdent();
    if (!nameTok || !this.expect("rparen")) return undefined;
    return this.terminated<InputStmt>({
      kind: "Input",
      span: this.spanFrom(start),
      target: this.identFrom(nameTok),
    });
  }

  // Expression statement, or an assignment when an assignment operator
  // follows an identifier or index expression.
  private parseSimpleStmt(): Stmt | undefined {
    const first = this.cur();
    const expr = this.parseExpr();
    if (!expr) return undefined;

    const opTok = this.cur();
    const opText = opTok.text;
    if (opTok.kind === "op" && isAssignOp(opText)) {
      const target = this.asAssignTarget(expr);
      if (!target) {
        this.unexpected(["';'"]);
        return undefined;
      }
      this.next();
      const rhs = this.parseExpr();
      if (!rhs) return undefined;
      return this.terminated<Assignment>({
        kind: "Assignment",
        span: this.spanFrom(first),
        target,
        op: opText,
        expr: rhs,
      });
    }

    return this.terminated<ExprStmt>({
      kind: "ExpressionStatement",
      span: this.spanFrom(first),
      expr,
    });
  }

  private asAssignTarget(expr: Expr): AssignTarget | undefined {
    if (expr.kind === "Identifier") return expr;
    if (isIndexExpr(expr)) return expr;
    return undefined;
  }

  /** `IDENT assignOp expr` as used in a for-loop header. */
  private parseAssignmentExpr(): Assignment | undefined {
    const nameTok = this.expectIdent();
    if (!nameTok) return undefined;
    return this.parseAssignmentRest(nameTok, ["assignment operator"]);
  }

  private parseAssignmentRest(
    nameTok: Token,
    expected: readonly string[]
  ): Assignment | undefined {
    const opTok = this.cur();
    const opText = opTok.text;
    if (opTok.kind !== "op" || !isAssignOp(opText)) {
      this.unexpected(expected);
      return undefined;
    }
    this.next();
    const expr = this.parseExpr();
    if (!expr) return undefined;
    return {
      kind: "Assignment",
      span: this.spanFrom(nameTok),
      target: this.identFrom(nameTok),
      op: opText,
      expr,
    };
  }

  /** For-loop update: `i = e`, `i += e`, `++i`, `--i`, `i++`, `i--`. */
  private parseStep(): StepExpr | undefined {
    if (this.isOp("++") || this.isOp("--")) {
      const opTok = this.next();
      const nameTok = this.expectIdent();
      if (!nameTok) return undefined;
      return {
        kind: "Unary",
        span: this.spanFrom(opTok),
        op: opTok.text === "++" ? "++" : "--",
        operand: this.identFrom(nameTok),
        prefix: true,
      };
    }

    const nameTok = this.expectIdent();
    if (!nameTok) return undefined;
    if (this.isOp("++") || this.isOp("--")) {
      const opTok = this.next();
      return {
        kind: "Postfix",
        span: this.spanFrom(nameTok),
        operand: this.identFrom(nameTok),
        op: { kind: opTok.text === "++" ? "increment" : "decrement" },
      };
    }
    return this.parseAssignmentRest(nameTok, [
      "'++'",
      "'--'",
      "assignment operator",
    ]);
  }

  private parseParenCondition(): Expr | undefined {
    if (!this.expect("lparen")) return undefined;
    const cond = this.parseExpr();
    if (!cond || !this.expect("rparen")) return undefined;
    return cond;
  }

  // --- Expressions ---

  private parseExpr(): Expr | undefined {
    return this.nested(() => this.parseConditional());
  }

  private parseConditional(): Expr | undefined {
    const cond = this.parseBinaryExpr(1);
    if (!cond || !this.is("question")) return cond;
    this.next();
    const thenExpr = this.parseExpr();
    if (!thenExpr || !this.expect("colon")) return undefined;
    // right-associative: the else arm is itself a full conditional
    const elseExpr = this.parseExpr();
    if (!elseExpr) return undefined;
    return {
      kind: "Conditional",
      span: this.spanFrom(cond.span),
      cond,
      thenExpr,
      elseExpr,
    };
  }

  // Same-precedence operators fold left in the loop; recursion only climbs
  // to the next tighter level.
  private parseBinaryExpr(minPrec: number): Expr | undefined {
    let left = this.parseUnaryExpr();
    if (!left) return undefined;

    while (this.is("op")) {
      const op = this.cur().text;
      if (!isBinaryOp(op)) break;
      const prec = PRECEDENCE[op];
      if (prec < minPrec) break;
      this.next();
      const right = this.parseBinaryExpr(prec + 1);
      if (!right) return undefined;
      left = {
        kind: "Binary",
        span: this.spanFrom(left.span),
        op,
        left,
        right,
      };
    }

    return left;
  }

  private parseUnaryExpr(): Expr | undefined {
    const prefixes: { tok: Token; op: UnaryOp }[] = [];
    while (this.is("op")) {
      const op = this.cur().text;
      if (!isUnaryOp(op)) break;
      prefixes.push({ tok: this.next(), op });
    }

    let expr = this.parsePostfixExpr();
    if (!expr) return undefined;

    for (let k = prefixes.length - 1; k >= 0; k--) {
      const { tok, op } = prefixes[k];
      expr = {
        kind: "Unary",
        span: {
          start: tok.start,
          end: expr.span.end,
          line: tok.line,
          col: tok.col,
        },
        op,
        operand: expr,
        prefix: true,
      };
    }
    return expr;
  }

  private parsePostfixExpr(): Expr | undefined {
    let expr = this.parsePrimaryExpr();
    if (!expr) return undefined;

    while (true) {
      if (this.isOp("++") || this.isOp("--")) {
        const opTok = this.next();
        expr = {
          kind: "Postfix",
          span: this.spanFrom(expr.span),
          operand: expr,
          op: { kind: opTok.text === "++" ? "increment" : "decrement" },
        };
        continue;
      }
      if (this.is("lbracket")) {
        this.next();
        const index = this.parseExpr();
        if (!index || !this.expect("rbracket")) return undefined;
        expr = {
          kind: "Postfix",
          span: this.spanFrom(expr.span),
          operand: expr,
          op: { kind: "index", index },
        };
        continue;
      }
      if (this.is("lparen")) {
        this.next();
        const args = this.parseExprList("rparen");
        if (!args || !this.expect("rparen")) return undefined;
        expr = {
          kind: "Postfix",
          span: this.spanFrom(expr.span),
          operand: expr,
          op: { kind: "call", args },
        };
        continue;
      }
      break;
    }

    return expr;
  }

  private parsePrimaryExpr(): Expr | undefined {
    const t = this.cur();
    switch (t.kind) {
      case "int":
      case "float":
      case "bool":
      case "string":
      case "char": {
        this.next();
        if (t.value === undefined) {
          throw new InvariantError(`literal token '${t.text}' has no value`);
        }
        return {
          kind: "Literal",
          span: this.tokenSpan(t),
          literalKind: t.kind,
          value: t.value,
          raw: t.text,
        };
      }
      case "ident":
        this.next();
        return this.identFrom(t);
      case "lparen": {
        this.next();
        const inner = this.parseExpr();
        if (!inner || !this.expect("rparen")) return undefined;
        // no grouping node; the inner expression takes over the parens' span
        return { ...inner, span: this.spanFrom(t) };
      }
      case "lbracket": {
        // in primary position `[` always opens an array literal
        this.next();
        const elements = this.parseExprList("rbracket");
        if (!elements || !this.expect("rbracket")) return undefined;
        return {
          kind: "ArrayLiteral",
          span: this.spanFrom(t),
          elements,
        };
      }
      default:
        this.unexpected(["expression"]);
        return undefined;
    }
  }

  private parseExprList(close: TokenKind): Expr[] | undefined {
    const items: Expr[] = [];
    if (this.is(close)) return items;
    while (true) {
      const item = this.parseExpr();
      if (!item) return undefined;
      items.push(item);
      if (!this.is("comma")) return items;
      this.next();
    }
  }

  // --- Recovery & reporting ---

  /**
   * Runs one level of nested parsing. Past `maxDepth` the parse reports
   * NestingTooDeep and abandons the remaining input.
   */
  private nested<T>(parse: () => T | undefined): T | undefined {
    if (this.aborted) return undefined;
    if (this.depth >= this.maxDepth) {
      this.report(
        { family: "syntax", kind: "NestingTooDeep", limit: this.maxDepth },
        `Nesting exceeds the maximum depth of ${this.maxDepth}`
      );
      this.aborted = true;
      this.i = this.tokens.length - 1;
      this.lastErrorAt = this.i;
      return undefined;
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private terminated<T extends Stmt>(stmt: T): T | undefined {
    return this.expect("semicolon") ? stmt : undefined;
  }

  /**
   * Consumes a token of `kind`. When it is absent but the current token is a
   * synchronization point, reports MissingToken and carries on as if it had
   * been there.
   */
  private expect(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.next();
      return true;
    }
    if (this.isSyncPoint()) {
      const expected = describeKind(kind);
      this.report(
        { family: "syntax", kind: "MissingToken", expected },
        `Missing ${expected} before ${describeToken(this.cur())}`
      );
      return true;
    }
    this.unexpected([describeKind(kind)]);
    return false;
  }

  private expectIdent(): Token | undefined {
    if (this.is("ident")) return this.next();
    this.unexpected(["identifier"]);
    return undefined;
  }

  private unexpected(expected: readonly string[]) {
    const t = this.cur();
    if (t.kind === "eof") {
      this.report(
        { family: "syntax", kind: "UnexpectedEOF", expected },
        `Unexpected end of input, expected ${listExpected(expected)}`
      );
      return;
    }
    this.report(
      { family: "syntax", kind: "UnexpectedToken", expected, found: t.text },
      `Expected ${listExpected(expected)} but got ${describeToken(t)}`
    );
  }

  // One diagnostic per token position; invalid tokens were already
  // reported by the lexer.
  private report(detail: DiagnosticDetail, message: string) {
    const t = this.cur();
    if (this.i === this.lastErrorAt || t.kind === "invalid") return;
    this.lastErrorAt = this.i;
    this.diags.error(detail, message, this.sourceSpan(t));
  }

  private warnEmptyStatement(t: Token) {
    this.diags.warning(
      { family: "syntax", kind: "EmptyStatement" },
      "Empty statement",
      this.sourceSpan(t)
    );
  }

  private isSyncPoint(): boolean {
    const kind = this.cur().kind;
    return (
      kind === "semicolon" ||
      kind === "lbrace" ||
      kind === "rbrace" ||
      kind === "eof" ||
      STATEMENT_KEYWORDS.has(kind)
    );
  }

  // --- Spans & cursor ---

  private spanFrom(from: Pos): Span {
    return {
      start: from.start,
      end: this.prev().end,
      line: from.line,
      col: from.col,
    };
  }

  private tokenSpan(tok: Token): Span {
    return { start: tok.start, end: tok.end, line: tok.line, col: tok.col };
  }

  private sourceSpan(tok: Token): SourceSpan {
    return { filePath: this.diags.filePath, ...this.tokenSpan(tok) };
  }

  private identFrom(tok: Token): Identifier {
    return { kind: "Identifier", span: this.tokenSpan(tok), name: tok.text };
  }

  private cur(): Token {
    return this.tokens[this.i] ?? this.tokens[this.tokens.length - 1];
  }

  private prev(): Token {
    return this.tokens[Math.max(0, this.i - 1)];
  }

  private next(): Token {
    const t = this.cur();
    if (t.kind !== "eof") this.i++;
    return t;
  }

  private is(kind: TokenKind): boolean {
    return this.cur().kind === kind;
  }

  private isOp(text: string): boolean {
    const t = this.cur();
    return t.kind === "op" && t.text === text;
  }
}
