import type { LiteralKind, TypeName } from "./tokens";

export type Span = {
  start: number;
  end: number;
  // position of the node's leftmost token
  line: number;
  col: number;
};

export type NodeBase = {
  kind: string;
  span: Span;
};

export type Program = NodeBase & {
  kind: "Program";
  statements: Stmt[];
};

export type Stmt =
  | Block
  | Declaration
  | Assignment
  | IfStmt
  | WhileStmt
  | DoWhileStmt
  | ForStmt
  | BreakStmt
  | ContinueStmt
  | ReturnStmt
  | PrintStmt
  | InputStmt
  | ExprStmt;

export type Block = NodeBase & {
  kind: "Block";
  statements: Stmt[];
};

export type VarType = {
  name: TypeName;
  isArray: boolean;
};

/**
 * Example: `int x = 5;`, `float[] xs = [1.5, 2.0];`
 */
export type Declaration = NodeBase & {
  kind: "Declaration";
  varType: VarType;
  name: string;
  init?: Expr;
};

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/=";

export type AssignTarget = Identifier | IndexExpr;

/**
 * Example: `x += 2;`, `xs[0] = 1;`
 */
export type Assignment = NodeBase & {
  kind: "Assignment";
  target: AssignTarget;
  op: AssignOp;
  expr: Expr;
};

/**
 * Example: `agr (x > 0) dikhao(x); varna dikhao(0);`
 */
export type IfStmt = NodeBase & {
  kind: "If";
  cond: Expr;
  thenBranch: Stmt;
  elseBranch?: Stmt;
};

export type WhileStmt = NodeBase & {
  kind: "While";
  cond: Expr;
  body: Stmt;
};

/**
 * Example: `do { i++; } jabtak (i < 10);`
 */
export type DoWhileStmt = NodeBase & {
  kind: "DoWhile";
  body: Stmt;
  cond: Expr;
};

/** A for-loop update step: `i = i + 1`, `i++`, `--i`. */
export type StepExpr = Assignment | UnaryExpr | PostfixExpr;

/**
 * Example: `tabtak (int i = 0; i < n; i++) { ... }`
 */
export type ForStmt = NodeBase & {
  kind: "For";
  init?: Declaration | Assignment;
  cond?: Expr;
  update: StepExpr[];
  body: Stmt;
};

export type BreakStmt = NodeBase & { kind: "Break" };

export type ContinueStmt = NodeBase & { kind: "Continue" };

export type ReturnStmt = NodeBase & {
  kind: "Return";
  value?: Expr;
};

/**
 * Example: `dikhao("sum", a + b);`
 */
export type PrintStmt = NodeBase & {
  kind: "Print";
  args: Expr[];
};

/**
 * Example: `likho(name);`
 */
export type InputStmt = NodeBase & {
  kind: "Input";
  target: Identifier;
};

export type ExprStmt = NodeBase & {
  kind: "ExpressionStatement";
  expr: Expr;
};

export type Expr =
  | ConditionalExpr
  | BinaryExpr
  | UnaryExpr
  | PostfixExpr
  | Literal
  | Identifier
  | ArrayLiteral;

export type ConditionalExpr = NodeBase & {
  kind: "Conditional";
  cond: Expr;
  thenExpr: Expr;
  elseExpr: Expr;
};

export type BinaryOp =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%";

export type BinaryExpr = NodeBase & {
  kind: "Binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
};

export type UnaryOp = "!" | "-" | "+" | "++" | "--";

export type UnaryExpr = NodeBase & {
  kind: "Unary";
  op: UnaryOp;
  operand: Expr;
  prefix: true;
};

export type PostfixOp =
  | { kind: "increment" }
  | { kind: "decrement" }
  | { kind: "index"; index: Expr }
  | { kind: "call"; args: Expr[] };

export type PostfixExpr = NodeBase & {
  kind: "Postfix";
  operand: Expr;
  op: PostfixOp;
};

export type IndexExpr = PostfixExpr & {
  op: { kind: "index"; index: Expr };
};

export type Literal = NodeBase & {
  kind: "Literal";
  literalKind: LiteralKind;
  value: number | string | boolean;
  raw: string;
};

export type Identifier = NodeBase & {
  kind: "Identifier";
  name: string;
};

export type ArrayLiteral = NodeBase & {
  kind: "ArrayLiteral";
  elements: Expr[];
};

export type Node = Program | Stmt | Expr;

export type NodeKind = Node["kind"];

export function positionOf(node: Node): { line: number; col: number } {
  return { line: node.span.line, col: node.span.col };
}

export function isIndexExpr(expr: Expr): expr is IndexExpr {
  return expr.kind === "Postfix" && expr.op.kind === "index";
}

/** Direct children in source order. */
export function nodeChildren(node: Node): Node[] {
  switch (node.kind) {
    case "Program":
    case "Block":
      return [...node.statements];
    case "Declaration":
      return node.init ? [node.init] : [];
    case "Assignment":
      return [node.target, node.expr];
    case "If":
      return node.elseBranch
        ? [node.cond, node.thenBranch, node.elseBranch]
        : [node.cond, node.thenBranch];
    case "While":
      return [node.cond, node.body];
    case "DoWhile":
      return [node.body, node.cond];
    case "For": {
      const out: Node[] = [];
      if (node.init) out.push(node.init);
      if (node.cond) out.push(node.cond);
      out.push(...node.update, node.body);
      return out;
    }
    case "Break":
    case "Continue":
      return [];
    case "Return":
      return node.value ? [node.value] : [];
    case "Print":
      return [...node.args];
    case "Input":
      return [node.target];
    case "ExpressionStatement":
      return [node.expr];
    case "Conditional":
      return [node.cond, node.thenExpr, node.elseExpr];
    case "Binary":
      return [node.left, node.right];
    case "Unary":
      return [node.operand];
    case "Postfix":
      switch (node.op.kind) {
        case "index":
          return [node.operand, node.op.index];
        case "call":
          return [node.operand, ...node.op.args];
        default:
          return [node.operand];
      }
    case "Literal":
    case "Identifier":
      return [];
    case "ArrayLiteral":
      return [...node.elements];
    default:
      return assertNever(node);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}
