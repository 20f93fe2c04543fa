import { assertNever, nodeChildren, type Node } from "./ast";
import type { Token } from "./tokens";

type Labeled = { label?: string; node: Node };

function describeNode(node: Node): string {
  switch (node.kind) {
    case "Declaration":
      return `Declaration: ${node.varType.name}${node.varType.isArray ? "[]" : ""} ${node.name}`;
    case "Assignment":
    case "Binary":
    case "Unary":
      return `${node.kind}: ${node.op}`;
    case "Postfix":
      switch (node.op.kind) {
        case "increment":
          return "Postfix: ++";
        case "decrement":
          return "Postfix: --";
        case "index":
          return "Postfix: []";
        case "call":
          return "Postfix: ()";
        default:
          return assertNever(node.op);
      }
    case "Literal":
      return `Literal: ${node.raw}`;
    case "Identifier":
      return `Identifier: ${node.name}`;
    case "Program":
    case "Block":
    case "If":
    case "While":
    case "DoWhile":
    case "For":
    case "Break":
    case "Continue":
    case "Return":
    case "Print":
    case "Input":
    case "ExpressionStatement":
    case "Conditional":
    case "ArrayLiteral":
      return node.kind;
    default:
      return assertNever(node);
  }
}

// Control constructs label their parts so optional pieces stay unambiguous.
function labeledChildren(node: Node): Labeled[] {
  switch (node.kind) {
    case "If": {
      const out: Labeled[] = [
        { label: "cond", node: node.cond },
        { label: "then", node: node.thenBranch },
      ];
      if (node.elseBranch) out.push({ label: "else", node: node.elseBranch });
      return out;
    }
    case "While":
      return [
        { label: "cond", node: node.cond },
        { label: "body", node: node.body },
      ];
    case "DoWhile":
      return [
        { label: "body", node: node.body },
        { label: "cond", node: node.cond },
      ];
    case "For": {
      const out: Labeled[] = [];
      if (node.init) out.push({ label: "init", node: node.init });
      if (node.cond) out.push({ label: "cond", node: node.cond });
      for (const step of node.update) out.push({ label: "update", node: step });
      out.push({ label: "body", node: node.body });
      return out;
    }
    default:
      return nodeChildren(node).map((child) => ({ node: child }));
  }
}

/**
 * Renders a node as an indented tree, one node per line:
 *
 * ```
 * Program
 *   Declaration: int x
 *     Binary: +
 *       Literal: 2
 *       Literal: 3
 * ```
 */
export function formatAst(node: Node): string {
  const lines: string[] = [];
  const walk = (n: Node, depth: number, label?: string) => {
    const prefix = label ? `${label}: ` : "";
    lines.push(`${"  ".repeat(depth)}${prefix}${describeNode(n)}`);
    for (const child of labeledChildren(n)) {
      walk(child.node, depth + 1, child.label);
    }
  };
  walk(node, 0);
  return lines.join("\n");
}

/** One token per line: `line:col kind "text"`. */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens
    .map((t) => `${t.line}:${t.col} ${t.kind} ${JSON.stringify(t.text)}`)
    .join("\n");
}
