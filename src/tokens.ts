export type KeywordKind =
  | "kw_agr"
  | "kw_varna"
  | "kw_jabtak"
  | "kw_tabtak"
  | "kw_do"
  | "kw_break"
  | "kw_continue"
  | "kw_return"
  | "kw_dikhao"
  | "kw_likho";

export type LiteralKind = "int" | "float" | "bool" | "string" | "char";

export type TokenKind =
  | "eof"
  | "invalid"
  | "ident"
  | "type"
  | LiteralKind
  | KeywordKind
  | "lparen"
  | "rparen"
  | "lbrace"
  | "rbrace"
  | "lbracket"
  | "rbracket"
  | "comma"
  | "semicolon"
  | "question"
  | "colon"
  | "op";

export type Token = {
  kind: TokenKind;
  text: string;
  // decoded literal; only set on literal tokens
  value?: number | string | boolean;
  start: number;
  end: number;
  line: number;
  col: number;
};

export const TYPE_NAMES = ["int", "float", "bool", "string", "char"] as const;
export type TypeName = (typeof TYPE_NAMES)[number];

const TYPE_NAME_LIST: readonly string[] = TYPE_NAMES;

export function isTypeName(text: string): text is TypeName {
  return TYPE_NAME_LIST.includes(text);
}

/** Keyword spellings. Matching is exact and case-sensitive. */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<
  string,
  TokenKind
>([
  ["agr", "kw_agr"],
  ["varna", "kw_varna"],
  ["jabtak", "kw_jabtak"],
  ["tabtak", "kw_tabtak"],
  ["do", "kw_do"],
  ["break", "kw_break"],
  ["continue", "kw_continue"],
  ["return", "kw_return"],
  ["dikhao", "kw_dikhao"],
  ["likho", "kw_likho"],
  ...TYPE_NAMES.map((name): [string, TokenKind] => [name, "type"]),
  ["true", "bool"],
  ["false", "bool"],
]);

export const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map<
  string,
  TokenKind
>([
  ["(", "lparen"],
  [")", "rparen"],
  ["{", "lbrace"],
  ["}", "rbrace"],
  ["[", "lbracket"],
  ["]", "rbracket"],
  [",", "comma"],
  [";", "semicolon"],
  ["?", "question"],
  [":", "colon"],
]);

export const TWO_CHAR_OPERATORS: ReadonlySet<string> = new Set([
  "+=",
  "-=",
  "*=",
  "/=",
  "++",
  "--",
  "&&",
  "||",
  "==",
  "!=",
  "<=",
  ">=",
]);

export const ONE_CHAR_OPERATORS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "%",
  "=",
  "<",
  ">",
  "!",
]);

/** Human-readable name of a token kind, used in "expected ..." messages. */
export function describeKind(kind: TokenKind): string {
  for (const [text, k] of PUNCTUATION) {
    if (k === kind) return `'${text}'`;
  }
  for (const [text, k] of KEYWORDS) {
    if (k === kind && kind.startsWith("kw_")) return `'${text}'`;
  }
  switch (kind) {
    case "eof":
      return "end of input";
    case "ident":
      return "identifier";
    case "type":
      return "type";
    case "op":
      return "operator";
    case "invalid":
      return "invalid token";
    default:
      return `${kind} literal`;
  }
}

export function describeToken(tok: Token): string {
  if (tok.kind === "eof") return "end of input";
  return `'${tok.text}'`;
}
