/* ===========================
 * Syntax fragments
 * ---------------------------
 * The slices of the source AST that diagnostics quote back to the user:
 * paths, expressions, tokens and visibility markers. Every node carries
 * its span and a `$kind` tag.
 * =========================== */

import type { SourceSpan } from "../model/span.js";

export interface Identifier {
  $kind: "Identifier";
  span: SourceSpan;
  name: string;
  isRaw?: boolean;
}

/* ---- Paths ---- */

export interface PathSegment {
  ident: Identifier;
  /** Generic arguments written on this segment, e.g. `Vec<u8>`. */
  args?: GenericArg[];
}

export type GenericArg =
  | { $kind: "TypeArg"; path: Path }
  | { $kind: "LifetimeArg"; name: string }
  | { $kind: "ConstArg"; expr: Expr };

export interface Path {
  $kind: "Path";
  span: SourceSpan;
  /** Written with a leading `::`. */
  global: boolean;
  segments: PathSegment[];
}

/* ---- Expressions ---- */

export type LitKind = "str" | "byte-str" | "char" | "byte" | "int" | "float" | "bool";

export interface LitExpr {
  $kind: "Lit";
  span: SourceSpan;
  lit: LitKind;
  /** Unescaped text for strings and chars, digits for numbers, `true`/`false` for bools. */
  symbol: string;
  suffix?: string;
}

export interface PathExpr {
  $kind: "PathExpr";
  span: SourceSpan;
  path: Path;
}

export type UnaryOperator = "!" | "-" | "*";

export interface UnaryExpr {
  $kind: "Unary";
  span: SourceSpan;
  operation: UnaryOperator;
  expression: Expr;
}

export type BinaryOperator =
  | "||" | "&&"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "|" | "^" | "&"
  | "<<" | ">>"
  | "+" | "-"
  | "*" | "/" | "%";

export interface BinaryExpr {
  $kind: "Binary";
  span: SourceSpan;
  operation: BinaryOperator;
  left: Expr;
  right: Expr;
}

export interface CastExpr {
  $kind: "Cast";
  span: SourceSpan;
  expression: Expr;
  type: Path;
}

export interface CallExpr {
  $kind: "Call";
  span: SourceSpan;
  func: Expr;
  args: Expr[];
}

export interface MethodCallExpr {
  $kind: "MethodCall";
  span: SourceSpan;
  receiver: Expr;
  method: Identifier;
  /** Turbofish arguments: `x.parse::<u32>()`. */
  typeArgs?: GenericArg[];
  args: Expr[];
}

export interface FieldExpr {
  $kind: "Field";
  span: SourceSpan;
  object: Expr;
  name: Identifier;
}

export interface IndexExpr {
  $kind: "Index";
  span: SourceSpan;
  object: Expr;
  index: Expr;
}

export interface ParenExpr {
  $kind: "Paren";
  span: SourceSpan;
  expression: Expr;
}

export interface ArrayExpr {
  $kind: "Array";
  span: SourceSpan;
  elements: Expr[];
}

export interface TupleExpr {
  $kind: "Tuple";
  span: SourceSpan;
  elements: Expr[];
}

export interface AddrOfExpr {
  $kind: "AddrOf";
  span: SourceSpan;
  mutable: boolean;
  expression: Expr;
}

export type Expr =
  | LitExpr
  | PathExpr
  | UnaryExpr
  | BinaryExpr
  | CastExpr
  | CallExpr
  | MethodCallExpr
  | FieldExpr
  | IndexExpr
  | ParenExpr
  | ArrayExpr
  | TupleExpr
  | AddrOfExpr;

/* ---- Tokens ---- */

export type Punct =
  | "Eq" | "Lt" | "Le" | "EqEq" | "Ne" | "Ge" | "Gt"
  | "AndAnd" | "OrOr" | "Not" | "Tilde"
  | "Plus" | "Minus" | "Star" | "Slash" | "Percent" | "Caret" | "And" | "Or" | "Shl" | "Shr"
  | "PlusEq" | "MinusEq" | "StarEq" | "SlashEq" | "PercentEq" | "CaretEq" | "AndEq" | "OrEq" | "ShlEq" | "ShrEq"
  | "At" | "Dot" | "DotDot" | "DotDotDot" | "DotDotEq"
  | "Comma" | "Semi" | "Colon" | "PathSep" | "RArrow" | "LArrow" | "FatArrow"
  | "Pound" | "Dollar" | "Question" | "SingleQuote";

export type Delimiter = "paren" | "bracket" | "brace";

export type TokenKind =
  | { $kind: "Punct"; punct: Punct }
  | { $kind: "OpenDelim"; delim: Delimiter }
  | { $kind: "CloseDelim"; delim: Delimiter }
  | { $kind: "Literal"; lit: LitKind; symbol: string; suffix?: string }
  | { $kind: "Ident"; name: string; isRaw: boolean }
  | { $kind: "Lifetime"; name: string }
  | { $kind: "DocComment"; style: "line" | "block"; text: string }
  | { $kind: "Eof" };

export interface Token {
  $kind: "Token";
  span: SourceSpan;
  kind: TokenKind;
}

/* ---- Visibility ---- */

export type VisibilityKind =
  | { $kind: "Public" }
  /** `pub(crate)`, `pub(super)`, `pub(self)` when `shorthand`, `pub(in path)` otherwise. */
  | { $kind: "Restricted"; path: Path; shorthand: boolean }
  | { $kind: "Inherited" };

export interface Visibility {
  $kind: "Visibility";
  span: SourceSpan;
  kind: VisibilityKind;
}

/** Any node that can be quoted in a diagnostic argument. */
export type SyntaxFragment = Expr | Path | Token | Visibility;
