import { escapeChar } from "../args/char.js";
import type {
  BinaryOperator,
  Delimiter,
  Expr,
  GenericArg,
  Identifier,
  LitKind,
  Path,
  Punct,
  SyntaxFragment,
  Token,
  TokenKind,
  Visibility,
} from "./ast.js";

function assertUnreachable(_x: never): never {
  throw new Error("unreachable");
}

/* ---- Precedence ---- */

const PREC_OR = 1;
const PREC_AND = 2;
const PREC_COMPARE = 3;
const PREC_BIT_OR = 4;
const PREC_BIT_XOR = 5;
const PREC_BIT_AND = 6;
const PREC_SHIFT = 7;
const PREC_SUM = 8;
const PREC_PRODUCT = 9;
const PREC_CAST = 10;
const PREC_PREFIX = 11;
const PREC_POSTFIX = 12;
const PREC_PRIMARY = 13;

const BINARY_PREC: Readonly<Record<BinaryOperator, number>> = {
  "||": PREC_OR,
  "&&": PREC_AND,
  "==": PREC_COMPARE,
  "!=": PREC_COMPARE,
  "<": PREC_COMPARE,
  "<=": PREC_COMPARE,
  ">": PREC_COMPARE,
  ">=": PREC_COMPARE,
  "|": PREC_BIT_OR,
  "^": PREC_BIT_XOR,
  "&": PREC_BIT_AND,
  "<<": PREC_SHIFT,
  ">>": PREC_SHIFT,
  "+": PREC_SUM,
  "-": PREC_SUM,
  "*": PREC_PRODUCT,
  "/": PREC_PRODUCT,
  "%": PREC_PRODUCT,
};

function precedence(expr: Expr): number {
  switch (expr.$kind) {
    case "Binary":
      return BINARY_PREC[expr.operation];
    case "Cast":
      return PREC_CAST;
    case "Unary":
    case "AddrOf":
      return PREC_PREFIX;
    case "Call":
    case "MethodCall":
    case "Field":
    case "Index":
      return PREC_POSTFIX;
    case "Lit":
    case "PathExpr":
    case "Paren":
    case "Array":
    case "Tuple":
      return PREC_PRIMARY;
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(expr);
  }
}

/* ---- Literals and identifiers ---- */

function escapeInString(ch: string): string {
  if (ch === '"') return '\\"';
  if (ch === "'") return "'";
  return escapeChar(ch);
}

export function literalToString(lit: LitKind, symbol: string, suffix?: string): string {
  const tail = suffix ?? "";
  switch (lit) {
    case "str":
      return `"${[...symbol].map(escapeInString).join("")}"${tail}`;
    case "byte-str":
      return `b"${[...symbol].map(escapeInString).join("")}"${tail}`;
    case "char":
      return `'${[...symbol].map(escapeChar).join("")}'${tail}`;
    case "byte":
      return `b'${[...symbol].map(escapeChar).join("")}'${tail}`;
    case "int":
    case "float":
    case "bool":
      return `${symbol}${tail}`;
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(lit);
  }
}

export function identToString(ident: Identifier): string {
  return ident.isRaw ? `r#${ident.name}` : ident.name;
}

/* ---- Paths ---- */

function genericArgToString(arg: GenericArg): string {
  switch (arg.$kind) {
    case "TypeArg":
      return pathToString(arg.path);
    case "LifetimeArg":
      return `'${arg.name}`;
    case "ConstArg":
      // Anything beyond a literal or a path needs braces in argument position.
      return arg.expr.$kind === "Lit" || arg.expr.$kind === "PathExpr"
        ? exprToString(arg.expr)
        : `{ ${exprToString(arg.expr)} }`;
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(arg);
  }
}

function genericArgsToString(args: readonly GenericArg[] | undefined, turbofish: boolean): string {
  if (!args || args.length === 0) return "";
  return `${turbofish ? "::" : ""}<${args.map(genericArgToString).join(", ")}>`;
}

/**
 * Print a path. In expression position generic arguments need the turbofish
 * (`Vec::<u8>::new`); in type position they do not (`Vec<u8>`).
 */
export function pathToString(path: Path, turbofish = false): string {
  const segments = path.segments.map(
    (segment) => `${identToString(segment.ident)}${genericArgsToString(segment.args, turbofish)}`,
  );
  return `${path.global ? "::" : ""}${segments.join("::")}`;
}

/* ---- Expressions ---- */

function printOperand(expr: Expr, minPrec: number): string {
  const text = exprToString(expr);
  return precedence(expr) < minPrec ? `(${text})` : text;
}

function printList(exprs: readonly Expr[]): string {
  return exprs.map((e) => exprToString(e)).join(", ");
}

export function exprToString(expr: Expr): string {
  switch (expr.$kind) {
    case "Lit":
      return literalToString(expr.lit, expr.symbol, expr.suffix);
    case "PathExpr":
      return pathToString(expr.path, true);
    case "Unary":
      return `${expr.operation}${printOperand(expr.expression, PREC_PREFIX)}`;
    case "AddrOf":
      return `&${expr.mutable ? "mut " : ""}${printOperand(expr.expression, PREC_PREFIX)}`;
    case "Binary": {
      const prec = BINARY_PREC[expr.operation];
      // Comparisons do not chain, so both sides bind tighter; the rest are left-associative.
      const leftMin = prec === PREC_COMPARE ? prec + 1 : prec;
      return `${printOperand(expr.left, leftMin)} ${expr.operation} ${printOperand(expr.right, prec + 1)}`;
    }
    case "Cast":
      return `${printOperand(expr.expression, PREC_CAST)} as ${pathToString(expr.type)}`;
    case "Call":
      return `${printOperand(expr.func, PREC_POSTFIX)}(${printList(expr.args)})`;
    case "MethodCall":
      return `${printOperand(expr.receiver, PREC_POSTFIX)}.${identToString(expr.method)}${genericArgsToString(expr.typeArgs, true)}(${printList(expr.args)})`;
    case "Field":
      return `${printOperand(expr.object, PREC_POSTFIX)}.${identToString(expr.name)}`;
    case "Index":
      return `${printOperand(expr.object, PREC_POSTFIX)}[${exprToString(expr.index)}]`;
    case "Paren":
      return `(${exprToString(expr.expression)})`;
    case "Array":
      return `[${printList(expr.elements)}]`;
    case "Tuple":
      return expr.elements.length === 1 ? `(${printList(expr.elements)},)` : `(${printList(expr.elements)})`;
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(expr);
  }
}

/* ---- Tokens ---- */

const PUNCT_TEXT: Readonly<Record<Punct, string>> = {
  Eq: "=",
  Lt: "<",
  Le: "<=",
  EqEq: "==",
  Ne: "!=",
  Ge: ">=",
  Gt: ">",
  AndAnd: "&&",
  OrOr: "||",
  Not: "!",
  Tilde: "~",
  Plus: "+",
  Minus: "-",
  Star: "*",
  Slash: "/",
  Percent: "%",
  Caret: "^",
  And: "&",
  Or: "|",
  Shl: "<<",
  Shr: ">>",
  PlusEq: "+=",
  MinusEq: "-=",
  StarEq: "*=",
  SlashEq: "/=",
  PercentEq: "%=",
  CaretEq: "^=",
  AndEq: "&=",
  OrEq: "|=",
  ShlEq: "<<=",
  ShrEq: ">>=",
  At: "@",
  Dot: ".",
  DotDot: "..",
  DotDotDot: "...",
  DotDotEq: "..=",
  Comma: ",",
  Semi: ";",
  Colon: ":",
  PathSep: "::",
  RArrow: "->",
  LArrow: "<-",
  FatArrow: "=>",
  Pound: "#",
  Dollar: "$",
  Question: "?",
  SingleQuote: "'",
};

const DELIMITERS: Readonly<Record<Delimiter, readonly [open: string, close: string]>> = {
  paren: ["(", ")"],
  bracket: ["[", "]"],
  brace: ["{", "}"],
};

export function tokenKindToString(kind: TokenKind): string {
  switch (kind.$kind) {
    case "Punct":
      return PUNCT_TEXT[kind.punct];
    case "OpenDelim":
      return DELIMITERS[kind.delim][0];
    case "CloseDelim":
      return DELIMITERS[kind.delim][1];
    case "Literal":
      return literalToString(kind.lit, kind.symbol, kind.suffix);
    case "Ident":
      return kind.isRaw ? `r#${kind.name}` : kind.name;
    case "Lifetime":
      return `'${kind.name}`;
    case "DocComment":
      return kind.style === "line" ? `///${kind.text}` : `/**${kind.text}*/`;
    case "Eof":
      return "<eof>";
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(kind);
  }
}

export function tokenToString(token: Token): string {
  return tokenKindToString(token.kind);
}

/* ---- Visibility ---- */

/** Printed as it appears before an item: non-empty output ends with a space. */
export function visToString(vis: Visibility): string {
  const kind = vis.kind;
  switch (kind.$kind) {
    case "Public":
      return "pub ";
    case "Restricted": {
      const path = pathToString(kind.path);
      return kind.shorthand ? `pub(${path}) ` : `pub(in ${path}) `;
    }
    case "Inherited":
      return "";
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(kind);
  }
}

/* ---- Fragments ---- */

const EXPR_KINDS: ReadonlySet<string> = new Set<Expr["$kind"]>([
  "Lit",
  "PathExpr",
  "Unary",
  "Binary",
  "Cast",
  "Call",
  "MethodCall",
  "Field",
  "Index",
  "Paren",
  "Array",
  "Tuple",
  "AddrOf",
]);

export function isSyntaxFragment(value: unknown): value is SyntaxFragment {
  if (typeof value !== "object" || value === null || !("$kind" in value)) return false;
  const kind = value.$kind;
  if (typeof kind !== "string") return false;
  return kind === "Path" || kind === "Token" || kind === "Visibility" || EXPR_KINDS.has(kind);
}

/** Pretty-printed form of any fragment; visibility markers lose their trailing space. */
export function syntaxFragmentToString(fragment: SyntaxFragment): string {
  switch (fragment.$kind) {
    case "Path":
      return pathToString(fragment);
    case "Token":
      return tokenToString(fragment);
    case "Visibility":
      return visToString(fragment).trimEnd();
    default:
      return exprToString(fragment);
  }
}
