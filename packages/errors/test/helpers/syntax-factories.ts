/**
 * Builders for syntax fragments in tests. Spans are irrelevant to printing,
 * so every node gets the same empty span.
 */
import type {
  BinaryOperator,
  Expr,
  GenericArg,
  Identifier,
  LitKind,
  Path,
  PathSegment,
  Visibility,
  VisibilityKind,
} from "../../src/syntax/ast.js";
import type { SourceSpan } from "../../src/model/span.js";

export const span: SourceSpan = { start: 0, end: 0 };

export function ident(name: string, isRaw = false): Identifier {
  return { $kind: "Identifier", span, name, isRaw };
}

export function segment(name: string, args?: GenericArg[]): PathSegment {
  return args === undefined ? { ident: ident(name) } : { ident: ident(name), args };
}

export function path(...names: string[]): Path {
  return { $kind: "Path", span, global: false, segments: names.map((name) => segment(name)) };
}

export function pathOf(segments: PathSegment[], global = false): Path {
  return { $kind: "Path", span, global, segments };
}

export function typeArg(...names: string[]): GenericArg {
  return { $kind: "TypeArg", path: path(...names) };
}

export function pathExpr(...names: string[]): Expr {
  return { $kind: "PathExpr", span, path: path(...names) };
}

export function lit(kind: LitKind, symbol: string, suffix?: string): Expr {
  return suffix === undefined
    ? { $kind: "Lit", span, lit: kind, symbol }
    : { $kind: "Lit", span, lit: kind, symbol, suffix };
}

export function int(symbol: string, suffix?: string): Expr {
  return lit("int", symbol, suffix);
}

export function binary(operation: BinaryOperator, left: Expr, right: Expr): Expr {
  return { $kind: "Binary", span, operation, left, right };
}

export function call(func: Expr, ...args: Expr[]): Expr {
  return { $kind: "Call", span, func, args };
}

export function visibility(kind: VisibilityKind): Visibility {
  return { $kind: "Visibility", span, kind };
}
