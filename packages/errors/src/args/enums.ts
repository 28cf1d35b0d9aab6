import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { Level } from "../model/level.js";

/**
 * Converter for a closed set of named states. Typing the table as
 * `Record<T, string>` makes a missing state a compile error.
 */
export function labelledArg<T extends string>(labels: Readonly<Record<T, string>>): (value: T) => DiagnosticArgValue {
  return (value) => argStr(labels[value]);
}

export const LEVEL_LABELS: Readonly<Record<Level, string>> = {
  bug: "error: internal compiler error",
  "delayed-bug": "error: internal compiler error",
  fatal: "error",
  error: "error",
  "force-warning": "warning",
  warning: "warning",
  note: "note",
  "on-slice-note": "note",
  help: "help",
  "on-slice-help": "help",
  "failure-note": "failure-note",
  allow: "allow",
  expect: "expect",
};
export const levelArg = labelledArg(LEVEL_LABELS);

/** Lint levels print as the command-line flag that sets them. */
export type LintLevel = "allow" | "expect" | "warn" | "force-warn" | "deny" | "forbid";
export const LINT_LEVEL_FLAGS: Readonly<Record<LintLevel, string>> = {
  allow: "allow",
  expect: "expect",
  warn: "warn",
  "force-warn": "force-warn",
  deny: "deny",
  forbid: "forbid",
};
export const lintLevelArg = labelledArg(LINT_LEVEL_FLAGS);

export type PanicStrategy = "unwind" | "abort";
export const panicStrategyArg = labelledArg<PanicStrategy>({ unwind: "unwind", abort: "abort" });

export type StackProtector = "none" | "basic" | "strong" | "all";
export const stackProtectorArg = labelledArg<StackProtector>({
  none: "none",
  basic: "basic",
  strong: "strong",
  all: "all",
});

export type SplitDebuginfo = "off" | "packed" | "unpacked";
export const splitDebuginfoArg = labelledArg<SplitDebuginfo>({
  off: "off",
  packed: "packed",
  unpacked: "unpacked",
});

export type Edition = "edition-2015" | "edition-2018" | "edition-2021" | "edition-2024";
export const editionArg = labelledArg<Edition>({
  "edition-2015": "2015",
  "edition-2018": "2018",
  "edition-2021": "2021",
  "edition-2024": "2024",
});

export type FloatTy = "f16" | "f32" | "f64" | "f128";
export const floatTyArg = labelledArg<FloatTy>({ f16: "f16", f32: "f32", f64: "f64", f128: "f128" });

export type ClosureKind = "fn" | "fn-mut" | "fn-once";
export const closureKindArg = labelledArg<ClosureKind>({
  fn: "Fn",
  "fn-mut": "FnMut",
  "fn-once": "FnOnce",
});

/** Ordering class of generic parameters; types and consts share one. */
export type ParamKindOrd = "lifetime" | "type-or-const";
export const paramKindOrdArg = labelledArg<ParamKindOrd>({
  lifetime: "lifetime",
  "type-or-const": "type and const",
});

/** Kind of constant-evaluation context an item body runs in. */
export type ConstContext =
  | { readonly kind: "const-fn" }
  | { readonly kind: "static"; readonly mutable: boolean }
  | { readonly kind: "const"; readonly inline: boolean };

function assertUnreachable(_x: never): never {
  throw new Error("unreachable");
}

export function constContextArg(context: ConstContext): DiagnosticArgValue {
  switch (context.kind) {
    case "const-fn":
      return argStr("const_fn");
    case "static":
      return argStr("static");
    case "const":
      return argStr("const");
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(context);
  }
}

/** Kind of a resolved definition, as it reads in "expected {descr}, found ..." text. */
export type DefKind =
  | "mod"
  | "struct"
  | "union"
  | "enum"
  | "variant"
  | "trait"
  | "trait-alias"
  | "ty-alias"
  | "foreign-ty"
  | "assoc-ty"
  | "ty-param"
  | "fn"
  | "const"
  | "const-param"
  | "static"
  | "tuple-struct-ctor"
  | "unit-struct-ctor"
  | "tuple-variant-ctor"
  | "unit-variant-ctor"
  | "assoc-fn"
  | "assoc-const"
  | "bang-macro"
  | "attr-macro"
  | "derive-macro"
  | "extern-crate"
  | "use"
  | "field"
  | "lifetime-param"
  | "impl"
  | "closure";

export const DEF_KIND_LABELS: Readonly<Record<DefKind, string>> = {
  mod: "module",
  struct: "struct",
  union: "union",
  enum: "enum",
  variant: "variant",
  trait: "trait",
  "trait-alias": "trait alias",
  "ty-alias": "type alias",
  "foreign-ty": "foreign type",
  "assoc-ty": "associated type",
  "ty-param": "type parameter",
  fn: "function",
  const: "constant",
  "const-param": "const parameter",
  static: "static",
  "tuple-struct-ctor": "tuple struct",
  "unit-struct-ctor": "unit struct",
  "tuple-variant-ctor": "tuple variant",
  "unit-variant-ctor": "unit variant",
  "assoc-fn": "associated function",
  "assoc-const": "associated constant",
  "bang-macro": "macro",
  "attr-macro": "attribute macro",
  "derive-macro": "derive macro",
  "extern-crate": "extern crate",
  use: "import",
  field: "field",
  "lifetime-param": "lifetime parameter",
  impl: "implementation",
  closure: "closure",
};
export const defKindArg = labelledArg(DEF_KIND_LABELS);

/** What a path resolved to. */
export type Res =
  | { readonly kind: "def"; readonly def: DefKind }
  | { readonly kind: "prim-ty" }
  | { readonly kind: "self-ty-param" }
  | { readonly kind: "self-ty-alias" }
  | { readonly kind: "self-ctor" }
  | { readonly kind: "tool-mod" }
  | { readonly kind: "local" }
  | { readonly kind: "non-macro-attr"; readonly tool: boolean }
  | { readonly kind: "err" };

export const RES_LABELS: Readonly<Record<Exclude<Res["kind"], "def" | "non-macro-attr">, string>> = {
  "prim-ty": "builtin type",
  "self-ty-param": "self type",
  "self-ty-alias": "self type",
  "self-ctor": "self constructor",
  "tool-mod": "tool module",
  local: "local variable",
  err: "unresolved item",
};

export function resArg(res: Res): DiagnosticArgValue {
  switch (res.kind) {
    case "def":
      return defKindArg(res.def);
    case "non-macro-attr":
      return argStr(res.tool ? "tool attribute" : "built-in attribute");
    default:
      return argStr(RES_LABELS[res.kind]);
  }
}
