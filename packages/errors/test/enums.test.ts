import { describe, expect, test } from "vitest";

import {
  DEF_KIND_LABELS,
  LEVEL_LABELS,
  closureKindArg,
  constContextArg,
  editionArg,
  floatTyArg,
  labelledArg,
  levelArg,
  lintLevelArg,
  panicStrategyArg,
  paramKindOrdArg,
  resArg,
  splitDebuginfoArg,
  stackProtectorArg,
} from "../src/args/enums.js";

describe("levelArg", () => {
  test("groups levels under the label the user sees", () => {
    expect(levelArg("bug")).toEqual({ kind: "str", value: "error: internal compiler error" });
    expect(levelArg("delayed-bug")).toEqual({ kind: "str", value: "error: internal compiler error" });
    expect(levelArg("fatal")).toEqual({ kind: "str", value: "error" });
    expect(levelArg("force-warning")).toEqual({ kind: "str", value: "warning" });
    expect(levelArg("on-slice-note")).toEqual({ kind: "str", value: "note" });
    expect(levelArg("on-slice-help")).toEqual({ kind: "str", value: "help" });
    expect(levelArg("failure-note")).toEqual({ kind: "str", value: "failure-note" });
  });

  test("has a label for every level", () => {
    expect(Object.keys(LEVEL_LABELS)).toHaveLength(13);
    expect(LEVEL_LABELS.allow).toBe("allow");
    expect(LEVEL_LABELS.expect).toBe("expect");
  });
});

describe("enumeration labels", () => {
  test("lint levels print as their flag", () => {
    expect(lintLevelArg("force-warn")).toEqual({ kind: "str", value: "force-warn" });
    expect(lintLevelArg("forbid")).toEqual({ kind: "str", value: "forbid" });
  });

  test("editions print their year", () => {
    expect(editionArg("edition-2015")).toEqual({ kind: "str", value: "2015" });
    expect(editionArg("edition-2024")).toEqual({ kind: "str", value: "2024" });
  });

  test("closure kinds print their trait name", () => {
    expect(closureKindArg("fn")).toEqual({ kind: "str", value: "Fn" });
    expect(closureKindArg("fn-mut")).toEqual({ kind: "str", value: "FnMut" });
    expect(closureKindArg("fn-once")).toEqual({ kind: "str", value: "FnOnce" });
  });

  test("types and consts share a parameter ordering", () => {
    expect(paramKindOrdArg("lifetime")).toEqual({ kind: "str", value: "lifetime" });
    expect(paramKindOrdArg("type-or-const")).toEqual({ kind: "str", value: "type and const" });
  });

  test("codegen options print their name", () => {
    expect(panicStrategyArg("abort")).toEqual({ kind: "str", value: "abort" });
    expect(stackProtectorArg("strong")).toEqual({ kind: "str", value: "strong" });
    expect(splitDebuginfoArg("unpacked")).toEqual({ kind: "str", value: "unpacked" });
    expect(floatTyArg("f128")).toEqual({ kind: "str", value: "f128" });
  });

  test("custom tables", () => {
    const colorArg = labelledArg<"red" | "green">({ red: "Red", green: "Green" });
    expect(colorArg("green")).toEqual({ kind: "str", value: "Green" });
  });
});

describe("constContextArg", () => {
  test("ignores the payload", () => {
    expect(constContextArg({ kind: "const-fn" })).toEqual({ kind: "str", value: "const_fn" });
    expect(constContextArg({ kind: "static", mutable: true })).toEqual({ kind: "str", value: "static" });
    expect(constContextArg({ kind: "static", mutable: false })).toEqual({ kind: "str", value: "static" });
    expect(constContextArg({ kind: "const", inline: true })).toEqual({ kind: "str", value: "const" });
  });
});

describe("resArg", () => {
  test("definitions use their kind label", () => {
    expect(resArg({ kind: "def", def: "fn" })).toEqual({ kind: "str", value: "function" });
    expect(resArg({ kind: "def", def: "ty-alias" })).toEqual({ kind: "str", value: "type alias" });
    expect(resArg({ kind: "def", def: "tuple-variant-ctor" })).toEqual({ kind: "str", value: "tuple variant" });
    expect(resArg({ kind: "def", def: "derive-macro" })).toEqual({ kind: "str", value: "derive macro" });
  });

  test("other resolutions have fixed labels", () => {
    expect(resArg({ kind: "prim-ty" })).toEqual({ kind: "str", value: "builtin type" });
    expect(resArg({ kind: "self-ty-param" })).toEqual({ kind: "str", value: "self type" });
    expect(resArg({ kind: "self-ty-alias" })).toEqual({ kind: "str", value: "self type" });
    expect(resArg({ kind: "local" })).toEqual({ kind: "str", value: "local variable" });
    expect(resArg({ kind: "err" })).toEqual({ kind: "str", value: "unresolved item" });
  });

  test("non-macro attributes say whose they are", () => {
    expect(resArg({ kind: "non-macro-attr", tool: false })).toEqual({ kind: "str", value: "built-in attribute" });
    expect(resArg({ kind: "non-macro-attr", tool: true })).toEqual({ kind: "str", value: "tool attribute" });
  });

  test("has a label for every definition kind", () => {
    expect(Object.keys(DEF_KIND_LABELS)).toHaveLength(30);
  });
});
