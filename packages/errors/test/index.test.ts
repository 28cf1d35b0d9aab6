/**
 * End-to-end checks through the package entry point.
 */
import { describe, expect, test } from "vitest";

import {
  Char,
  DiagnosticSymbolList,
  Integer,
  intoDiagnostic,
  intoDiagnosticArg,
  unquoteChar,
} from "../src/index.js";
import * as api from "../src/index.js";

describe("@diagweave/errors", () => {
  test("a signed 8-bit -5 becomes the number -5", () => {
    expect(intoDiagnosticArg(Integer.i8(-5))).toEqual({ kind: "number", value: -5n });
  });

  test("true becomes the string true", () => {
    expect(intoDiagnosticArg(true)).toEqual({ kind: "str", value: "true" });
  });

  test("a newline character is quoted and escaped", () => {
    const arg = intoDiagnosticArg(new Char("\n"));
    expect(arg).toEqual({ kind: "str", value: "'\\n'" });
    expect(arg.kind === "str" ? unquoteChar(arg.value) : undefined).toBe("\n");
  });

  test("a symbol list keeps order and decoration", () => {
    expect(intoDiagnosticArg(new DiagnosticSymbolList(["foo", "bar"]))).toEqual({
      kind: "str-list-sep-by-and",
      values: ["`foo`", "`bar`"],
    });
  });

  test("an invalid alignment binds cause, err_kind and align only", () => {
    const diag = intoDiagnostic(
      { kind: "invalid-alignment", cause: "x86_64", err: { kind: "not-power-of-two", align: 3n } },
      "error",
    );

    expect(diag.message).toEqual({ kind: "template", key: "errors_target_invalid_alignment" });
    expect(diag.argNames()).toEqual(["cause", "err_kind", "align"]);
  });

  test("converting the same value twice gives equal results", () => {
    const list = new DiagnosticSymbolList(["a", "b"]);
    expect(intoDiagnosticArg(list.clone())).toEqual(intoDiagnosticArg(list.clone()));
    expect(intoDiagnosticArg(Integer.u64(9n))).toEqual(intoDiagnosticArg(Integer.u64(9n)));
  });

  test("exposes no span or level helpers beyond the types", () => {
    const names = Object.keys(api);
    for (const removed of ["normalizeSpan", "spanEquals", "formatSpan", "isErrorLevel"]) {
      expect(names).not.toContain(removed);
    }
    expect(names).toContain("resArg");
    expect(names).toContain("boundMessage");
  });
});
