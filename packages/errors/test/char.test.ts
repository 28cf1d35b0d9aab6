import { describe, expect, test } from "vitest";

import { Char, escapeChar, unquoteChar } from "../src/args/char.js";

describe("Char", () => {
  test("quotes printable characters as they are", () => {
    expect(new Char("a").intoDiagnosticArg()).toEqual({ kind: "str", value: "'a'" });
    expect(new Char("é").intoDiagnosticArg()).toEqual({ kind: "str", value: "'é'" });
    expect(new Char('"').intoDiagnosticArg()).toEqual({ kind: "str", value: `'"'` });
  });

  test("escapes the usual control characters", () => {
    expect(new Char("\n").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\n'" });
    expect(new Char("\t").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\t'" });
    expect(new Char("\0").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\0'" });
    expect(new Char("'").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\''" });
    expect(new Char("\\").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\\\'" });
  });

  test("writes other unprintable code points in hex", () => {
    expect(new Char("\u007f").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{7f}'" });
    expect(new Char("\u0301").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{301}'" });
    expect(new Char("\u2028").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{2028}'" });
  });

  test("writes space separators other than U+0020 in hex", () => {
    expect(new Char(" ").intoDiagnosticArg()).toEqual({ kind: "str", value: "' '" });
    expect(new Char("\u00a0").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{a0}'" });
    expect(new Char("\u2003").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{2003}'" });
    expect(new Char("\u3000").intoDiagnosticArg()).toEqual({ kind: "str", value: "'\\u{3000}'" });
  });

  test("accepts characters outside the basic plane", () => {
    const ch = Char.fromCodePoint(0x1f600);
    expect(ch.value).toBe("😀");
    expect(ch.intoDiagnosticArg()).toEqual({ kind: "str", value: "'😀'" });
  });

  test("requires exactly one code point", () => {
    expect(() => new Char("")).toThrow(TypeError);
    expect(() => new Char("ab")).toThrow(TypeError);
  });
});

describe("escapeChar", () => {
  test("leaves double quotes alone", () => {
    expect(escapeChar('"')).toBe('"');
    expect(escapeChar("\r")).toBe("\\r");
  });
});

describe("unquoteChar", () => {
  test("reverses each escape form", () => {
    expect(unquoteChar("'x'")).toBe("x");
    expect(unquoteChar("'\\n'")).toBe("\n");
    expect(unquoteChar("'\\''")).toBe("'");
    expect(unquoteChar("'\\u{7f}'")).toBe("\u007f");
    expect(unquoteChar("'😀'")).toBe("😀");
  });

  test("reads back what Char produces", () => {
    const arg = new Char("\u0301").intoDiagnosticArg();
    expect(arg.kind === "str" ? unquoteChar(arg.value) : undefined).toBe("\u0301");
  });

  test("rejects text that is not a quoted character", () => {
    expect(unquoteChar("x")).toBeUndefined();
    expect(unquoteChar("'ab'")).toBeUndefined();
    expect(unquoteChar("'\\q'")).toBeUndefined();
    expect(unquoteChar("'\\u{110000}'")).toBeUndefined();
  });
});
