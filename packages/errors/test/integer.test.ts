import { describe, expect, test } from "vitest";

import { INTEGER_RANGES, Integer, type IntegerWidth } from "../src/args/integer.js";
import { I128_MAX } from "../src/model/arg-value.js";

const WIDTHS: readonly IntegerWidth[] = [
  "i8", "u8", "i16", "u16", "i32", "u32", "i64", "u64", "i128", "u128", "isize", "usize",
];

describe("Integer", () => {
  test("widens to a 128-bit number", () => {
    expect(Integer.i8(-5).intoDiagnosticArg()).toEqual({ kind: "number", value: -5n });
    expect(Integer.u64(18446744073709551615n).intoDiagnosticArg()).toEqual({
      kind: "number",
      value: 18446744073709551615n,
    });
    expect(Integer.u128(I128_MAX).intoDiagnosticArg()).toEqual({ kind: "number", value: I128_MAX });
  });

  test("every width converts its extremes exactly", () => {
    for (const width of WIDTHS) {
      const [min, max] = INTEGER_RANGES[width];
      expect(new Integer(width, min).intoDiagnosticArg()).toEqual({ kind: "number", value: min });
      if (width !== "u128") {
        expect(new Integer(width, max).intoDiagnosticArg()).toEqual({ kind: "number", value: max });
      }
    }
  });

  test("u128 values above the i128 maximum keep their decimal text", () => {
    expect(Integer.u128(2n ** 128n - 1n).intoDiagnosticArg()).toEqual({
      kind: "str",
      value: "340282366920938463463374607431768211455",
    });
  });

  test("checks the range at construction", () => {
    expect(() => Integer.i8(128)).toThrow(RangeError);
    expect(() => Integer.u8(-1)).toThrow(RangeError);
    expect(() => Integer.u32(2n ** 32n)).toThrow("4294967296 is out of range for u32 (0..=4294967295)");
    expect(Integer.i8(-128).value).toBe(-128n);
  });

  test("rejects numbers that are not exact integers", () => {
    expect(() => Integer.i32(1.5)).toThrow(RangeError);
    expect(() => Integer.u64(Number.MAX_SAFE_INTEGER + 1)).toThrow(RangeError);
  });

  test("pointer-sized widths are 64-bit", () => {
    expect(INTEGER_RANGES.usize).toEqual([0n, 18446744073709551615n]);
    expect(INTEGER_RANGES.isize).toEqual([-9223372036854775808n, 9223372036854775807n]);
  });

  test("displays the decimal value", () => {
    expect(Integer.isize(-7).toString()).toBe("-7");
    expect(new Integer("u16", 65535).width).toBe("u16");
  });
});
