import { argNumber, argStr, isI128, type DiagnosticArgValue } from "../model/arg-value.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

export type IntegerWidth =
  | "i8"
  | "u8"
  | "i16"
  | "u16"
  | "i32"
  | "u32"
  | "i64"
  | "u64"
  | "i128"
  | "u128"
  | "isize"
  | "usize";

function signedRange(bits: bigint): readonly [bigint, bigint] {
  return [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n];
}

function unsignedRange(bits: bigint): readonly [bigint, bigint] {
  return [0n, (1n << bits) - 1n];
}

/** Inclusive [min, max] per width. Pointer-sized widths are 64-bit. */
export const INTEGER_RANGES: Readonly<Record<IntegerWidth, readonly [bigint, bigint]>> = {
  i8: signedRange(8n),
  u8: unsignedRange(8n),
  i16: signedRange(16n),
  u16: unsignedRange(16n),
  i32: signedRange(32n),
  u32: unsignedRange(32n),
  i64: signedRange(64n),
  u64: unsignedRange(64n),
  i128: signedRange(128n),
  u128: unsignedRange(128n),
  isize: signedRange(64n),
  usize: unsignedRange(64n),
};

/**
 * A fixed-width integer. The width is checked once, here; conversion then
 * widens to a 128-bit argument number.
 */
export class Integer implements IntoDiagnosticArg {
  readonly value: bigint;

  constructor(
    readonly width: IntegerWidth,
    value: number | bigint,
  ) {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new RangeError(`${value} is not an integer that converts to ${width} exactly`);
    }
    const big = BigInt(value);
    const [min, max] = INTEGER_RANGES[width];
    if (big < min || big > max) {
      throw new RangeError(`${big} is out of range for ${width} (${min}..=${max})`);
    }
    this.value = big;
  }

  static i8(value: number | bigint): Integer { return new Integer("i8", value); }
  static u8(value: number | bigint): Integer { return new Integer("u8", value); }
  static i16(value: number | bigint): Integer { return new Integer("i16", value); }
  static u16(value: number | bigint): Integer { return new Integer("u16", value); }
  static i32(value: number | bigint): Integer { return new Integer("i32", value); }
  static u32(value: number | bigint): Integer { return new Integer("u32", value); }
  static i64(value: number | bigint): Integer { return new Integer("i64", value); }
  static u64(value: number | bigint): Integer { return new Integer("u64", value); }
  static i128(value: number | bigint): Integer { return new Integer("i128", value); }
  static u128(value: number | bigint): Integer { return new Integer("u128", value); }
  static isize(value: number | bigint): Integer { return new Integer("isize", value); }
  static usize(value: number | bigint): Integer { return new Integer("usize", value); }

  /** `u128` values above the i128 maximum keep their decimal text. */
  intoDiagnosticArg(): DiagnosticArgValue {
    return isI128(this.value) ? argNumber(this.value) : argStr(this.value.toString());
  }

  toString(): string {
    return this.value.toString();
  }
}
