export type IntErrorKind = "empty" | "invalid-digit" | "pos-overflow" | "neg-overflow" | "zero";

const INT_ERROR_TEXT: Record<IntErrorKind, string> = {
  empty: "cannot parse integer from empty string",
  "invalid-digit": "invalid digit found in string",
  "pos-overflow": "number too large to fit in target type",
  "neg-overflow": "number too small to fit in target type",
  zero: "number would be zero for non-zero type",
};

/** Why a decimal integer could not be parsed. Displays as a fixed sentence. */
export class ParseIntError {
  constructor(readonly kind: IntErrorKind) {}

  toString(): string {
    return INT_ERROR_TEXT[this.kind];
  }
}

export type ParseIntResult =
  | { readonly ok: true; readonly value: bigint }
  | { readonly ok: false; readonly error: ParseIntError };

const DIGITS = /^[0-9]+$/;

/**
 * Parse an unsigned decimal integer of the given width.
 *
 * Accepts an optional leading `+`. A lone sign is an invalid digit, the
 * empty string is its own error.
 */
export function parseUnsigned(text: string, bits: 8 | 16 | 32 | 64 | 128): ParseIntResult {
  if (text.length === 0) return { ok: false, error: new ParseIntError("empty") };
  const digits = text.startsWith("+") ? text.slice(1) : text;
  if (!DIGITS.test(digits)) return { ok: false, error: new ParseIntError("invalid-digit") };
  const value = BigInt(digits);
  if (value > (1n << BigInt(bits)) - 1n) {
    return { ok: false, error: new ParseIntError("pos-overflow") };
  }
  return { ok: true, value };
}
