import { debug, formatDebugValue } from "@diagweave/shared";

import { argNumber, argStr, isI128, type DiagnosticArgValue } from "../model/arg-value.js";
import type { SyntaxFragment } from "../syntax/ast.js";
import { isSyntaxFragment, syntaxFragmentToString } from "../syntax/print.js";

/**
 * Conversion into a renderable argument.
 *
 * Implementations take the value over (callers do not reuse it afterwards),
 * never throw, and never touch anything outside the value.
 */
export interface IntoDiagnosticArg {
  intoDiagnosticArg(): DiagnosticArgValue;
}

/** Anything with a textual form. Used only when no dedicated rule applies. */
export interface Displayable {
  toString(): string;
}

export type IntoDiagnosticArgInput =
  | number
  | bigint
  | boolean
  | string
  | Error
  | Uint8Array
  | IntoDiagnosticArg
  | SyntaxFragment
  | Displayable;

export function isIntoDiagnosticArg(value: unknown): value is IntoDiagnosticArg {
  return (
    typeof value === "object" &&
    value !== null &&
    "intoDiagnosticArg" in value &&
    typeof value.intoDiagnosticArg === "function"
  );
}

export function bigintArg(value: bigint): DiagnosticArgValue {
  return isI128(value) ? argNumber(value) : argStr(value.toString());
}

/** Integers become numbers; fractions and non-finite values keep their textual form. */
export function numberArg(value: number): DiagnosticArgValue {
  return Number.isSafeInteger(value) ? argNumber(BigInt(value)) : argStr(String(value));
}

export function boolArg(value: boolean): DiagnosticArgValue {
  return argStr(value ? "true" : "false");
}

/** Lossy UTF-8 decode of a NUL-terminated byte string. */
export function cStringArg(bytes: Uint8Array): DiagnosticArgValue {
  const nul = bytes.indexOf(0);
  const content = nul >= 0 ? bytes.subarray(0, nul) : bytes;
  return argStr(new TextDecoder("utf-8").decode(content));
}

export function errorArg(error: Error): DiagnosticArgValue {
  return argStr(error.message);
}

/**
 * Textual form of a value through its own `toString`. Objects that only
 * inherit `Object.prototype.toString`, or whose `toString` does not produce a
 * string, get a debug rendering instead.
 */
export function displayString(value: Displayable): string {
  if (typeof value === "function") return formatDebugValue(value);
  if (typeof value !== "object" || value === null) return String(value);
  try {
    if (
      "toString" in value &&
      typeof value.toString === "function" &&
      value.toString !== Object.prototype.toString
    ) {
      const text: unknown = value.toString();
      if (typeof text === "string") return text;
    }
  } catch (error) {
    debug.args("display.threw", { error: formatDebugValue(error) });
  }
  debug.args("fallback.debug", { value: formatDebugValue(value) });
  return formatDebugValue(value);
}

/**
 * Convert any supported value into a diagnostic argument.
 *
 * Dedicated rules are tried before the generic textual form, in this order:
 * primitives, `IntoDiagnosticArg` implementations, syntax fragments (their
 * pretty-printed source), errors (their message), byte strings, then `toString`.
 */
export function intoDiagnosticArg(value: IntoDiagnosticArgInput): DiagnosticArgValue {
  switch (typeof value) {
    case "bigint":
      return bigintArg(value);
    case "number":
      return numberArg(value);
    case "boolean":
      return boolArg(value);
    case "string":
      return argStr(value);
    default:
      break;
  }
  if (isIntoDiagnosticArg(value)) return value.intoDiagnosticArg();
  if (isSyntaxFragment(value)) return argStr(syntaxFragmentToString(value));
  if (value instanceof Error) return errorArg(value);
  if (value instanceof Uint8Array) return cStringArg(value);
  return argStr(displayString(value));
}
