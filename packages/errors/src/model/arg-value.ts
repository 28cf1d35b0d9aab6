/* =======================================================================================
 * DIAGNOSTIC ARGUMENT VALUES
 * ---------------------------------------------------------------------------------------
 * The closed set of shapes a converted value can take. Every conversion picks one of
 * these three; consumers bind them by name into message templates.
 * ======================================================================================= */

export const I128_MIN = -(1n << 127n);
export const I128_MAX = (1n << 127n) - 1n;

export interface ArgNumber {
  readonly kind: "number";
  /** Always within the signed 128-bit range. */
  readonly value: bigint;
}

export interface ArgStr {
  readonly kind: "str";
  readonly value: string;
}

export interface ArgStrList {
  readonly kind: "str-list-sep-by-and";
  /** Rendered by the consumer as "a, b and c"; order is significant. */
  readonly values: readonly string[];
}

export type DiagnosticArgValue = ArgNumber | ArgStr | ArgStrList;

export type DiagnosticArgKind = DiagnosticArgValue["kind"];

/** A named argument bound into a diagnostic's template. */
export interface DiagnosticArg {
  readonly name: string;
  readonly value: DiagnosticArgValue;
}

export function isI128(value: bigint): boolean {
  return value >= I128_MIN && value <= I128_MAX;
}

/** Callers guarantee `value` is within i128; out-of-range integers render as strings instead. */
export function argNumber(value: bigint): ArgNumber {
  return { kind: "number", value };
}

export function argStr(value: string): ArgStr {
  return { kind: "str", value };
}

export function argStrList(values: readonly string[]): ArgStrList {
  return { kind: "str-list-sep-by-and", values: [...values] };
}

export function isArgNumber(value: DiagnosticArgValue): value is ArgNumber {
  return value.kind === "number";
}

export function isArgStr(value: DiagnosticArgValue): value is ArgStr {
  return value.kind === "str";
}

export function isArgStrList(value: DiagnosticArgValue): value is ArgStrList {
  return value.kind === "str-list-sep-by-and";
}

export function argValueEquals(a: DiagnosticArgValue, b: DiagnosticArgValue): boolean {
  switch (a.kind) {
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "str":
      return b.kind === "str" && a.value === b.value;
    case "str-list-sep-by-and":
      return (
        b.kind === "str-list-sep-by-and" &&
        a.values.length === b.values.length &&
        a.values.every((item, i) => item === b.values[i])
      );
  }
}

const AND_LIST = new Intl.ListFormat("en", { style: "long", type: "conjunction" });

/**
 * Default English rendering, for logs and tests. Message templates do their
 * own rendering through the localization layer.
 */
export function displayArgValue(value: DiagnosticArgValue): string {
  switch (value.kind) {
    case "number":
      return value.value.toString();
    case "str":
      return value.value;
    case "str-list-sep-by-and":
      return AND_LIST.format(value.values);
  }
}
