import type { AlignFromBytesError } from "./align.js";
import type { ParseIntError } from "./parse-int.js";

/**
 * Everything that can be wrong with a target's data-layout string, or with the
 * layout's agreement with the target it was declared for.
 *
 * `cause` is always the data-layout spec (or spec prefix) that failed.
 */
export type TargetDataLayoutError =
  | {
      readonly kind: "invalid-address-space";
      readonly addrSpace: string;
      readonly cause: string;
      readonly err: ParseIntError;
    }
  | {
      readonly kind: "invalid-bits";
      /** What the bit count was for: `size` or `alignment`. */
      readonly kindName: string;
      readonly bit: string;
      readonly cause: string;
      readonly err: ParseIntError;
    }
  | { readonly kind: "missing-alignment"; readonly cause: string }
  | { readonly kind: "invalid-alignment"; readonly cause: string; readonly err: AlignFromBytesError }
  | { readonly kind: "inconsistent-target-architecture"; readonly dl: string; readonly target: string }
  | {
      readonly kind: "inconsistent-target-pointer-width";
      readonly pointerSize: bigint;
      readonly target: number;
    }
  | { readonly kind: "invalid-bits-size"; readonly err: string };

export type TargetDataLayoutErrorKind = TargetDataLayoutError["kind"];

export type LayoutResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: TargetDataLayoutError };

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: TargetDataLayoutError): LayoutResult<T> {
  return { ok: false, error };
}
