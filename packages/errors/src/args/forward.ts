import type { DiagnosticArgValue } from "../model/arg-value.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

export interface Cloneable<T> {
  clone(): T;
}

/**
 * Convert a value the caller keeps using: the conversion runs on a clone, so
 * the referent is never handed over.
 */
export function fromRef<T extends IntoDiagnosticArg & Cloneable<T>>(value: T): DiagnosticArgValue {
  return value.clone().intoDiagnosticArg();
}
