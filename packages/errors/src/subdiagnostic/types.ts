import type { Diagnostic } from "../model/diagnostic.js";

/**
 * A structured part of a diagnostic: a label, note or suggestion together
 * with the arguments its template needs.
 *
 * Merging binds arguments under the part's own placeholder names and attaches
 * the part, in that order. It never fails.
 */
export interface Subdiagnostic {
  addToDiagnostic(diag: Diagnostic): void;
}
