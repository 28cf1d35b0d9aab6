import type { Diagnostic } from "../model/diagnostic.js";
import type { Level } from "../model/level.js";

/** An error that knows which template describes it and what to bind. */
export interface IntoDiagnostic {
  intoDiagnostic(level: Level): Diagnostic;
}
