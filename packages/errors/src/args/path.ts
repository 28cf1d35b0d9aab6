import { displayPath } from "@diagweave/shared";

import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

/** A file-system path, or a `file:` URI naming one. */
export class FilePath implements IntoDiagnosticArg {
  constructor(readonly value: string) {}

  /** Platform path as the user would write it, never an escaped form. */
  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(displayPath(this.value));
  }

  toString(): string {
    return displayPath(this.value);
  }
}
