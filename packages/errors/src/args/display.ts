import type { DiagnosticArgValue } from "../model/arg-value.js";
import { argStr } from "../model/arg-value.js";
import { displayString, type Displayable, type IntoDiagnosticArg } from "./into-arg.js";

/**
 * Forwards to the wrapped value's textual form. Carries nothing of its own;
 * it exists so a displayable value can be handed over where an
 * `IntoDiagnosticArg` is expected.
 */
export class DiagnosticArgFromDisplay implements IntoDiagnosticArg {
  constructor(readonly value: Displayable) {}

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(displayString(this.value));
  }
}

export function fromDisplay(value: Displayable): DiagnosticArgFromDisplay {
  return new DiagnosticArgFromDisplay(value);
}
