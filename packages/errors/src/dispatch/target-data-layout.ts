import { debug } from "@diagweave/shared";
import { alignErrorIdent, alignErrorValue, type TargetDataLayoutError } from "@diagweave/target";

import { fromDisplay } from "../args/display.js";
import { Diagnostic } from "../model/diagnostic.js";
import type { Level } from "../model/level.js";
import type { IntoDiagnostic } from "./types.js";

function assertUnreachable(_x: never): never {
  throw new Error("unreachable");
}

function build(error: TargetDataLayoutError, level: Level): Diagnostic {
  switch (error.kind) {
    case "invalid-address-space":
      return new Diagnostic(level, "errors_target_invalid_address_space")
        .arg("addr_space", error.addrSpace)
        .arg("cause", error.cause)
        .arg("err", fromDisplay(error.err));
    case "invalid-bits":
      return new Diagnostic(level, "errors_target_invalid_bits")
        .arg("kind", error.kindName)
        .arg("bit", error.bit)
        .arg("cause", error.cause)
        .arg("err", fromDisplay(error.err));
    case "missing-alignment":
      return new Diagnostic(level, "errors_target_missing_alignment").arg("cause", error.cause);
    case "invalid-alignment":
      return new Diagnostic(level, "errors_target_invalid_alignment")
        .arg("cause", error.cause)
        .arg("err_kind", alignErrorIdent(error.err))
        .arg("align", alignErrorValue(error.err));
    case "inconsistent-target-architecture":
      return new Diagnostic(level, "errors_target_inconsistent_architecture")
        .arg("dl", error.dl)
        .arg("target", error.target);
    case "inconsistent-target-pointer-width":
      return new Diagnostic(level, "errors_target_inconsistent_pointer_width")
        .arg("pointer_size", error.pointerSize)
        .arg("target", error.target);
    case "invalid-bits-size":
      return new Diagnostic(level, "errors_target_invalid_bits_size").arg("err", error.err);
    default:
      /* c8 ignore next -- type exhaustiveness guard */
      return assertUnreachable(error);
  }
}

/**
 * The diagnostic describing a data-layout error: one template per variant,
 * with exactly that template's arguments bound.
 */
export function targetDataLayoutDiagnostic(error: TargetDataLayoutError, level: Level): Diagnostic {
  const diag = build(error, level);
  debug.dispatch("target", {
    kind: error.kind,
    key: diag.message.kind === "template" ? diag.message.key : undefined,
    args: diag.argNames(),
  });
  return diag;
}

/** `IntoDiagnostic` view of a data-layout error. */
export class TargetDataLayoutErrors implements IntoDiagnostic {
  constructor(readonly error: TargetDataLayoutError) {}

  intoDiagnostic(level: Level): Diagnostic {
    return targetDataLayoutDiagnostic(this.error, level);
  }
}

export function intoDiagnostic(error: TargetDataLayoutError, level: Level): Diagnostic {
  return new TargetDataLayoutErrors(error).intoDiagnostic(level);
}
