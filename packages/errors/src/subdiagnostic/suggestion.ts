import { debug } from "@diagweave/shared";

import { Integer } from "../args/integer.js";
import type { Diagnostic } from "../model/diagnostic.js";
import type { SourceSpan } from "../model/span.js";
import type { Subdiagnostic } from "./types.js";

const INDICATE_ANONYMOUS_LIFETIME_FIELDS = { count: "count", suggestion: "suggestion" } as const;

/**
 * Suggests spelling out elided lifetimes. The suggestion text is both the
 * bound `suggestion` argument and the replacement code, always shown in full.
 */
export class IndicateAnonymousLifetime implements Subdiagnostic {
  readonly count: Integer;

  /** Throws `RangeError` when `count` is not a valid `usize`. */
  constructor(
    readonly span: SourceSpan,
    count: number | bigint,
    readonly suggestion: string,
  ) {
    this.count = Integer.usize(count);
  }

  addToDiagnostic(diag: Diagnostic): void {
    debug.subdiag("merge", { part: "IndicateAnonymousLifetime", count: this.count.value });
    diag.arg(INDICATE_ANONYMOUS_LIFETIME_FIELDS.count, this.count);
    diag.arg(INDICATE_ANONYMOUS_LIFETIME_FIELDS.suggestion, this.suggestion);
    diag.spanSuggestionWithStyle(
      this.span,
      diag.boundTemplate("errors_indicate_anonymous_lifetime", [
        INDICATE_ANONYMOUS_LIFETIME_FIELDS.count,
        INDICATE_ANONYMOUS_LIFETIME_FIELDS.suggestion,
      ]),
      this.suggestion,
      "unspecified",
      "show-always",
    );
  }
}
