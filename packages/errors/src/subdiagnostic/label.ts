import { debug } from "@diagweave/shared";

import { Integer } from "../args/integer.js";
import type { Diagnostic } from "../model/diagnostic.js";
import { staticMessage } from "../model/message.js";
import type { SourceSpan } from "../model/span.js";
import type { Subdiagnostic } from "./types.js";

/** One fixed label repeated on every span. Binds no arguments. */
export class SingleLabelManySpans implements Subdiagnostic {
  readonly spans: readonly SourceSpan[];

  constructor(
    spans: readonly SourceSpan[],
    readonly label: string,
  ) {
    this.spans = [...spans];
  }

  addToDiagnostic(diag: Diagnostic): void {
    debug.subdiag("merge", { part: "SingleLabelManySpans", spans: this.spans.length });
    diag.spanLabels(this.spans, staticMessage(this.label));
  }
}

const EXPECTED_LIFETIME_PARAMETER_FIELDS = { count: "count" } as const;

export class ExpectedLifetimeParameter implements Subdiagnostic {
  readonly count: Integer;

  /** Throws `RangeError` when `count` is not a valid `usize`. */
  constructor(
    readonly span: SourceSpan,
    count: number | bigint,
  ) {
    this.count = Integer.usize(count);
  }

  addToDiagnostic(diag: Diagnostic): void {
    debug.subdiag("merge", { part: "ExpectedLifetimeParameter", count: this.count.value });
    diag.arg(EXPECTED_LIFETIME_PARAMETER_FIELDS.count, this.count);
    diag.spanLabel(
      this.span,
      diag.boundTemplate("errors_expected_lifetime_parameter", [EXPECTED_LIFETIME_PARAMETER_FIELDS.count]),
    );
  }
}
