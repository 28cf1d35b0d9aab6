import { debug } from "@diagweave/shared";

import { levelArg } from "../args/enums.js";
import type { Diagnostic } from "../model/diagnostic.js";
import type { Level } from "../model/level.js";
import type { SourceSpan } from "../model/span.js";
import type { SubdiagnosticTemplateKey } from "../catalog/index.js";
import type { Backtrace, DiagnosticLocation } from "./location.js";
import type { Subdiagnostic } from "./types.js";

const DELAYED_AT_FIELDS = { emittedAt: "emitted_at", note: "note" } as const;

function addDelayedAt(
  diag: Diagnostic,
  key: SubdiagnosticTemplateKey,
  span: SourceSpan,
  emittedAt: DiagnosticLocation,
  note: Backtrace,
): void {
  debug.subdiag("merge", { part: key, status: note.status });
  diag.arg(DELAYED_AT_FIELDS.emittedAt, emittedAt);
  diag.arg(DELAYED_AT_FIELDS.note, note);
  diag.spanNote(span, diag.boundTemplate(key, [DELAYED_AT_FIELDS.emittedAt, DELAYED_AT_FIELDS.note]));
}

/** Where a delayed bug was created, with its captured backtrace below. */
export class DelayedAtWithNewline implements Subdiagnostic {
  constructor(
    readonly span: SourceSpan,
    readonly emittedAt: DiagnosticLocation,
    readonly note: Backtrace,
  ) {}

  addToDiagnostic(diag: Diagnostic): void {
    addDelayedAt(diag, "errors_delayed_at_with_newline", this.span, this.emittedAt, this.note);
  }
}

/** Where a delayed bug was created, when there is no backtrace to show. */
export class DelayedAtWithoutNewline implements Subdiagnostic {
  constructor(
    readonly span: SourceSpan,
    readonly emittedAt: DiagnosticLocation,
    readonly note: Backtrace,
  ) {}

  addToDiagnostic(diag: Diagnostic): void {
    addDelayedAt(diag, "errors_delayed_at_without_newline", this.span, this.emittedAt, this.note);
  }
}

export function delayedAtNote(
  span: SourceSpan,
  emittedAt: DiagnosticLocation,
  backtrace: Backtrace,
): DelayedAtWithNewline | DelayedAtWithoutNewline {
  return backtrace.isCaptured
    ? new DelayedAtWithNewline(span, emittedAt, backtrace)
    : new DelayedAtWithoutNewline(span, emittedAt, backtrace);
}

const INVALID_FLUSHED_LEVEL_FIELDS = { level: "level" } as const;

export class InvalidFlushedDelayedDiagnosticLevel implements Subdiagnostic {
  constructor(
    readonly span: SourceSpan,
    readonly level: Level,
  ) {}

  addToDiagnostic(diag: Diagnostic): void {
    debug.subdiag("merge", { part: "InvalidFlushedDelayedDiagnosticLevel", level: this.level });
    diag.argValue(INVALID_FLUSHED_LEVEL_FIELDS.level, levelArg(this.level));
    diag.spanNote(
      this.span,
      diag.boundTemplate("errors_invalid_flushed_delayed_diagnostic_level", [INVALID_FLUSHED_LEVEL_FIELDS.level]),
    );
  }
}
