import { debug } from "@diagweave/shared";

import type { TemplateKey } from "../catalog/index.js";
import { intoDiagnosticArg, type IntoDiagnosticArgInput } from "../args/into-arg.js";
import type { Subdiagnostic } from "../subdiagnostic/types.js";
import { argValueEquals, displayArgValue, type DiagnosticArgValue } from "./arg-value.js";
import type { Level } from "./level.js";
import { boundMessage, toMessage, type DiagnosticMessage, type MessageInput } from "./message.js";
import type { SourceSpan } from "./span.js";

/** How much of a suggestion's code the renderer shows inline. */
export type SuggestionStyle =
  | "hide-code-inline"
  | "hide-code-always"
  | "completely-hidden"
  | "show-code"
  | "show-always";

/** Whether a tool may apply a suggestion without a human looking at it. */
export type Applicability = "machine-applicable" | "maybe-incorrect" | "has-placeholders" | "unspecified";

export interface SpanLabel {
  readonly span: SourceSpan;
  readonly label: DiagnosticMessage;
}

/** Primary spans plus labelled spans, in the order they were attached. */
export interface MultiSpan {
  readonly primary: readonly SourceSpan[];
  readonly labels: readonly SpanLabel[];
}

export interface SubDiagnosticEntry {
  readonly level: "note" | "help";
  readonly message: DiagnosticMessage;
  readonly span: MultiSpan;
}

export interface Substitution {
  readonly span: SourceSpan;
  readonly snippet: string;
}

export interface CodeSuggestion {
  readonly substitutions: readonly Substitution[];
  readonly message: DiagnosticMessage;
  readonly style: SuggestionStyle;
  readonly applicability: Applicability;
}

const EMPTY_MULTI_SPAN: MultiSpan = { primary: [], labels: [] };

/**
 * A diagnostic under construction.
 *
 * Holds the named arguments its templates interpolate, the spans it points
 * at and the notes, helps and suggestions attached to it. Rendering and
 * emission happen elsewhere; this type only collects.
 */
export class Diagnostic {
  readonly level: Level;
  readonly message: DiagnosticMessage;

  readonly #args = new Map<string, DiagnosticArgValue>();
  #primary: SourceSpan[] = [];
  readonly #labels: SpanLabel[] = [];
  readonly #children: SubDiagnosticEntry[] = [];
  readonly #suggestions: CodeSuggestion[] = [];

  constructor(level: Level, message: MessageInput) {
    this.level = level;
    this.message = toMessage(message);
  }

  /* ---- Arguments ---- */

  /** Convert `value` and bind it under `name`. A later bind of the same name wins. */
  arg(name: string, value: IntoDiagnosticArgInput): this {
    return this.argValue(name, intoDiagnosticArg(value));
  }

  /** Bind an already converted value. */
  argValue(name: string, value: DiagnosticArgValue): this {
    const previous = this.#args.get(name);
    if (previous !== undefined && !argValueEquals(previous, value)) {
      debug.args("rebind", {
        name,
        previous: displayArgValue(previous),
        next: displayArgValue(value),
      });
    }
    this.#args.set(name, value);
    return this;
  }

  removeArg(name: string): boolean {
    return this.#args.delete(name);
  }

  getArg(name: string): DiagnosticArgValue | undefined {
    return this.#args.get(name);
  }

  /** Bound names in first-bind order. */
  argNames(): string[] {
    return [...this.#args.keys()];
  }

  get args(): ReadonlyMap<string, DiagnosticArgValue> {
    return this.#args;
  }

  /**
   * A template message carrying the current values of `names`. Later binds
   * of the same names leave it unchanged; unbound names are skipped.
   */
  boundTemplate(key: TemplateKey, names: readonly string[]): DiagnosticMessage {
    const args: Record<string, DiagnosticArgValue> = {};
    for (const name of names) {
      const value = this.#args.get(name);
      if (value !== undefined) args[name] = value;
    }
    return boundMessage(key, args);
  }

  /* ---- Spans ---- */

  /** Replace the primary span(s). */
  span(span: SourceSpan | readonly SourceSpan[]): this {
    this.#primary = isSpanList(span) ? [...span] : [span];
    return this;
  }

  spanLabel(span: SourceSpan, label: MessageInput): this {
    this.#labels.push({ span, label: toMessage(label) });
    return this;
  }

  /** The same label on each span, in iteration order. */
  spanLabels(spans: Iterable<SourceSpan>, label: MessageInput): this {
    const message = toMessage(label);
    for (const span of spans) {
      this.#labels.push({ span, label: message });
    }
    return this;
  }

  get spans(): MultiSpan {
    return { primary: [...this.#primary], labels: [...this.#labels] };
  }

  /* ---- Children ---- */

  note(message: MessageInput): this {
    return this.#child("note", message, EMPTY_MULTI_SPAN);
  }

  spanNote(span: SourceSpan, message: MessageInput): this {
    return this.#child("note", message, { primary: [span], labels: [] });
  }

  help(message: MessageInput): this {
    return this.#child("help", message, EMPTY_MULTI_SPAN);
  }

  spanHelp(span: SourceSpan, message: MessageInput): this {
    return this.#child("help", message, { primary: [span], labels: [] });
  }

  get children(): readonly SubDiagnosticEntry[] {
    return [...this.#children];
  }

  /* ---- Suggestions ---- */

  spanSuggestionWithStyle(
    span: SourceSpan,
    message: MessageInput,
    suggestion: string,
    applicability: Applicability,
    style: SuggestionStyle,
  ): this {
    this.#suggestions.push({
      substitutions: [{ span, snippet: suggestion }],
      message: toMessage(message),
      style,
      applicability,
    });
    return this;
  }

  get suggestions(): readonly CodeSuggestion[] {
    return [...this.#suggestions];
  }

  /* ---- Composition ---- */

  /** Merge a structured part into this diagnostic. */
  subdiagnostic(part: Subdiagnostic): this {
    part.addToDiagnostic(this);
    return this;
  }

  #child(level: SubDiagnosticEntry["level"], message: MessageInput, span: MultiSpan): this {
    this.#children.push({ level, message: toMessage(message), span });
    return this;
  }
}

function isSpanList(span: SourceSpan | readonly SourceSpan[]): span is readonly SourceSpan[] {
  return Array.isArray(span);
}
