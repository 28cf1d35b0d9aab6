/** Where a template's text ends up on the diagnostic. */
export type TemplateKind = "diagnostic" | "label" | "note" | "help" | "suggestion";

/** Named arguments a template interpolates; checked against what a dispatcher binds. */
export type TemplateArgRequirement = {
  readonly required: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for a template key's role and argument contract. */
export type TemplateSpec = {
  readonly kind: TemplateKind;
  readonly args: TemplateArgRequirement;
  /** Human-readable explanation for docs and tooling; never rendered. */
  readonly description: string;
};

/** Preserves literal argument names without boilerplate in callers. */
export function defineTemplate<const TSpec extends TemplateSpec>(spec: TSpec): TSpec {
  return spec;
}

export type TemplateCatalog = Record<string, TemplateSpec>;
