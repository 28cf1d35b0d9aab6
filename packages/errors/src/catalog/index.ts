import { subdiagnosticTemplates } from "./subdiagnostics.js";
import { targetTemplates } from "./target.js";
import type { TemplateCatalog, TemplateKind, TemplateSpec } from "./types.js";

export const templateCatalog = {
  ...targetTemplates,
  ...subdiagnosticTemplates,
} as const satisfies TemplateCatalog;

export const templatesByGroup = {
  target: targetTemplates,
  subdiagnostics: subdiagnosticTemplates,
} as const;

/** Opaque template identifier, resolved to text by the localization layer. */
export type TemplateKey = keyof typeof templateCatalog;
export type TargetTemplateKey = keyof typeof targetTemplates;
export type SubdiagnosticTemplateKey = keyof typeof subdiagnosticTemplates;

export function isTemplateKey(value: string): value is TemplateKey {
  return Object.prototype.hasOwnProperty.call(templateCatalog, value);
}

export function templateSpec(key: TemplateKey): TemplateSpec {
  return templateCatalog[key];
}

export function templateKind(key: TemplateKey): TemplateKind {
  return templateSpec(key).kind;
}

/** Required argument names that `bound` does not provide, in catalog order. */
export function missingTemplateArgs(key: TemplateKey, bound: Iterable<string>): string[] {
  const have = new Set(bound);
  return templateSpec(key).args.required.filter((name) => !have.has(name));
}

export { defineTemplate } from "./types.js";
export type { TemplateArgRequirement, TemplateCatalog, TemplateKind, TemplateSpec } from "./types.js";
