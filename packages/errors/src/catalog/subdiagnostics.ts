import { defineTemplate } from "./types.js";

export const subdiagnosticTemplates = {
  errors_expected_lifetime_parameter: defineTemplate({
    kind: "label",
    args: { required: ["count"] },
    description: "Points at a type that is missing `count` lifetime parameters.",
  }),
  errors_delayed_at_with_newline: defineTemplate({
    kind: "note",
    args: { required: ["emitted_at", "note"] },
    description: "Where a delayed bug was created, followed by its captured backtrace on new lines.",
  }),
  errors_delayed_at_without_newline: defineTemplate({
    kind: "note",
    args: { required: ["emitted_at", "note"] },
    description: "Where a delayed bug was created, with the backtrace status inline.",
  }),
  errors_invalid_flushed_delayed_diagnostic_level: defineTemplate({
    kind: "note",
    args: { required: ["level"] },
    description: "A delayed diagnostic was flushed at a level that delayed diagnostics cannot have.",
  }),
  errors_indicate_anonymous_lifetime: defineTemplate({
    kind: "suggestion",
    args: { required: ["count", "suggestion"] },
    description: "Suggests writing the elided lifetime(s) explicitly.",
  }),
} as const;
