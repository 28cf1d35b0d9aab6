import { defineTemplate } from "./types.js";

export const targetTemplates = {
  errors_target_invalid_address_space: defineTemplate({
    kind: "diagnostic",
    args: { required: ["addr_space", "cause", "err"] },
    description: "An address space in the data-layout string is not a valid integer.",
  }),
  errors_target_invalid_bits: defineTemplate({
    kind: "diagnostic",
    args: { required: ["kind", "bit", "cause", "err"] },
    description: "A size or alignment bit count in the data-layout string is not a valid integer.",
  }),
  errors_target_missing_alignment: defineTemplate({
    kind: "diagnostic",
    args: { required: ["cause"] },
    description: "A data-layout spec that needs an alignment has none.",
  }),
  errors_target_invalid_alignment: defineTemplate({
    kind: "diagnostic",
    args: { required: ["cause", "err_kind", "align"] },
    description: "A data-layout alignment is not a power of two, or is too large.",
  }),
  errors_target_inconsistent_architecture: defineTemplate({
    kind: "diagnostic",
    args: { required: ["dl", "target"] },
    description: "The data layout's byte order disagrees with the target's.",
  }),
  errors_target_inconsistent_pointer_width: defineTemplate({
    kind: "diagnostic",
    args: { required: ["pointer_size", "target"] },
    description: "The data layout's pointer size disagrees with the target's pointer width.",
  }),
  errors_target_invalid_bits_size: defineTemplate({
    kind: "diagnostic",
    args: { required: ["err"] },
    description: "The target's C `int` width is not a usable integer size.",
  }),
} as const;
