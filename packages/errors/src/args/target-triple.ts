import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

export type TargetTripleSource =
  | { readonly kind: "builtin"; readonly triple: string }
  | { readonly kind: "json"; readonly path: string };

/** A compilation target: a builtin triple, or a JSON target description file. */
export class TargetTriple implements IntoDiagnosticArg {
  constructor(readonly source: TargetTripleSource) {}

  static builtin(triple: string): TargetTriple {
    return new TargetTriple({ kind: "builtin", triple });
  }

  static json(path: string): TargetTriple {
    return new TargetTriple({ kind: "json", path });
  }

  /** The triple; a JSON target is named after its file, without `.json`. */
  get triple(): string {
    const source = this.source;
    if (source.kind === "builtin") return source.triple;
    const base = source.path.split(/[\\/]/).pop() ?? source.path;
    return base.endsWith(".json") ? base.slice(0, -".json".length) : base;
  }

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(this.triple);
  }

  toString(): string {
    return this.triple;
  }
}
