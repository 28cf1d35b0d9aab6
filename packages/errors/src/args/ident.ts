import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { SourceSpan } from "../model/span.js";
import type { Cloneable } from "./forward.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

const DUMMY_SPAN: SourceSpan = { start: 0, end: 0 };

/** An identifier as written in source, with its span. Raw identifiers print with `r#`. */
export class Ident implements IntoDiagnosticArg, Cloneable<Ident> {
  constructor(
    readonly name: string,
    readonly span: SourceSpan = DUMMY_SPAN,
    readonly isRaw = false,
  ) {}

  static raw(name: string, span: SourceSpan = DUMMY_SPAN): Ident {
    return new Ident(name, span, true);
  }

  clone(): Ident {
    return new Ident(this.name, this.span, this.isRaw);
  }

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(this.toString());
  }

  toString(): string {
    return this.isRaw ? `r#${this.name}` : this.name;
  }
}
