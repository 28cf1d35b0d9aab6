import { argStrList, type DiagnosticArgValue } from "../model/arg-value.js";
import type { Cloneable } from "./forward.js";
import type { Ident } from "./ident.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

/** Names rendered as "`a`, `b` and `c`", in the order given. */
export class DiagnosticSymbolList implements IntoDiagnosticArg, Cloneable<DiagnosticSymbolList> {
  readonly items: readonly (string | Ident)[];

  constructor(items: readonly (string | Ident)[]) {
    this.items = [...items];
  }

  clone(): DiagnosticSymbolList {
    return new DiagnosticSymbolList(this.items);
  }

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStrList(this.items.map((item) => `\`${item.toString()}\``));
  }
}
