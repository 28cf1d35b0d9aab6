import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { SyntaxFragment } from "./ast.js";
import { syntaxFragmentToString } from "./print.js";

/** Quote a piece of source back as a string argument. */
export function syntaxArg(fragment: SyntaxFragment): DiagnosticArgValue {
  return argStr(syntaxFragmentToString(fragment));
}
