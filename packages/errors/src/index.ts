/* ===========================
 * @diagweave/errors
 * ---------------------------
 * Argument conversion, subdiagnostic composition and error dispatch for
 * structured diagnostics.
 * =========================== */

export * from "./args/index.js";
export * from "./catalog/index.js";
export * from "./dispatch/index.js";
export * from "./subdiagnostic/index.js";
export * from "./syntax/index.js";

export {
  I128_MAX,
  I128_MIN,
  argNumber,
  argStr,
  argStrList,
  argValueEquals,
  displayArgValue,
  isArgNumber,
  isArgStr,
  isArgStrList,
  isI128,
  type ArgNumber,
  type ArgStr,
  type ArgStrList,
  type DiagnosticArg,
  type DiagnosticArgKind,
  type DiagnosticArgValue,
} from "./model/arg-value.js";
export {
  Diagnostic,
  type Applicability,
  type CodeSuggestion,
  type MultiSpan,
  type SpanLabel,
  type SubDiagnosticEntry,
  type Substitution,
  type SuggestionStyle,
} from "./model/diagnostic.js";
export type { Level } from "./model/level.js";
export {
  boundMessage,
  formatMessage,
  staticMessage,
  templateMessage,
  toMessage,
  type BoundArgs,
  type DiagnosticMessage,
  type MessageInput,
} from "./model/message.js";
export type { SourceSpan } from "./model/span.js";
