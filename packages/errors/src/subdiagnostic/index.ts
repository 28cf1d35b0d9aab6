export type { Subdiagnostic } from "./types.js";
export { Backtrace, DiagnosticLocation, type BacktraceStatus } from "./location.js";
export { ExpectedLifetimeParameter, SingleLabelManySpans } from "./label.js";
export {
  DelayedAtWithNewline,
  DelayedAtWithoutNewline,
  InvalidFlushedDelayedDiagnosticLevel,
  delayedAtNote,
} from "./note.js";
export { IndicateAnonymousLifetime } from "./suggestion.js";
