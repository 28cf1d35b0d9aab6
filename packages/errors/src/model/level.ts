/** Severity a diagnostic is built at. Emission policy for each level lives outside this package. */
export type Level =
  | "bug"
  | "delayed-bug"
  | "fatal"
  | "error"
  | "force-warning"
  | "warning"
  | "note"
  | "on-slice-note"
  | "help"
  | "on-slice-help"
  | "failure-note"
  | "allow"
  | "expect";
