/** Half-open character range in a source file. */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
  readonly file?: string;
}
