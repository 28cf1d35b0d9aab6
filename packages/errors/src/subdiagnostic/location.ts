import { displayPath } from "@diagweave/shared";

import type { IntoDiagnosticArg } from "../args/into-arg.js";
import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";

// `    at fn (file:line:col)` or `    at file:line:col`
const FRAME_LOCATION = /^\s*at (?:.*?\()?(.+?):(\d+):(\d+)\)?$/;

function stackFrames(stack: string | undefined): string[] {
  if (!stack) return [];
  return stack
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("at "));
}

/** Where in the program a diagnostic was created. Displays as `file:line:col`. */
export class DiagnosticLocation implements IntoDiagnosticArg {
  constructor(
    readonly file: string,
    readonly line: number,
    readonly col: number,
  ) {}

  /**
   * Location of the code calling `caller`; `depth` skips that many further
   * frames. Falls back to `<unknown>:0:0` when the runtime records no frame.
   */
  static caller(depth = 0): DiagnosticLocation {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, DiagnosticLocation.caller);
    const frame = stackFrames(holder.stack)[depth];
    const match = frame === undefined ? null : FRAME_LOCATION.exec(frame);
    if (!match) return new DiagnosticLocation("<unknown>", 0, 0);
    const [, file = "<unknown>", line = "0", col = "0"] = match;
    return new DiagnosticLocation(displayPath(file), Number(line), Number(col));
  }

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(this.toString());
  }

  toString(): string {
    return `${this.file}:${this.line}:${this.col}`;
  }
}

export type BacktraceStatus = "captured" | "disabled";

/** Call stack captured when a delayed diagnostic was created. */
export class Backtrace implements IntoDiagnosticArg {
  private constructor(
    readonly status: BacktraceStatus,
    readonly frames: readonly string[],
  ) {}

  /** Walk the current stack, leaving out this call. An empty walk counts as disabled. */
  static capture(): Backtrace {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, Backtrace.capture);
    const frames = stackFrames(holder.stack);
    return frames.length > 0 ? new Backtrace("captured", frames) : Backtrace.disabled();
  }

  static disabled(): Backtrace {
    return new Backtrace("disabled", []);
  }

  static fromFrames(frames: readonly string[]): Backtrace {
    return frames.length > 0 ? new Backtrace("captured", [...frames]) : Backtrace.disabled();
  }

  get isCaptured(): boolean {
    return this.status === "captured";
  }

  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(this.toString());
  }

  toString(): string {
    return this.status === "disabled" ? "disabled backtrace" : this.frames.join("\n");
  }
}
