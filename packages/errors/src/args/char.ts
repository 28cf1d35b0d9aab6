import { argStr, type DiagnosticArgValue } from "../model/arg-value.js";
import type { IntoDiagnosticArg } from "./into-arg.js";

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\t": "\\t",
  "\r": "\\r",
  "\n": "\\n",
  "\\": "\\\\",
  "'": "\\'",
  "\0": "\\0",
};

const SIMPLE_UNESCAPES: Readonly<Record<string, string>> = {
  t: "\t",
  r: "\r",
  n: "\n",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "0": "\0",
};

// Control, format, unassigned, private-use, surrogate and combining code
// points are written as `\u{..}`, as is every separator except U+0020.
const UNPRINTABLE = /^[\p{C}\p{Z}\p{Mn}\p{Me}]$/u;

const QUOTED = /^'(?:\\u\{([0-9a-fA-F]{1,6})\}|\\(.)|([^\\]))'$/u;

export function escapeChar(ch: string): string {
  const simple = SIMPLE_ESCAPES[ch];
  if (simple !== undefined) return simple;
  if (ch !== " " && UNPRINTABLE.test(ch)) {
    return `\\u{${(ch.codePointAt(0) ?? 0).toString(16)}}`;
  }
  return ch;
}

/** Reverse of the quoted form; `undefined` when `text` is not a quoted character. */
export function unquoteChar(text: string): string | undefined {
  const match = QUOTED.exec(text);
  if (!match) return undefined;
  const [, hex, escaped, plain] = match;
  if (hex !== undefined) {
    const codePoint = Number.parseInt(hex, 16);
    return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : undefined;
  }
  if (escaped !== undefined) return SIMPLE_UNESCAPES[escaped];
  return plain;
}

/** A single Unicode code point. */
export class Char implements IntoDiagnosticArg {
  constructor(readonly value: string) {
    if ([...value].length !== 1) {
      throw new TypeError(`expected exactly one code point, got ${JSON.stringify(value)}`);
    }
  }

  static fromCodePoint(codePoint: number): Char {
    return new Char(String.fromCodePoint(codePoint));
  }

  /** Quoted and escaped: `'x'`, `'\n'`, `'\u{7f}'`. */
  intoDiagnosticArg(): DiagnosticArgValue {
    return argStr(`'${escapeChar(this.value)}'`);
  }

  toString(): string {
    return this.value;
  }
}
