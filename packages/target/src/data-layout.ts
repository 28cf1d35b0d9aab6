import { debug } from "@diagweave/shared";

import { Align, Size } from "./align.js";
import { fail, ok, type LayoutResult } from "./errors.js";
import { parseUnsigned } from "./parse-int.js";

export type Endian = "little" | "big";

export interface AbiAndPrefAlign {
  readonly abi: Align;
  readonly pref: Align;
}

export interface TargetDataLayout {
  readonly endian: Endian;
  readonly i1Align: AbiAndPrefAlign;
  readonly i8Align: AbiAndPrefAlign;
  readonly i16Align: AbiAndPrefAlign;
  readonly i32Align: AbiAndPrefAlign;
  readonly i64Align: AbiAndPrefAlign;
  readonly i128Align: AbiAndPrefAlign;
  readonly f32Align: AbiAndPrefAlign;
  readonly f64Align: AbiAndPrefAlign;
  readonly pointerSize: Size;
  readonly pointerAlign: AbiAndPrefAlign;
  readonly aggregateAlign: AbiAndPrefAlign;
  /** Alignments for vector types, keyed by vector size. */
  readonly vectorAlign: readonly (readonly [Size, AbiAndPrefAlign])[];
  readonly instructionAddressSpace: number;
}

/** What a target declares about itself, checked against its data layout. */
export interface TargetLayoutFacts {
  readonly endian: Endian;
  readonly pointerWidth: number;
  /** Width of the C `int` type, as written in the target description. */
  readonly cIntWidth: string;
}

export interface CheckedDataLayout extends TargetDataLayout {
  /** Minimum size of a C-like enum, from the target's `int` width. */
  readonly cEnumMinSize: Size;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

// Defaults are all valid powers of two, so the lookups below cannot fail.
function pow2Align(bytes: number): Align {
  const result = Align.fromBytes(BigInt(bytes));
  return result.ok ? result.value : Align.ONE;
}

function alignPair(abiBits: number, prefBits: number): AbiAndPrefAlign {
  return { abi: pow2Align(abiBits / 8), pref: pow2Align(prefBits / 8) };
}

export function defaultDataLayout(): TargetDataLayout {
  return {
    endian: "big",
    i1Align: alignPair(8, 8),
    i8Align: alignPair(8, 8),
    i16Align: alignPair(16, 16),
    i32Align: alignPair(32, 32),
    i64Align: alignPair(32, 64),
    i128Align: alignPair(32, 64),
    f32Align: alignPair(32, 32),
    f64Align: alignPair(64, 64),
    pointerSize: Size.fromBits(64n),
    pointerAlign: alignPair(64, 64),
    aggregateAlign: alignPair(0, 64),
    vectorAlign: [
      [Size.fromBits(64n), alignPair(64, 64)],
      [Size.fromBits(128n), alignPair(128, 128)],
    ],
    instructionAddressSpace: 0,
  };
}

function parseAddressSpace(text: string, cause: string): LayoutResult<number> {
  const parsed = parseUnsigned(text, 32);
  if (!parsed.ok) {
    return fail({ kind: "invalid-address-space", addrSpace: text, cause, err: parsed.error });
  }
  return ok(Number(parsed.value));
}

function parseBits(text: string, kindName: string, cause: string): LayoutResult<bigint> {
  const parsed = parseUnsigned(text, 64);
  if (!parsed.ok) {
    return fail({ kind: "invalid-bits", kindName, bit: text, cause, err: parsed.error });
  }
  return ok(parsed.value);
}

function parseSize(text: string, cause: string): LayoutResult<Size> {
  const bits = parseBits(text, "size", cause);
  return bits.ok ? ok(Size.fromBits(bits.value)) : bits;
}

function alignFromBits(bits: bigint, cause: string): LayoutResult<Align> {
  const result = Align.fromBits(bits);
  if (!result.ok) return fail({ kind: "invalid-alignment", cause, err: result.error });
  return ok(result.value);
}

function parseAlign(parts: readonly string[], cause: string): LayoutResult<AbiAndPrefAlign> {
  const [abiText, prefText] = parts;
  if (abiText === undefined) return fail({ kind: "missing-alignment", cause });

  const abiBits = parseBits(abiText, "alignment", cause);
  if (!abiBits.ok) return abiBits;
  const prefBits = prefText === undefined ? abiBits : parseBits(prefText, "alignment", cause);
  if (!prefBits.ok) return prefBits;

  const abi = alignFromBits(abiBits.value, cause);
  if (!abi.ok) return abi;
  const pref = alignFromBits(prefBits.value, cause);
  if (!pref.ok) return pref;
  return ok({ abi: abi.value, pref: pref.value });
}

/**
 * Parse a data-layout string such as `e-m:e-p:64:64-i64:64-n8:16:32:64-S128`.
 *
 * Specs are separated by `-`, fields within a spec by `:`. Specs this layout
 * model has no slot for (mangling, native widths, stack alignment, non-zero
 * address-space pointers) are skipped.
 */
export function parseDataLayout(input: string): LayoutResult<TargetDataLayout> {
  const dl: Mutable<TargetDataLayout> = defaultDataLayout();
  const vectorAlign = [...dl.vectorAlign];
  let i128AlignSrc = 64n;

  for (const spec of input.split("-")) {
    const [head = "", ...rest] = spec.split(":");

    if (rest.length === 0 && head === "e") {
      dl.endian = "little";
    } else if (rest.length === 0 && head === "E") {
      dl.endian = "big";
    } else if (rest.length === 0 && head.startsWith("P")) {
      const space = parseAddressSpace(head.slice(1), "P");
      if (!space.ok) return space;
      dl.instructionAddressSpace = space.value;
    } else if (head === "a" || head === "f32" || head === "f64") {
      const align = parseAlign(rest, head);
      if (!align.ok) return align;
      if (head === "a") dl.aggregateAlign = align.value;
      else if (head === "f32") dl.f32Align = align.value;
      else dl.f64Align = align.value;
    } else if ((head === "p" || head === "p0") && rest.length > 0) {
      const [sizeText = "", ...alignParts] = rest;
      const size = parseSize(sizeText, head);
      if (!size.ok) return size;
      const align = parseAlign(alignParts, head);
      if (!align.ok) return align;
      dl.pointerSize = size.value;
      dl.pointerAlign = align.value;
    } else if (head.startsWith("i")) {
      const bits = parseUnsigned(head.slice(1), 64);
      if (!bits.ok) {
        return fail({ kind: "invalid-bits", kindName: "size", bit: head.slice(1), cause: "i", err: bits.error });
      }
      const align = parseAlign(rest, head);
      if (!align.ok) return align;
      switch (bits.value) {
        case 1n: dl.i1Align = align.value; break;
        case 8n: dl.i8Align = align.value; break;
        case 16n: dl.i16Align = align.value; break;
        case 32n: dl.i32Align = align.value; break;
        case 64n: dl.i64Align = align.value; break;
        default: break;
      }
      // i128 takes the alignment of the largest integer spec in 64..=128.
      if (bits.value >= i128AlignSrc && bits.value <= 128n) {
        i128AlignSrc = bits.value;
        dl.i128Align = align.value;
      }
    } else if (head.startsWith("v")) {
      const size = parseSize(head.slice(1), "v");
      if (!size.ok) return size;
      const align = parseAlign(rest, head);
      if (!align.ok) return align;
      const index = vectorAlign.findIndex(([existing]) => existing.equals(size.value));
      if (index >= 0) vectorAlign[index] = [size.value, align.value];
      else vectorAlign.push([size.value, align.value]);
    } else {
      debug.layout("spec.ignored", { spec });
    }
  }

  dl.vectorAlign = vectorAlign;
  return ok(dl);
}

const C_ENUM_SIZES = new Set([8n, 16n, 32n, 64n, 128n]);

/**
 * Check a parsed layout against the target that declared it: byte order and
 * pointer width must agree, and the C `int` width must be a usable integer size.
 */
export function checkTargetDataLayout(
  layout: TargetDataLayout,
  target: TargetLayoutFacts,
): LayoutResult<CheckedDataLayout> {
  if (layout.endian !== target.endian) {
    return fail({ kind: "inconsistent-target-architecture", dl: layout.endian, target: target.endian });
  }
  if (layout.pointerSize.bits !== BigInt(target.pointerWidth)) {
    return fail({
      kind: "inconsistent-target-pointer-width",
      pointerSize: layout.pointerSize.bits,
      target: target.pointerWidth,
    });
  }
  const cInt = parseUnsigned(target.cIntWidth, 64);
  if (!cInt.ok) {
    return fail({ kind: "invalid-bits-size", err: cInt.error.toString() });
  }
  const cEnumMinSize = Size.fromBits(cInt.value);
  if (!C_ENUM_SIZES.has(cEnumMinSize.bits)) {
    return fail({ kind: "invalid-bits-size", err: `integers with ${cInt.value} bits are not supported` });
  }
  return ok({ ...layout, cEnumMinSize });
}

/** Parse then check in one step, the way a target description is loaded. */
export function loadTargetDataLayout(
  input: string,
  target: TargetLayoutFacts,
): LayoutResult<CheckedDataLayout> {
  const parsed = parseDataLayout(input);
  if (!parsed.ok) {
    debug.layout("parse.failed", { input, kind: parsed.error.kind });
    return parsed;
  }
  return checkTargetDataLayout(parsed.value, target);
}
