/** A byte count. Bit counts round up to whole bytes. */
export class Size {
  private constructor(readonly bytes: bigint) {}

  static fromBytes(bytes: bigint): Size {
    return new Size(bytes);
  }

  static fromBits(bits: bigint): Size {
    return new Size(bits / 8n + (bits % 8n + 7n) / 8n);
  }

  get bits(): bigint {
    return this.bytes * 8n;
  }

  equals(other: Size): boolean {
    return this.bytes === other.bytes;
  }
}

export type AlignFromBytesError =
  | { readonly kind: "not-power-of-two"; readonly align: bigint }
  | { readonly kind: "too-large"; readonly align: bigint };

export type AlignResult =
  | { readonly ok: true; readonly value: Align }
  | { readonly ok: false; readonly error: AlignFromBytesError };

/** Largest supported alignment is 2^29 bytes. */
export const MAX_ALIGN_POW2 = 29;

/** A power-of-two byte alignment, stored as its exponent. */
export class Align {
  private constructor(readonly pow2: number) {}

  static readonly ONE = new Align(0);

  static fromBits(bits: bigint): AlignResult {
    return Align.fromBytes(Size.fromBits(bits).bytes);
  }

  static fromBytes(align: bigint): AlignResult {
    if (align === 0n) return { ok: true, value: Align.ONE };
    if ((align & (align - 1n)) !== 0n) {
      return { ok: false, error: { kind: "not-power-of-two", align } };
    }
    let pow2 = 0;
    let rest = align;
    while (rest > 1n) {
      rest >>= 1n;
      pow2++;
    }
    if (pow2 > MAX_ALIGN_POW2) {
      return { ok: false, error: { kind: "too-large", align } };
    }
    return { ok: true, value: new Align(pow2) };
  }

  get bytes(): bigint {
    return 1n << BigInt(this.pow2);
  }

  get bits(): bigint {
    return this.bytes * 8n;
  }
}

/** Identifier used by message templates to pick the wording for an alignment error. */
export function alignErrorIdent(err: AlignFromBytesError): "not_power_of_two" | "too_large" {
  return err.kind === "not-power-of-two" ? "not_power_of_two" : "too_large";
}

export function alignErrorValue(err: AlignFromBytesError): bigint {
  return err.align;
}

export function formatAlignError(err: AlignFromBytesError): string {
  return err.kind === "not-power-of-two"
    ? `\`${err.align}\` is not a power of 2`
    : `\`${err.align}\` is too large`;
}
