// Width parameters and length-class tables.
//
// Every width shares one layout: lengths 1..markerClasses carry a unary
// prefix (zero bits, then a 1 marker) followed by 7 payload bits per byte;
// the last class is `zeroBytes` all-zero bytes followed by the full
// width's worth of payload bytes.

export type Bits = 32 | 64 | 128;

export interface IntWidth {
  readonly bits: Bits;
  /** Longest encoded form in bytes. */
  readonly maxBytes: number;
  /** Payload bytes of the overflow class (`bits / 8`). */
  readonly payloadBytes: number;
  /** Leading all-zero bytes that select the overflow class. */
  readonly zeroBytes: number;
  /** Number of prefix-marked classes (lengths 1..markerClasses). */
  readonly markerClasses: number;
  /** `bases[L]` is the smallest value of class L, for L in 1..markerClasses + 1. */
  readonly bases: readonly bigint[];
  /** Smallest value of the overflow class. */
  readonly overflowBase: bigint;
  /** Largest unsigned value of the width. */
  readonly max: bigint;
}

export interface LengthClass {
  readonly length: number;
  readonly min: bigint;
  readonly max: bigint;
  /** True for the all-zero-prefix class. */
  readonly overflow: boolean;
}

export function defineWidth(bits: Bits, maxBytes: number): IntWidth {
  const payloadBytes = bits / 8;
  const zeroBytes = maxBytes - payloadBytes;
  if (zeroBytes < 1) {
    throw new Error(`width ${bits}: maxBytes ${maxBytes} leaves no room for a prefix`);
  }
  const markerClasses = Math.min(8 * zeroBytes, maxBytes - 1);

  const bases: bigint[] = [0n, 0n];
  for (let length = 1; length <= markerClasses; length++) {
    bases.push(bases[length] + (1n << BigInt(7 * length)));
  }
  const overflowBase = bases[markerClasses + 1];
  const max = (1n << BigInt(bits)) - 1n;
  if (overflowBase > max) {
    throw new Error(`width ${bits}: marker classes already exceed the width`);
  }

  return { bits, maxBytes, payloadBytes, zeroBytes, markerClasses, bases, overflowBase, max };
}

export const WIDTH_32: IntWidth = defineWidth(32, 5);
export const WIDTH_64: IntWidth = defineWidth(64, 9);
export const WIDTH_128: IntWidth = defineWidth(128, 18);

/** The capacity table of a width, shortest class first. */
export function lengthClasses(width: IntWidth): LengthClass[] {
  const classes: LengthClass[] = [];
  for (let length = 1; length <= width.markerClasses; length++) {
    classes.push({
      length,
      min: width.bases[length],
      max: width.bases[length + 1] - 1n,
      overflow: false,
    });
  }
  classes.push({
    length: width.maxBytes,
    min: width.overflowBase,
    max: width.max,
    overflow: true,
  });
  return classes;
}

/** Minimal encoded length of an in-range unsigned value. */
export function classLength(width: IntWidth, value: bigint): number {
  for (let length = 1; length <= width.markerClasses; length++) {
    if (value < width.bases[length + 1]) return length;
  }
  return width.maxBytes;
}
