/**
 * Zigzag mapping between signed and unsigned integers of one width.
 *
 * Small magnitudes of either sign map to small unsigned values:
 * 0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3, 2 -> 4, etc.
 */

import { VlqError } from "./errors.ts";
import type { Bits } from "./width.ts";

export function signedMin(bits: Bits): bigint {
  return -(1n << BigInt(bits - 1));
}

export function signedMax(bits: Bits): bigint {
  return (1n << BigInt(bits - 1)) - 1n;
}

/** `(n << 1) ^ (n >> (bits - 1))`, as an unsigned value of `bits` bits. */
export function zigzagEncode(bits: Bits, value: bigint, codec = `Vi${bits}`): bigint {
  const min = signedMin(bits);
  const max = signedMax(bits);
  if (value < min || value > max) {
    throw VlqError.outOfRange(codec, value, min, max);
  }
  return BigInt.asUintN(bits, (value << 1n) ^ (value >> BigInt(bits - 1)));
}

/** `(u >> 1) ^ -(u & 1)`. */
export function zigzagDecode(bits: Bits, value: bigint, codec = `Vi${bits}`): bigint {
  const max = (1n << BigInt(bits)) - 1n;
  if (value < 0n || value > max) {
    throw VlqError.outOfRange(codec, value, 0n, max);
  }
  return (value >> 1n) ^ -(value & 1n);
}
