// Unsigned length-prefix codec, shared by every width.
//
// Marker class L (1 <= L <= markerClasses) is the big-endian word
// 2^(7L) | (value - base(L)) in L bytes: L - 1 zero bits, the marker bit,
// then 7L payload bits. The overflow class is `zeroBytes` zero bytes followed
// by (value - overflowBase) in `payloadBytes` big-endian bytes.
//
// When the longest length is reachable by a marker (the 32-bit width, where
// 0x08..0x0f announces 5 bytes), that marked form is read with the marker
// layout of class maxBytes. It is accepted but never written.

import { VlqError, VlqErrorCode } from "./errors.ts";
import type { DecodeResult } from "./result.ts";
import { classLength, type IntWidth } from "./width.ts";

/** Leading zero bits of a byte (8 for 0x00). */
export function leadingZeros8(byte: number): number {
  return Math.clz32(byte & 0xff) - 24;
}

/**
 * Scan the leading bytes of an encoding for its length.
 *
 * Returns the encoded length, or `undefined` when `prefix` ends before the
 * length is known (only possible for widths with more than one zero byte).
 * Throws `InvalidPrefix` for a marker that selects a length the width lacks.
 */
export function scanPrefix(
  width: IntWidth,
  name: string,
  buf: Uint8Array,
  offset = 0,
): number | undefined {
  checkOffset(name, buf, offset);
  for (let i = 0; i < width.zeroBytes; i++) {
    if (offset + i >= buf.length) return undefined;
    const byte = buf[offset + i];
    if (byte === 0) continue;
    const length = 8 * i + leadingZeros8(byte) + 1;
    if (length > width.markerClasses && length !== width.maxBytes) {
      throw VlqError.invalidPrefix(name, byte, length, width.maxBytes, buf, offset);
    }
    return length;
  }
  return width.maxBytes;
}

/** Offsets must be integer positions in or at the end of the buffer. */
function checkOffset(name: string, buf: Uint8Array, offset: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > buf.length) {
    throw VlqError.badOffset(name, buf, offset);
  }
}

export function peekLength(width: IntWidth, name: string, buf: Uint8Array, offset = 0): number {
  const length = scanPrefix(width, name, buf, offset);
  if (length === undefined) {
    const available = Math.max(0, buf.length - offset);
    throw VlqError.truncated(name, available + 1, available, buf, offset);
  }
  return length;
}

/** Write the encoding of an in-range value at `offset`; returns the offset past it. */
export function writeUnsigned(
  width: IntWidth,
  value: bigint,
  out: Uint8Array,
  offset: number,
): number {
  const length = classLength(width, value);
  let word: bigint;
  if (length <= width.markerClasses) {
    word = (1n << BigInt(7 * length)) | (value - width.bases[length]);
  } else {
    word = value - width.overflowBase;
  }
  for (let i = length - 1; i >= 0; i--) {
    out[offset + i] = Number(word & 0xffn);
    word >>= 8n;
  }
  return offset + length;
}

export function encodeUnsigned(width: IntWidth, value: bigint): Uint8Array {
  const out = new Uint8Array(classLength(width, value));
  writeUnsigned(width, value, out, 0);
  return out;
}

export function decodeUnsigned(
  width: IntWidth,
  name: string,
  buf: Uint8Array,
  offset = 0,
): DecodeResult<bigint> {
  const length = peekLength(width, name, buf, offset);
  const available = buf.length - offset;
  if (available < length) {
    throw VlqError.truncated(name, length, available, buf, offset);
  }

  let word = 0n;
  for (let i = 0; i < length; i++) {
    word = (word << 8n) | BigInt(buf[offset + i]);
  }

  let value: bigint;
  if (length <= width.markerClasses || buf[offset] !== 0) {
    const payloadBits = BigInt(7 * length);
    value = width.bases[length] + (word & ((1n << payloadBits) - 1n));
  } else {
    value = width.overflowBase + word;
  }

  if (value > width.max) {
    throw new VlqError(
      VlqErrorCode.OUT_OF_RANGE,
      name,
      `decoded value ${value} exceeds ${width.max} at offset ${offset}`,
    );
  }
  return { value, next: offset + length };
}
