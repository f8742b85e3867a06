// The six integer codecs: one implementation instantiated per width and
// signedness.

import { VlqError, VlqErrorCode } from "./errors.ts";
import type { DecodeResult, TryDecodeResult } from "./result.ts";
import { decodeUnsigned, encodeUnsigned, peekLength, scanPrefix, writeUnsigned } from "./unsigned.ts";
import { classLength, WIDTH_128, WIDTH_32, WIDTH_64, type IntWidth } from "./width.ts";
import { signedMax, signedMin, zigzagDecode, zigzagEncode } from "./zigzag.ts";

/** A value accepted by the encoders: a bigint, or a number holding an integer. */
export type IntInput = bigint | number;

export interface IntCodec {
  /** Display name, e.g. "Vu64" or "Vi128". */
  readonly name: string;
  readonly width: IntWidth;
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
  readonly maxBytes: number;

  /** Encode to exactly the minimal number of bytes. */
  encode(value: IntInput): Uint8Array;
  /** Encode into `out` at `offset`; returns the offset past the encoding. */
  encodeInto(value: IntInput, out: Uint8Array, offset?: number): number;
  encodedLength(value: IntInput): number;
  /** Decode one value; throws `VlqError`. */
  decode(buf: Uint8Array, offset?: number): DecodeResult<bigint>;
  /** Decode one value without throwing. */
  tryDecode(buf: Uint8Array, offset?: number): TryDecodeResult<bigint>;
  /** Encoded length announced by the prefix at `offset`. */
  peekLength(buf: Uint8Array, offset?: number): number;
  /**
   * Like `peekLength`, but returns `undefined` when `buf` ends before the
   * prefix is complete.
   */
  scanPrefix(buf: Uint8Array, offset?: number): number | undefined;
}

function toBigInt(codec: string, value: IntInput, min: bigint, max: bigint): bigint {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw VlqError.outOfRange(codec, value, min, max);
  }
  const n = typeof value === "bigint" ? value : BigInt(value);
  if (n < min || n > max) {
    throw VlqError.outOfRange(codec, n, min, max);
  }
  return n;
}

function checkCapacity(codec: IntCodec, length: number, out: Uint8Array, offset: number): void {
  if (offset < 0 || offset + length > out.length) {
    throw new RangeError(
      `${codec.name}: output buffer too small (need ${length} bytes at offset ${offset}, length ${out.length})`,
    );
  }
}

function tryDecodeWith(codec: IntCodec, buf: Uint8Array, offset: number): TryDecodeResult<bigint> {
  try {
    const { value, next } = codec.decode(buf, offset);
    return { ok: true, value, next };
  } catch (e) {
    if (e instanceof VlqError) return { ok: false, error: e };
    throw e;
  }
}

export function unsignedCodec(width: IntWidth): IntCodec {
  const name = `Vu${width.bits}`;
  const codec: IntCodec = {
    name,
    width,
    signed: false,
    min: 0n,
    max: width.max,
    maxBytes: width.maxBytes,

    encode(value) {
      return encodeUnsigned(width, toBigInt(name, value, 0n, width.max));
    },

    encodeInto(value, out, offset = 0) {
      const n = toBigInt(name, value, 0n, width.max);
      checkCapacity(codec, classLength(width, n), out, offset);
      return writeUnsigned(width, n, out, offset);
    },

    encodedLength(value) {
      return classLength(width, toBigInt(name, value, 0n, width.max));
    },

    decode(buf, offset = 0) {
      return decodeUnsigned(width, name, buf, offset);
    },

    tryDecode(buf, offset = 0) {
      return tryDecodeWith(codec, buf, offset);
    },

    peekLength(buf, offset = 0) {
      return peekLength(width, name, buf, offset);
    },

    scanPrefix(buf, offset = 0) {
      return scanPrefix(width, name, buf, offset);
    },
  };
  return codec;
}

export function signedCodec(width: IntWidth): IntCodec {
  const name = `Vi${width.bits}`;
  const min = signedMin(width.bits);
  const max = signedMax(width.bits);

  const zigzag = (value: IntInput): bigint => zigzagEncode(width.bits, toBigInt(name, value, min, max), name);

  const codec: IntCodec = {
    name,
    width,
    signed: true,
    min,
    max,
    maxBytes: width.maxBytes,

    encode(value) {
      return encodeUnsigned(width, zigzag(value));
    },

    encodeInto(value, out, offset = 0) {
      const u = zigzag(value);
      checkCapacity(codec, classLength(width, u), out, offset);
      return writeUnsigned(width, u, out, offset);
    },

    encodedLength(value) {
      return classLength(width, zigzag(value));
    },

    decode(buf, offset = 0) {
      const { value, next } = decodeUnsigned(width, name, buf, offset);
      return { value: zigzagDecode(width.bits, value, name), next };
    },

    tryDecode(buf, offset = 0) {
      return tryDecodeWith(codec, buf, offset);
    },

    peekLength(buf, offset = 0) {
      return peekLength(width, name, buf, offset);
    },

    scanPrefix(buf, offset = 0) {
      return scanPrefix(width, name, buf, offset);
    },
  };
  return codec;
}

export const vu32: IntCodec = unsignedCodec(WIDTH_32);
export const vi32: IntCodec = signedCodec(WIDTH_32);
export const vu64: IntCodec = unsignedCodec(WIDTH_64);
export const vi64: IntCodec = signedCodec(WIDTH_64);
export const vu128: IntCodec = unsignedCodec(WIDTH_128);
export const vi128: IntCodec = signedCodec(WIDTH_128);

/** All codecs, keyed by their short type name. */
export const codecs = {
  u32: vu32,
  i32: vi32,
  u64: vu64,
  i64: vi64,
  u128: vu128,
  i128: vi128,
} as const;

export type CodecKey = keyof typeof codecs;

export function isCodecKey(key: string): key is CodecKey {
  return Object.prototype.hasOwnProperty.call(codecs, key);
}

/**
 * Decode a value and return it as a number.
 * Throws `OutOfRange` if it doesn't fit in a safe integer.
 */
export function decodeNumber(codec: IntCodec, buf: Uint8Array, offset = 0): DecodeResult<number> {
  const { value, next } = codec.decode(buf, offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new VlqError(
      VlqErrorCode.OUT_OF_RANGE,
      codec.name,
      `value ${value} too large for number`,
    );
  }
  return { value: Number(value), next };
}
