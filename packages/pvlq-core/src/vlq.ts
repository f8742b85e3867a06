import type { IntCodec, IntInput } from "./codec.ts";

/**
 * An integer held in its encoded form.
 *
 * Backed by a buffer of the codec's `maxBytes`; the encoded bytes occupy the
 * front of it and the rest stays zero.
 */
export class Vlq {
  private constructor(
    readonly codec: IntCodec,
    private readonly buf: Uint8Array,
  ) {}

  static encode(codec: IntCodec, value: IntInput): Vlq {
    const buf = new Uint8Array(codec.maxBytes);
    codec.encodeInto(value, buf, 0);
    return new Vlq(codec, buf);
  }

  /**
   * Take the encoded value at `offset`, validating it by decoding.
   * Only the bytes of that one value are copied.
   */
  static from(codec: IntCodec, bytes: Uint8Array, offset = 0): Vlq {
    const { next } = codec.decode(bytes, offset);
    const buf = new Uint8Array(codec.maxBytes);
    buf.set(bytes.subarray(offset, next));
    return new Vlq(codec, buf);
  }

  /** Length of the encoded form in bytes. */
  get length(): number {
    return this.codec.peekLength(this.buf);
  }

  get(): bigint {
    return this.codec.decode(this.buf).value;
  }

  /** Copy of the whole backing buffer, zero padded to `maxBytes`. */
  bytes(): Uint8Array {
    return this.buf.slice();
  }

  /** Copy of exactly the encoded bytes. */
  asSlice(): Uint8Array {
    return this.buf.slice(0, this.length);
  }

  equals(other: Vlq): boolean {
    if (this.codec !== other.codec) return false;
    return this.buf.every((byte, i) => byte === other.buf[i]);
  }

  toString(): string {
    return this.get().toString();
  }

  /** Binary rendering of the encoded bytes, e.g. `Vu64(0b01000000_00000000)`. */
  toDebugString(): string {
    const bits = Array.from(this.asSlice(), (byte) => byte.toString(2).padStart(8, "0"));
    return `${this.codec.name}(0b${bits.join("_")})`;
  }
}
