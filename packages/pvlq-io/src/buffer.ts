// Synchronous adapters over in-memory buffers.

import { VlqError, type IntCodec, type IntInput } from "@pvlq/pvlq-core";
import { createValueLogger, type LoggingOptions, type ValueLogger } from "./logging.ts";

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/**
 * A reader for decoding values from a Uint8Array.
 */
export class ByteReader {
  private data: Uint8Array;
  private offset: number;
  private log: ValueLogger;

  constructor(data: Uint8Array, logging?: LoggingOptions) {
    this.data = data;
    this.offset = 0;
    this.log = createValueLogger("read", logging);
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  hasRemaining(count: number = 1): boolean {
    return this.remaining >= count;
  }

  readByte(): number {
    if (this.offset >= this.data.length) {
      throw this.eof("ByteReader", 1);
    }
    return this.data[this.offset++];
  }

  readBytes(count: number): Uint8Array {
    if (this.offset + count > this.data.length) {
      throw this.eof("ByteReader", count);
    }
    const result = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return result;
  }

  skip(count: number): void {
    if (this.offset + count > this.data.length) {
      throw this.eof("ByteReader", count);
    }
    this.offset += count;
  }

  /** Decode one value. On failure the position is left where it was. */
  read(codec: IntCodec): bigint {
    const { value, next } = codec.decode(this.data, this.offset);
    this.log(codec, value, next - this.offset);
    this.offset = next;
    return value;
  }

  /** Step over one value using only its prefix; returns the bytes skipped. */
  skipValue(codec: IntCodec): number {
    const length = codec.peekLength(this.data, this.offset);
    this.skip(length);
    return length;
  }

  private eof(codec: string, needed: number): VlqError {
    return VlqError.truncated(codec, needed, this.remaining, this.data, this.offset);
  }
}

/**
 * A writer that collects encoded values into one buffer.
 */
export class ByteWriter {
  private parts: Uint8Array[] = [];
  private total = 0;
  private log: ValueLogger;

  constructor(logging?: LoggingOptions) {
    this.log = createValueLogger("write", logging);
  }

  /** Bytes written so far. */
  get length(): number {
    return this.total;
  }

  write(codec: IntCodec, value: IntInput): this {
    const encoded = codec.encode(value);
    this.log(codec, BigInt(value), encoded.length);
    return this.append(encoded);
  }

  /** Append raw bytes. They are copied, so the caller may reuse `bytes`. */
  writeBytes(bytes: Uint8Array): this {
    return this.append(bytes.slice());
  }

  private append(bytes: Uint8Array): this {
    this.parts.push(bytes);
    this.total += bytes.length;
    return this;
  }

  finish(): Uint8Array {
    return concat(...this.parts);
  }
}
