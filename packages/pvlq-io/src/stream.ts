// Asynchronous adapters over Node streams and async iterables.
//
// The reader pulls the prefix byte(s) first, sizes the rest of the value
// with the codec's length-peek and pulls exactly those bytes. No framing is
// added in either direction.

import type { Writable } from "node:stream";
import { VlqError, type IntCodec, type IntInput } from "@pvlq/pvlq-core";
import { concat } from "./buffer.ts";
import { createValueLogger, type LoggingOptions, type ValueLogger } from "./logging.ts";

export interface StreamReaderOptions {
  logging?: LoggingOptions;
}

export interface StreamWriterOptions {
  logging?: LoggingOptions;
}

/**
 * Reads values from any async iterable of byte chunks: a Node `Readable`,
 * a web `ReadableStream`, or an async generator.
 *
 * One consumer at a time; calls must not overlap.
 */
export class StreamReader {
  private iterator: AsyncIterator<Uint8Array>;
  private buf: Uint8Array = new Uint8Array(0);
  private ended = false;
  private log: ValueLogger;

  constructor(source: AsyncIterable<Uint8Array>, options: StreamReaderOptions = {}) {
    this.iterator = source[Symbol.asyncIterator]();
    this.log = createValueLogger("read", options.logging);
  }

  /** Bytes pulled from the source but not consumed yet. */
  get buffered(): number {
    return this.buf.length;
  }

  /**
   * Read one value. End of input before the value is complete is
   * `TruncatedInput`, including an end before its first byte.
   */
  async read(codec: IntCodec): Promise<bigint> {
    const value = await this.tryRead(codec);
    if (value === null) {
      throw VlqError.truncated(codec.name, 1, 0, this.buf, 0);
    }
    return value;
  }

  /**
   * Read one value, or return null when the input ends cleanly at a value
   * boundary.
   */
  async tryRead(codec: IntCodec): Promise<bigint | null> {
    if (!(await this.fill(1))) return null;

    let length = codec.scanPrefix(this.buf);
    while (length === undefined) {
      await this.fill(this.buf.length + 1);
      length = codec.peekLength(this.buf);
    }

    await this.fill(length);
    const { value, next } = codec.decode(this.buf);
    this.buf = this.buf.subarray(next);
    this.log(codec, value, next);
    return value;
  }

  /** Read exactly `count` raw bytes. */
  async readBytes(count: number): Promise<Uint8Array> {
    if (!(await this.fill(count))) {
      throw VlqError.truncated("StreamReader", count, this.buf.length, this.buf, 0);
    }
    const out = this.buf.slice(0, count);
    this.buf = this.buf.subarray(count);
    return out;
  }

  /**
   * Iterate over values until the input ends cleanly.
   */
  async *values(codec: IntCodec): AsyncGenerator<bigint, void, undefined> {
    while (true) {
      const value = await this.tryRead(codec);
      if (value === null) {
        return;
      }
      yield value;
    }
  }

  /** Stop reading; releases the underlying source. */
  async close(): Promise<void> {
    this.ended = true;
    this.buf = new Uint8Array(0);
    await this.iterator.return?.();
  }

  /**
   * Pull chunks until at least `count` bytes are buffered.
   * Returns false if the input ended first.
   */
  private async fill(count: number): Promise<boolean> {
    while (this.buf.length < count) {
      if (this.ended) return false;
      const { done, value } = await this.iterator.next();
      if (done) {
        this.ended = true;
        return false;
      }
      this.buf = this.buf.length === 0 ? value : concat(this.buf, value);
    }
    return true;
  }
}

/**
 * Writes encoded values to a Node `Writable`.
 */
export class StreamWriter {
  private sink: Writable;
  private log: ValueLogger;

  constructor(sink: Writable, options: StreamWriterOptions = {}) {
    this.sink = sink;
    this.log = createValueLogger("write", options.logging);
  }

  /**
   * Write one value. Resolves once the sink accepted the bytes; rejects with
   * the sink's error.
   */
  async write(codec: IntCodec, value: IntInput): Promise<void> {
    const encoded = codec.encode(value);
    this.log(codec, BigInt(value), encoded.length);
    await this.writeBytes(encoded);
  }

  writeBytes(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.sink.write(bytes, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** End the sink; resolves when it has finished. */
  end(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.sink.once("error", onError);
      this.sink.end(() => {
        this.sink.off("error", onError);
        resolve();
      });
    });
  }
}
