// Tests for the async stream adapters, using in-process streams only.

import { PassThrough, Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import { isVlqError, vi64, vu128, vu32, vu64, VlqErrorCode } from "@pvlq/pvlq-core";
import { StreamReader, StreamWriter } from "./stream.ts";

async function* chunks(...parts: number[][]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Uint8Array.from(part);
  }
}

async function expectCode(promise: Promise<unknown>, code: VlqErrorCode): Promise<void> {
  try {
    await promise;
  } catch (e) {
    expect(isVlqError(e, code)).toBe(true);
    return;
  }
  expect.fail(`expected ${code}`);
}

describe("StreamReader", () => {
  it("reads values split across chunks", async () => {
    const reader = new StreamReader(chunks([0x40], [0xac, 0x20], [0x00], [0x00, 0x81]));
    expect(await reader.read(vu64)).toBe(300n);
    expect(await reader.read(vu64)).toBe(16_512n);
    expect(await reader.read(vi64)).toBe(-1n);
  });

  it("reads a two-byte 128-bit prefix one byte at a time", async () => {
    const encoded = Array.from(vu128.encode(1n << 100n));
    expect(encoded.slice(0, 2)).toEqual([0x00, 0x02]);
    expect(encoded).toHaveLength(15);
    const reader = new StreamReader(chunks(...encoded.map((b) => [b])));
    expect(await reader.read(vu128)).toBe(1n << 100n);
    expect(await reader.tryRead(vu128)).toBeNull();
  });

  it("pulls only the bytes of one value", async () => {
    const reader = new StreamReader(chunks([0x40, 0xac, 0x81, 0x82]));
    await reader.read(vu64);
    expect(reader.buffered).toBe(2);
    expect(Array.from(await reader.readBytes(2))).toEqual([0x81, 0x82]);
  });

  it("returns null from tryRead at a clean end", async () => {
    const reader = new StreamReader(chunks([0x85]));
    expect(await reader.tryRead(vu64)).toBe(5n);
    expect(await reader.tryRead(vu64)).toBeNull();
  });

  it("treats an end before the first byte as truncation in read", async () => {
    const reader = new StreamReader(chunks());
    await expectCode(reader.read(vu64), VlqErrorCode.TRUNCATED_INPUT);
  });

  it("treats an end inside a value as truncation", async () => {
    const reader = new StreamReader(chunks([0x20, 0x00]));
    await expectCode(reader.tryRead(vu64), VlqErrorCode.TRUNCATED_INPUT);
  });

  it("treats an end inside a 128-bit prefix as truncation", async () => {
    const reader = new StreamReader(chunks([0x00]));
    await expectCode(reader.read(vu128), VlqErrorCode.TRUNCATED_INPUT);
  });

  it("rejects a prefix the codec does not have", async () => {
    const reader = new StreamReader(chunks([0x04, 0, 0, 0, 0, 0]));
    await expectCode(reader.read(vu32), VlqErrorCode.INVALID_PREFIX);
  });

  it("reads a marked five-byte 32-bit value", async () => {
    const reader = new StreamReader(chunks([0x08, 0x2f], [0xdf, 0xbf, 0x80]));
    expect(await reader.read(vu32)).toBe(1n << 30n);
    expect(reader.buffered).toBe(0);
  });

  it("iterates values until the end", async () => {
    const reader = new StreamReader(chunks([0x80, 0x81], [0x40, 0x00]));
    const seen: bigint[] = [];
    for await (const v of reader.values(vu64)) seen.push(v);
    expect(seen).toEqual([0n, 1n, 128n]);
  });

  it("releases the source on close", async () => {
    let released = false;
    async function* source(): AsyncGenerator<Uint8Array> {
      try {
        yield Uint8Array.from([0x81]);
        yield Uint8Array.from([0x82]);
      } finally {
        released = true;
      }
    }
    const reader = new StreamReader(source());
    expect(await reader.read(vu64)).toBe(1n);
    await reader.close();
    expect(released).toBe(true);
    expect(await reader.tryRead(vu64)).toBeNull();
  });
});

describe("StreamWriter", () => {
  it("round trips through a PassThrough", async () => {
    const pipe = new PassThrough();
    const writer = new StreamWriter(pipe);
    const reader = new StreamReader(pipe);

    await writer.write(vu64, 300n);
    await writer.write(vi64, -(1n << 63n));
    await writer.write(vu128, (1n << 128n) - 1n);
    await writer.end();

    expect(await reader.read(vu64)).toBe(300n);
    expect(await reader.read(vi64)).toBe(-(1n << 63n));
    expect(await reader.read(vu128)).toBe((1n << 128n) - 1n);
    expect(await reader.tryRead(vu64)).toBeNull();
  });

  it("writes exactly the encoded bytes", async () => {
    const received: number[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        received.push(...chunk);
        callback();
      },
    });
    const writer = new StreamWriter(sink);
    await writer.write(vu64, 16_511n);
    await writer.write(vu32, 0);
    expect(received).toEqual([0x7f, 0xff, 0x80]);
  });

  it("rejects with the sink's error", async () => {
    const sinkErrors: Error[] = [];
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("disk full"));
      },
    });
    sink.on("error", (err) => sinkErrors.push(err));

    const writer = new StreamWriter(sink);
    await expect(writer.write(vu64, 1n)).rejects.toThrow("disk full");
    await new Promise((resolve) => setImmediate(resolve));
    expect(sinkErrors.map((e) => e.message)).toEqual(["disk full"]);
  });

  it("rejects out-of-range values before writing", async () => {
    const pipe = new PassThrough();
    const writer = new StreamWriter(pipe);
    await expectCode(writer.write(vu32, -1n), VlqErrorCode.OUT_OF_RANGE);
    expect(pipe.readableLength).toBe(0);
  });
});
