import { describe, it, expect } from "vitest";
import { vi32, vu64 } from "@pvlq/pvlq-core";
import { parseArgs, parseHex, parseInteger, runInspect, USAGE, UsageError } from "./inspect.ts";

describe("parseArgs", () => {
  it("defaults to u64 encoding", () => {
    expect(parseArgs(["300"])).toEqual({ codec: vu64, mode: "encode", input: "300" });
  });

  it("selects a type and mode", () => {
    expect(parseArgs(["-t", "i32", "--decode", "81"])).toEqual({ codec: vi32, mode: "decode", input: "81" });
  });

  it("rejects unknown types and missing input", () => {
    expect(() => parseArgs(["--type", "u16", "1"])).toThrow(UsageError);
    expect(() => parseArgs(["--type"])).toThrow("unknown type: <missing>");
    expect(() => parseArgs([])).toThrow("missing integer");
    expect(() => parseArgs(["1", "2"])).toThrow("unexpected argument: 2");
  });
});

describe("parseInteger", () => {
  it("accepts decimal, hex and separators", () => {
    expect(parseInteger("16_512")).toBe(16_512n);
    expect(parseInteger("0xff")).toBe(255n);
    expect(parseInteger("-0x10")).toBe(-16n);
    expect(parseInteger("-7")).toBe(-7n);
  });

  it("rejects anything else", () => {
    expect(() => parseInteger("1.5")).toThrow(UsageError);
    expect(() => parseInteger("_")).toThrow(UsageError);
    expect(() => parseInteger("")).toThrow(UsageError);
  });
});

describe("parseHex", () => {
  it("ignores spaces, separators and a 0x prefix", () => {
    expect(Array.from(parseHex("0x40 ac"))).toEqual([0x40, 0xac]);
    expect(Array.from(parseHex("00:fe_fd"))).toEqual([0x00, 0xfe, 0xfd]);
  });

  it("rejects odd digit counts", () => {
    expect(() => parseHex("abc")).toThrow("not a hex byte string: abc");
  });
});

describe("runInspect", () => {
  it("shows the binary form of a value", () => {
    expect(runInspect(["300"])).toEqual({
      code: 0,
      stdout: ["Vu64(0b01000000_10101100)", "hex: 40 ac", "length: 2"],
      stderr: [],
    });
  });

  it("shows signed values", () => {
    expect(runInspect(["--type", "i32", "-1"]).stdout).toEqual(["Vi32(0b10000001)", "hex: 81", "length: 1"]);
  });

  it("decodes hex and reports trailing bytes", () => {
    expect(runInspect(["--decode", "40ac81"]).stdout).toEqual([
      "Vu64: 300",
      "consumed: 2 of 3 bytes",
      "trailing: [81]",
    ]);
  });

  it("prints the class table", () => {
    expect(runInspect(["--type", "u32", "--table"]).stdout).toEqual([
      " 1 bytes: 0 ..= 127",
      " 2 bytes: 128 ..= 16511",
      " 3 bytes: 16512 ..= 2113663",
      " 4 bytes: 2113664 ..= 270549119",
      " 5 bytes: 270549120 ..= 4294967295 (overflow)",
    ]);
  });

  it("reports usage errors with the usage text", () => {
    expect(runInspect(["--type", "u16", "1"])).toEqual({
      code: 1,
      stdout: [],
      stderr: ["error: unknown type: u16", USAGE],
    });
  });

  it("reports codec errors", () => {
    expect(runInspect(["--type", "u32", "4294967296"]).stderr).toEqual([
      "error: Vu32: value 4294967296 is outside [0, 4294967295]",
    ]);
    const truncated = runInspect(["--decode", "20"]);
    expect(truncated.code).toBe(1);
    expect(truncated.stderr[0]).toBe(
      "error: Vu64: need 3 bytes, 1 available at offset 0\n  Buffer (1 bytes): [20]",
    );
  });
});
