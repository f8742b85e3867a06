// Inspection commands: show how a number encodes, decode a hex string, or
// print a type's length classes.

import {
  codecs,
  hexDump,
  isCodecKey,
  isVlqError,
  lengthClasses,
  Vlq,
  type IntCodec,
} from "@pvlq/pvlq-core";

export const USAGE = [
  "Usage: pvlq-inspect [--type <u32|i32|u64|i64|u128|i128>] <integer>",
  "       pvlq-inspect [--type <...>] --decode <hex>",
  "       pvlq-inspect [--type <...>] --table",
].join("\n");

export interface InspectOptions {
  codec: IntCodec;
  mode: "encode" | "decode" | "table";
  /** The integer (encode) or hex string (decode). */
  input: string;
}

export interface InspectOutput {
  code: number;
  stdout: string[];
  stderr: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: string[]): InspectOptions {
  let codec: IntCodec = codecs.u64;
  let mode: InspectOptions["mode"] = "encode";
  let input: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-t":
      case "--type": {
        const key = args[++i];
        if (key === undefined || !isCodecKey(key)) {
          throw new UsageError(`unknown type: ${key ?? "<missing>"}`);
        }
        codec = codecs[key];
        break;
      }
      case "-d":
      case "--decode":
        mode = "decode";
        input = args[++i];
        if (input === undefined) throw new UsageError("--decode needs a hex string");
        break;
      case "--table":
        mode = "table";
        break;
      default:
        if (input !== undefined) throw new UsageError(`unexpected argument: ${arg}`);
        input = arg;
    }
  }

  if (mode !== "table" && input === undefined) {
    throw new UsageError("missing integer");
  }
  return { codec, mode, input: input ?? "" };
}

export function parseInteger(text: string): bigint {
  if (!/^-?(0x[0-9a-f][0-9a-f_]*|[0-9][0-9_]*)$/i.test(text)) {
    throw new UsageError(`not an integer: ${text}`);
  }
  const negative = text.startsWith("-");
  const magnitude = BigInt((negative ? text.slice(1) : text).replace(/_/g, ""));
  return negative ? -magnitude : magnitude;
}

export function parseHex(text: string): Uint8Array {
  const digits = text.replace(/^0x/i, "").replace(/[\s_:]/g, "");
  if (digits.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(digits)) {
    throw new UsageError(`not a hex byte string: ${text}`);
  }
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(digits.slice(2 * i, 2 * i + 2), 16);
  }
  return out;
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

export function inspect(options: InspectOptions): string[] {
  const { codec } = options;
  switch (options.mode) {
    case "encode": {
      const v = Vlq.encode(codec, parseInteger(options.input));
      return [v.toDebugString(), `hex: ${toHex(v.asSlice())}`, `length: ${v.length}`];
    }
    case "decode": {
      const buf = parseHex(options.input);
      const { value, next } = codec.decode(buf);
      const lines = [`${codec.name}: ${value}`, `consumed: ${next} of ${buf.length} bytes`];
      if (next < buf.length) {
        lines.push(`trailing: ${hexDump(buf, next, buf.length - next)}`);
      }
      return lines;
    }
    case "table":
      return lengthClasses(codec.width).map(
        (c) => `${String(c.length).padStart(2)} bytes: ${c.min} ..= ${c.max}${c.overflow ? " (overflow)" : ""}`,
      );
  }
}

/** Run the command; never throws for bad input or codec errors. */
export function runInspect(args: string[]): InspectOutput {
  try {
    return { code: 0, stdout: inspect(parseArgs(args)), stderr: [] };
  } catch (e) {
    if (e instanceof UsageError) {
      return { code: 1, stdout: [], stderr: [`error: ${e.message}`, USAGE] };
    }
    if (isVlqError(e)) {
      return { code: 1, stdout: [], stderr: [`error: ${e.message}`] };
    }
    throw e;
  }
}
