// Typed codec errors.

/** Error kinds raised by the codec. */
export const VlqErrorCode = {
  /** Value outside the declared width, on encode or after decode. */
  OUT_OF_RANGE: "OutOfRange",
  /** The prefix announced more bytes than the input holds. */
  TRUNCATED_INPUT: "TruncatedInput",
  /** The prefix announces a length the type does not have. */
  INVALID_PREFIX: "InvalidPrefix",
} as const;

export type VlqErrorCode = (typeof VlqErrorCode)[keyof typeof VlqErrorCode];

export interface VlqErrorDetails {
  /** Bytes required once the length was known (truncation only). */
  needed?: number;
  /** Bytes that were available (truncation only). */
  available?: number;
  /** The prefix byte that was rejected (prefix errors only). */
  prefixByte?: number;
}

export class VlqError extends Error {
  readonly code: VlqErrorCode;
  /** Name of the codec that raised the error, e.g. "Vu64". */
  readonly codec: string;
  readonly details: VlqErrorDetails;

  constructor(code: VlqErrorCode, codec: string, message: string, details: VlqErrorDetails = {}) {
    super(`${codec}: ${message}`);
    this.name = "VlqError";
    this.code = code;
    this.codec = codec;
    this.details = details;
  }

  static outOfRange(codec: string, value: unknown, min: bigint, max: bigint): VlqError {
    return new VlqError(
      VlqErrorCode.OUT_OF_RANGE,
      codec,
      `value ${String(value)} is outside [${min}, ${max}]`,
    );
  }

  static truncated(
    codec: string,
    needed: number,
    available: number,
    buf: Uint8Array,
    offset: number,
  ): VlqError {
    return new VlqError(
      VlqErrorCode.TRUNCATED_INPUT,
      codec,
      `need ${needed} bytes, ${available} available at offset ${offset}\n` +
        `  Buffer (${buf.length} bytes): ${hexDump(buf, offset, 32)}`,
      { needed, available },
    );
  }

  /** An offset that is not an integer position within the input. */
  static badOffset(codec: string, buf: Uint8Array, offset: number): VlqError {
    return new VlqError(
      VlqErrorCode.TRUNCATED_INPUT,
      codec,
      `offset ${offset} is not a position in a ${buf.length}-byte buffer`,
      { available: 0 },
    );
  }

  static invalidPrefix(
    codec: string,
    prefixByte: number,
    length: number,
    maxBytes: number,
    buf: Uint8Array,
    offset: number,
  ): VlqError {
    return new VlqError(
      VlqErrorCode.INVALID_PREFIX,
      codec,
      `prefix byte 0x${prefixByte.toString(16).padStart(2, "0")} implies ${length} bytes, ` +
        `not a valid length for a ${maxBytes}-byte type\n` +
        `  Buffer (${buf.length} bytes): ${hexDump(buf, offset, 32)}`,
      { prefixByte },
    );
  }

  is(code: VlqErrorCode): boolean {
    return this.code === code;
  }
}

export function isVlqError(error: unknown, code?: VlqErrorCode): error is VlqError {
  return error instanceof VlqError && (code === undefined || error.code === code);
}

/** Hex dump of buffer bytes from `offset`, with the byte at `offset` bracketed. */
export function hexDump(buf: Uint8Array, offset: number, length: number): string {
  const start = Math.max(0, offset);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === offset ? `[${hex}]` : hex);
  }
  return bytes.length === 0 ? "<empty>" : bytes.join(" ");
}
