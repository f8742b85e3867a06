// @pvlq/pvlq-core - prefix-length variable-length integers.
// Encoded length is known from the leading byte(s) before the payload is read.

export {
  type Bits,
  type IntWidth,
  type LengthClass,
  defineWidth,
  lengthClasses,
  classLength,
  WIDTH_32,
  WIDTH_64,
  WIDTH_128,
} from "./width.ts";

export {
  VlqError,
  VlqErrorCode,
  type VlqErrorDetails,
  isVlqError,
  hexDump,
} from "./errors.ts";

export type { DecodeResult, TryDecodeResult } from "./result.ts";

export {
  leadingZeros8,
  scanPrefix,
  peekLength,
  writeUnsigned,
  encodeUnsigned,
  decodeUnsigned,
} from "./unsigned.ts";

export { zigzagEncode, zigzagDecode, signedMin, signedMax } from "./zigzag.ts";

export {
  type IntCodec,
  type IntInput,
  type CodecKey,
  unsignedCodec,
  signedCodec,
  vu32,
  vi32,
  vu64,
  vi64,
  vu128,
  vi128,
  codecs,
  isCodecKey,
  decodeNumber,
} from "./codec.ts";

export { Vlq } from "./vlq.ts";
