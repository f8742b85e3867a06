import type { VlqError } from "./errors.ts";

/** A decoded value and the offset just past its encoding. */
export interface DecodeResult<T> {
  value: T;
  next: number;
}

/**
 * Result of a non-throwing decode.
 *
 * Follows Rust-style Result semantics instead of throwing exceptions.
 */
export type TryDecodeResult<T> =
  | { ok: true; value: T; next: number }
  | { ok: false; error: VlqError };
