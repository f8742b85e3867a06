// Debug logging for the byte-source/sink adapters.
//
// Logging is controlled by the DEBUG environment variable with the pattern
// syntax of npm's debug package:
//
//   DEBUG='pvlq:*'        all adapter logging
//   DEBUG='pvlq:io:read'  reads only
//   DEBUG='*,-pvlq:io:write'

import type { IntCodec } from "@pvlq/pvlq-core";

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "pvlq:io:read" for readers
   * and "pvlq:io:write" for writers.
   */
  namespace?: string;

  /**
   * Log decoded/encoded values. Defaults to true.
   */
  logValues?: boolean;
}

/**
 * Check if a namespace is enabled based on the DEBUG pattern.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

export type Direction = "read" | "write";

/** Logs one value moving through an adapter. */
export type ValueLogger = (codec: IntCodec, value: bigint, length: number) => void;

/**
 * Create a value logger for one adapter direction.
 *
 * Logs structured objects to the console:
 * - Read: `← Vu64 (2 bytes)` with { type: "read", codec, length, value? }
 * - Write: `→ Vu64 (2 bytes)` with { type: "write", codec, length, value? }
 *
 * The DEBUG check happens per call, so toggling the variable takes effect
 * without recreating the adapter.
 */
export function createValueLogger(direction: Direction, options: LoggingOptions = {}): ValueLogger {
  const namespace = options.namespace ?? `pvlq:io:${direction}`;
  const logValues = options.logValues ?? true;
  const arrow = direction === "read" ? "←" : "→";

  return (codec, value, length) => {
    if (!isEnabled(namespace)) return;

    const logObj: Record<string, unknown> = {
      type: direction,
      codec: codec.name,
      length,
    };
    if (logValues) {
      logObj.value = value;
    }

    console.log(`${arrow} ${codec.name} (${length} ${length === 1 ? "byte" : "bytes"})`, logObj);
  };
}
