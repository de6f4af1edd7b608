/**
 * @module Utilities
 * @description Hashing, canonical JSON, ordering and event helpers.
 */

import { createHash, randomUUID } from "node:crypto";
import type { EventHandler, IndexerEvent } from "./types";

/**
 * Computes the SHA-256 hash of binary data.
 * @category Utilities
 * @group Hashing
 *
 * Returns a lowercase hexadecimal string (64 characters). Archive objects in
 * the in-memory archive are addressed by this hash.
 *
 * @example
 * ```ts
 * const id = compute_hash(new TextEncoder().encode('Hello, world!'))
 * // => '315f5bdb76d078c43b8ac0064e4a0164612b1fce77c869345bfc94c75894edd3'
 * ```
 */
export function compute_hash(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Generates a random run identifier. Runs are ordered by their transitions,
 * never by id.
 *
 * @category Utilities
 */
export function generate_run_id(): string {
  return randomUUID();
}

/**
 * Serializes a JSON-compatible value with object keys sorted recursively.
 *
 * Two values that differ only in key order serialize identically, which makes
 * the output usable as a natural key (tool configurations, batch ordering).
 *
 * @example
 * ```ts
 * canonical_json({ b: 1, a: { d: 2, c: 3 } }) // => '{"a":{"c":3,"d":2},"b":1}'
 * ```
 */
export function canonical_json(value: unknown): string {
  return JSON.stringify(sort_keys(value));
}

function sort_keys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sort_keys);
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort(compare_strings)) {
      sorted[key] = sort_keys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Code-unit order comparison, independent of locale.
 */
export function compare_strings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Lexicographic comparison of tuples of strings and numbers.
 */
export function compare_tuples(a: ReadonlyArray<string | number>, b: ReadonlyArray<string | number>): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right || left === undefined || right === undefined) continue;
    if (typeof left === "number" && typeof right === "number") return left < right ? -1 : 1;
    return compare_strings(String(left), String(right));
  }
  return a.length - b.length;
}

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: IndexerEvent) => void {
  return (event: IndexerEvent) => handler?.(event);
}

export function is_record(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function unique<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items));
}
