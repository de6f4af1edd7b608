/**
 * @module Result
 * @description Extended utilities for working with Result types.
 *
 * Provides functional utilities for error handling without exceptions:
 * - Pattern matching with `match`
 * - Safe unwrapping with `unwrap_or`, `unwrap`, `unwrap_err`
 * - Exception-to-Result conversion with `try_catch`, `try_catch_async`
 * - Storage wrapping with `guard_storage`
 */

import { ok, err, type Result, type IndexerError } from "./types";

/**
 * Pattern match on a Result, extracting the value with appropriate handler.
 *
 * @example
 * ```ts
 * const label = match(
 *   await resolver.resolve_head(origin),
 *   head => head.directory_id,
 *   error => `unresolved (${error.kind})`
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, returning default if error.
 *
 * @example
 * ```ts
 * const facts = unwrap_or(await storage.content_metadata.get(ids), [])
 * ```
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Execute a function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = try_catch(
 *   () => JSON.parse(input),
 *   e => ({ kind: 'parse_error', ecosystem: 'npm', cause: to_error(e) })
 * )
 * ```
 */
export const try_catch = <T, E>(fn: () => T, on_error: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Execute an async function and convert exceptions to Result.
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Run a backend or collaborator call, mapping anything it throws to a `storage_error`.
 *
 * @example
 * ```ts
 * const entries = await guard_storage('graph.get_directory_entries', () => graph.get_directory_entries(id))
 * ```
 */
export const guard_storage = <T>(operation: string, fn: () => Promise<T>): Promise<Result<T, IndexerError>> =>
	try_catch_async(fn, e => ({ kind: "storage_error", cause: to_error(e), operation }));

/**
 * Extract value from Result, returning null for any error.
 */
export const to_nullable = <T, E>(result: Result<T, E>): T | null => (result.ok ? result.value : null);

/**
 * Format an unknown error to a string message.
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Coerce an unknown thrown value into an Error.
 */
export const to_error = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

/**
 * Human-readable one-liner for an IndexerError.
 */
export const describe_error = (error: IndexerError): string => {
	switch (error.kind) {
		case "referential_integrity":
			return `${error.table}: unknown tool ${error.tool_id} for ${error.object_id}`;
		case "no_canonical_branch":
			return `no canonical branch for ${error.origin}: ${error.reason}`;
		case "parse_error":
			return `cannot parse ${error.ecosystem} metadata: ${error.cause.message}`;
		case "unsupported_format":
			return `unsupported metadata format ${error.format}`;
		case "authority_mismatch":
			return `${error.authority.type} ${error.authority.url} is not an authority for ${error.origin}`;
		case "storage_error":
			return `storage failure during ${error.operation}: ${error.cause.message}`;
		case "not_found":
			return `${error.object_type} ${error.id} not found`;
		case "validation_error":
			return error.message;
		case "invalid_transition":
			return `cannot apply ${error.event} to a run in state ${error.from}`;
		case "invalid_config":
			return error.message;
	}
};
