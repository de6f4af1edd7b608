import { describe, test, expect } from "vitest";
import {
	match,
	unwrap_or,
	unwrap,
	unwrap_err,
	try_catch,
	try_catch_async,
	guard_storage,
	to_nullable,
	format_error,
	to_error,
	describe_error,
} from "../../result";
import { ok, err, type Result } from "../../types";

describe("Result Utilities", () => {
	describe("match", () => {
		test("calls on_ok for success result", () => {
			const output = match(
				ok(42),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("success: 42");
		});

		test("calls on_err for error result", () => {
			const output = match(
				err("something went wrong"),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("error: something went wrong");
		});
	});

	describe("unwrap_or", () => {
		test("returns value for ok result", () => {
			expect(unwrap_or(ok(42), 0)).toBe(42);
		});

		test("returns default for error result", () => {
			const result: Result<number[], string> = err("no data");
			expect(unwrap_or(result, [])).toEqual([]);
		});
	});

	describe("unwrap", () => {
		test("returns value for ok result", () => {
			expect(unwrap(ok({ data: "test" }))).toEqual({ data: "test" });
		});

		test("includes error in thrown message", () => {
			expect(() => unwrap(err({ kind: "not_found", id: "abc" }))).toThrow('"kind":"not_found"');
		});
	});

	describe("unwrap_err", () => {
		test("returns error for error result", () => {
			expect(unwrap_err(err({ kind: "unsupported_format", format: "x" }))).toEqual({ kind: "unsupported_format", format: "x" });
		});

		test("throws for ok result", () => {
			expect(() => unwrap_err(ok("success"))).toThrow("unwrap_err called on ok result");
		});
	});

	describe("try_catch", () => {
		test("returns ok for successful function", () => {
			const result = try_catch(
				() => JSON.parse('{"value": 42}'),
				e => format_error(e)
			);
			expect(result).toEqual({ ok: true, value: { value: 42 } });
		});

		test("maps thrown exception", () => {
			const result = try_catch(
				() => {
					throw new Error("custom error");
				},
				e => `caught: ${format_error(e)}`
			);
			expect(result).toEqual({ ok: false, error: "caught: custom error" });
		});
	});

	describe("try_catch_async", () => {
		test("returns ok for resolved promise", async () => {
			const result = await try_catch_async(
				async () => "done",
				() => "failed"
			);
			expect(result).toEqual({ ok: true, value: "done" });
		});

		test("returns error for rejected promise", async () => {
			const result = await try_catch_async(
				() => Promise.reject(new Error("boom")),
				e => format_error(e)
			);
			expect(result).toEqual({ ok: false, error: "boom" });
		});
	});

	describe("guard_storage", () => {
		test("passes resolved values through", async () => {
			const result = await guard_storage("graph.get_blob", async () => 7);
			expect(result).toEqual({ ok: true, value: 7 });
		});

		test("wraps throws into storage_error with the operation name", async () => {
			const result = await guard_storage("graph.get_blob", async () => {
				throw new Error("connection reset");
			});
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.kind).toBe("storage_error");
			if (result.error.kind !== "storage_error") return;
			expect(result.error.operation).toBe("graph.get_blob");
			expect(result.error.cause.message).toBe("connection reset");
		});

		test("wraps non-Error throws", async () => {
			const result = await guard_storage("tools.add", () => Promise.reject("offline"));
			expect(result.ok).toBe(false);
			if (result.ok || result.error.kind !== "storage_error") return;
			expect(result.error.cause.message).toBe("offline");
		});
	});

	describe("to_nullable", () => {
		test("returns value or null", () => {
			expect(to_nullable(ok("x"))).toBe("x");
			expect(to_nullable(err("e"))).toBeNull();
		});
	});

	describe("format_error and to_error", () => {
		test("format_error uses the message of an Error", () => {
			expect(format_error(new Error("bad"))).toBe("bad");
			expect(format_error(42)).toBe("42");
		});

		test("to_error keeps Errors and wraps everything else", () => {
			const original = new Error("kept");
			expect(to_error(original)).toBe(original);
			expect(to_error("text").message).toBe("text");
		});
	});

	describe("describe_error", () => {
		test("describes each error kind in one line", () => {
			expect(describe_error({ kind: "no_canonical_branch", origin: "https://example.org/a", reason: "no snapshot" })).toBe(
				"no canonical branch for https://example.org/a: no snapshot"
			);
			expect(describe_error({ kind: "unsupported_format", format: "text/plain" })).toBe("unsupported metadata format text/plain");
			expect(describe_error({ kind: "not_found", object_type: "directory", id: "d1" })).toBe("directory d1 not found");
			expect(
				describe_error({ kind: "referential_integrity", table: "content_metadata", object_id: "c1", tool_id: 9 })
			).toBe("content_metadata: unknown tool 9 for c1");
			expect(describe_error({ kind: "invalid_transition", from: "done", event: "completed" })).toBe(
				"cannot apply completed to a run in state done"
			);
			expect(
				describe_error({ kind: "authority_mismatch", origin: "https://a.org/x", authority: { type: "forge", url: "https://b.org" } })
			).toBe("forge https://b.org is not an authority for https://a.org/x");
		});
	});
});
