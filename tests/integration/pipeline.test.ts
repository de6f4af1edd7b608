import { describe, it, expect, beforeEach } from "vitest";
import {
	create_directory_extractor,
	create_dispatcher,
	create_filename_registry,
	create_memory_archive,
	create_memory_backend,
	create_memory_queue,
	register_tools,
	unwrap,
	type Dispatcher,
	type DispatcherTools,
	type FilenameRegistry,
	type IndexerEvent,
	type IndexerStorage,
	type MemoryArchive,
	type MemoryQueue,
	type OriginRun,
	type RawExtrinsicMetadata,
	type Task,
} from "../../index";

const ORIGIN = "https://example.org/foo";

const encode = (text: string) => new TextEncoder().encode(text);

type Harness = {
	archive: MemoryArchive;
	storage: IndexerStorage;
	tools: DispatcherTools;
	queue: MemoryQueue;
	dispatcher: Dispatcher;
	events: IndexerEvent[];
	runs: OriginRun[];
	drain: () => ReturnType<MemoryQueue["drain"]>;
};

async function create_harness(opts: { duplicate_delivery?: boolean; archive?: MemoryArchive } = {}): Promise<Harness> {
	const archive = opts.archive ?? create_memory_archive();
	const storage = create_memory_backend();
	const tools = unwrap(await register_tools(storage.tools));
	const queue = create_memory_queue({ duplicate_delivery: opts.duplicate_delivery });
	const events: IndexerEvent[] = [];
	const runs: OriginRun[] = [];
	const dispatcher = create_dispatcher({ storage, graph: archive, scheduler: queue, tools, on_event: e => events.push(e) });

	const handle = async (task: Task) => {
		const result = await dispatcher.handle(task);
		if (result.ok && result.value) runs.push(result.value);
		return result;
	};

	return { archive, storage, tools, queue, dispatcher, events, runs, drain: () => queue.drain(handle) };
}

/** Publishes a directory of files as the HEAD revision of `origin`. */
function publish(archive: MemoryArchive, origin: string, files: Record<string, string>): string {
	const directory = archive.add_directory(
		Object.entries(files).map(([name, text]) => ({ name, type: "file" as const, target: archive.add_blob(text) }))
	);
	archive.add_snapshot(origin, { HEAD: { target_type: "revision", target: archive.add_revision(directory) } });
	return directory;
}

const of_type = <T extends IndexerEvent["type"]>(events: IndexerEvent[], type: T) =>
	events.filter((e): e is Extract<IndexerEvent, { type: T }> => e.type === type);

describe("indexing pipeline", () => {
	let h: Harness;

	beforeEach(async () => {
		h = await create_harness();
	});

	describe("intrinsic metadata", () => {
		it("indexes package.json into a searchable origin fact", async () => {
			const directory = publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo", "author": "Jane Doe"}' });

			unwrap(await h.dispatcher.start(ORIGIN));
			const report = await h.drain();

			expect(report).toEqual({ handled: 3, retried: 0, failed: [] });
			expect(unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]))).toEqual([
				{
					id: ORIGIN,
					indexer_configuration_id: h.tools.directory.id,
					metadata: { name: "Foo", author: "Jane Doe" },
					from_directory: directory,
					mappings: ["npm"],
					search_vector: { doe: [2], foo: [3], jane: [1] },
					tool: h.tools.directory,
				},
			]);

			const hits = unwrap(await h.storage.origin_intrinsic_metadata.search_fulltext("Jane"));
			expect(hits.map(hit => hit.id)).toEqual([ORIGIN]);
		});

		it("walks the run through every state", async () => {
			publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}' });

			const run = unwrap(await h.dispatcher.start(ORIGIN));
			await h.drain();

			expect(of_type(h.events, "run_transition").map(e => [e.from, e.to])).toEqual([
				["pending", "head_resolved"],
				["head_resolved", "directory_indexed"],
				["directory_indexed", "origin_aggregated"],
				["origin_aggregated", "done"],
			]);
			expect(h.runs.map(r => r.state)).toEqual(["head_resolved", "directory_indexed", "done"]);
			expect(h.runs.every(r => r.run_id === run.run_id)).toBe(true);
		});

		it("stores content and directory facts under their own tools", async () => {
			const directory = publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}', "README.md": "# Foo" });
			const blob = h.archive.add_blob('{"name": "Foo"}');

			await h.dispatcher.start(ORIGIN);
			await h.drain();

			expect(unwrap(await h.storage.content_metadata.get([blob]))).toEqual([
				{ id: blob, indexer_configuration_id: h.tools.content.id, metadata: { name: "Foo" }, tool: h.tools.content },
			]);
			expect(unwrap(await h.storage.directory_intrinsic_metadata.get([directory]))).toEqual([
				{ id: directory, indexer_configuration_id: h.tools.directory.id, metadata: { name: "Foo" }, mappings: ["npm"], tool: h.tools.directory },
			]);
		});

		it("lets later files win in filename order", async () => {
			publish(h.archive, ORIGIN, {
				"package.json": '{"name": "b"}',
				"codemeta.json": '{"name": "a", "version": "1"}',
			});

			await h.dispatcher.start(ORIGIN);
			await h.drain();

			const [fact] = unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]));
			expect(fact?.metadata).toEqual({ name: "b", version: "1" });
			expect(fact?.mappings).toEqual(["codemeta", "npm"]);
		});

		it("records an empty fact for a directory without metadata files", async () => {
			publish(h.archive, ORIGIN, { "README.md": "# Foo" });

			await h.dispatcher.start(ORIGIN);
			await h.drain();

			const [fact] = unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]));
			expect(fact?.metadata).toEqual({});
			expect(fact?.mappings).toEqual([]);
			expect(unwrap(await h.storage.origin_intrinsic_metadata.stats())).toEqual({ total: 1, non_empty: 0, per_mapping: {} });
		});

		it("skips files that fail to parse and keeps the rest", async () => {
			publish(h.archive, ORIGIN, {
				"package.json": "{not json",
				"codemeta.json": '{"name": "Foo"}',
			});
			const broken = h.archive.add_blob("{not json");

			await h.dispatcher.start(ORIGIN);
			const report = await h.drain();

			expect(report.failed).toEqual([]);
			const skipped = of_type(h.events, "translation_skipped");
			expect(skipped.map(e => [e.content_id, e.ecosystem, e.error.kind])).toEqual([[broken, "npm", "parse_error"]]);
			expect(unwrap(await h.storage.content_metadata.get([broken]))).toEqual([]);

			const [fact] = unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]));
			expect(fact?.metadata).toEqual({ name: "Foo" });
			expect(fact?.mappings).toEqual(["codemeta"]);
		});

		it("translates a directory shared by two origins once", async () => {
			const fork = "https://example.org/fork";
			const directory = publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}' });
			publish(h.archive, fork, { "package.json": '{"name": "Foo"}' });

			await h.dispatcher.start(ORIGIN);
			await h.dispatcher.start(fork);
			await h.drain();

			expect(of_type(h.events, "content_translated")).toHaveLength(1);
			expect(of_type(h.events, "directory_indexed")).toHaveLength(1);
			const facts = unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN, fork]));
			expect(facts.map(f => [f.id, f.from_directory])).toEqual([
				[ORIGIN, directory],
				[fork, directory],
			]);
		});

		it("reuses stored content facts under skip and replaces them on reindex", async () => {
			publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}' });
			const blob = h.archive.add_blob('{"name": "Foo"}');
			await h.storage.content_metadata.add([{ id: blob, indexer_configuration_id: h.tools.content.id, metadata: { name: "Stale" } }]);

			await h.dispatcher.start(ORIGIN);
			await h.drain();
			expect(unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]))[0]?.metadata).toEqual({ name: "Stale" });

			const runs = unwrap(await h.dispatcher.reindex([ORIGIN]));
			expect(runs.map(r => r.policy)).toEqual(["overwrite"]);
			await h.drain();

			expect(unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]))[0]?.metadata).toEqual({ name: "Foo" });
			expect(unwrap(await h.storage.content_metadata.get([blob]))[0]?.metadata).toEqual({ name: "Foo" });
			expect(unwrap(await h.storage.origin_intrinsic_metadata.search_fulltext("stale"))).toEqual([]);
		});

		it("moves the origin fact to the new head on a later visit", async () => {
			const before = publish(h.archive, ORIGIN, { "package.json": '{"name": "Old"}' });
			await h.dispatcher.start(ORIGIN);
			await h.drain();

			const after = publish(h.archive, ORIGIN, { "package.json": '{"name": "New"}' });
			await h.dispatcher.start(ORIGIN);
			await h.drain();

			const [fact] = unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]));
			expect(fact?.metadata).toEqual({ name: "New" });
			expect(fact?.from_directory).toBe(after);
			expect(after).not.toBe(before);
			expect(unwrap(await h.storage.origin_intrinsic_metadata.search_fulltext("New")).map(hit => hit.id)).toEqual([ORIGIN]);
			expect(unwrap(await h.storage.origin_intrinsic_metadata.search_fulltext("Old"))).toEqual([]);
		});
	});

	describe("delivery", () => {
		it("converges on one fact when every task is delivered twice", async () => {
			h = await create_harness({ duplicate_delivery: true });
			publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}' });

			await h.dispatcher.start(ORIGIN);
			const report = await h.drain();

			expect(report).toEqual({ handled: 14, retried: 0, failed: [] });
			expect(unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]))).toHaveLength(1);
			expect(of_type(h.events, "content_translated").filter(e => !e.reused)).toHaveLength(1);
		});

		it("retries a task after a transient graph failure", async () => {
			const archive = create_memory_archive();
			let failures = 1;
			const flaky: MemoryArchive = {
				...archive,
				async get_latest_snapshot(origin) {
					if (failures-- > 0) throw new Error("connection reset");
					return archive.get_latest_snapshot(origin);
				},
			};
			h = await create_harness({ archive: flaky });
			publish(archive, ORIGIN, { "package.json": '{"name": "Foo"}' });

			await h.dispatcher.start(ORIGIN);
			const report = await h.drain();

			expect(report).toEqual({ handled: 3, retried: 1, failed: [] });
			expect(of_type(h.events, "task_failed")).toEqual([]);
			expect(unwrap(await h.storage.origin_intrinsic_metadata.get([ORIGIN]))).toHaveLength(1);
		});
	});

	describe("failures", () => {
		it("fails a run whose origin has no snapshot", async () => {
			await h.dispatcher.start(ORIGIN);
			const report = await h.drain();

			expect(report).toEqual({ handled: 1, retried: 0, failed: [] });
			expect(h.runs.map(r => r.state)).toEqual(["failed"]);
			expect(of_type(h.events, "task_failed")).toEqual([
				{
					type: "task_failed",
					stage: "resolve_head",
					origin: ORIGIN,
					object_id: null,
					tool_id: null,
					error: { kind: "no_canonical_branch", origin: ORIGIN, reason: "no snapshot" },
				},
			]);
		});

		it("restarts a failed run once the origin can be resolved", async () => {
			await h.dispatcher.start(ORIGIN);
			await h.drain();
			const [failed] = h.runs;
			if (!failed) throw new Error("expected a failed run");

			publish(h.archive, ORIGIN, { "package.json": '{"name": "Foo"}' });
			const restarted = unwrap(await h.dispatcher.restart(failed));
			expect(restarted).toEqual({ run_id: failed.run_id, origin: ORIGIN, state: "pending", policy: "skip" });

			await h.drain();
			expect(h.runs.map(r => r.state)).toEqual(["failed", "head_resolved", "directory_indexed", "done"]);
		});

		it("refuses to restart a run that is still in progress", async () => {
			const run = unwrap(await h.dispatcher.start(ORIGIN));
			const result = await h.dispatcher.restart(run);

			expect(result).toEqual({ ok: false, error: { kind: "invalid_transition", from: "pending", event: "restart" } });
		});

		it("fails the run when the head directory is missing", async () => {
			h.archive.add_snapshot(ORIGIN, { HEAD: { target_type: "directory", target: "missing-dir" } });

			await h.dispatcher.start(ORIGIN);
			await h.drain();

			expect(h.runs.map(r => r.state)).toEqual(["head_resolved", "failed"]);
			const [failure] = of_type(h.events, "task_failed");
			expect(failure?.stage).toBe("index_directory");
			expect(failure?.object_id).toBe("missing-dir");
			expect(failure?.tool_id).toBe(h.tools.directory.id);
			expect(failure?.error).toEqual({ kind: "not_found", object_type: "directory", id: "missing-dir" });
		});
	});

	describe("extrinsic metadata", () => {
		const record = (overrides: Partial<RawExtrinsicMetadata>): RawExtrinsicMetadata => ({
			id: "remd-1",
			target: "https://github.com/foo/bar",
			authority: { type: "forge", url: "https://github.com" },
			format: "application/vnd.github.v3+json",
			metadata: encode('{"name": "bar", "description": "A parser"}'),
			...overrides,
		});

		it("stores records from an authority for the origin", async () => {
			expect(unwrap(await h.dispatcher.ingest_extrinsic([record({})]))).toBe(1);
			await h.drain();

			expect(unwrap(await h.storage.origin_extrinsic_metadata.get(["https://github.com/foo/bar"]))).toEqual([
				{
					id: "https://github.com/foo/bar",
					indexer_configuration_id: h.tools.extrinsic.id,
					metadata: { name: "bar", description: "A parser" },
					from_remd_id: "remd-1",
					mappings: ["github"],
					search_vector: { a: [1], bar: [3], parser: [2] },
					tool: h.tools.extrinsic,
				},
			]);
		});

		it("drops records from a forge that does not host the origin", async () => {
			const foreign = record({ id: "remd-2", target: "https://gitlab.com/foo/bar" });

			await h.dispatcher.ingest_extrinsic([foreign]);
			const report = await h.drain();

			expect(report).toEqual({ handled: 1, retried: 0, failed: [] });
			expect(unwrap(await h.storage.origin_extrinsic_metadata.get(["https://gitlab.com/foo/bar"]))).toEqual([]);
			expect(of_type(h.events, "extrinsic_dropped")).toEqual([
				{
					type: "extrinsic_dropped",
					origin: "https://gitlab.com/foo/bar",
					remd_id: "remd-2",
					reason: "forge https://github.com is not an authority for https://gitlab.com/foo/bar",
				},
			]);
			expect(of_type(h.events, "task_failed")).toEqual([]);
		});

		it("accepts deposits for any origin", async () => {
			const deposit = record({
				id: "remd-3",
				target: "https://example.org/deposit/1",
				authority: { type: "deposit_client", url: "https://deposit.example.org" },
				format: "json-sword-codemeta",
				metadata: encode('{"codemeta:name": "Deposit", "codemeta:author": {"name": "Jane Doe"}}'),
			});

			await h.dispatcher.ingest_extrinsic([deposit]);
			await h.drain();

			const [fact] = unwrap(await h.storage.origin_extrinsic_metadata.get(["https://example.org/deposit/1"]));
			expect(fact?.metadata).toEqual({ name: "Deposit", author: "Jane Doe" });
			expect(fact?.mappings).toEqual(["json-sword-codemeta"]);
		});

		it("reports records in an unknown format without failing the batch", async () => {
			await h.dispatcher.ingest_extrinsic([record({ id: "remd-4", format: "text/plain" }), record({})]);
			const report = await h.drain();

			expect(report).toEqual({ handled: 2, retried: 0, failed: [] });
			const [failure] = of_type(h.events, "task_failed");
			expect(failure?.stage).toBe("aggregate_extrinsic");
			expect(failure?.object_id).toBe("remd-4");
			expect(failure?.error).toEqual({ kind: "unsupported_format", format: "text/plain" });
			expect(unwrap(await h.storage.origin_extrinsic_metadata.get(["https://github.com/foo/bar"]))).toHaveLength(1);
		});
	});
});

describe("directory extractor", () => {
	let archive: MemoryArchive;
	let storage: IndexerStorage;
	let tools: DispatcherTools;

	beforeEach(async () => {
		archive = create_memory_archive();
		storage = create_memory_backend();
		tools = unwrap(await register_tools(storage.tools));
	});

	const extractor = (filenames?: FilenameRegistry) =>
		create_directory_extractor({ graph: archive, storage, content_tool: tools.content, directory_tool: tools.directory, filenames });

	it("returns not_found for an unknown directory", async () => {
		const result = await extractor().extract("missing-dir");
		expect(result).toEqual({ ok: false, error: { kind: "not_found", object_type: "directory", id: "missing-dir" } });
	});

	it("only looks at files on the top level", async () => {
		const nested = archive.add_directory([{ name: "package.json", type: "file", target: archive.add_blob('{"name": "Nested"}') }]);
		const directory = archive.add_directory([
			{ name: "package.json", type: "dir", target: nested },
			{ name: "sub", type: "dir", target: nested },
		]);

		const extraction = unwrap(await extractor().extract(directory));
		expect(extraction.fact.metadata).toEqual({});
		expect(extraction.translated).toEqual([]);
	});

	it("skips files whose blob is missing", async () => {
		const directory = archive.add_directory([{ name: "package.json", type: "file", target: "missing-blob" }]);

		const extraction = unwrap(await extractor().extract(directory));
		expect(extraction.skipped).toEqual([
			{
				name: "package.json",
				content_id: "missing-blob",
				ecosystem: "npm",
				error: { kind: "not_found", object_type: "content", id: "missing-blob" },
			},
		]);
	});

	it("matches filenames from a custom registry", async () => {
		const directory = archive.add_directory([
			{ name: "package.json", type: "file", target: archive.add_blob('{"name": "Ignored"}') },
			{ name: "meta.json", type: "file", target: archive.add_blob('{"name": "Custom"}') },
		]);

		const extraction = unwrap(await extractor(create_filename_registry([["meta.json", "npm"]])).extract(directory));
		expect(extraction.fact.metadata).toEqual({ name: "Custom" });
		expect(extraction.translated).toEqual(["meta.json"]);
	});

	it("reports reused content facts", async () => {
		const directory = archive.add_directory([{ name: "package.json", type: "file", target: archive.add_blob('{"name": "Foo"}') }]);

		unwrap(await extractor().extract(directory));
		const again = unwrap(await extractor().extract(directory));

		expect(again.reused).toEqual(["package.json"]);
		expect(again.translated).toEqual([]);
	});
});
