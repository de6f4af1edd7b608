/**
 * @module Dispatcher
 * @description Drives origins through head resolution, directory extraction and aggregation.
 */

import type {
	ConflictPolicy,
	EventHandler,
	IndexerError,
	IndexerStorage,
	OriginRun,
	PropagationHints,
	RawExtrinsicMetadata,
	Result,
	RunEvent,
	RunState,
	Scheduler,
	Stage,
	Task,
	Tool,
} from "./types";
import { ok, err } from "./types";
import type { GraphStorage } from "./archive";
import type { FilenameRegistry } from "./mappings/registry";
import { create_head_resolver } from "./head";
import { create_directory_extractor } from "./extractor";
import { create_origin_aggregator } from "./aggregator";
import { create_emitter, generate_run_id } from "./utils";

const TERMINAL: ReadonlySet<RunState> = new Set(["done", "failed"]);

/**
 * The run state machine. Pure: returns the next run or `invalid_transition`,
 * never mutates its input.
 *
 * ```
 * pending → head_resolved → directory_indexed → origin_aggregated → done
 *    └──────────┴─────────────────┴──────────────────┴──→ failed
 * done | failed ──restart──→ pending
 * ```
 *
 * @example
 * ```ts
 * const run = { run_id: 'r1', origin: 'https://example.org/foo', state: 'pending', policy: 'skip' }
 * transition(run, { type: 'head_resolved', directory_id: 'abc' })
 * // => { ok: true, value: { ...run, state: 'head_resolved', directory_id: 'abc' } }
 * transition(run, { type: 'completed' })
 * // => { ok: false, error: { kind: 'invalid_transition', from: 'pending', event: 'completed' } }
 * ```
 */
export function transition(run: OriginRun, event: RunEvent): Result<OriginRun> {
	const refuse = (): Result<OriginRun> => err({ kind: "invalid_transition", from: run.state, event: event.type });

	switch (event.type) {
		case "head_resolved":
			if (run.state !== "pending") return refuse();
			return ok({ ...run, state: "head_resolved", directory_id: event.directory_id });
		case "directory_indexed":
			if (run.state !== "head_resolved") return refuse();
			return ok({ ...run, state: "directory_indexed", tool_id: event.tool_id });
		case "origin_aggregated":
			if (run.state !== "directory_indexed") return refuse();
			return ok({ ...run, state: "origin_aggregated" });
		case "completed":
			if (run.state !== "origin_aggregated") return refuse();
			return ok({ ...run, state: "done" });
		case "failed":
			if (TERMINAL.has(run.state)) return refuse();
			return ok({ ...run, state: "failed", error: event.error });
		case "restart":
			if (!TERMINAL.has(run.state)) return refuse();
			return ok({ run_id: run.run_id, origin: run.origin, state: "pending", policy: run.policy });
	}
}

export type StartOpts = {
	policy?: ConflictPolicy;
};

/**
 * The dispatcher's entry points.
 *
 * - `start(origin)` - Create a pending run and schedule head resolution
 * - `reindex(origins)` - Start runs that overwrite existing facts
 * - `ingest_extrinsic(records)` - Schedule one aggregation per extrinsic record
 * - `restart(run)` - Move a finished run back to pending and schedule it again
 * - `handle(task)` - Perform one stage and schedule the next
 *
 * `handle` returns `storage_error` as an error so the transport retries the
 * task; every other failure is final for the run and comes back as a run in
 * the `failed` state.
 *
 * @category Types
 * @group Dispatcher Types
 */
export type Dispatcher = {
	start: (origin: string, opts?: StartOpts) => Promise<Result<OriginRun>>;
	reindex: (origins: string[]) => Promise<Result<OriginRun[]>>;
	ingest_extrinsic: (records: RawExtrinsicMetadata[], opts?: StartOpts) => Promise<Result<number>>;
	restart: (run: OriginRun) => Promise<Result<OriginRun>>;
	handle: (task: Task) => Promise<Result<OriginRun | null>>;
};

export type DispatcherTools = {
	/** Attributed to per-file content metadata facts. */
	content: Tool;
	/** Attributed to directory facts, and through them to intrinsic origin facts. */
	directory: Tool;
	/** Attributed to translated extrinsic records. */
	extrinsic: Tool;
};

export type DispatcherConfig = {
	storage: IndexerStorage;
	graph: GraphStorage;
	scheduler: Scheduler;
	tools: DispatcherTools;
	filenames?: FilenameRegistry;
	branch_names?: readonly string[];
	/** Concurrent translations per directory. */
	concurrency?: number;
	/** Policy for `start` and `ingest_extrinsic` calls that do not name one. */
	policy?: ConflictPolicy;
	on_event?: EventHandler;
};

type Failure = {
	stage: Stage;
	object_id: string | null;
	tool_id: number | null;
	error: IndexerError;
};

export function create_dispatcher(config: DispatcherConfig): Dispatcher {
	const { storage, graph, scheduler, tools } = config;
	const default_policy = config.policy ?? "skip";
	const emit = create_emitter(config.on_event);

	const resolver = create_head_resolver({ graph, branch_names: config.branch_names });
	const extractor = create_directory_extractor({
		graph,
		storage,
		content_tool: tools.content,
		directory_tool: tools.directory,
		filenames: config.filenames,
		concurrency: config.concurrency,
		on_event: config.on_event,
	});
	const aggregator = create_origin_aggregator({ storage, extrinsic_tool: tools.extrinsic, on_event: config.on_event });

	const advance = (run: OriginRun, event: RunEvent): Result<OriginRun> => {
		const next = transition(run, event);
		if (next.ok) emit({ type: "run_transition", origin: run.origin, run_id: run.run_id, from: run.state, to: next.value.state });
		return next;
	};

	const schedule = async (task: Task): Promise<Result<void>> => {
		const scheduled = await scheduler.schedule(task);
		if (scheduled.ok) {
			const origin = task.stage === "aggregate_extrinsic" ? task.record.target : task.run.origin;
			emit({ type: "task_scheduled", stage: task.stage, origin });
		}
		return scheduled;
	};

	/** Transient errors go back to the transport; anything else fails the run. */
	const fail = (run: OriginRun, failure: Failure): Result<OriginRun> => {
		if (failure.error.kind === "storage_error") return err(failure.error);
		emit({ type: "task_failed", origin: run.origin, ...failure });
		return advance(run, { type: "failed", error: failure.error });
	};

	const then_schedule = async (run: OriginRun, task: Task): Promise<Result<OriginRun>> => {
		const scheduled = await schedule(task);
		return scheduled.ok ? ok(run) : scheduled;
	};

	async function resolve_head(run: OriginRun): Promise<Result<OriginRun>> {
		const head = await resolver.resolve_head(run.origin);
		if (!head.ok) return fail(run, { stage: "resolve_head", object_id: null, tool_id: null, error: head.error });

		const next = advance(run, { type: "head_resolved", directory_id: head.value.directory_id });
		if (!next.ok) return next;
		return then_schedule(next.value, {
			stage: "index_directory",
			run: next.value,
			directory_id: head.value.directory_id,
			hints: { head_of_origin: run.origin },
		});
	}

	/** Under `skip`, a directory fact already stored for the directory tool is reused. */
	async function existing_directory_tool(directory_id: string, policy: ConflictPolicy): Promise<Result<number | null>> {
		if (policy !== "skip") return ok(null);
		const existing = await storage.directory_intrinsic_metadata.get([directory_id], { tool_ids: [tools.directory.id] });
		if (!existing.ok) return existing;
		const [fact] = existing.value;
		return ok(fact ? fact.indexer_configuration_id : null);
	}

	async function index_directory(run: OriginRun, directory_id: string, hints: PropagationHints): Promise<Result<OriginRun>> {
		const failure = (error: IndexerError): Failure => ({ stage: "index_directory", object_id: directory_id, tool_id: tools.directory.id, error });

		const reusable = await existing_directory_tool(directory_id, run.policy);
		if (!reusable.ok) return fail(run, failure(reusable.error));

		let tool_id = reusable.value;
		if (tool_id === null) {
			const extraction = await extractor.extract(directory_id, { policy: run.policy });
			if (!extraction.ok) return fail(run, failure(extraction.error));
			tool_id = extraction.value.fact.indexer_configuration_id;
		}

		const next = advance(run, { type: "directory_indexed", tool_id });
		if (!next.ok) return next;
		return then_schedule(next.value, { stage: "aggregate_origin", run: next.value, directory_id, tool_id, hints });
	}

	async function aggregate_origin(run: OriginRun, directory_id: string, tool_id: number, hints: PropagationHints): Promise<Result<OriginRun>> {
		const failure = (error: IndexerError): Failure => ({ stage: "aggregate_origin", object_id: directory_id, tool_id, error });
		const origin = hints.head_of_origin ?? run.origin;

		const facts = await storage.directory_intrinsic_metadata.get([directory_id], { tool_ids: [tool_id] });
		if (!facts.ok) return fail(run, failure(facts.error));
		const [fact] = facts.value;
		if (!fact) return fail(run, failure({ kind: "not_found", object_type: "directory", id: directory_id }));

		// the origin always follows its current head, whatever the run's policy
		const aggregated = await aggregator.aggregate_intrinsic(origin, fact, "overwrite");
		if (!aggregated.ok) return fail(run, failure(aggregated.error));

		const next = advance(run, { type: "origin_aggregated" });
		if (!next.ok) return next;
		return advance(next.value, { type: "completed" });
	}

	async function aggregate_extrinsic(record: RawExtrinsicMetadata, policy: ConflictPolicy): Promise<Result<null>> {
		const aggregated = await aggregator.aggregate_extrinsic(record, policy);
		if (aggregated.ok) return ok(null);

		const error = aggregated.error;
		if (error.kind === "storage_error") return err(error);
		// dropped records are already reported by the aggregator
		if (error.kind !== "authority_mismatch") {
			emit({
				type: "task_failed",
				stage: "aggregate_extrinsic",
				origin: record.target,
				object_id: record.id,
				tool_id: tools.extrinsic.id,
				error,
			});
		}
		return ok(null);
	}

	const start = async (origin: string, opts?: StartOpts): Promise<Result<OriginRun>> => {
		const run: OriginRun = { run_id: generate_run_id(), origin, state: "pending", policy: opts?.policy ?? default_policy };
		return then_schedule(run, { stage: "resolve_head", run });
	};

	return {
		start,

		async reindex(origins) {
			const runs: OriginRun[] = [];
			for (const origin of origins) {
				const run = await start(origin, { policy: "overwrite" });
				if (!run.ok) return run;
				runs.push(run.value);
			}
			return ok(runs);
		},

		async ingest_extrinsic(records, opts) {
			const policy = opts?.policy ?? default_policy;
			for (const record of records) {
				const scheduled = await schedule({ stage: "aggregate_extrinsic", record, policy });
				if (!scheduled.ok) return scheduled;
			}
			return ok(records.length);
		},

		async restart(run) {
			const next = advance(run, { type: "restart" });
			if (!next.ok) return next;
			return then_schedule(next.value, { stage: "resolve_head", run: next.value });
		},

		async handle(task) {
			switch (task.stage) {
				case "resolve_head":
					return resolve_head(task.run);
				case "index_directory":
					return index_directory(task.run, task.directory_id, task.hints);
				case "aggregate_origin":
					return aggregate_origin(task.run, task.directory_id, task.tool_id, task.hints);
				case "aggregate_extrinsic":
					return aggregate_extrinsic(task.record, task.policy);
			}
		},
	};
}
