/**
 * @module Backend Base
 * @description Storage adapter contracts and the clients that hold all fact-store logic.
 *
 * Backends implement the thin `*Storage` adapters (plain promises, throwing on
 * failure). Validation, ordering, deduplication, referential checks, joins
 * and events live in the clients built here, so every backend behaves alike.
 */

import type {
	AddOpts,
	AddSummary,
	ConflictPolicy,
	ContentLicenseRow,
	ContentMetadataRow,
	ContentMimetypeRow,
	DirectoryIntrinsicMetadataRow,
	FactClient,
	FactKey,
	FactRow,
	IndexerError,
	IndexerEvent,
	IndexerStorage,
	OriginExtrinsicMetadataRow,
	OriginFactClient,
	OriginIntrinsicClient,
	OriginIntrinsicMetadataRow,
	OriginMetadataStats,
	RejectedEntry,
	Result,
	SearchHit,
	Tool,
	ToolRegistry,
	ToolSpec,
	WithTool,
} from "../types";
import { ok, err } from "../types";
import type { Ecosystem } from "../mappings/types";
import { z } from "zod";
import { guard_storage } from "../result";
import { canonical_json, compare_tuples, unique } from "../utils";
import { parse_query } from "../search";
import * as facts from "../facts";
import type { FactKindDef } from "../facts";

const DEFAULT_SEARCH_LIMIT = 100;
const DEFAULT_PAGE_LIMIT = 100;

/** A tool spec with its configuration serialized canonically, as stored. */
export type StoredToolSpec = {
	name: string;
	version: string;
	configuration: string;
};

export type ToolStorage = {
	/** Inserts specs whose natural key is absent. Returns how many were created. */
	insert_ignore: (specs: StoredToolSpec[]) => Promise<number>;
	find_by_keys: (specs: StoredToolSpec[]) => Promise<Tool[]>;
	find_by_ids: (ids: number[]) => Promise<Tool[]>;
};

export type FactStorage<Row extends FactRow> = {
	/** Writes a prepared batch in one transaction. Returns keys inserted or overwritten. */
	write: (rows: Row[], policy: ConflictPolicy) => Promise<number>;
	read: (ids: string[], tool_ids?: number[]) => Promise<Row[]>;
	remove: (keys: FactKey[]) => Promise<number>;
};

export type ScoredRow<Row> = { row: Row; score: number };

export type OriginFactStorage<Row extends FactRow> = FactStorage<Row> & {
	/** Rows matching every token, best first, ties by origin then tool. */
	search: (tokens: string[], limit: number) => Promise<ScoredRow<Row>[]>;
};

export type ScanOpts = {
	after?: string;
	mappings?: Ecosystem[];
	tool_ids?: number[];
	limit: number;
};

export type OriginIntrinsicStorage = OriginFactStorage<OriginIntrinsicMetadataRow> & {
	/** Distinct origin urls after `after`, in url order. */
	scan_ids: (opts: ScanOpts) => Promise<string[]>;
	stats: () => Promise<OriginMetadataStats>;
};

export type StorageAdapters = {
	tools: ToolStorage;
	content_mimetype: FactStorage<ContentMimetypeRow>;
	content_fossology_license: FactStorage<ContentLicenseRow>;
	content_metadata: FactStorage<ContentMetadataRow>;
	directory_intrinsic_metadata: FactStorage<DirectoryIntrinsicMetadataRow>;
	origin_intrinsic_metadata: OriginIntrinsicStorage;
	origin_extrinsic_metadata: OriginFactStorage<OriginExtrinsicMetadataRow>;
};

type Emit = (event: IndexerEvent) => void;

const ConfigurationSchema = z.record(z.unknown());

const ToolSpecSchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	configuration: ConfigurationSchema,
});

/** Reads back a configuration stored by `to_stored_spec`. */
export const parse_configuration = (stored: string): Record<string, unknown> => ConfigurationSchema.parse(JSON.parse(stored));

export const to_stored_spec = (spec: ToolSpec): StoredToolSpec => ({
	name: spec.name,
	version: spec.version,
	configuration: canonical_json(spec.configuration),
});

const stored_key = (spec: StoredToolSpec): string => JSON.stringify([spec.name, spec.version, spec.configuration]);

const tool_key = (tool: Tool): string => stored_key(to_stored_spec(tool));

export function create_tool_registry(storage: ToolStorage, emit: Emit): ToolRegistry {
	const registry: ToolRegistry = {
		async add(specs): Promise<Result<Tool[]>> {
			const parsed = z.array(ToolSpecSchema).safeParse(specs);
			if (!parsed.success) {
				return err({ kind: "validation_error", cause: parsed.error, message: parsed.error.message });
			}

			const stored = parsed.data.map(to_stored_spec);
			const distinct = Array.from(new Map(stored.map(s => [stored_key(s), s])).values());

			const created = await guard_storage("tools.insert_ignore", () => storage.insert_ignore(distinct));
			if (!created.ok) return created;

			const found = await guard_storage("tools.find_by_keys", () => storage.find_by_keys(distinct));
			if (!found.ok) return found;

			const by_key = new Map(found.value.map(tool => [tool_key(tool), tool]));
			const tools: Tool[] = [];
			for (const spec of stored) {
				const tool = by_key.get(stored_key(spec));
				if (!tool) {
					return err({
						kind: "storage_error",
						cause: new Error(`tool ${spec.name} ${spec.version} missing after insert`),
						operation: "tools.add",
					});
				}
				tools.push(tool);
			}

			emit({ type: "tool_register", requested: specs.length, created: created.value });
			return ok(tools);
		},

		async register(name, version, configuration): Promise<Result<Tool>> {
			const result = await registry.add([{ name, version, configuration }]);
			if (!result.ok) return result;
			const [tool] = result.value;
			if (!tool) return err({ kind: "storage_error", cause: new Error("empty registration"), operation: "tools.register" });
			return ok(tool);
		},

		async get(spec): Promise<Result<Tool | null>> {
			const found = await guard_storage("tools.find_by_keys", () => storage.find_by_keys([to_stored_spec(spec)]));
			if (!found.ok) return found;
			return ok(found.value[0] ?? null);
		},

		async get_by_ids(ids): Promise<Result<Tool[]>> {
			if (ids.length === 0) return ok([]);
			return guard_storage("tools.find_by_ids", () => storage.find_by_ids(unique(ids)));
		},
	};
	return registry;
}

async function tool_map(tools: ToolRegistry, ids: number[]): Promise<Result<Map<number, Tool>>> {
	const found = await tools.get_by_ids(ids);
	if (!found.ok) return found;
	return ok(new Map(found.value.map(tool => [tool.id, tool])));
}

const row_order = <Entry extends FactRow, Row extends Entry>(def: FactKindDef<Entry, Row>) => {
	const sort_key = (row: Row) => [row.id, row.indexer_configuration_id, ...def.key(row)];
	return (a: Row, b: Row) => compare_tuples(sort_key(a), sort_key(b));
};

function attach<Row extends FactRow>(rows: Row[], tools: Map<number, Tool>): WithTool<Row>[] {
	return rows.flatMap(row => {
		const tool = tools.get(row.indexer_configuration_id);
		return tool ? [{ ...row, tool }] : [];
	});
}

/**
 * Creates the client for one fact kind.
 *
 * `add` validates every entry, rejects those naming unknown tools, then hands
 * the sorted, deduplicated batch to the adapter as a single write.
 */
export function create_fact_client<Entry extends FactRow, Row extends Entry>(
	def: FactKindDef<Entry, Row>,
	storage: FactStorage<Row>,
	tools: ToolRegistry,
	emit: Emit
): FactClient<Entry, Row> {
	const table = def.table;
	const order = row_order(def);

	return {
		table,

		async add(entries, opts?: AddOpts): Promise<Result<AddSummary>> {
			const policy = opts?.policy ?? "skip";
			const tool_ids = unique(
				entries.flatMap(e => (typeof e.indexer_configuration_id === "number" ? [e.indexer_configuration_id] : []))
			);
			const known = await tool_map(tools, tool_ids);
			if (!known.ok) return known;

			const prepared = facts.prepare_batch(def, entries, policy);
			const valid: Entry[] = [];
			const rejected: RejectedEntry[] = [...prepared.rejected];
			for (const entry of prepared.entries) {
				if (known.value.has(entry.indexer_configuration_id)) {
					valid.push(entry);
					continue;
				}
				const error: IndexerError = {
					kind: "referential_integrity",
					table,
					object_id: entry.id,
					tool_id: entry.indexer_configuration_id,
				};
				entries.forEach((candidate, index) => {
					if (candidate.id === entry.id && candidate.indexer_configuration_id === entry.indexer_configuration_id) {
						rejected.push({ index, error });
					}
				});
			}
			rejected.sort((a, b) => a.index - b.index);

			let affected = 0;
			if (valid.length > 0) {
				const rows = valid.map(def.to_row);
				const written = await guard_storage(`${table}.write`, () => storage.write(rows, policy));
				if (!written.ok) return written;
				affected = written.value;
			}

			emit({ type: "fact_add", table, policy, affected, rejected: rejected.length });
			return ok({ affected, rejected });
		},

		async get(ids, opts): Promise<Result<WithTool<Row>[]>> {
			const wanted = unique(ids);
			if (wanted.length === 0) return ok([]);

			const rows = await guard_storage(`${table}.read`, () => storage.read(wanted, opts?.tool_ids));
			if (!rows.ok) return rows;

			const known = await tool_map(tools, unique(rows.value.map(r => r.indexer_configuration_id)));
			if (!known.ok) return known;

			const joined = attach([...rows.value].sort(order), known.value);
			emit({ type: "fact_get", table, requested: wanted.length, found: joined.length });
			return ok(joined);
		},

		async missing(keys: FactKey[]): Promise<Result<string[]>> {
			if (keys.length === 0) return ok([]);
			const rows = await guard_storage(`${table}.read`, () =>
				storage.read(unique(keys.map(k => k.id)), unique(keys.map(k => k.indexer_configuration_id)))
			);
			if (!rows.ok) return rows;

			const present = new Set(rows.value.map(r => JSON.stringify([r.id, r.indexer_configuration_id])));
			return ok(unique(keys.filter(k => !present.has(JSON.stringify([k.id, k.indexer_configuration_id]))).map(k => k.id)));
		},

		async delete(keys: FactKey[]): Promise<Result<number>> {
			if (keys.length === 0) return ok(0);
			const deleted = await guard_storage(`${table}.remove`, () => storage.remove(keys));
			if (!deleted.ok) return deleted;
			emit({ type: "fact_delete", table, deleted: deleted.value });
			return ok(deleted.value);
		},
	};
}

export function create_origin_fact_client<Entry extends FactRow, Row extends Entry>(
	def: FactKindDef<Entry, Row>,
	storage: OriginFactStorage<Row>,
	tools: ToolRegistry,
	emit: Emit
): OriginFactClient<Entry, Row> {
	return {
		...create_fact_client(def, storage, tools, emit),

		async search_fulltext(query, opts): Promise<Result<SearchHit<Row>[]>> {
			const tokens = parse_query(query);
			if (tokens.length === 0) return ok([]);
			const limit = opts?.limit ?? DEFAULT_SEARCH_LIMIT;

			const scored = await guard_storage(`${def.table}.search`, () => storage.search(tokens, limit));
			if (!scored.ok) return scored;

			const known = await tool_map(tools, unique(scored.value.map(s => s.row.indexer_configuration_id)));
			if (!known.ok) return known;

			return ok(
				scored.value.flatMap(({ row, score }) => {
					const tool = known.value.get(row.indexer_configuration_id);
					return tool ? [{ ...row, tool, score }] : [];
				})
			);
		},
	};
}

export function create_origin_intrinsic_client(
	storage: OriginIntrinsicStorage,
	tools: ToolRegistry,
	emit: Emit
): OriginIntrinsicClient {
	const base = create_origin_fact_client(facts.origin_intrinsic_metadata, storage, tools, emit);

	return {
		...base,

		async search_by_producer(query = {}) {
			const limit = query.limit ?? DEFAULT_PAGE_LIMIT;
			const ids = await guard_storage("origin_intrinsic_metadata.scan_ids", () =>
				storage.scan_ids({
					after: query.page_token,
					mappings: query.mappings,
					tool_ids: query.tool_ids,
					limit: limit + 1,
				})
			);
			if (!ids.ok) return ids;

			const page = ids.value.slice(0, limit);
			const next_page_token = ids.value.length > limit ? (page[page.length - 1] ?? null) : null;
			if (query.ids_only) return ok({ origins: page, next_page_token });

			const rows = await base.get(page, { tool_ids: query.tool_ids });
			if (!rows.ok) return rows;
			const mappings = query.mappings;
			const origins = mappings ? rows.value.filter(row => row.mappings.some(m => mappings.includes(m))) : rows.value;
			return ok({ origins, next_page_token });
		},

		async stats(): Promise<Result<OriginMetadataStats>> {
			return guard_storage("origin_intrinsic_metadata.stats", () => storage.stats());
		},
	};
}

export type StorageOptions = {
	close?: () => void;
};

/**
 * Assembles an `IndexerStorage` from a backend's adapters.
 */
export function create_indexer_storage(adapters: StorageAdapters, emit: Emit, options: StorageOptions = {}): IndexerStorage {
	const tools = create_tool_registry(adapters.tools, emit);
	return {
		tools,
		content_mimetype: create_fact_client(facts.content_mimetype, adapters.content_mimetype, tools, emit),
		content_fossology_license: create_fact_client(facts.content_fossology_license, adapters.content_fossology_license, tools, emit),
		content_metadata: create_fact_client(facts.content_metadata, adapters.content_metadata, tools, emit),
		directory_intrinsic_metadata: create_fact_client(
			facts.directory_intrinsic_metadata,
			adapters.directory_intrinsic_metadata,
			tools,
			emit
		),
		origin_intrinsic_metadata: create_origin_intrinsic_client(adapters.origin_intrinsic_metadata, tools, emit),
		origin_extrinsic_metadata: create_origin_fact_client(facts.origin_extrinsic_metadata, adapters.origin_extrinsic_metadata, tools, emit),
		close: options.close ?? (() => {}),
	};
}
