/**
 * @module Backends
 * @description In-memory storage backend for testing and development.
 */

import type {
	ConflictPolicy,
	EventHandler,
	FactKey,
	FactRow,
	IndexerStorage,
	OriginIntrinsicMetadataRow,
	OriginMetadataStats,
	SearchVector,
	Tool,
} from "../types";
import type { Ecosystem } from "../mappings/types";
import { create_emitter, compare_strings, compare_tuples } from "../utils";
import { score_vector } from "../search";
import * as facts from "../facts";
import type { FactKindDef } from "../facts";
import { create_indexer_storage, parse_configuration } from "./base";
import type { FactStorage, OriginFactStorage, OriginIntrinsicStorage, ScoredRow, StoredToolSpec, ToolStorage } from "./base";

export type MemoryBackendOptions = {
	on_event?: EventHandler;
};

function create_memory_tools(): ToolStorage {
	const by_key = new Map<string, Tool>();
	const by_id = new Map<number, Tool>();
	let next_id = 1;

	const key_of = (spec: StoredToolSpec) => JSON.stringify([spec.name, spec.version, spec.configuration]);

	return {
		async insert_ignore(specs) {
			let created = 0;
			for (const spec of specs) {
				const key = key_of(spec);
				if (by_key.has(key)) continue;
				const tool: Tool = {
					id: next_id++,
					name: spec.name,
					version: spec.version,
					configuration: parse_configuration(spec.configuration),
				};
				by_key.set(key, tool);
				by_id.set(tool.id, tool);
				created++;
			}
			return created;
		},

		async find_by_keys(specs) {
			return specs.flatMap(spec => {
				const tool = by_key.get(key_of(spec));
				return tool ? [tool] : [];
			});
		},

		async find_by_ids(ids) {
			return ids.flatMap(id => {
				const tool = by_id.get(id);
				return tool ? [tool] : [];
			});
		},
	};
}

/**
 * Rows are cloned on the way in and out so callers never share state with the store.
 */
function create_memory_facts<Entry extends FactRow, Row extends Entry>(def: FactKindDef<Entry, Row>) {
	const rows = new Map<string, Row>();
	const key_of = (row: Row) => facts.fact_key_string(def, row);

	const storage: FactStorage<Row> = {
		async write(batch: Row[], policy: ConflictPolicy) {
			let affected = 0;
			for (const row of batch) {
				const key = key_of(row);
				if (policy === "skip" && rows.has(key)) continue;
				rows.set(key, structuredClone(row));
				affected++;
			}
			return affected;
		},

		async read(ids, tool_ids) {
			const wanted = new Set(ids);
			const tools = tool_ids ? new Set(tool_ids) : null;
			return Array.from(rows.values())
				.filter(row => wanted.has(row.id) && (!tools || tools.has(row.indexer_configuration_id)))
				.map(row => structuredClone(row));
		},

		async remove(keys: FactKey[]) {
			const doomed = new Set(keys.map(k => JSON.stringify([k.id, k.indexer_configuration_id])));
			let deleted = 0;
			for (const [key, row] of rows) {
				if (doomed.has(JSON.stringify([row.id, row.indexer_configuration_id]))) {
					rows.delete(key);
					deleted++;
				}
			}
			return deleted;
		},
	};

	return { storage, rows };
}

type Searchable = FactRow & { search_vector: SearchVector };

function search_rows<Row extends Searchable>(rows: Iterable<Row>, tokens: string[], limit: number): ScoredRow<Row>[] {
	const hits: ScoredRow<Row>[] = [];
	for (const row of rows) {
		const score = score_vector(row.search_vector, tokens);
		if (score !== null) hits.push({ row: structuredClone(row), score });
	}
	return hits
		.sort((a, b) => b.score - a.score || compare_tuples([a.row.id, a.row.indexer_configuration_id], [b.row.id, b.row.indexer_configuration_id]))
		.slice(0, limit);
}

function create_memory_origin_facts<Entry extends FactRow, Row extends Entry & Searchable>(def: FactKindDef<Entry, Row>) {
	const { storage, rows } = create_memory_facts(def);
	const origin_storage: OriginFactStorage<Row> = {
		...storage,
		async search(tokens, limit) {
			return search_rows(rows.values(), tokens, limit);
		},
	};
	return { storage: origin_storage, rows };
}

function create_memory_origin_intrinsic(): OriginIntrinsicStorage {
	const { storage, rows } = create_memory_origin_facts(facts.origin_intrinsic_metadata);

	const matches = (row: OriginIntrinsicMetadataRow, mappings?: Ecosystem[], tool_ids?: number[]) =>
		(!tool_ids || tool_ids.includes(row.indexer_configuration_id)) &&
		(!mappings || row.mappings.some(m => mappings.includes(m)));

	return {
		...storage,

		async scan_ids({ after, mappings, tool_ids, limit }) {
			const ids = new Set<string>();
			for (const row of rows.values()) {
				if (after !== undefined && row.id <= after) continue;
				if (matches(row, mappings, tool_ids)) ids.add(row.id);
			}
			return Array.from(ids).sort(compare_strings).slice(0, limit);
		},

		async stats(): Promise<OriginMetadataStats> {
			const stats: OriginMetadataStats = { total: 0, non_empty: 0, per_mapping: {} };
			for (const row of rows.values()) {
				stats.total++;
				if (row.mappings.length > 0) stats.non_empty++;
				for (const mapping of row.mappings) {
					stats.per_mapping[mapping] = (stats.per_mapping[mapping] ?? 0) + 1;
				}
			}
			return stats;
		},
	};
}

/**
 * Creates an in-memory storage backend.
 * @category Backends
 * @group Storage Backends
 *
 * All data is lost when the process ends. Behaves like the SQLite backend
 * except for full-text scores, which count term occurrences instead of bm25.
 *
 * @example
 * ```ts
 * const storage = create_memory_backend({
 *   on_event: (e) => console.log(`[${e.type}]`, e)
 * })
 * const tool = unwrap(await storage.tools.register('npm-detector', '1.0', {}))
 * ```
 */
export function create_memory_backend(options?: MemoryBackendOptions): IndexerStorage {
	const on_event = options?.on_event;
	const emit = create_emitter(on_event);

	const storage = create_indexer_storage(
		{
			tools: create_memory_tools(),
			content_mimetype: create_memory_facts(facts.content_mimetype).storage,
			content_fossology_license: create_memory_facts(facts.content_fossology_license).storage,
			content_metadata: create_memory_facts(facts.content_metadata).storage,
			directory_intrinsic_metadata: create_memory_facts(facts.directory_intrinsic_metadata).storage,
			origin_intrinsic_metadata: create_memory_origin_intrinsic(),
			origin_extrinsic_metadata: create_memory_origin_facts(facts.origin_extrinsic_metadata).storage,
		},
		emit
	);

	return { ...storage, on_event };
}
