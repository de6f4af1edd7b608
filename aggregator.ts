/**
 * @module OriginAggregator
 * @description Copies directory facts and extrinsic records into origin-keyed, searchable facts.
 */

import type {
	AddSummary,
	ConflictPolicy,
	DirectoryIntrinsicMetadataRow,
	EventHandler,
	IndexerStorage,
	MetadataAuthority,
	OriginExtrinsicMetadataEntry,
	OriginIntrinsicMetadataEntry,
	RawExtrinsicMetadata,
	Result,
	Tool,
} from "./types";
import { ok, err } from "./types";
import type { Ecosystem, MetadataDocument } from "./mappings/types";
import { DEPOSIT_FORMATS } from "./mappings/registry";
import { translate_extrinsic, is_non_empty } from "./translator";
import { create_emitter } from "./utils";

/** What an origin fact is copied from. */
export type AggregationSource = {
	metadata: MetadataDocument;
	mappings: Ecosystem[];
	tool_id: number;
};

export type AggregatedFact =
	| { extrinsic: false; fact: OriginIntrinsicMetadataEntry }
	| { extrinsic: true; fact: OriginExtrinsicMetadataEntry };

export type OriginAggregator = {
	aggregate: (
		origin: string,
		source: AggregationSource,
		provenance: string,
		extrinsic: boolean,
		policy?: ConflictPolicy
	) => Promise<Result<AggregatedFact>>;
	aggregate_intrinsic: (
		origin: string,
		directory_fact: DirectoryIntrinsicMetadataRow,
		policy?: ConflictPolicy
	) => Promise<Result<OriginIntrinsicMetadataEntry>>;
	aggregate_extrinsic: (record: RawExtrinsicMetadata, policy?: ConflictPolicy) => Promise<Result<OriginExtrinsicMetadataEntry>>;
};

export type OriginAggregatorConfig = {
	storage: IndexerStorage;
	/** Tool attributed to translated extrinsic records. */
	extrinsic_tool: Tool;
	on_event?: EventHandler;
};

const with_slash = (url: string) => (url.endsWith("/") ? url : `${url}/`);

/**
 * Whether `authority` may assert metadata about `origin` in `format`.
 *
 * Forges and registries only speak for origins under their own URL; deposit
 * clients only through deposit formats.
 *
 * @example
 * ```ts
 * is_authoritative('https://github.com/foo/bar', { type: 'forge', url: 'https://github.com' }, 'application/vnd.github.v3+json') // => true
 * is_authoritative('https://gitlab.com/foo/bar', { type: 'forge', url: 'https://github.com' }, 'application/vnd.github.v3+json') // => false
 * ```
 */
export function is_authoritative(origin: string, authority: MetadataAuthority, format: string): boolean {
	switch (authority.type) {
		case "forge":
		case "registry":
			return origin === authority.url || origin.startsWith(with_slash(authority.url));
		case "deposit_client":
			return DEPOSIT_FORMATS.has(format);
	}
}

export function create_origin_aggregator(config: OriginAggregatorConfig): OriginAggregator {
	const { storage, extrinsic_tool } = config;
	const emit = create_emitter(config.on_event);

	async function store<Entry>(pending: Promise<Result<AddSummary>>, entry: Entry): Promise<Result<Entry>> {
		const result = await pending;
		if (!result.ok) return result;
		const [rejection] = result.value.rejected;
		if (rejection) return err(rejection.error);
		return ok(entry);
	}

	const base_of = (origin: string, source: AggregationSource) => ({
		id: origin,
		indexer_configuration_id: source.tool_id,
		metadata: source.metadata,
		mappings: source.mappings,
	});

	async function write_intrinsic(origin: string, source: AggregationSource, from_directory: string, policy: ConflictPolicy) {
		const entry: OriginIntrinsicMetadataEntry = { ...base_of(origin, source), from_directory };
		const stored = await store(storage.origin_intrinsic_metadata.add([entry], { policy }), entry);
		if (stored.ok) emit({ type: "origin_aggregated", origin, tool_id: source.tool_id, extrinsic: false, provenance: from_directory });
		return stored;
	}

	async function write_extrinsic(origin: string, source: AggregationSource, from_remd_id: string, policy: ConflictPolicy) {
		const entry: OriginExtrinsicMetadataEntry = { ...base_of(origin, source), from_remd_id };
		const stored = await store(storage.origin_extrinsic_metadata.add([entry], { policy }), entry);
		if (stored.ok) emit({ type: "origin_aggregated", origin, tool_id: source.tool_id, extrinsic: true, provenance: from_remd_id });
		return stored;
	}

	return {
		async aggregate(origin, source, provenance, extrinsic, policy = "skip"): Promise<Result<AggregatedFact>> {
			if (extrinsic) {
				const fact = await write_extrinsic(origin, source, provenance, policy);
				return fact.ok ? ok({ extrinsic: true, fact: fact.value }) : fact;
			}
			const fact = await write_intrinsic(origin, source, provenance, policy);
			return fact.ok ? ok({ extrinsic: false, fact: fact.value }) : fact;
		},

		async aggregate_intrinsic(origin, directory_fact, policy = "skip") {
			const source = {
				metadata: directory_fact.metadata,
				mappings: directory_fact.mappings,
				tool_id: directory_fact.indexer_configuration_id,
			};
			return write_intrinsic(origin, source, directory_fact.id, policy);
		},

		async aggregate_extrinsic(record, policy = "skip") {
			if (!is_authoritative(record.target, record.authority, record.format)) {
				emit({
					type: "extrinsic_dropped",
					origin: record.target,
					remd_id: record.id,
					reason: `${record.authority.type} ${record.authority.url} is not an authority for ${record.target}`,
				});
				return err({ kind: "authority_mismatch", origin: record.target, authority: record.authority });
			}

			const translated = translate_extrinsic(record.metadata, record.format);
			if (!translated.ok) return translated;
			const { ecosystem, document } = translated.value;

			const source = { metadata: document, mappings: is_non_empty(document) ? [ecosystem] : [], tool_id: extrinsic_tool.id };
			return write_extrinsic(record.target, source, record.id, policy);
		},
	};
}
