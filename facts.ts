/**
 * @module Facts
 * @description Fact kind definitions: entry schemas, natural keys, and batch preparation.
 */

import { z } from "zod";
import type {
	ConflictPolicy,
	ContentLicenseRow,
	ContentMetadataRow,
	ContentMimetypeRow,
	DirectoryIntrinsicMetadataRow,
	FactRow,
	FactTable,
	IndexerError,
	OriginExtrinsicMetadataEntry,
	OriginExtrinsicMetadataRow,
	OriginIntrinsicMetadataEntry,
	OriginIntrinsicMetadataRow,
	RejectedEntry,
} from "./types";
import { EcosystemSchema, MetadataDocumentSchema } from "./mappings/types";
import { compute_search_vector } from "./search";
import { canonical_json, compare_tuples } from "./utils";

/**
 * Describes one fact table to the generic fact client.
 * @category Types
 * @group Fact Types
 *
 * - `schema` validates (and strips) caller entries
 * - `key` lists the natural key fields beyond object id and tool
 * - `to_row` derives stored columns, e.g. search vectors
 */
export type FactKindDef<Entry extends FactRow, Row extends FactRow> = {
	table: FactTable;
	schema: z.ZodType<Entry>;
	key: (entry: Entry) => string[];
	to_row: (entry: Entry) => Row;
};

const FactRowSchema = z.object({
	id: z.string().min(1),
	indexer_configuration_id: z.number().int().positive(),
});

const Mappings = z.array(EcosystemSchema);

export const ContentMimetypeEntrySchema = FactRowSchema.extend({
	mimetype: z.string().min(1),
	encoding: z.string(),
});

export const ContentLicenseEntrySchema = FactRowSchema.extend({
	license: z.string().min(1),
});

export const ContentMetadataEntrySchema = FactRowSchema.extend({
	metadata: MetadataDocumentSchema,
});

export const DirectoryIntrinsicMetadataEntrySchema = FactRowSchema.extend({
	metadata: MetadataDocumentSchema,
	mappings: Mappings,
});

export const OriginIntrinsicMetadataEntrySchema = FactRowSchema.extend({
	metadata: MetadataDocumentSchema,
	from_directory: z.string().min(1),
	mappings: Mappings,
});

export const OriginExtrinsicMetadataEntrySchema = FactRowSchema.extend({
	metadata: MetadataDocumentSchema,
	from_remd_id: z.string().min(1),
	mappings: Mappings,
});

const no_key = () => [];

export const content_mimetype: FactKindDef<ContentMimetypeRow, ContentMimetypeRow> = {
	table: "content_mimetype",
	schema: ContentMimetypeEntrySchema,
	key: no_key,
	to_row: entry => entry,
};

export const content_fossology_license: FactKindDef<ContentLicenseRow, ContentLicenseRow> = {
	table: "content_fossology_license",
	schema: ContentLicenseEntrySchema,
	key: entry => [entry.license],
	to_row: entry => entry,
};

export const content_metadata: FactKindDef<ContentMetadataRow, ContentMetadataRow> = {
	table: "content_metadata",
	schema: ContentMetadataEntrySchema,
	key: no_key,
	to_row: entry => entry,
};

export const directory_intrinsic_metadata: FactKindDef<DirectoryIntrinsicMetadataRow, DirectoryIntrinsicMetadataRow> = {
	table: "directory_intrinsic_metadata",
	schema: DirectoryIntrinsicMetadataEntrySchema,
	key: no_key,
	to_row: entry => entry,
};

export const origin_intrinsic_metadata: FactKindDef<OriginIntrinsicMetadataEntry, OriginIntrinsicMetadataRow> = {
	table: "origin_intrinsic_metadata",
	schema: OriginIntrinsicMetadataEntrySchema,
	key: no_key,
	to_row: entry => ({ ...entry, search_vector: compute_search_vector(entry.metadata) }),
};

export const origin_extrinsic_metadata: FactKindDef<OriginExtrinsicMetadataEntry, OriginExtrinsicMetadataRow> = {
	table: "origin_extrinsic_metadata",
	schema: OriginExtrinsicMetadataEntrySchema,
	key: no_key,
	to_row: entry => ({ ...entry, search_vector: compute_search_vector(entry.metadata) }),
};

/**
 * Natural key of a row as a single string, for maps keyed by fact.
 */
export const fact_key_string = <Entry extends FactRow, Row extends FactRow>(def: FactKindDef<Entry, Row>, entry: Entry): string =>
	JSON.stringify([entry.id, entry.indexer_configuration_id, ...def.key(entry)]);

type Keyed<Entry> = { entry: Entry; key: string; sort: (string | number)[] };

export type PreparedBatch<Entry> = {
	entries: Entry[];
	rejected: RejectedEntry[];
};

/**
 * Validates a batch, then sorts and deduplicates it by natural key.
 *
 * Entries are ordered by (object id, tool id, remaining key fields, canonical
 * payload), so any permutation of the same batch prepares identically. Under
 * `skip` the first entry of each key wins, under `overwrite` the last.
 *
 * @example
 * ```ts
 * const { entries, rejected } = prepare_batch(content_mimetype, input, 'skip')
 * ```
 */
export function prepare_batch<Entry extends FactRow, Row extends FactRow>(
	def: FactKindDef<Entry, Row>,
	input: readonly unknown[],
	policy: ConflictPolicy
): PreparedBatch<Entry> {
	const rejected: RejectedEntry[] = [];
	const keyed: Keyed<Entry>[] = [];

	input.forEach((raw, index) => {
		const parsed = def.schema.safeParse(raw);
		if (!parsed.success) {
			const error: IndexerError = { kind: "validation_error", cause: parsed.error, message: parsed.error.message };
			rejected.push({ index, error });
			return;
		}
		const entry = parsed.data;
		const fields = def.key(entry);
		keyed.push({
			entry,
			key: fact_key_string(def, entry),
			sort: [entry.id, entry.indexer_configuration_id, ...fields, canonical_json(entry)],
		});
	});

	keyed.sort((a, b) => compare_tuples(a.sort, b.sort));

	const winners = new Map<string, Entry>();
	for (const { entry, key } of keyed) {
		if (policy === "skip" && winners.has(key)) continue;
		winners.set(key, entry);
	}

	return { entries: Array.from(winners.values()), rejected };
}
