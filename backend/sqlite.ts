/**
 * @module Backends
 * @description SQLite storage backend using drizzle-orm over better-sqlite3, with FTS5 search.
 */

import Database, { type RunResult } from "better-sqlite3";
import { and, asc, count, eq, gt, inArray, ne, sql, type Column } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import { z } from "zod";
import type {
	ConflictPolicy,
	ContentLicenseRow,
	ContentMetadataRow,
	ContentMimetypeRow,
	DirectoryIntrinsicMetadataRow,
	EventHandler,
	FactKey,
	IndexerStorage,
	OriginExtrinsicMetadataRow,
	OriginIntrinsicMetadataRow,
	OriginMetadataStats,
	Tool,
} from "../types";
import { EcosystemSchema } from "../mappings/types";
import { create_emitter, compare_tuples } from "../utils";
import { to_match_expression, vector_text } from "../search";
import { migrate } from "../migrations";
import {
	content_fossology_license,
	content_metadata,
	content_mimetype,
	directory_intrinsic_metadata,
	fossology_license,
	indexer_configuration,
	origin_extrinsic_metadata,
	origin_intrinsic_metadata,
} from "../schema";
import { create_indexer_storage, parse_configuration } from "./base";
import type {
	FactStorage,
	OriginFactStorage,
	OriginIntrinsicStorage,
	ScanOpts,
	ScoredRow,
	ToolStorage,
} from "./base";

/** Satisfied by both the database and its transactions. */
type Db = BaseSQLiteDatabase<"sync", RunResult>;

export type SqliteBackendConfig = {
	/** Database file; defaults to an in-process `:memory:` database. */
	path?: string;
	/** An already open connection. The backend does not close it. */
	database?: Database.Database;
	on_event?: EventHandler;
};

const to_tool = (row: typeof indexer_configuration.$inferSelect): Tool => ({
	id: row.id,
	name: row.tool_name,
	version: row.tool_version,
	configuration: parse_configuration(row.tool_configuration),
});

/** Condition restricting to the given tools, or undefined for all tools. */
const tool_filter = (column: Column, tool_ids?: number[]) =>
	tool_ids ? inArray(column, tool_ids) : undefined;

const wants_nothing = (ids: string[], tool_ids?: number[]) => ids.length === 0 || (tool_ids !== undefined && tool_ids.length === 0);

function create_sqlite_tools(db: Db): ToolStorage {
	return {
		async insert_ignore(specs) {
			return db.transaction(tx => {
				let created = 0;
				for (const spec of specs) {
					created += tx
						.insert(indexer_configuration)
						.values({ tool_name: spec.name, tool_version: spec.version, tool_configuration: spec.configuration })
						.onConflictDoNothing()
						.run().changes;
				}
				return created;
			});
		},

		async find_by_keys(specs) {
			return specs.flatMap(spec => {
				const row = db
					.select()
					.from(indexer_configuration)
					.where(
						and(
							eq(indexer_configuration.tool_name, spec.name),
							eq(indexer_configuration.tool_version, spec.version),
							eq(indexer_configuration.tool_configuration, spec.configuration)
						)
					)
					.get();
				return row ? [to_tool(row)] : [];
			});
		},

		async find_by_ids(ids) {
			if (ids.length === 0) return [];
			return db.select().from(indexer_configuration).where(inArray(indexer_configuration.id, ids)).all().map(to_tool);
		},
	};
}

/** Deletes by (object, tool) key, one statement per key inside a transaction. */
function remove_keys(db: Db, keys: FactKey[], remove_one: (tx: Db, key: FactKey) => number): number {
	return db.transaction(tx => keys.reduce((deleted, key) => deleted + remove_one(tx, key), 0));
}

function create_mimetype_storage(db: Db): FactStorage<ContentMimetypeRow> {
	const t = content_mimetype;
	return {
		async write(rows, policy) {
			return db.transaction(tx =>
				rows.reduce((affected, row) => {
					const insert = tx.insert(t).values(row);
					const result =
						policy === "skip"
							? insert.onConflictDoNothing().run()
							: insert
									.onConflictDoUpdate({
										target: [t.id, t.indexer_configuration_id],
										set: { mimetype: row.mimetype, encoding: row.encoding },
									})
									.run();
					return affected + result.changes;
				}, 0)
			);
		},
		async read(ids, tool_ids) {
			if (wants_nothing(ids, tool_ids)) return [];
			return db
				.select()
				.from(t)
				.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
				.all();
		},
		async remove(keys) {
			return remove_keys(db, keys, (tx, key) =>
				tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run().changes
			);
		},
	};
}

function create_content_metadata_storage(db: Db): FactStorage<ContentMetadataRow> {
	const t = content_metadata;
	return {
		async write(rows, policy) {
			return db.transaction(tx =>
				rows.reduce((affected, row) => {
					const insert = tx.insert(t).values(row);
					const result =
						policy === "skip"
							? insert.onConflictDoNothing().run()
							: insert.onConflictDoUpdate({ target: [t.id, t.indexer_configuration_id], set: { metadata: row.metadata } }).run();
					return affected + result.changes;
				}, 0)
			);
		},
		async read(ids, tool_ids) {
			if (wants_nothing(ids, tool_ids)) return [];
			return db
				.select()
				.from(t)
				.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
				.all();
		},
		async remove(keys) {
			return remove_keys(db, keys, (tx, key) =>
				tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run().changes
			);
		},
	};
}

function create_directory_storage(db: Db): FactStorage<DirectoryIntrinsicMetadataRow> {
	const t = directory_intrinsic_metadata;
	return {
		async write(rows, policy) {
			return db.transaction(tx =>
				rows.reduce((affected, row) => {
					const insert = tx.insert(t).values(row);
					const result =
						policy === "skip"
							? insert.onConflictDoNothing().run()
							: insert
									.onConflictDoUpdate({
										target: [t.id, t.indexer_configuration_id],
										set: { metadata: row.metadata, mappings: row.mappings },
									})
									.run();
					return affected + result.changes;
				}, 0)
			);
		},
		async read(ids, tool_ids) {
			if (wants_nothing(ids, tool_ids)) return [];
			return db
				.select()
				.from(t)
				.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
				.all();
		},
		async remove(keys) {
			return remove_keys(db, keys, (tx, key) =>
				tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run().changes
			);
		},
	};
}

/**
 * License facts reference the dictionary. Unknown names are inserted with
 * conflict-ignore and resolved in the same transaction as the fact rows.
 */
function create_license_storage(db: Db): FactStorage<ContentLicenseRow> {
	const t = content_fossology_license;

	const resolve_license = (tx: Db, name: string): number => {
		tx.insert(fossology_license).values({ name }).onConflictDoNothing().run();
		const row = tx.select({ id: fossology_license.id }).from(fossology_license).where(eq(fossology_license.name, name)).get();
		if (!row) throw new Error(`license ${name} missing from dictionary after insert`);
		return row.id;
	};

	return {
		async write(rows, policy) {
			return db.transaction(tx => {
				const ids = new Map<string, number>();
				let affected = 0;
				for (const row of rows) {
					const license_id = ids.get(row.license) ?? resolve_license(tx, row.license);
					ids.set(row.license, license_id);
					const changes = tx
						.insert(t)
						.values({ id: row.id, indexer_configuration_id: row.indexer_configuration_id, license_id })
						.onConflictDoNothing()
						.run().changes;
					affected += policy === "overwrite" ? 1 : changes;
				}
				return affected;
			});
		},
		async read(ids, tool_ids) {
			if (wants_nothing(ids, tool_ids)) return [];
			return db
				.select({ id: t.id, indexer_configuration_id: t.indexer_configuration_id, license: fossology_license.name })
				.from(t)
				.innerJoin(fossology_license, eq(t.license_id, fossology_license.id))
				.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
				.all();
		},
		async remove(keys) {
			return remove_keys(db, keys, (tx, key) =>
				tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run().changes
			);
		},
	};
}

const FtsHitSchema = z.object({
	id: z.string(),
	indexer_configuration_id: z.number().int(),
	score: z.number(),
});

/**
 * Keeps an FTS5 mirror of one origin table: `body` holds the lexemes of the
 * row's search vector in position order.
 */
function create_fts(fts_table: string) {
	const table = sql.identifier(fts_table);
	return {
		replace(tx: Db, row: { id: string; indexer_configuration_id: number; search_vector: Record<string, number[]> }) {
			tx.run(sql`DELETE FROM ${table} WHERE id = ${row.id} AND indexer_configuration_id = ${row.indexer_configuration_id}`);
			tx.run(
				sql`INSERT INTO ${table} (id, indexer_configuration_id, body) VALUES (${row.id}, ${row.indexer_configuration_id}, ${vector_text(row.search_vector)})`
			);
		},
		remove(tx: Db, key: FactKey) {
			tx.run(sql`DELETE FROM ${table} WHERE id = ${key.id} AND indexer_configuration_id = ${key.indexer_configuration_id}`);
		},
		hits(db: Db, tokens: string[], limit: number) {
			const rows = db.all(
				sql`SELECT id, indexer_configuration_id, -bm25(${table}) AS score FROM ${table}
				    WHERE ${table} MATCH ${to_match_expression(tokens)}
				    ORDER BY score DESC, id ASC, indexer_configuration_id ASC
				    LIMIT ${limit}`
			);
			return z.array(FtsHitSchema).parse(rows);
		},
	};
}

function join_hits<Row extends { id: string; indexer_configuration_id: number }>(
	hits: z.infer<typeof FtsHitSchema>[],
	rows: Row[]
): ScoredRow<Row>[] {
	const by_key = new Map(rows.map(row => [JSON.stringify([row.id, row.indexer_configuration_id]), row]));
	return hits
		.flatMap(hit => {
			const row = by_key.get(JSON.stringify([hit.id, hit.indexer_configuration_id]));
			return row ? [{ row, score: hit.score }] : [];
		})
		.sort(
			(a, b) =>
				b.score - a.score ||
				compare_tuples([a.row.id, a.row.indexer_configuration_id], [b.row.id, b.row.indexer_configuration_id])
		);
}

function create_origin_intrinsic_storage(db: Db): OriginIntrinsicStorage {
	const t = origin_intrinsic_metadata;
	const fts = create_fts("origin_intrinsic_metadata_fts");

	const read = async (ids: string[], tool_ids?: number[]) => {
		if (wants_nothing(ids, tool_ids)) return [];
		return db
			.select()
			.from(t)
			.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
			.all();
	};

	const mapping_filter = (mappings?: string[]) =>
		mappings
			? sql`EXISTS (SELECT 1 FROM json_each(${t.mappings}) WHERE json_each.value IN (${sql.join(
					mappings.map(m => sql`${m}`),
					sql`, `
				)}))`
			: undefined;

	return {
		async write(rows: OriginIntrinsicMetadataRow[], policy: ConflictPolicy) {
			return db.transaction(tx =>
				rows.reduce((affected, row) => {
					const insert = tx.insert(t).values(row);
					const changes =
						policy === "skip"
							? insert.onConflictDoNothing().run().changes
							: insert
									.onConflictDoUpdate({
										target: [t.id, t.indexer_configuration_id],
										set: {
											metadata: row.metadata,
											from_directory: row.from_directory,
											mappings: row.mappings,
											search_vector: row.search_vector,
										},
									})
									.run().changes;
					if (changes > 0) fts.replace(tx, row);
					return affected + changes;
				}, 0)
			);
		},

		read,

		async remove(keys) {
			return remove_keys(db, keys, (tx, key) => {
				fts.remove(tx, key);
				return tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run()
					.changes;
			});
		},

		async search(tokens, limit) {
			const hits = fts.hits(db, tokens, limit);
			return join_hits(hits, await read(Array.from(new Set(hits.map(h => h.id)))));
		},

		async scan_ids({ after, mappings, tool_ids, limit }: ScanOpts) {
			if (tool_ids && tool_ids.length === 0) return [];
			if (mappings && mappings.length === 0) return [];
			return db
				.selectDistinct({ id: t.id })
				.from(t)
				.where(
					and(
						after !== undefined ? gt(t.id, after) : undefined,
						tool_filter(t.indexer_configuration_id, tool_ids),
						mapping_filter(mappings)
					)
				)
				.orderBy(asc(t.id))
				.limit(limit)
				.all()
				.map(row => row.id);
		},

		async stats(): Promise<OriginMetadataStats> {
			const total = db.select({ n: count() }).from(t).get()?.n ?? 0;
			const non_empty = db.select({ n: count() }).from(t).where(ne(t.mappings, [])).get()?.n ?? 0;
			const grouped = z.array(z.object({ mapping: EcosystemSchema, n: z.number().int() })).parse(
				db.all(
					sql`SELECT json_each.value AS mapping, COUNT(*) AS n
					    FROM ${t}, json_each(${t.mappings})
					    GROUP BY json_each.value
					    ORDER BY json_each.value`
				)
			);
			const per_mapping: OriginMetadataStats["per_mapping"] = {};
			for (const { mapping, n } of grouped) per_mapping[mapping] = n;
			return { total, non_empty, per_mapping };
		},
	};
}

function create_origin_extrinsic_storage(db: Db): OriginFactStorage<OriginExtrinsicMetadataRow> {
	const t = origin_extrinsic_metadata;
	const fts = create_fts("origin_extrinsic_metadata_fts");

	const read = async (ids: string[], tool_ids?: number[]) => {
		if (wants_nothing(ids, tool_ids)) return [];
		return db
			.select()
			.from(t)
			.where(and(inArray(t.id, ids), tool_filter(t.indexer_configuration_id, tool_ids)))
			.all();
	};

	return {
		async write(rows, policy) {
			return db.transaction(tx =>
				rows.reduce((affected, row) => {
					const insert = tx.insert(t).values(row);
					const changes =
						policy === "skip"
							? insert.onConflictDoNothing().run().changes
							: insert
									.onConflictDoUpdate({
										target: [t.id, t.indexer_configuration_id],
										set: {
											metadata: row.metadata,
											from_remd_id: row.from_remd_id,
											mappings: row.mappings,
											search_vector: row.search_vector,
										},
									})
									.run().changes;
					if (changes > 0) fts.replace(tx, row);
					return affected + changes;
				}, 0)
			);
		},

		read,

		async remove(keys) {
			return remove_keys(db, keys, (tx, key) => {
				fts.remove(tx, key);
				return tx.delete(t).where(and(eq(t.id, key.id), eq(t.indexer_configuration_id, key.indexer_configuration_id))).run()
					.changes;
			});
		},

		async search(tokens, limit) {
			const hits = fts.hits(db, tokens, limit);
			return join_hits(hits, await read(Array.from(new Set(hits.map(h => h.id)))));
		},
	};
}

/**
 * Creates a SQLite storage backend.
 * @category Backends
 * @group Storage Backends
 *
 * Runs pending migrations on open. Writes are synchronous better-sqlite3
 * transactions, so a batch is applied entirely or not at all.
 *
 * @example
 * ```ts
 * const storage = create_sqlite_backend({ path: './indexer.db' })
 * const tool = unwrap(await storage.tools.register('npm-detector', '1.0', {}))
 * storage.close()
 * ```
 */
export function create_sqlite_backend(config: SqliteBackendConfig = {}): IndexerStorage {
	const owned = config.database === undefined;
	const sqlite = config.database ?? new Database(config.path ?? ":memory:");
	sqlite.pragma("foreign_keys = ON");
	migrate(sqlite);

	const db = drizzle(sqlite);
	const on_event = config.on_event;
	const emit = create_emitter(on_event);

	const storage = create_indexer_storage(
		{
			tools: create_sqlite_tools(db),
			content_mimetype: create_mimetype_storage(db),
			content_fossology_license: create_license_storage(db),
			content_metadata: create_content_metadata_storage(db),
			directory_intrinsic_metadata: create_directory_storage(db),
			origin_intrinsic_metadata: create_origin_intrinsic_storage(db),
			origin_extrinsic_metadata: create_origin_extrinsic_storage(db),
		},
		emit,
		{
			close: () => {
				if (owned) sqlite.close();
			},
		}
	);

	return { ...storage, on_event };
}
