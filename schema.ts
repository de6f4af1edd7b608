/**
 * @module Schema
 * @description Database schema definitions for Drizzle ORM.
 */

import { sqliteTable, text, integer, primaryKey, index, uniqueIndex } from 'drizzle-orm/sqlite-core'
import type { Ecosystem, MetadataDocument } from './mappings/types'
import type { SearchVector } from './types'

/**
 * Registered tools. The natural key is (name, version, canonical configuration JSON).
 *
 * @example
 * ```ts
 * import { drizzle } from 'drizzle-orm/better-sqlite3'
 * import { indexer_configuration } from './schema'
 *
 * const db = drizzle(new Database('indexer.db'))
 * const tools = db.select().from(indexer_configuration).all()
 * ```
 */
export const indexer_configuration = sqliteTable('indexer_configuration', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  tool_name: text('tool_name').notNull(),
  tool_version: text('tool_version').notNull(),
  tool_configuration: text('tool_configuration').notNull(),
}, (table) => ({
  natural_key: uniqueIndex('indexer_configuration_natural_key').on(table.tool_name, table.tool_version, table.tool_configuration),
}))

/** License dictionary: name to small integer id. */
export const fossology_license = sqliteTable('fossology_license', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
})

const tool_ref = () => integer('indexer_configuration_id').notNull().references(() => indexer_configuration.id)

export const content_mimetype = sqliteTable('content_mimetype', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  mimetype: text('mimetype').notNull(),
  encoding: text('encoding').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id] }),
}))

export const content_fossology_license = sqliteTable('content_fossology_license', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  license_id: integer('license_id').notNull().references(() => fossology_license.id),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id, table.license_id] }),
}))

export const content_metadata = sqliteTable('content_metadata', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  metadata: text('metadata', { mode: 'json' }).$type<MetadataDocument>().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id] }),
}))

export const directory_intrinsic_metadata = sqliteTable('directory_intrinsic_metadata', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  metadata: text('metadata', { mode: 'json' }).$type<MetadataDocument>().notNull(),
  mappings: text('mappings', { mode: 'json' }).$type<Ecosystem[]>().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id] }),
}))

/**
 * Origin-level intrinsic facts. `search_vector` is derived from `metadata` on
 * every write and mirrored into the `origin_intrinsic_metadata_fts` FTS5 table.
 */
export const origin_intrinsic_metadata = sqliteTable('origin_intrinsic_metadata', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  metadata: text('metadata', { mode: 'json' }).$type<MetadataDocument>().notNull(),
  from_directory: text('from_directory').notNull(),
  mappings: text('mappings', { mode: 'json' }).$type<Ecosystem[]>().notNull(),
  search_vector: text('search_vector', { mode: 'json' }).$type<SearchVector>().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id] }),
  tool_idx: index('idx_origin_intrinsic_tool').on(table.indexer_configuration_id),
}))

export const origin_extrinsic_metadata = sqliteTable('origin_extrinsic_metadata', {
  id: text('id').notNull(),
  indexer_configuration_id: tool_ref(),
  metadata: text('metadata', { mode: 'json' }).$type<MetadataDocument>().notNull(),
  from_remd_id: text('from_remd_id').notNull(),
  mappings: text('mappings', { mode: 'json' }).$type<Ecosystem[]>().notNull(),
  search_vector: text('search_vector', { mode: 'json' }).$type<SearchVector>().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.id, table.indexer_configuration_id] }),
}))

/** Applied schema migrations, one row per version. */
export const dbversion = sqliteTable('dbversion', {
  version: integer('version').primaryKey(),
  release: text('release').notNull(),
  description: text('description').notNull(),
})

export type IndexerConfigurationRow = typeof indexer_configuration.$inferSelect
export type DbVersionRow = typeof dbversion.$inferSelect
