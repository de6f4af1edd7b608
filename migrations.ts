/**
 * @module Migrations
 * @description Forward-only schema migrations for the SQLite backend.
 */

import type Database from 'better-sqlite3'

export type Migration = {
  version: number
  description: string
  sql: string
}

/**
 * Migrations in version order. Each is applied in its own transaction together
 * with its `dbversion` row; applied versions are never run again.
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'tools, license dictionary and fact tables',
    sql: `
CREATE TABLE IF NOT EXISTS indexer_configuration (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  tool_name TEXT NOT NULL,
  tool_version TEXT NOT NULL,
  tool_configuration TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS indexer_configuration_natural_key
  ON indexer_configuration(tool_name, tool_version, tool_configuration);

CREATE TABLE IF NOT EXISTS fossology_license (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS content_mimetype (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  mimetype TEXT NOT NULL,
  encoding TEXT NOT NULL,
  PRIMARY KEY (id, indexer_configuration_id)
);

CREATE TABLE IF NOT EXISTS content_fossology_license (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  license_id INTEGER NOT NULL REFERENCES fossology_license(id),
  PRIMARY KEY (id, indexer_configuration_id, license_id)
);

CREATE TABLE IF NOT EXISTS content_metadata (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  metadata TEXT NOT NULL,
  PRIMARY KEY (id, indexer_configuration_id)
);

CREATE TABLE IF NOT EXISTS directory_intrinsic_metadata (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  metadata TEXT NOT NULL,
  mappings TEXT NOT NULL,
  PRIMARY KEY (id, indexer_configuration_id)
);

CREATE TABLE IF NOT EXISTS origin_intrinsic_metadata (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  metadata TEXT NOT NULL,
  from_directory TEXT NOT NULL,
  mappings TEXT NOT NULL,
  search_vector TEXT NOT NULL,
  PRIMARY KEY (id, indexer_configuration_id)
);
CREATE INDEX IF NOT EXISTS idx_origin_intrinsic_tool ON origin_intrinsic_metadata(indexer_configuration_id);

CREATE TABLE IF NOT EXISTS origin_extrinsic_metadata (
  id TEXT NOT NULL,
  indexer_configuration_id INTEGER NOT NULL REFERENCES indexer_configuration(id),
  metadata TEXT NOT NULL,
  from_remd_id TEXT NOT NULL,
  mappings TEXT NOT NULL,
  search_vector TEXT NOT NULL,
  PRIMARY KEY (id, indexer_configuration_id)
);
`,
  },
  {
    version: 2,
    description: 'full-text search over origin metadata',
    sql: `
CREATE VIRTUAL TABLE IF NOT EXISTS origin_intrinsic_metadata_fts USING fts5(
  id UNINDEXED,
  indexer_configuration_id UNINDEXED,
  body,
  tokenize = 'unicode61 remove_diacritics 0'
);
CREATE VIRTUAL TABLE IF NOT EXISTS origin_extrinsic_metadata_fts USING fts5(
  id UNINDEXED,
  indexer_configuration_id UNINDEXED,
  body,
  tokenize = 'unicode61 remove_diacritics 0'
);
`,
  },
]

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0

const DBVERSION_SQL = `
CREATE TABLE IF NOT EXISTS dbversion (
  version INTEGER PRIMARY KEY,
  release TEXT NOT NULL,
  description TEXT NOT NULL
);
`

/** Highest applied migration version, 0 for a fresh database. */
export const read_schema_version = (db: Database.Database): number => {
  db.exec(DBVERSION_SQL)
  const value = db.prepare('SELECT MAX(version) FROM dbversion').pluck().get()
  return typeof value === 'number' ? value : 0
}

/**
 * Brings a database up to `SCHEMA_VERSION`. Returns the versions applied by
 * this call; running it again on a migrated database applies nothing.
 */
export function migrate(db: Database.Database): number[] {
  const from = read_schema_version(db)
  const pending = MIGRATIONS.filter(migration => migration.version > from)
  const record = db.prepare('INSERT INTO dbversion (version, release, description) VALUES (?, ?, ?)')

  const apply = db.transaction((migration: Migration) => {
    db.exec(migration.sql)
    record.run(migration.version, new Date().toISOString(), migration.description)
  })

  for (const migration of pending) apply(migration)
  return pending.map(migration => migration.version)
}
