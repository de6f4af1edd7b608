/**
 * @module Types
 * @description Type definitions for the metadata indexing core.
 */

import type { Ecosystem, MetadataDocument } from './mappings/types'

/**
 * Error types that can occur during indexing operations.
 * @category Types
 * @group Error Types
 *
 * Uses discriminated unions for type-safe error handling via the `kind` field:
 * - `referential_integrity` - A fact names a tool that is not registered
 * - `no_canonical_branch` - An origin has no resolvable head
 * - `parse_error` - A metadata file could not be parsed for its ecosystem
 * - `unsupported_format` - No mapping handles the requested format
 * - `authority_mismatch` - Extrinsic metadata was declared by a foreign authority
 * - `storage_error` - Backend or collaborator failure (transient, retried by the transport)
 * - `not_found` - A referenced archive object does not exist
 * - `validation_error` - An entry or configuration failed schema validation
 * - `invalid_transition` - The run state machine refused an event
 * - `invalid_config` - Configuration error during setup
 *
 * @example
 * ```ts
 * const result = await resolver.resolve_head('https://example.org/repo.git')
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case 'no_canonical_branch':
 *       console.log(`No head for ${result.error.origin}: ${result.error.reason}`)
 *       break
 *     case 'storage_error':
 *       console.log(`Storage failed during ${result.error.operation}:`, result.error.cause)
 *       break
 *   }
 * }
 * ```
 */
export type IndexerError =
  | { kind: 'referential_integrity'; table: FactTable; object_id: string; tool_id: number }
  | { kind: 'no_canonical_branch'; origin: string; reason: string }
  | { kind: 'parse_error'; ecosystem: Ecosystem; cause: Error }
  | { kind: 'unsupported_format'; format: string }
  | { kind: 'authority_mismatch'; origin: string; authority: MetadataAuthority }
  | { kind: 'storage_error'; cause: Error; operation: string }
  | { kind: 'not_found'; object_type: ObjectType; id: string }
  | { kind: 'validation_error'; cause: Error; message: string }
  | { kind: 'invalid_transition'; from: RunState; event: RunEvent['type'] }
  | { kind: 'invalid_config'; message: string }

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = IndexerError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 *
 * @category Core
 * @group Result Helpers
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 *
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

export type ObjectType = 'content' | 'directory' | 'revision' | 'release' | 'snapshot' | 'origin'

export type FactTable =
  | 'content_mimetype'
  | 'content_fossology_license'
  | 'content_metadata'
  | 'directory_intrinsic_metadata'
  | 'origin_intrinsic_metadata'
  | 'origin_extrinsic_metadata'

export type ConflictPolicy = 'skip' | 'overwrite'

export type IndexerEvent =
  | { type: 'tool_register'; requested: number; created: number }
  | { type: 'fact_get'; table: FactTable; requested: number; found: number }
  | { type: 'fact_add'; table: FactTable; policy: ConflictPolicy; affected: number; rejected: number }
  | { type: 'fact_delete'; table: FactTable; deleted: number }
  | { type: 'content_translated'; content_id: string; ecosystem: Ecosystem; reused: boolean }
  | { type: 'translation_skipped'; content_id: string; ecosystem: Ecosystem; error: IndexerError }
  | { type: 'directory_indexed'; directory_id: string; tool_id: number; mappings: Ecosystem[] }
  | { type: 'origin_aggregated'; origin: string; tool_id: number; extrinsic: boolean; provenance: string }
  | { type: 'extrinsic_dropped'; origin: string; remd_id: string; reason: string }
  | { type: 'run_transition'; origin: string; run_id: string; from: RunState; to: RunState }
  | { type: 'task_scheduled'; stage: Stage; origin: string }
  | { type: 'task_failed'; stage: Stage; origin: string; object_id: string | null; tool_id: number | null; error: IndexerError }

export type EventHandler = (event: IndexerEvent) => void

/**
 * A registered extraction or detection procedure. Every fact is attributed to one.
 *
 * `configuration` is free-form; two tools differ when any key or value of it
 * differs, regardless of key order.
 *
 * @category Types
 * @group Tool Types
 */
export type Tool = {
  id: number
  name: string
  version: string
  configuration: Record<string, unknown>
}

export type ToolSpec = Omit<Tool, 'id'>

/** Base shape shared by every stored fact: object key plus producing tool. */
export type FactRow = {
  id: string
  indexer_configuration_id: number
}

export type ContentMimetypeRow = FactRow & {
  mimetype: string
  encoding: string
}

export type ContentLicenseRow = FactRow & {
  license: string
}

export type ContentMetadataRow = FactRow & {
  metadata: MetadataDocument
}

export type DirectoryIntrinsicMetadataRow = FactRow & {
  metadata: MetadataDocument
  mappings: Ecosystem[]
}

/**
 * Lexeme to positions, as produced by `compute_search_vector`.
 * @category Types
 * @group Search Types
 */
export type SearchVector = Record<string, number[]>

export type OriginIntrinsicMetadataRow = FactRow & {
  metadata: MetadataDocument
  from_directory: string
  mappings: Ecosystem[]
  search_vector: SearchVector
}

export type OriginExtrinsicMetadataRow = FactRow & {
  metadata: MetadataDocument
  from_remd_id: string
  mappings: Ecosystem[]
  search_vector: SearchVector
}

/** What callers pass to `add`: search vectors are always computed by the store. */
export type OriginIntrinsicMetadataEntry = Omit<OriginIntrinsicMetadataRow, 'search_vector'>
export type OriginExtrinsicMetadataEntry = Omit<OriginExtrinsicMetadataRow, 'search_vector'>

export type WithTool<Row extends FactRow> = Row & { tool: Tool }

export type FactKey = { id: string; indexer_configuration_id: number }

export type AddOpts = { policy?: ConflictPolicy }

export type GetOpts = { tool_ids?: number[] }

export type RejectedEntry = { index: number; error: IndexerError }

/**
 * Outcome of a bulk `add`.
 *
 * `affected` counts keys inserted or overwritten; rejected entries never abort
 * the rest of the batch.
 */
export type AddSummary = {
  affected: number
  rejected: RejectedEntry[]
}

/**
 * Client for one fact kind.
 *
 * - `add(entries, opts?)` - Validate, sort, deduplicate and upsert in one transaction
 * - `get(ids, opts?)` - Bulk lookup, rows joined with their tool
 * - `missing(keys)` - Object ids with no fact for the given tool
 * - `delete(keys)` - Remove facts by (object, tool)
 *
 * @category Types
 * @group Fact Types
 */
export type FactClient<Entry extends FactRow, Row extends FactRow = Entry> = {
  readonly table: FactTable
  add: (entries: Entry[], opts?: AddOpts) => Promise<Result<AddSummary>>
  get: (ids: string[], opts?: GetOpts) => Promise<Result<WithTool<Row>[]>>
  missing: (keys: FactKey[]) => Promise<Result<string[]>>
  delete: (keys: FactKey[]) => Promise<Result<number>>
}

export type SearchHit<Row extends FactRow> = WithTool<Row> & { score: number }

export type SearchOpts = { limit?: number }

export type ProducerQuery = {
  mappings?: Ecosystem[]
  tool_ids?: number[]
  page_token?: string
  limit?: number
  ids_only?: boolean
}

export type ProducerPage<Row extends FactRow> = {
  origins: WithTool<Row>[] | string[]
  next_page_token: string | null
}

export type OriginMetadataStats = {
  total: number
  non_empty: number
  per_mapping: Partial<Record<Ecosystem, number>>
}

export type OriginFactClient<Entry extends FactRow, Row extends FactRow> = FactClient<Entry, Row> & {
  search_fulltext: (query: string, opts?: SearchOpts) => Promise<Result<SearchHit<Row>[]>>
}

export type OriginIntrinsicClient = OriginFactClient<OriginIntrinsicMetadataEntry, OriginIntrinsicMetadataRow> & {
  search_by_producer: (query?: ProducerQuery) => Promise<Result<ProducerPage<OriginIntrinsicMetadataRow>>>
  stats: () => Promise<Result<OriginMetadataStats>>
}

export type ToolRegistry = {
  register: (name: string, version: string, configuration: Record<string, unknown>) => Promise<Result<Tool>>
  add: (specs: ToolSpec[]) => Promise<Result<Tool[]>>
  get: (spec: ToolSpec) => Promise<Result<Tool | null>>
  get_by_ids: (ids: number[]) => Promise<Result<Tool[]>>
}

/**
 * Everything the indexing core persists.
 *
 * Built-in backends:
 * - `create_memory_backend()` - In-memory, ephemeral storage
 * - `create_sqlite_backend()` - SQLite through drizzle-orm, FTS5 full-text search
 *
 * @category Types
 * @group Backend Types
 */
export type IndexerStorage = {
  tools: ToolRegistry
  content_mimetype: FactClient<ContentMimetypeRow>
  content_fossology_license: FactClient<ContentLicenseRow>
  content_metadata: FactClient<ContentMetadataRow>
  directory_intrinsic_metadata: FactClient<DirectoryIntrinsicMetadataRow>
  origin_intrinsic_metadata: OriginIntrinsicClient
  origin_extrinsic_metadata: OriginFactClient<OriginExtrinsicMetadataEntry, OriginExtrinsicMetadataRow>
  on_event?: EventHandler
  close: () => void
}

/**
 * Who asserted a piece of extrinsic metadata.
 *
 * `forge` and `registry` authorities are only trusted for origins they host,
 * `deposit_client` only for deposit formats.
 */
export type MetadataAuthority = {
  type: 'forge' | 'registry' | 'deposit_client'
  url: string
}

export type RawExtrinsicMetadata = {
  id: string
  target: string
  authority: MetadataAuthority
  format: string
  metadata: Uint8Array
}

export type RunState = 'pending' | 'head_resolved' | 'directory_indexed' | 'origin_aggregated' | 'done' | 'failed'

export type Stage = 'resolve_head' | 'index_directory' | 'aggregate_origin' | 'aggregate_extrinsic'

export type OriginRun = {
  run_id: string
  origin: string
  state: RunState
  policy: ConflictPolicy
  directory_id?: string
  tool_id?: number
  error?: IndexerError
}

export type RunEvent =
  | { type: 'head_resolved'; directory_id: string }
  | { type: 'directory_indexed'; tool_id: number }
  | { type: 'origin_aggregated' }
  | { type: 'completed' }
  | { type: 'failed'; error: IndexerError }
  | { type: 'restart' }

export type PropagationHints = {
  head_of_origin?: string
}

export type Task =
  | { stage: 'resolve_head'; run: OriginRun }
  | { stage: 'index_directory'; run: OriginRun; directory_id: string; hints: PropagationHints }
  | { stage: 'aggregate_origin'; run: OriginRun; directory_id: string; tool_id: number; hints: PropagationHints }
  | { stage: 'aggregate_extrinsic'; record: RawExtrinsicMetadata; policy: ConflictPolicy }

export type Scheduler = {
  schedule: (task: Task) => Promise<Result<void>>
}
