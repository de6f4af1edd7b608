export { create_memory_backend, type MemoryBackendOptions } from "./backend/memory";
export { create_sqlite_backend, type SqliteBackendConfig } from "./backend/sqlite";

export { create_head_resolver, archive_version, DEFAULT_BRANCH_NAMES, type Head, type HeadResolver, type HeadResolverConfig } from "./head";
export {
	create_directory_extractor,
	merge_documents,
	type DirectoryExtractor,
	type DirectoryExtractorConfig,
	type Extraction,
	type ExtractOpts,
	type SkippedFile,
} from "./extractor";
export {
	create_origin_aggregator,
	is_authoritative,
	type AggregatedFact,
	type AggregationSource,
	type OriginAggregator,
	type OriginAggregatorConfig,
} from "./aggregator";
export {
	create_dispatcher,
	transition,
	type Dispatcher,
	type DispatcherConfig,
	type DispatcherTools,
	type StartOpts,
} from "./dispatcher";
export { create_memory_queue, type MemoryQueue, type MemoryQueueOpts, type DrainReport, type TaskHandler } from "./queue";
export { create_memory_archive, type GraphStorage, type MemoryArchive, type DirectoryEntry, type Revision, type Release, type Branch, type Snapshot } from "./archive";

export { translate, translate_extrinsic, is_non_empty } from "./translator";
export { compute_search_vector, parse_query, tokenize } from "./search";

export { load_config, create_backend, register_tools, DEFAULT_TOOL_SPECS, LOG_LEVELS, type IndexerConfig, type LogLevel, type ToolRole } from "./config";
export { create_indexer, type Indexer, type IndexerDeps } from "./indexer";
export { create_logger, create_event_logger, type Logger, type LoggerOpts, type LogSink } from "./logger";

export { MIGRATIONS, SCHEMA_VERSION, migrate, read_schema_version, type Migration } from "./migrations";

export { compute_hash, canonical_json, generate_run_id } from "./utils";

export type {
	IndexerError,
	Result,
	IndexerEvent,
	EventHandler,
	Tool,
	ToolSpec,
	ToolRegistry,
	FactTable,
	FactRow,
	FactKey,
	ConflictPolicy,
	AddOpts,
	AddSummary,
	GetOpts,
	RejectedEntry,
	WithTool,
	FactClient,
	OriginFactClient,
	OriginIntrinsicClient,
	SearchHit,
	SearchOpts,
	SearchVector,
	ProducerQuery,
	ProducerPage,
	OriginMetadataStats,
	ContentMimetypeRow,
	ContentLicenseRow,
	ContentMetadataRow,
	DirectoryIntrinsicMetadataRow,
	OriginIntrinsicMetadataRow,
	OriginIntrinsicMetadataEntry,
	OriginExtrinsicMetadataRow,
	OriginExtrinsicMetadataEntry,
	IndexerStorage,
	MetadataAuthority,
	RawExtrinsicMetadata,
	OriginRun,
	RunState,
	RunEvent,
	Stage,
	Task,
	Scheduler,
	PropagationHints,
} from "./types";

export { ok, err } from "./types";

export {
	match,
	unwrap_or,
	unwrap,
	unwrap_err,
	try_catch,
	try_catch_async,
	to_nullable,
	format_error,
	describe_error,
} from "./result";

export { Semaphore, parallel_map } from "./concurrency";

export * from "./mappings";
