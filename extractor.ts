/**
 * @module DirectoryExtractor
 * @description Detects metadata files in one directory level, translates them, and stores the merged directory fact.
 */

import type {
	ConflictPolicy,
	DirectoryIntrinsicMetadataRow,
	EventHandler,
	IndexerError,
	IndexerStorage,
	Result,
	Tool,
} from "./types";
import { ok, err } from "./types";
import type { GraphStorage, DirectoryEntry } from "./archive";
import type { Ecosystem, IntrinsicEcosystem, MetadataDocument } from "./mappings/types";
import { DEFAULT_FILENAME_REGISTRY, type FilenameRegistry } from "./mappings/registry";
import { translate, is_non_empty } from "./translator";
import { guard_storage } from "./result";
import { parallel_map } from "./concurrency";
import { compare_strings, create_emitter, unique } from "./utils";

export type SkippedFile = {
	name: string;
	content_id: string;
	ecosystem: IntrinsicEcosystem;
	error: IndexerError;
};

export type Extraction = {
	fact: DirectoryIntrinsicMetadataRow;
	skipped: SkippedFile[];
	/** Files whose stored content fact was reused instead of re-translating. */
	reused: string[];
	translated: string[];
};

export type ExtractOpts = {
	policy?: ConflictPolicy;
};

export type DirectoryExtractor = {
	extract: (directory_id: string, opts?: ExtractOpts) => Promise<Result<Extraction>>;
};

export type DirectoryExtractorConfig = {
	graph: GraphStorage;
	storage: IndexerStorage;
	/** Tool attributed to per-file content metadata facts. */
	content_tool: Tool;
	/** Tool attributed to the merged directory fact. */
	directory_tool: Tool;
	filenames?: FilenameRegistry;
	concurrency?: number;
	on_event?: EventHandler;
};

type FileOutcome =
	| { kind: "document"; name: string; ecosystem: Ecosystem; document: MetadataDocument; reused: boolean }
	| { kind: "skipped"; file: SkippedFile };

type Match = { entry: DirectoryEntry; ecosystem: IntrinsicEcosystem };

/**
 * Merges per-file documents in the given order; a later file's term replaces
 * an earlier one. `mappings` lists each ecosystem with a non-empty document
 * once, in first-seen order.
 *
 * @example
 * ```ts
 * merge_documents([
 *   { ecosystem: 'codemeta', document: { name: 'a', version: '1' } },
 *   { ecosystem: 'npm', document: { name: 'b' } },
 * ])
 * // => { metadata: { name: 'b', version: '1' }, mappings: ['codemeta', 'npm'] }
 * ```
 */
export function merge_documents(documents: ReadonlyArray<{ ecosystem: Ecosystem; document: MetadataDocument }>): {
	metadata: MetadataDocument;
	mappings: Ecosystem[];
} {
	const metadata: MetadataDocument = {};
	const mappings: Ecosystem[] = [];
	for (const { ecosystem, document } of documents) {
		if (!is_non_empty(document)) continue;
		Object.assign(metadata, document);
		mappings.push(ecosystem);
	}
	return { metadata, mappings: unique(mappings) };
}

export function create_directory_extractor(config: DirectoryExtractorConfig): DirectoryExtractor {
	const { graph, storage, content_tool, directory_tool } = config;
	const filenames = config.filenames ?? DEFAULT_FILENAME_REGISTRY;
	const concurrency = config.concurrency ?? 4;
	const emit = create_emitter(config.on_event);

	async function process_file(match: Match, policy: ConflictPolicy): Promise<Result<FileOutcome>> {
		const { entry, ecosystem } = match;
		const content_id = entry.target;

		if (policy === "skip") {
			const existing = await storage.content_metadata.get([content_id], { tool_ids: [content_tool.id] });
			if (!existing.ok) return existing;
			const [fact] = existing.value;
			if (fact) {
				emit({ type: "content_translated", content_id, ecosystem, reused: true });
				return ok({ kind: "document", name: entry.name, ecosystem, document: fact.metadata, reused: true });
			}
		}

		const bytes = await guard_storage("graph.get_blob", () => graph.get_blob(content_id));
		if (!bytes.ok) return bytes;
		if (!bytes.value) {
			const error: IndexerError = { kind: "not_found", object_type: "content", id: content_id };
			emit({ type: "translation_skipped", content_id, ecosystem, error });
			return ok({ kind: "skipped", file: { name: entry.name, content_id, ecosystem, error } });
		}

		const document = translate(bytes.value, ecosystem);
		if (!document.ok) {
			emit({ type: "translation_skipped", content_id, ecosystem, error: document.error });
			return ok({ kind: "skipped", file: { name: entry.name, content_id, ecosystem, error: document.error } });
		}

		const stored = await storage.content_metadata.add(
			[{ id: content_id, indexer_configuration_id: content_tool.id, metadata: document.value }],
			{ policy }
		);
		if (!stored.ok) return stored;
		const [rejection] = stored.value.rejected;
		if (rejection) return err(rejection.error);

		emit({ type: "content_translated", content_id, ecosystem, reused: false });
		return ok({ kind: "document", name: entry.name, ecosystem, document: document.value, reused: false });
	}

	return {
		/**
		 * Indexes one directory level. Matches are processed concurrently but
		 * merged in filename order, so the result does not depend on timing.
		 */
		async extract(directory_id, opts): Promise<Result<Extraction>> {
			const policy = opts?.policy ?? "skip";

			const entries = await guard_storage("graph.get_directory_entries", () => graph.get_directory_entries(directory_id));
			if (!entries.ok) return entries;
			if (!entries.value) return err({ kind: "not_found", object_type: "directory", id: directory_id });

			const matches = entries.value
				.flatMap((entry): Match[] => {
					if (entry.type !== "file") return [];
					const ecosystem = filenames.match(entry.name);
					return ecosystem ? [{ entry, ecosystem }] : [];
				})
				.sort((a, b) => compare_strings(a.entry.name, b.entry.name));

			const outcomes = await parallel_map(matches, match => process_file(match, policy), concurrency);

			const documents: Array<{ ecosystem: Ecosystem; document: MetadataDocument }> = [];
			const skipped: SkippedFile[] = [];
			const reused: string[] = [];
			const translated: string[] = [];
			for (const outcome of outcomes) {
				if (!outcome.ok) return outcome;
				const value = outcome.value;
				if (value.kind === "skipped") {
					skipped.push(value.file);
					continue;
				}
				documents.push({ ecosystem: value.ecosystem, document: value.document });
				(value.reused ? reused : translated).push(value.name);
			}

			const { metadata, mappings } = merge_documents(documents);
			const fact: DirectoryIntrinsicMetadataRow = {
				id: directory_id,
				indexer_configuration_id: directory_tool.id,
				metadata,
				mappings,
			};

			const stored = await storage.directory_intrinsic_metadata.add([fact], { policy });
			if (!stored.ok) return stored;
			const [rejection] = stored.value.rejected;
			if (rejection) return err(rejection.error);

			emit({ type: "directory_indexed", directory_id, tool_id: directory_tool.id, mappings });
			return ok({ fact, skipped, reused, translated });
		},
	};
}
