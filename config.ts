/**
 * @module Config
 * @description Environment configuration, backend construction and tool registration.
 */

import { z } from 'zod'
import type { EventHandler, IndexerStorage, Result, ToolRegistry, ToolSpec, ConflictPolicy } from './types'
import { ok, err } from './types'
import { INTRINSIC_ECOSYSTEMS, type IntrinsicEcosystem } from './mappings/types'
import { DEFAULT_FILENAME_REGISTRY, DEPOSIT_FORMATS, EXTRINSIC_MAPPINGS, create_filename_registry, type FilenameRegistry } from './mappings/registry'
import { DEFAULT_BRANCH_NAMES } from './head'
import type { DispatcherTools } from './dispatcher'
import { create_memory_backend } from './backend/memory'
import { create_sqlite_backend } from './backend/sqlite'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export type ToolRole = keyof DispatcherTools

export const DEFAULT_TOOL_SPECS: Readonly<Record<ToolRole, ToolSpec>> = {
  content: {
    name: 'content-metadata-translator',
    version: '1.0.0',
    configuration: { type: 'local', ecosystems: [...INTRINSIC_ECOSYSTEMS] },
  },
  directory: {
    name: 'directory-metadata-extractor',
    version: '1.0.0',
    configuration: { type: 'local', filenames: DEFAULT_FILENAME_REGISTRY.patterns.map(([pattern]) => pattern) },
  },
  extrinsic: {
    name: 'extrinsic-metadata-translator',
    version: '1.0.0',
    configuration: { formats: EXTRINSIC_MAPPINGS.flatMap(mapping => mapping.formats), deposit_formats: [...DEPOSIT_FORMATS] },
  },
}

export type IndexerConfig = {
  storage: { kind: 'memory' } | { kind: 'sqlite'; path: string }
  log_level: LogLevel
  conflict_policy: ConflictPolicy
  translate_concurrency: number
  head_branches: string[]
  filenames: FilenameRegistry
  tools: Record<ToolRole, ToolSpec>
}

const list = (value: string): string[] =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)

const IntrinsicEcosystemSchema = z.enum(INTRINSIC_ECOSYSTEMS)

const FilenamePairSchema = z
  .string()
  .regex(/^[^=]+=[^=]+$/, 'expected name=ecosystem')
  .transform(pair => pair.split('=').map(part => part.trim()))
  .pipe(z.tuple([z.string().min(1), IntrinsicEcosystemSchema]))

/** `name@version`; the version may not be empty. */
const ToolOverrideSchema = z
  .string()
  .regex(/^[^@]+@[^@]+$/, 'expected name@version')
  .transform(value => {
    const [name = '', version = ''] = value.split('@')
    return { name: name.trim(), version: version.trim() }
  })

const EnvSchema = z.object({
  INDEXER_STORAGE: z.enum(['memory', 'sqlite']).default('memory'),
  INDEXER_SQLITE_PATH: z.string().min(1).default('indexer.db'),
  INDEXER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  INDEXER_CONFLICT_POLICY: z.enum(['skip', 'overwrite']).default('skip'),
  INDEXER_TRANSLATE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  INDEXER_HEAD_BRANCHES: z.string().transform(list).pipe(z.array(z.string()).min(1)).optional(),
  INDEXER_METADATA_FILENAMES: z.string().transform(list).pipe(z.array(FilenamePairSchema)).optional(),
  INDEXER_CONTENT_TOOL: ToolOverrideSchema.optional(),
  INDEXER_DIRECTORY_TOOL: ToolOverrideSchema.optional(),
  INDEXER_EXTRINSIC_TOOL: ToolOverrideSchema.optional(),
})

const with_override = (spec: ToolSpec, override?: { name: string; version: string }): ToolSpec =>
  override ? { ...spec, ...override } : { ...spec }

/**
 * Reads `INDEXER_*` variables into an {@link IndexerConfig}. Unset variables
 * take their defaults; malformed ones produce `invalid_config` naming every
 * offending variable.
 *
 * @example
 * ```ts
 * const config = load_config({
 *   INDEXER_STORAGE: 'sqlite',
 *   INDEXER_SQLITE_PATH: './indexer.db',
 *   INDEXER_METADATA_FILENAMES: 'package.json=npm,META.json=codemeta',
 * })
 * ```
 */
export function load_config(env: Record<string, string | undefined> = process.env): Result<IndexerConfig> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    return err({ kind: 'invalid_config', message })
  }

  const vars = parsed.data
  const pairs: Array<readonly [string, IntrinsicEcosystem]> = vars.INDEXER_METADATA_FILENAMES ?? []

  return ok({
    storage: vars.INDEXER_STORAGE === 'sqlite' ? { kind: 'sqlite', path: vars.INDEXER_SQLITE_PATH } : { kind: 'memory' },
    log_level: vars.INDEXER_LOG_LEVEL,
    conflict_policy: vars.INDEXER_CONFLICT_POLICY,
    translate_concurrency: vars.INDEXER_TRANSLATE_CONCURRENCY,
    head_branches: vars.INDEXER_HEAD_BRANCHES ?? [...DEFAULT_BRANCH_NAMES],
    filenames: create_filename_registry(pairs),
    tools: {
      content: with_override(DEFAULT_TOOL_SPECS.content, vars.INDEXER_CONTENT_TOOL),
      directory: with_override(DEFAULT_TOOL_SPECS.directory, vars.INDEXER_DIRECTORY_TOOL),
      extrinsic: with_override(DEFAULT_TOOL_SPECS.extrinsic, vars.INDEXER_EXTRINSIC_TOOL),
    },
  })
}

export function create_backend(config: IndexerConfig, on_event?: EventHandler): IndexerStorage {
  switch (config.storage.kind) {
    case 'memory':
      return create_memory_backend({ on_event })
    case 'sqlite':
      return create_sqlite_backend({ path: config.storage.path, on_event })
  }
}

/**
 * Registers the three pipeline tools in one batch, returning them by role.
 * Registering the same specs again yields the same ids.
 */
export async function register_tools(registry: ToolRegistry, specs: Record<ToolRole, ToolSpec> = DEFAULT_TOOL_SPECS): Promise<Result<DispatcherTools>> {
  const registered = await registry.add([specs.content, specs.directory, specs.extrinsic])
  if (!registered.ok) return registered

  const [content, directory, extrinsic] = registered.value
  if (!content || !directory || !extrinsic) {
    return err({ kind: 'invalid_config', message: 'tool registration returned fewer tools than requested' })
  }
  return ok({ content, directory, extrinsic })
}
