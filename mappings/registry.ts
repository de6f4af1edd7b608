/**
 * @module MappingRegistry
 * @description Lookup tables from ecosystem, filename and extrinsic format to mapping.
 */

import type { Ecosystem, ExtrinsicMappingDef, IntrinsicEcosystem, IntrinsicMappingDef, MappingDef } from './types'
import { npm } from './npm'
import { maven } from './maven'
import { pkg_info } from './pkg-info'
import { composer } from './composer'
import { codemeta, json_sword_codemeta, sword_codemeta } from './codemeta'
import { pubspec } from './pubspec'
import { cff } from './cff'
import { gemspec } from './gemspec'
import { nuget } from './nuget'
import { github, gitea } from './forges'

export const INTRINSIC_MAPPINGS: readonly IntrinsicMappingDef[] = [npm, maven, pkg_info, composer, codemeta, pubspec, cff, gemspec, nuget]

export const EXTRINSIC_MAPPINGS: readonly ExtrinsicMappingDef[] = [github, gitea, json_sword_codemeta, sword_codemeta]

const BY_ECOSYSTEM: ReadonlyMap<Ecosystem, MappingDef> = new Map<Ecosystem, MappingDef>(
  [...INTRINSIC_MAPPINGS, ...EXTRINSIC_MAPPINGS].map(def => [def.ecosystem, def])
)

const BY_FORMAT: ReadonlyMap<string, ExtrinsicMappingDef> = new Map(
  EXTRINSIC_MAPPINGS.flatMap(def => def.formats.map(format => [format, def] as const))
)

/**
 * Filename to ecosystem table used by the directory extractor. A pattern is
 * either an exact, case-sensitive name or `*.suffix`. Exact names win over
 * suffixes, suffixes are tried in declaration order, and a repeated exact
 * name keeps its last ecosystem.
 */
export type FilenameRegistry = {
  patterns: ReadonlyArray<readonly [string, IntrinsicEcosystem]>
  match: (name: string) => IntrinsicEcosystem | undefined
}

const build_registry = (patterns: ReadonlyArray<readonly [string, IntrinsicEcosystem]>): FilenameRegistry => {
  const exact = new Map<string, IntrinsicEcosystem>()
  const suffixes: Array<readonly [string, IntrinsicEcosystem]> = []
  for (const [pattern, ecosystem] of patterns) {
    if (pattern.startsWith('*')) suffixes.push([pattern.slice(1), ecosystem])
    else exact.set(pattern, ecosystem)
  }
  return {
    patterns,
    match: name => exact.get(name) ?? suffixes.find(([suffix]) => name.endsWith(suffix))?.[1],
  }
}

export const DEFAULT_FILENAME_REGISTRY: FilenameRegistry = build_registry(
  INTRINSIC_MAPPINGS.map(def => [def.filename, def.ecosystem] as const)
)

/** Formats whose records come from deposit clients rather than forges or registries. */
export const DEPOSIT_FORMATS: ReadonlySet<string> = new Set([...json_sword_codemeta.formats, ...sword_codemeta.formats])

export const get_mapping = (ecosystem: Ecosystem): MappingDef | undefined => BY_ECOSYSTEM.get(ecosystem)

export const get_mapping_for_format = (format: string): ExtrinsicMappingDef | undefined => BY_FORMAT.get(format)

/**
 * Builds a filename registry from `pattern=ecosystem` pairs, falling back to
 * the default table for an empty list.
 */
export const create_filename_registry = (entries: ReadonlyArray<readonly [string, IntrinsicEcosystem]>): FilenameRegistry =>
  entries.length === 0 ? DEFAULT_FILENAME_REGISTRY : build_registry(entries)
