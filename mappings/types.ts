/**
 * @module MappingTypes
 * @description Ecosystem tags, the normalized metadata document, and the shape of a mapping.
 */

import { z } from 'zod'

export const INTRINSIC_ECOSYSTEMS = ['npm', 'maven', 'pkg-info', 'composer', 'codemeta', 'pubspec', 'cff', 'gemspec', 'nuget'] as const
export const EXTRINSIC_ECOSYSTEMS = ['github', 'gitea', 'json-sword-codemeta', 'sword-codemeta'] as const

export type IntrinsicEcosystem = (typeof INTRINSIC_ECOSYSTEMS)[number]
export type ExtrinsicEcosystem = (typeof EXTRINSIC_ECOSYSTEMS)[number]

/**
 * Identifier of the source format a piece of metadata evidence came from.
 * @category Types
 * @group Mapping Types
 */
export type Ecosystem = IntrinsicEcosystem | ExtrinsicEcosystem

export const EcosystemSchema = z.enum([...INTRINSIC_ECOSYSTEMS, ...EXTRINSIC_ECOSYSTEMS])

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json }

export const JsonSchema: z.ZodType<Json> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonSchema), z.record(JsonSchema)])
)

/**
 * CodeMeta terms a normalized document may carry.
 */
export const TERMS = [
  'name',
  'version',
  'description',
  'author',
  'contributor',
  'maintainer',
  'license',
  'keywords',
  'url',
  'codeRepository',
  'issueTracker',
  'identifier',
  'programmingLanguage',
  'softwareRequirements',
  'dateCreated',
  'dateModified',
  'datePublished',
] as const

export type Term = (typeof TERMS)[number]

/**
 * A translated metadata document, keyed by CodeMeta term.
 *
 * People are rendered as `Name <email> (url)` strings; single values stay
 * scalars, repeated values become arrays.
 *
 * @example
 * ```ts
 * const doc: MetadataDocument = { name: 'Foo', author: 'Jane Doe', keywords: ['cli', 'parser'] }
 * ```
 */
export type MetadataDocument = Partial<Record<Term, Json>>

export const MetadataDocumentSchema: z.ZodType<MetadataDocument> = z.record(z.enum(TERMS), JsonSchema)

/**
 * Turns one raw source value into a document value, or `undefined` to drop it.
 */
export type Normalizer = (value: unknown) => Json | undefined

export type FieldRule = {
  term: Term
  normalize: Normalizer
}

/**
 * One ecosystem variant: how to parse its bytes, which source keys map to
 * which terms, and an optional hook for translations that span several keys.
 */
export type MappingDef = {
  ecosystem: Ecosystem
  parse: (text: string) => unknown
  /** Selects the dictionary to translate from the parsed value; null means the file is not a metadata dictionary. */
  root: (parsed: unknown) => Record<string, unknown> | null
  fields: Readonly<Record<string, FieldRule>>
  extra?: (raw: Record<string, unknown>, doc: MetadataDocument) => void
}

export type IntrinsicMappingDef = MappingDef & {
  ecosystem: IntrinsicEcosystem
  /** An exact file name, or `*.suffix` for any name ending in `.suffix`. */
  filename: string
}

export type ExtrinsicMappingDef = MappingDef & {
  ecosystem: ExtrinsicEcosystem
  formats: readonly string[]
}
