/**
 * @module Translator
 * @description Raw metadata bytes to a normalized metadata document.
 */

import { err, ok, type IndexerError, type Result } from './types'
import { try_catch, to_error } from './result'
import { translate_dict } from './mappings/common'
import { EcosystemSchema, type Ecosystem, type MappingDef, type MetadataDocument } from './mappings/types'
import { get_mapping, get_mapping_for_format } from './mappings/registry'

const decoder = new TextDecoder('utf-8', { fatal: true })

function run_mapping(def: MappingDef, bytes: Uint8Array): Result<MetadataDocument, IndexerError> {
  const parsed = try_catch(
    () => def.parse(decoder.decode(bytes)),
    (e): IndexerError => ({ kind: 'parse_error', ecosystem: def.ecosystem, cause: to_error(e) })
  )
  if (!parsed.ok) return parsed

  const root = def.root(parsed.value)
  if (!root) return ok({})
  return ok(translate_dict(def, root))
}

/**
 * Translates the bytes of one metadata file written in `ecosystem`'s format.
 *
 * Pure: the same bytes always give the same document. A file that is valid
 * but carries no dictionary (e.g. a JSON array) translates to `{}`.
 *
 * @example
 * ```ts
 * const bytes = new TextEncoder().encode('{"name": "Foo", "author": "Jane Doe"}')
 * translate(bytes, 'npm') // => ok({ name: 'Foo', author: 'Jane Doe' })
 * translate(bytes, 'rpm') // => err({ kind: 'unsupported_format', format: 'rpm' })
 * ```
 */
export function translate(bytes: Uint8Array, ecosystem: string): Result<MetadataDocument, IndexerError> {
  const parsed = EcosystemSchema.safeParse(ecosystem)
  if (!parsed.success) return err({ kind: 'unsupported_format', format: ecosystem })
  const def = get_mapping(parsed.data)
  if (!def) return err({ kind: 'unsupported_format', format: ecosystem })
  return run_mapping(def, bytes)
}

/**
 * Translates an extrinsic record by its declared format.
 */
export function translate_extrinsic(
  bytes: Uint8Array,
  format: string
): Result<{ ecosystem: Ecosystem; document: MetadataDocument }, IndexerError> {
  const def = get_mapping_for_format(format)
  if (!def) return err({ kind: 'unsupported_format', format })
  const document = run_mapping(def, bytes)
  if (!document.ok) return document
  return ok({ ecosystem: def.ecosystem, document: document.value })
}

/** True when a translated document carries at least one term. */
export const is_non_empty = (document: MetadataDocument): boolean => Object.keys(document).length > 0
