/**
 * @module MappingHelpers
 * @description Normalizers shared by the ecosystem mappings, and the generic dictionary translation.
 */

import type { Json, MappingDef, MetadataDocument, Normalizer, Term, FieldRule } from './types'
import { is_record } from '../utils'

/**
 * Combines two values for the same term: lists are concatenated, scalars become lists.
 *
 * @example
 * ```ts
 * merge_values('a', 'b')          // => ['a', 'b']
 * merge_values(['a', 'b'], 'c')   // => ['a', 'b', 'c']
 * ```
 */
export function merge_values(left: Json | undefined, right: Json): Json {
  if (left === undefined || left === null) return right
  if (right === null) return left
  const as_list = (v: Json): Json[] => (Array.isArray(v) ? v : [v])
  return [...as_list(left), ...as_list(right)]
}

export const as_string: Normalizer = value => {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

/** Keeps the string members of a list; a lone string is kept as a scalar. */
export const as_strings: Normalizer = value => {
  if (typeof value === 'string') return as_string(value)
  if (!Array.isArray(value)) return undefined
  const strings = value.flatMap(v => {
    const s = as_string(v)
    return typeof s === 'string' ? [s] : []
  })
  return strings.length === 0 ? undefined : strings
}

/** Keywords always normalize to a list. */
export const as_keywords: Normalizer = value => {
  const strings = as_strings(value)
  if (strings === undefined) return undefined
  return Array.isArray(strings) ? strings : [strings]
}

export const as_url: Normalizer = value => {
  const s = as_string(value)
  if (typeof s !== 'string') return undefined
  return /^[a-z][a-z0-9+.-]*:\/\/\S+$/i.test(s) ? s : undefined
}

/**
 * Renders a person as `Name <email> (url)`, omitting absent parts.
 */
export function format_person(name?: string, email?: string, url?: string): string | undefined {
  const parts: string[] = []
  if (name) parts.push(name)
  if (email) parts.push(`<${email}>`)
  if (url) parts.push(`(${url})`)
  return parts.length === 0 ? undefined : parts.join(' ')
}

const PERSON_RE = /^ *(.*?)( +<(.*)>)?( +\((.*)\))? *$/

/**
 * Accepts `"Name <email> (url)"` strings or `{ name, email, url }` objects.
 */
export const as_person: Normalizer = value => {
  if (typeof value === 'string') {
    const m = PERSON_RE.exec(value)
    if (!m) return undefined
    return format_person(m[1] || undefined, m[3] || undefined, m[5] || undefined)
  }
  if (is_record(value)) {
    const pick = (key: string) => {
      const v = value[key]
      return typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined
    }
    const given = [pick('givenName') ?? pick('given-names'), pick('familyName') ?? pick('family-names')]
      .filter((part): part is string => part !== undefined)
      .join(' ')
    return format_person(pick('name') ?? (given || undefined), pick('email'), pick('url') ?? pick('homepage'))
  }
  return undefined
}

/** A single person stays a scalar, a list of people stays a list. */
export const as_people: Normalizer = value => {
  if (!Array.isArray(value)) return as_person(value)
  const people = value.flatMap(v => {
    const p = as_person(v)
    return typeof p === 'string' ? [p] : []
  })
  return people.length === 0 ? undefined : people
}

export const rule = (term: Term, normalize: Normalizer = as_string): FieldRule => ({ term, normalize })

/**
 * Applies a mapping's field table to a parsed dictionary.
 *
 * Keys are visited in source order; a term set twice within one file keeps
 * both values (see `merge_values`).
 */
export function translate_dict(def: MappingDef, raw: Record<string, unknown>): MetadataDocument {
  const doc: MetadataDocument = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!Object.hasOwn(def.fields, key)) continue
    const field = def.fields[key]
    if (!field) continue
    const normalized = field.normalize(value)
    if (normalized === undefined) continue
    doc[field.term] = merge_values(doc[field.term], normalized)
  }
  def.extra?.(raw, doc)
  return doc
}

export const root_object = (parsed: unknown): Record<string, unknown> | null => (is_record(parsed) ? parsed : null)
