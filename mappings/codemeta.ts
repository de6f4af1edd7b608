import { XMLParser } from 'fast-xml-parser'
import { TERMS, type ExtrinsicMappingDef, type IntrinsicMappingDef, type Normalizer, type Term } from './types'
import { as_keywords, as_people, as_string, root_object, rule } from './common'
import { is_record } from '../utils'

const PEOPLE: ReadonlySet<Term> = new Set(['author', 'contributor', 'maintainer'])

/** Identifiers and licenses may be given as `{ "@id": ... }` nodes. */
const as_id: Normalizer = value => {
  if (is_record(value)) return as_string(value['@id'])
  if (Array.isArray(value)) {
    const ids = value.flatMap(v => {
      const id = as_id(v)
      return id === undefined ? [] : [id]
    })
    return ids.length === 0 ? undefined : ids
  }
  return as_string(value)
}

const rule_for = (term: Term) => {
  if (PEOPLE.has(term)) return rule(term, as_people)
  if (term === 'keywords') return rule(term, as_keywords)
  if (term === 'license' || term === 'identifier' || term === 'codeRepository' || term === 'url') return rule(term, as_id)
  return rule(term, value => (typeof value === 'number' ? String(value) : as_string(value) ?? as_id(value)))
}

/**
 * codemeta.json already speaks the target vocabulary: every known term maps to
 * itself, unknown terms and JSON-LD keywords are dropped.
 */
export const codemeta: IntrinsicMappingDef = {
  ecosystem: 'codemeta',
  filename: 'codemeta.json',
  parse: text => JSON.parse(text),
  root: root_object,
  fields: Object.fromEntries(TERMS.map(term => [term, rule_for(term)])),
}

/**
 * Deposit payloads: a SWORD entry converted to JSON, whose CodeMeta terms
 * carry a `codemeta:` prefix. Unprefixed terms are accepted as well.
 */
export const json_sword_codemeta: ExtrinsicMappingDef = {
  ecosystem: 'json-sword-codemeta',
  formats: ['json-sword-codemeta'],
  parse: text => JSON.parse(text),
  root: parsed => {
    const entry = root_object(parsed)
    if (!entry) return null
    return Object.fromEntries(Object.entries(entry).map(([key, value]) => [key.replace(/^codemeta:/, ''), value]))
  },
  fields: codemeta.fields,
}

const sword_parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
})

/**
 * SWORD v2 Atom entries as sent by deposit clients. Namespace prefixes are
 * dropped, so `codemeta:author` and Atom's own `author` both count as authors.
 */
export const sword_codemeta: ExtrinsicMappingDef = {
  ecosystem: 'sword-codemeta',
  formats: ['sword-v2-atom-codemeta'],
  parse: text => sword_parser.parse(text, true),
  root: parsed => {
    if (!is_record(parsed)) return null
    const entry = parsed.entry
    return is_record(entry) ? entry : null
  },
  fields: codemeta.fields,
}
