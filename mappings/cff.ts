import { parse as parse_yaml } from 'yaml'
import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_people, as_string, as_url, rule } from './common'
import { is_record } from '../utils'

const normalize_doi: Normalizer = value => {
  const doi = as_string(value)
  return typeof doi === 'string' ? `https://doi.org/${doi}` : undefined
}

/** YAML turns `date-released: 2021-04-01` into a Date. */
const normalize_date: Normalizer = value => {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10)
  return as_string(value)
}

/**
 * Citation File Format, https://citation-file-format.github.io/
 *
 * A `preferred-citation` block replaces the top-level metadata when present.
 */
export const cff: IntrinsicMappingDef = {
  ecosystem: 'cff',
  filename: 'CITATION.cff',
  parse: text => parse_yaml(text),
  root: parsed => {
    if (!is_record(parsed)) return null
    const preferred = parsed['preferred-citation']
    return is_record(preferred) ? preferred : parsed
  },
  fields: {
    title: rule('name'),
    version: rule('version', value => (typeof value === 'number' ? String(value) : as_string(value))),
    abstract: rule('description'),
    authors: rule('author', as_people),
    keywords: rule('keywords', as_keywords),
    license: rule('license'),
    url: rule('url', as_url),
    'repository-code': rule('codeRepository', as_url),
    doi: rule('identifier', normalize_doi),
    'date-released': rule('datePublished', normalize_date),
  },
}
