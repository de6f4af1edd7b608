import { XMLParser } from 'fast-xml-parser'
import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_people, as_string, as_url, rule } from './common'
import { is_record } from '../utils'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
})

/**
 * https://learn.microsoft.com/en-us/nuget/reference/nuspec#license
 *
 * Only plain `A OR B` expressions are kept; `WITH`, `AND` and grouping are
 * dropped rather than misread.
 */
export const normalize_license_expression: Normalizer = value => {
  if (!is_record(value) || value['@_type'] !== 'expression') return undefined
  const expression = as_string(value['#text'])
  if (typeof expression !== 'string' || / with |\(|\)| and /i.test(expression)) return undefined
  const ids = expression.split(/ or /i).map(id => `https://spdx.org/licenses/${id.trim()}`)
  return ids.length === 1 ? (ids[0] ?? null) : ids
}

const normalize_authors: Normalizer = value => (typeof value === 'string' ? as_people(value.split(',')) : undefined)

const normalize_tags: Normalizer = value => (typeof value === 'string' ? as_keywords(value.split(/\s+/)) : undefined)

const normalize_repository: Normalizer = value => (is_record(value) ? as_url(value['@_url']) : undefined)

/** https://learn.microsoft.com/en-us/nuget/reference/nuspec */
export const nuget: IntrinsicMappingDef = {
  ecosystem: 'nuget',
  filename: '*.nuspec',
  parse: text => parser.parse(text, true),
  root: parsed => {
    if (!is_record(parsed)) return null
    const pkg = parsed.package
    if (!is_record(pkg)) return null
    const metadata = pkg.metadata
    return is_record(metadata) ? metadata : null
  },
  fields: {
    id: rule('identifier'),
    title: rule('name'),
    version: rule('version'),
    authors: rule('author', normalize_authors),
    description: rule('description'),
    summary: rule('description'),
    projectUrl: rule('url', as_url),
    repository: rule('codeRepository', normalize_repository),
    license: rule('license', normalize_license_expression),
    licenseUrl: rule('license', as_url),
    tags: rule('keywords', normalize_tags),
  },
}
