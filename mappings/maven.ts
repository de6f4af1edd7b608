import { XMLParser } from 'fast-xml-parser'
import type { IntrinsicMappingDef, Json, Normalizer } from './types'
import { as_people, as_string, as_url, rule } from './common'
import { is_record } from '../utils'

const DEFAULT_REPOSITORY = 'https://repo.maven.apache.org/maven2/'

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
})

/** `<licenses><license>` holds either one element or a list of them. */
const children = (value: unknown, tag: string): unknown[] => {
  if (!is_record(value)) return []
  const inner = value[tag]
  if (inner === undefined) return []
  return Array.isArray(inner) ? inner : [inner]
}

/**
 * https://maven.apache.org/pom.html#Licenses
 *
 * Prefers the license URL, falls back to its name.
 */
export const normalize_licenses: Normalizer = value => {
  const licenses = children(value, 'license').flatMap(license => {
    if (!is_record(license)) return []
    const id = as_url(license.url) ?? as_string(license.name)
    return typeof id === 'string' ? [id] : []
  })
  if (licenses.length === 0) return undefined
  return licenses.length === 1 ? (licenses[0] ?? null) : licenses
}

const normalize_developers: Normalizer = value => as_people(children(value, 'developer'))

const normalize_url_of: Normalizer = value => (is_record(value) ? as_url(value.url) : undefined)

function repository_url(project: Record<string, unknown>, base: string): string | undefined {
  const group = as_string(project.groupId)
  const artifact = as_string(project.artifactId)
  if (typeof group !== 'string' || typeof artifact !== 'string') return undefined
  const prefix = base.endsWith('/') ? base : `${base}/`
  return `${prefix}${group.split('.').join('/')}/${artifact}`
}

/**
 * https://maven.apache.org/pom.html#Repositories
 *
 * Without a `<repositories>` section the artifact lives in Maven Central.
 * Repositories with a non-default layout are ignored.
 */
function parse_repositories(project: Record<string, unknown>): Json | undefined {
  const declared = project.repositories
  const repositories = declared === undefined || declared === '' ? [{ url: DEFAULT_REPOSITORY }] : children(declared, 'repository')
  const urls = repositories.flatMap(repo => {
    if (!is_record(repo)) return []
    const layout = repo.layout ?? 'default'
    const base = as_url(repo.url)
    if (layout !== 'default' || typeof base !== 'string') return []
    const url = repository_url(project, base)
    return url === undefined ? [] : [url]
  })
  if (urls.length === 0) return undefined
  return urls.length === 1 ? (urls[0] ?? null) : urls
}

export const maven: IntrinsicMappingDef = {
  ecosystem: 'maven',
  filename: 'pom.xml',
  parse: text => parser.parse(text, true),
  root: parsed => {
    if (!is_record(parsed)) return null
    const project = parsed.project
    return is_record(project) ? project : null
  },
  fields: {
    name: rule('name'),
    version: rule('version'),
    description: rule('description'),
    url: rule('url', as_url),
    groupId: rule('identifier'),
    licenses: rule('license', normalize_licenses),
    developers: rule('author', normalize_developers),
    contributors: rule('contributor', value => as_people(children(value, 'contributor'))),
    issueManagement: rule('issueTracker', normalize_url_of),
  },
  extra: (raw, doc) => {
    const repositories = parse_repositories(raw)
    if (repositories !== undefined) doc.codeRepository = repositories
  },
}
