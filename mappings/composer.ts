import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_people, as_url, root_object, rule } from './common'
import { is_record } from '../utils'

/** `license` is an SPDX id or a list of them. */
const normalize_license: Normalizer = value => {
  if (typeof value === 'string') return value.trim() === '' ? undefined : value.trim()
  if (!Array.isArray(value)) return undefined
  const ids = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '')
  return ids.length === 0 ? undefined : ids
}

const normalize_support: Normalizer = value => (is_record(value) ? as_url(value.issues) : undefined)

const normalize_source: Normalizer = value => (is_record(value) ? as_url(value.source) : undefined)

const normalize_require: Normalizer = value => {
  if (!is_record(value)) return undefined
  const requirements = Object.entries(value).flatMap(([pkg, constraint]) =>
    typeof constraint === 'string' ? [`${pkg} ${constraint}`] : []
  )
  return requirements.length === 0 ? undefined : requirements
}

export const composer: IntrinsicMappingDef = {
  ecosystem: 'composer',
  filename: 'composer.json',
  parse: text => JSON.parse(text),
  root: root_object,
  fields: {
    name: rule('name'),
    description: rule('description'),
    version: rule('version'),
    keywords: rule('keywords', as_keywords),
    homepage: rule('url', as_url),
    license: rule('license', normalize_license),
    authors: rule('author', as_people),
    support: rule('issueTracker', normalize_support),
    source: rule('codeRepository', normalize_source),
    require: rule('softwareRequirements', normalize_require),
  },
}
