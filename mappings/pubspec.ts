import { parse as parse_yaml } from 'yaml'
import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_people, as_person, as_url, root_object, rule } from './common'
import { is_record } from '../utils'

const normalize_environment: Normalizer = value => {
  if (!is_record(value)) return undefined
  const requirements = Object.entries(value).flatMap(([sdk, constraint]) =>
    typeof constraint === 'string' ? [`${sdk} ${constraint}`] : []
  )
  return requirements.length === 0 ? undefined : requirements
}

/** https://dart.dev/tools/pub/pubspec */
export const pubspec: IntrinsicMappingDef = {
  ecosystem: 'pubspec',
  filename: 'pubspec.yaml',
  parse: text => parse_yaml(text),
  root: root_object,
  fields: {
    name: rule('name'),
    version: rule('version'),
    description: rule('description'),
    homepage: rule('url', as_url),
    repository: rule('codeRepository', as_url),
    issue_tracker: rule('issueTracker', as_url),
    license: rule('license'),
    keywords: rule('keywords', as_keywords),
    topics: rule('keywords', as_keywords),
    author: rule('author', as_person),
    authors: rule('author', as_people),
    environment: rule('softwareRequirements', normalize_environment),
  },
}
