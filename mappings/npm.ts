import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_people, as_person, as_string, as_url, root_object, rule } from './common'
import { is_record } from '../utils'

const SHORTCUTS: Record<string, (path: string) => string> = {
  github: path => `git+https://github.com/${path}.git`,
  gist: path => `git+https://gist.github.com/${path}.git`,
  gitlab: path => `git+https://gitlab.com/${path}.git`,
}

/**
 * https://docs.npmjs.com/cli/configuring-npm/package-json#repository
 *
 * @example
 * ```ts
 * normalize_repository({ type: 'git', url: 'https://example.org/foo.git' }) // => 'git+https://example.org/foo.git'
 * normalize_repository('gitlab:foo/bar')                                   // => 'git+https://gitlab.com/foo/bar.git'
 * normalize_repository('foo/bar')                                          // => 'git+https://github.com/foo/bar.git'
 * ```
 */
export const normalize_repository: Normalizer = value => {
  if (is_record(value)) {
    const { type, url } = value
    if (typeof type === 'string' && typeof url === 'string') return `${type}+${url}`
    return undefined
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined
  if (value.includes('://')) return value
  const colon = value.indexOf(':')
  if (colon === -1) return SHORTCUTS.github?.(value)
  const expand = SHORTCUTS[value.slice(0, colon)]
  return expand ? expand(value.slice(colon + 1)) : undefined
}

const normalize_bugs: Normalizer = value => {
  if (is_record(value)) return as_url(value.url)
  return as_url(value)
}

export const npm: IntrinsicMappingDef = {
  ecosystem: 'npm',
  filename: 'package.json',
  parse: text => JSON.parse(text),
  root: root_object,
  fields: {
    name: rule('name'),
    version: rule('version'),
    description: rule('description', as_string),
    homepage: rule('url', as_url),
    repository: rule('codeRepository', normalize_repository),
    bugs: rule('issueTracker', normalize_bugs),
    author: rule('author', as_person),
    contributors: rule('contributor', as_people),
    maintainers: rule('maintainer', as_people),
    license: rule('license'),
    keywords: rule('keywords', as_keywords),
  },
}
