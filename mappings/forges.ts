import type { ExtrinsicMappingDef, Normalizer } from './types'
import { as_keywords, as_string, as_url, root_object, rule } from './common'
import { is_record } from '../utils'

const normalize_spdx: Normalizer = value => {
  if (!is_record(value)) return undefined
  const id = as_string(value.spdx_id)
  return id === undefined || id === 'NOASSERTION' ? undefined : `https://spdx.org/licenses/${id}`
}

const normalize_owner: Normalizer = value => (is_record(value) ? as_string(value.login) : undefined)

/** https://docs.github.com/en/rest/repos/repos#get-a-repository */
export const github: ExtrinsicMappingDef = {
  ecosystem: 'github',
  formats: ['application/vnd.github.v3+json'],
  parse: text => JSON.parse(text),
  root: root_object,
  fields: {
    name: rule('name'),
    description: rule('description'),
    html_url: rule('url', as_url),
    clone_url: rule('codeRepository', as_url),
    homepage: rule('url', as_url),
    topics: rule('keywords', as_keywords),
    license: rule('license', normalize_spdx),
    language: rule('programmingLanguage'),
    owner: rule('author', normalize_owner),
    created_at: rule('dateCreated'),
    updated_at: rule('dateModified'),
  },
  extra: (raw, doc) => {
    const html_url = as_url(raw.html_url)
    if (raw.has_issues === true && typeof html_url === 'string') doc.issueTracker = `${html_url}/issues`
  },
}

/** Gitea and Gogs share the repository payload layout. */
export const gitea: ExtrinsicMappingDef = {
  ecosystem: 'gitea',
  formats: ['gitea-project-json', 'gogs-project-json'],
  parse: text => JSON.parse(text),
  root: root_object,
  fields: {
    name: rule('name'),
    description: rule('description'),
    html_url: rule('url', as_url),
    website: rule('url', as_url),
    clone_url: rule('codeRepository', as_url),
    language: rule('programmingLanguage'),
    owner: rule('author', normalize_owner),
    created_at: rule('dateCreated'),
    updated_at: rule('dateModified'),
  },
}
