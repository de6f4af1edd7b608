import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_string, as_strings, as_url, format_person, root_object, rule } from './common'

/**
 * Parses the RFC 822 header block of a PKG-INFO file into lowercase keys,
 * each holding every value seen for it. `UNKNOWN` values are dropped and
 * continuation lines are folded into the previous value.
 *
 * @example
 * ```ts
 * parse_headers('Name: foo\nKeywords: a b\nAuthor: UNKNOWN\n')
 * // => { name: ['foo'], keywords: ['a b'] }
 * ```
 */
export function parse_headers(text: string): Record<string, string[]> {
  const headers: Record<string, string[]> = {}
  let current: { key: string; value: string } | null = null

  const flush = () => {
    if (!current) return
    const value = current.value.trim()
    if (value !== 'UNKNOWN') (headers[current.key] ??= []).push(value)
    current = null
  }

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') break
    if (/^[ \t]/.test(line)) {
      if (!current) throw new Error('continuation line before any header')
      current.value += `\n${line.trim()}`
      continue
    }
    const colon = line.indexOf(':')
    if (colon <= 0) throw new Error(`malformed header line: ${line}`)
    flush()
    current = { key: line.slice(0, colon).trim().toLowerCase(), value: line.slice(colon + 1) }
  }
  flush()
  return headers
}

const first_of = (normalize: Normalizer): Normalizer => value =>
  Array.isArray(value) ? normalize(value[0]) : normalize(value)

const split_keywords: Normalizer = value => {
  const list = Array.isArray(value) ? value : [value]
  const words = list.flatMap(entry => (typeof entry === 'string' ? entry.split(/[\s,]+/) : [])).filter(w => w !== '')
  return words.length === 0 ? undefined : words
}

export const pkg_info: IntrinsicMappingDef = {
  ecosystem: 'pkg-info',
  filename: 'PKG-INFO',
  parse: parse_headers,
  root: root_object,
  fields: {
    name: rule('name', first_of(as_string)),
    version: rule('version', first_of(as_string)),
    summary: rule('description', first_of(as_string)),
    'home-page': rule('url', first_of(as_url)),
    'project-url': rule('codeRepository', first_of(value => as_url(typeof value === 'string' ? value.split(',').pop() : value))),
    keywords: rule('keywords', split_keywords),
    license: rule('license', first_of(as_string)),
    'requires-dist': rule('softwareRequirements', as_strings),
    'requires-python': rule('softwareRequirements', first_of(value => (typeof value === 'string' ? `python ${value.trim()}` : undefined))),
  },
  extra: (raw, doc) => {
    const pick = (key: string) => {
      const values = raw[key]
      return Array.isArray(values) && typeof values[0] === 'string' ? values[0] : undefined
    }
    const author = format_person(pick('author'), pick('author-email'))
    if (author !== undefined) doc.author = author
  },
}
