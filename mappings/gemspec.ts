import type { IntrinsicMappingDef, Normalizer } from './types'
import { as_people, as_person, as_url, root_object, rule } from './common'

const SPEC_NEW = /Gem::Specification\.new +(do|\{) +\|.*\|/
const SPEC_ENTRY = /^\s*\w+\.(\w+)\s*=\s*(.*)$/
const STRING_LITERAL = /^(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)')$/
const LIST_ITEM = /\s*("(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')\s*(?:,|$)/y

const unquote = (literal: string): string | undefined => {
  const match = STRING_LITERAL.exec(literal)
  if (!match) return undefined
  return (match[1] ?? match[2] ?? '').replace(/\\(.)/g, '$1')
}

/**
 * Evaluates the right-hand side of a gemspec assignment when it is a string
 * literal or a list of them; anything else (hashes, method calls, globs) is
 * left out.
 *
 * @example
 * ```ts
 * eval_literal("'example'.freeze")      // => 'example'
 * eval_literal('["a", \'b\']')          // => ['a', 'b']
 * eval_literal("Dir.glob('lib/*.rb')")  // => undefined
 * ```
 */
export function eval_literal(expr: string): string | string[] | undefined {
  const source = expr.replace(/\.freeze\b/g, '').trim()
  if (!source.startsWith('[')) return unquote(source)
  if (!source.endsWith(']')) return undefined

  const inner = source.slice(1, -1)
  const items: string[] = []
  LIST_ITEM.lastIndex = 0
  while (LIST_ITEM.lastIndex < inner.length) {
    const match = LIST_ITEM.exec(inner)
    const item = match?.[1] === undefined ? undefined : unquote(match[1])
    if (item === undefined) return undefined
    items.push(item)
  }
  return items.length === 0 ? undefined : items
}

/** Collects the literal assignments that follow `Gem::Specification.new`; null without one. */
function parse_gemspec(text: string): Record<string, string | string[]> | null {
  const lines = text.split('\n')
  const start = lines.findIndex(line => SPEC_NEW.test(line))
  if (start === -1) return null

  const entries: Record<string, string | string[]> = {}
  for (const line of lines.slice(start + 1)) {
    const match = SPEC_ENTRY.exec(line)
    if (!match) continue
    const [, key = '', expr = ''] = match
    const value = eval_literal(expr)
    if (value !== undefined && value.length > 0) entries[key] = value
  }
  return entries
}

const spdx = (id: string): string => `https://spdx.org/licenses/${id}`

const normalize_license: Normalizer = value => (typeof value === 'string' ? spdx(value) : undefined)

const normalize_licenses: Normalizer = value => {
  if (!Array.isArray(value)) return undefined
  const ids = value.flatMap(id => (typeof id === 'string' ? [spdx(id)] : []))
  if (ids.length === 0) return undefined
  return ids.length === 1 ? (ids[0] ?? null) : ids
}

/** https://guides.rubygems.org/specification-reference/ */
export const gemspec: IntrinsicMappingDef = {
  ecosystem: 'gemspec',
  filename: '*.gemspec',
  parse: parse_gemspec,
  root: root_object,
  fields: {
    name: rule('name'),
    version: rule('version'),
    summary: rule('description'),
    description: rule('description'),
    homepage: rule('codeRepository', as_url),
    license: rule('license', normalize_license),
    licenses: rule('license', normalize_licenses),
    author: rule('author', value => (typeof value === 'string' ? as_person(value) : undefined)),
    authors: rule('author', value => (Array.isArray(value) ? as_people(value) : undefined)),
  },
}
