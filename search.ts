/**
 * @module Search
 * @description Search vectors over metadata documents and query handling for both backends.
 */

import type { SearchVector } from './types'
import { compare_strings, is_record, unique } from './utils'

const SEPARATOR = /[^\p{L}\p{N}]+/u

/**
 * Lowercases and splits on anything that is not a letter or a digit.
 * No stopwords, no stemming.
 *
 * @example
 * ```ts
 * tokenize('Fast-XML parser, v2') // => ['fast', 'xml', 'parser', 'v2']
 * ```
 */
export const tokenize = (text: string): string[] => text.toLowerCase().split(SEPARATOR).filter(token => token !== '')

function* string_leaves(value: unknown): Generator<string> {
  if (typeof value === 'string') {
    yield value
    return
  }
  if (Array.isArray(value)) {
    for (const item of value) yield* string_leaves(item)
    return
  }
  if (is_record(value)) {
    for (const key of Object.keys(value).sort(compare_strings)) yield* string_leaves(value[key])
  }
}

/**
 * Builds the lexeme to positions map of a metadata document.
 *
 * Positions are 1-based and run across every string leaf, visiting object keys
 * in sorted order and arrays in order, so the vector depends only on the
 * document's content.
 *
 * @example
 * ```ts
 * compute_search_vector({ name: 'Foo', author: 'Jane Doe' })
 * // => { doe: [2], foo: [3], jane: [1] }
 * ```
 */
export function compute_search_vector(document: unknown): SearchVector {
  const positions = new Map<string, number[]>()
  let position = 0
  for (const leaf of string_leaves(document)) {
    for (const token of tokenize(leaf)) {
      position++
      const list = positions.get(token)
      if (list) list.push(position)
      else positions.set(token, [position])
    }
  }
  const vector: SearchVector = {}
  for (const lexeme of [...positions.keys()].sort(compare_strings)) {
    vector[lexeme] = positions.get(lexeme) ?? []
  }
  return vector
}

/**
 * Lexemes in position order, for indexing by an external full-text engine.
 */
export function vector_text(vector: SearchVector): string {
  const placed: Array<[number, string]> = []
  for (const [lexeme, positions] of Object.entries(vector)) {
    for (const position of positions) placed.push([position, lexeme])
  }
  return placed
    .sort((a, b) => a[0] - b[0])
    .map(([, lexeme]) => lexeme)
    .join(' ')
}

/** Distinct query tokens; an empty list matches nothing. */
export const parse_query = (query: string): string[] => unique(tokenize(query))

/**
 * Scores a vector against query tokens: null unless every token is present,
 * otherwise the total number of occurrences.
 */
export function score_vector(vector: SearchVector, tokens: readonly string[]): number | null {
  if (tokens.length === 0) return null
  let score = 0
  for (const token of tokens) {
    const positions = vector[token]
    if (!positions || positions.length === 0) return null
    score += positions.length
  }
  return score
}

/**
 * FTS5 MATCH expression requiring every token, each as a quoted string.
 *
 * @example
 * ```ts
 * to_match_expression(['jane', 'doe']) // => '"jane" "doe"'
 * ```
 */
export const to_match_expression = (tokens: readonly string[]): string =>
  tokens.map(token => `"${token.replaceAll('"', '""')}"`).join(' ')
