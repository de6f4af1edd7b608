/**
 * @module HeadResolver
 * @description Finds the canonical root directory of an origin's latest snapshot.
 */

import type { IndexerError, Result } from './types'
import { ok, err } from './types'
import type { Branch, GraphStorage, Snapshot } from './archive'
import { guard_storage } from './result'
import { compare_tuples } from './utils'

export const DEFAULT_BRANCH_NAMES: readonly string[] = ['HEAD', 'refs/heads/main', 'refs/heads/master', 'main', 'master', 'trunk']

const MAX_ALIAS_HOPS = 16

export type Head = {
  branch: string
  /** Revision the head resolved through, null when the branch targets a directory. */
  revision_id: string | null
  directory_id: string
}

export type HeadResolver = {
  resolve_head: (origin: string) => Promise<Result<Head>>
}

export type HeadResolverConfig = {
  graph: GraphStorage
  branch_names?: readonly string[]
}

const ARCHIVE_NAME = /^(.*)[-_]([0-9]+(?:\.[0-9]+)*)([-+][a-zA-Z0-9.~]+?)?((?:\.[a-zA-Z0-9]+)+)$/

/**
 * Orders release archive names by version: numeric parts, then pre-releases
 * (`-beta2`) before the plain release before post-releases (`+build`).
 * Returns null for names that are not release archives.
 *
 * @example
 * ```ts
 * archive_version('hello-0.0.1.tar.gz')        // => [0, 0, 1, 0]
 * archive_version('hello-0.0.1-beta2.tar.gz')  // => [0, 0, 1, -1, 'beta2']
 * archive_version('README')                    // => null
 * ```
 */
export function archive_version(name: string): Array<number | string> | null {
  const match = ARCHIVE_NAME.exec(name)
  if (!match) return null
  const [, , version = '', pre] = match
  const parts: Array<number | string> = version.split('.').map(n => Number.parseInt(n, 10))
  if (pre === undefined) parts.push(0)
  else parts.push(pre.startsWith('-') ? -1 : 1, pre.slice(1))
  return parts
}

function latest_release_archive(snapshot: Snapshot): string | null {
  const names = Object.keys(snapshot.branches)
  if (names.length === 0) return null
  let best: { name: string; version: Array<number | string> } | null = null
  for (const name of names) {
    const version = archive_version(name)
    if (!version) return null
    if (!best || compare_tuples(version, best.version) > 0) best = { name, version }
  }
  return best?.name ?? null
}

export function create_head_resolver(config: HeadResolverConfig): HeadResolver {
  const { graph } = config
  const branch_names = config.branch_names ?? DEFAULT_BRANCH_NAMES

  const no_branch = (origin: string, reason: string): Result<never> => err({ kind: 'no_canonical_branch', origin, reason })

  /** Follows alias chains; null for dangling or cyclic aliases. */
  const follow = (snapshot: Snapshot, name: string): Branch | null => {
    let branch = snapshot.branches[name] ?? null
    for (let hops = 0; branch && branch.target_type === 'alias'; hops++) {
      if (hops >= MAX_ALIAS_HOPS) return null
      branch = snapshot.branches[branch.target] ?? null
    }
    return branch
  }

  const directory_of_revision = async (origin: string, branch: string, revision_id: string): Promise<Result<Head>> => {
    const revision = await guard_storage('graph.get_revision', () => graph.get_revision(revision_id))
    if (!revision.ok) return revision
    if (!revision.value) return no_branch(origin, `revision ${revision_id} of ${branch} is missing`)
    return ok({ branch, revision_id, directory_id: revision.value.directory })
  }

  const resolve_target = async (origin: string, name: string, branch: Branch): Promise<Result<Head>> => {
    switch (branch.target_type) {
      case 'revision':
        return directory_of_revision(origin, name, branch.target)
      case 'directory':
        return ok({ branch: name, revision_id: null, directory_id: branch.target })
      case 'release': {
        const release = await guard_storage('graph.get_release', () => graph.get_release(branch.target))
        if (!release.ok) return release
        if (!release.value) return no_branch(origin, `release ${branch.target} of ${name} is missing`)
        if (release.value.target_type !== 'revision') {
          return no_branch(origin, `release ${branch.target} targets a ${release.value.target_type}`)
        }
        return directory_of_revision(origin, name, release.value.target)
      }
      default:
        return no_branch(origin, `${name} targets a ${branch.target_type}`)
    }
  }

  return {
    /**
     * Tries the configured branch names in order and takes the first that
     * resolves, falling back to the highest-versioned release archive when no
     * configured name is present. When every present name fails, the first
     * failure is reported. Errors other than `storage_error` are final for the
     * origin.
     */
    async resolve_head(origin): Promise<Result<Head, IndexerError>> {
      const snapshot = await guard_storage('graph.get_latest_snapshot', () => graph.get_latest_snapshot(origin))
      if (!snapshot.ok) return snapshot
      const latest = snapshot.value
      if (!latest) return no_branch(origin, 'no snapshot')

      const present = branch_names.filter(name => name in latest.branches)
      if (present.length === 0) {
        const archive = latest_release_archive(latest)
        if (archive === null) return no_branch(origin, 'no matching branch')
        present.push(archive)
      }

      let first_failure: Result<Head> | null = null
      for (const name of present) {
        const branch = follow(latest, name)
        const result = branch ? await resolve_target(origin, name, branch) : no_branch(origin, `${name} is dangling`)
        if (result.ok || result.error.kind !== 'no_canonical_branch') return result
        first_failure ??= result
      }
      return first_failure ?? no_branch(origin, 'no matching branch')
    },
  }
}
