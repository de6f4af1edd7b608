/**
 * @module Archive
 * @description The read-only view of the archive graph the indexer consumes, and an in-memory stand-in.
 */

import { compute_hash, canonical_json } from './utils'

export type DirectoryEntry = {
  name: string
  type: 'file' | 'dir' | 'rev'
  /** Hash of the blob, subdirectory or revision the entry points at. */
  target: string
}

export type Revision = {
  id: string
  directory: string
}

export type ReleaseTargetType = 'revision' | 'release' | 'directory' | 'content'

export type Release = {
  id: string
  target: string
  target_type: ReleaseTargetType
}

export type BranchTargetType = ReleaseTargetType | 'snapshot' | 'alias'

export type Branch = {
  target_type: BranchTargetType
  /** Object hash, or the name of another branch for aliases. */
  target: string
}

export type Snapshot = {
  id: string
  /** A null branch is a dangling name kept by the loader. */
  branches: Record<string, Branch | null>
}

/**
 * Graph storage as the indexer sees it.
 *
 * Absent objects resolve to `null`; transient failures reject and are mapped
 * to `storage_error` by the caller.
 *
 * @category Types
 * @group Archive Types
 */
export type GraphStorage = {
  get_directory_entries: (directory_id: string) => Promise<DirectoryEntry[] | null>
  get_revision: (revision_id: string) => Promise<Revision | null>
  get_release: (release_id: string) => Promise<Release | null>
  get_latest_snapshot: (origin: string) => Promise<Snapshot | null>
  get_blob: (content_id: string) => Promise<Uint8Array | null>
}

export type MemoryArchive = GraphStorage & {
  add_blob: (data: Uint8Array | string) => string
  add_directory: (entries: DirectoryEntry[]) => string
  add_revision: (directory: string, message?: string) => string
  add_release: (target: string, target_type: ReleaseTargetType, name?: string) => string
  /** Records a new visit of `origin`; the latest visit wins. */
  add_snapshot: (origin: string, branches: Record<string, Branch | null>) => string
}

const encoder = new TextEncoder()

const object_id = (kind: string, value: unknown): string => compute_hash(encoder.encode(`${kind} ${canonical_json(value)}`))

/**
 * Creates an in-memory, content-addressed archive for development and tests.
 *
 * Blob ids are the SHA-256 of their bytes; other objects hash their canonical
 * JSON, so equal objects share an id.
 *
 * @example
 * ```ts
 * const archive = create_memory_archive()
 * const blob = archive.add_blob('{"name": "Foo"}')
 * const dir = archive.add_directory([{ name: 'package.json', type: 'file', target: blob }])
 * archive.add_snapshot('https://example.org/foo', { HEAD: { target_type: 'revision', target: archive.add_revision(dir) } })
 * ```
 */
export function create_memory_archive(): MemoryArchive {
  const blobs = new Map<string, Uint8Array>()
  const directories = new Map<string, DirectoryEntry[]>()
  const revisions = new Map<string, Revision>()
  const releases = new Map<string, Release>()
  const snapshots = new Map<string, Snapshot>()

  return {
    add_blob(data) {
      const bytes = typeof data === 'string' ? encoder.encode(data) : data
      const id = compute_hash(bytes)
      blobs.set(id, bytes)
      return id
    },

    add_directory(entries) {
      const id = object_id('directory', entries)
      directories.set(id, entries.map(entry => ({ ...entry })))
      return id
    },

    add_revision(directory, message = '') {
      const id = object_id('revision', { directory, message })
      revisions.set(id, { id, directory })
      return id
    },

    add_release(target, target_type, name = '') {
      const id = object_id('release', { target, target_type, name })
      releases.set(id, { id, target, target_type })
      return id
    },

    add_snapshot(origin, branches) {
      const id = object_id('snapshot', branches)
      snapshots.set(origin, { id, branches: { ...branches } })
      return id
    },

    async get_directory_entries(directory_id) {
      const entries = directories.get(directory_id)
      return entries ? entries.map(entry => ({ ...entry })) : null
    },

    async get_revision(revision_id) {
      return revisions.get(revision_id) ?? null
    },

    async get_release(release_id) {
      return releases.get(release_id) ?? null
    },

    async get_latest_snapshot(origin) {
      return snapshots.get(origin) ?? null
    },

    async get_blob(content_id) {
      return blobs.get(content_id) ?? null
    },
  }
}
