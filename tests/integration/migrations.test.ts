import { describe, it, expect, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import { MIGRATIONS, SCHEMA_VERSION, migrate, read_schema_version } from '../../migrations'
import { create_sqlite_backend } from '../../backend/sqlite'
import { unwrap } from '../../result'

describe('migrations', () => {
  let db: Database.Database

  afterEach(() => {
    db.close()
  })

  it('reports version 0 for a fresh database', () => {
    db = new Database(':memory:')
    expect(read_schema_version(db)).toBe(0)
  })

  it('applies every migration once', () => {
    db = new Database(':memory:')

    expect(migrate(db)).toEqual(MIGRATIONS.map(m => m.version))
    expect(read_schema_version(db)).toBe(SCHEMA_VERSION)
    expect(migrate(db)).toEqual([])

    const rows = db.prepare('SELECT version, description FROM dbversion ORDER BY version').all()
    expect(rows).toEqual(MIGRATIONS.map(m => ({ version: m.version, description: m.description })))
  })

  it('creates the fact and search tables', () => {
    db = new Database(':memory:')
    migrate(db)

    const names = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").pluck().all()
    expect(names).toEqual(
      expect.arrayContaining([
        'content_fossology_license',
        'content_metadata',
        'content_mimetype',
        'directory_intrinsic_metadata',
        'fossology_license',
        'indexer_configuration',
        'origin_extrinsic_metadata',
        'origin_extrinsic_metadata_fts',
        'origin_intrinsic_metadata',
        'origin_intrinsic_metadata_fts',
      ])
    )
  })

  it('applies only migrations newer than the recorded version', () => {
    db = new Database(':memory:')
    read_schema_version(db)
    db.exec(MIGRATIONS[0]?.sql ?? '')
    db.prepare('INSERT INTO dbversion (version, release, description) VALUES (1, ?, ?)').run('2026-01-01T00:00:00.000Z', 'seeded')

    expect(migrate(db)).toEqual([2])
  })
})

describe('sqlite backend on a shared connection', () => {
  let db: Database.Database

  afterEach(() => {
    db.close()
  })

  it('keeps facts across backends opened on the same database', async () => {
    db = new Database(':memory:')
    const first = create_sqlite_backend({ database: db })
    const tool = unwrap(await first.tools.register('mimetype-detector', '1.0.0', {}))
    await first.content_mimetype.add([{ id: 'c1', indexer_configuration_id: tool.id, mimetype: 'text/plain', encoding: 'utf-8' }])
    first.close()

    const second = create_sqlite_backend({ database: db })
    expect(unwrap(await second.content_mimetype.get(['c1'])).map(f => f.mimetype)).toEqual(['text/plain'])
    expect(unwrap(await second.tools.register('mimetype-detector', '1.0.0', {})).id).toBe(tool.id)
  })

  it('stores each license name once in the dictionary', async () => {
    db = new Database(':memory:')
    const storage = create_sqlite_backend({ database: db })
    const tool = unwrap(await storage.tools.register('license-scanner', '1.0.0', {}))

    await storage.content_fossology_license.add([
      { id: 'c1', indexer_configuration_id: tool.id, license: 'MIT' },
      { id: 'c2', indexer_configuration_id: tool.id, license: 'MIT' },
    ])
    await storage.content_fossology_license.add([{ id: 'c3', indexer_configuration_id: tool.id, license: 'MIT' }])

    expect(db.prepare('SELECT name FROM fossology_license').pluck().all()).toEqual(['MIT'])
    expect(db.prepare('SELECT COUNT(*) FROM content_fossology_license').pluck().get()).toBe(3)
  })

  it('derives the full-text body from the search vector', async () => {
    db = new Database(':memory:')
    const storage = create_sqlite_backend({ database: db })
    const tool = unwrap(await storage.tools.register('metadata-translator', '1.0.0', {}))

    await storage.origin_intrinsic_metadata.add([
      {
        id: 'https://example.org/foo',
        indexer_configuration_id: tool.id,
        metadata: { name: 'Foo', author: 'Jane Doe' },
        from_directory: 'd1',
        mappings: ['npm'],
      },
    ])

    expect(db.prepare('SELECT body FROM origin_intrinsic_metadata_fts').pluck().all()).toEqual(['jane doe foo'])
  })
})
