import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { discoverMigrations, migrationsToRollback, pendingMigrations } from '../db/migrationFiles.js'

describe('discoverMigrations', () => {
    it('finds the bundled schema migrations in order', () => {
        const migrations = discoverMigrations()
        expect(migrations.map(m => [m.version, m.name, m.hasDown])).toEqual([
            ['001', 'create_assets', true],
            ['002', 'create_price_history', true]
        ])
    })

    describe('in a scratch directory', () => {
        let dir: string

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'migrations-'))
            for (const file of ['010_b.up.sql', '002_a.up.sql', '002_a.down.sql', 'README.md', '003_c.down.sql']) {
                writeFileSync(join(dir, file), '-- test')
            }
        })

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true })
        })

        it('pairs up files and ignores anything else', () => {
            const migrations = discoverMigrations(dir)
            expect(migrations).toEqual([
                { version: '002', name: 'a', upPath: join(dir, '002_a.up.sql'), downPath: join(dir, '002_a.down.sql'), hasDown: true },
                { version: '010', name: 'b', upPath: join(dir, '010_b.up.sql'), downPath: join(dir, '010_b.down.sql'), hasDown: false }
            ])
        })
    })
})

describe('pendingMigrations', () => {
    it('keeps migrations that were not applied', () => {
        const all = discoverMigrations()
        expect(pendingMigrations(all, ['001']).map(m => m.version)).toEqual(['002'])
        expect(pendingMigrations(all, ['001', '002'])).toEqual([])
    })
})

describe('migrationsToRollback', () => {
    it('returns the most recent first', () => {
        const all = discoverMigrations()
        expect(migrationsToRollback(all, ['001', '002'], 2).map(m => m.version)).toEqual(['002', '001'])
        expect(migrationsToRollback(all, ['001', '002'], 1).map(m => m.version)).toEqual(['002'])
    })

    it('refuses when an applied version has no file', () => {
        expect(() => migrationsToRollback(discoverMigrations(), ['001', '099'], 1))
            .toThrow('Applied migration 099 has no file in the migrations directory')
    })
})
