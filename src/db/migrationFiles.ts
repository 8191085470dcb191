import { readdirSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'

export const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations')

export interface MigrationFile {
    version: string
    name: string
    upPath: string
    downPath: string
    hasDown: boolean
}

const UP_FILE = /^(\d+)_(.+)\.up\.sql$/

/**
 * Lists `NNN_name.up.sql` files in version order, pairing each with its
 * `.down.sql` sibling when present.
 */
export function discoverMigrations(dir: string = MIGRATIONS_DIR): MigrationFile[] {
    const files = readdirSync(dir)
    const migrations: MigrationFile[] = []
    for (const file of files) {
        const match = UP_FILE.exec(file)
        if (!match) continue
        const [, version, name] = match
        const down = `${version}_${name}.down.sql`
        migrations.push({
            version,
            name,
            upPath: join(dir, file),
            downPath: join(dir, down),
            hasDown: files.includes(down)
        })
    }
    return migrations.sort((a, b) => a.version.localeCompare(b.version, 'en'))
}

export function pendingMigrations(all: MigrationFile[], applied: readonly string[]): MigrationFile[] {
    const done = new Set(applied)
    return all.filter(m => !done.has(m.version))
}

/** Most recently applied first, at most `count`. */
export function migrationsToRollback(all: MigrationFile[], applied: readonly string[], count: number): MigrationFile[] {
    const byVersion = new Map(all.map((m): [string, MigrationFile] => [m.version, m]))
    return applied
        .slice(-count)
        .reverse()
        .map(version => {
            const migration = byVersion.get(version)
            if (!migration) {
                throw new Error(`Applied migration ${version} has no file in the migrations directory`)
            }
            return migration
        })
}
