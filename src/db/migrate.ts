#!/usr/bin/env node
/**
 * Versioned migration runner for the PostgreSQL price store.
 * Usage:
 *   npm run db:migrate                    - Apply all pending migrations
 *   npm run db:migrate -- --dry-run       - Print pending SQL without applying
 *   npm run db:migrate -- --rollback [n]  - Roll back last n migrations (default 1)
 *   npm run db:migrate -- --status        - List applied and pending migrations
 */
import 'dotenv/config'
import { readFileSync } from 'node:fs'
import { getPool, closePool, isDbConfigured } from './client.js'
import {
    MIGRATIONS_DIR,
    discoverMigrations,
    migrationsToRollback,
    pendingMigrations
} from './migrationFiles.js'

const MIGRATION_TABLE = `CREATE TABLE IF NOT EXISTS schema_migrations (
    version VARCHAR(64) PRIMARY KEY,
    name VARCHAR(256) NOT NULL,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`

interface MigrateArgs {
    dryRun: boolean
    rollback: number | null
    status: boolean
}

function parseArgs(argv: string[]): MigrateArgs {
    const args: MigrateArgs = { dryRun: false, rollback: null, status: false }
    for (let i = 0; i < argv.length; i++) {
        if (argv[i] === '--dry-run') args.dryRun = true
        else if (argv[i] === '--status') args.status = true
        else if (argv[i] === '--rollback') {
            const next = argv[i + 1]
            if (next !== undefined && /^\d+$/.test(next)) {
                args.rollback = parseInt(next, 10)
                i++
            } else {
                args.rollback = 1
            }
        }
    }
    return args
}

async function getAppliedVersions(): Promise<string[]> {
    await getPool().query(MIGRATION_TABLE)
    const result = await getPool().query<{ version: string }>(
        'SELECT version FROM schema_migrations ORDER BY version ASC'
    )
    return result.rows.map(r => r.version)
}

async function runInTransaction(sql: string, bookkeeping: string, params: unknown[]): Promise<void> {
    const client = await getPool().connect()
    try {
        await client.query('BEGIN')
        await client.query(sql)
        await client.query(bookkeeping, params)
        await client.query('COMMIT')
    } catch (err) {
        await client.query('ROLLBACK')
        throw err
    } finally {
        client.release()
    }
}

async function run(): Promise<number> {
    const { dryRun, rollback, status } = parseArgs(process.argv.slice(2))
    const migrations = discoverMigrations()
    if (migrations.length === 0) {
        console.log('No migration files found in', MIGRATIONS_DIR)
        return 0
    }

    if (!isDbConfigured()) {
        if (dryRun && rollback === null && !status) {
            console.log('[DRY RUN] DATABASE_URL not set. Migration files that would be applied:')
            for (const m of migrations) console.log('  ', m.version, m.name)
            return 0
        }
        console.error('DATABASE_URL is not set. Set it to run migrations.')
        return 1
    }

    const applied = await getAppliedVersions()

    if (status) {
        console.log('Applied migrations:')
        for (const v of applied) {
            const m = migrations.find(x => x.version === v)
            console.log('  ', v, m ? m.name : '(unknown)')
        }
        console.log('\nPending migrations:')
        for (const m of pendingMigrations(migrations, applied)) console.log('  ', m.version, m.name)
        return 0
    }

    if (rollback !== null) {
        const toRollback = migrationsToRollback(migrations, applied, rollback)
        if (toRollback.length === 0) {
            console.log('No migrations to roll back.')
            return 0
        }
        for (const m of toRollback) {
            if (!m.hasDown) {
                console.error('Missing down migration for', m.version, m.name)
                return 1
            }
            const sql = readFileSync(m.downPath, 'utf8')
            if (dryRun) {
                console.log('---', m.version, m.name, '(down) ---\n', sql)
                continue
            }
            console.log('Rolling back', m.version, m.name, '...')
            await runInTransaction(sql, 'DELETE FROM schema_migrations WHERE version = $1', [m.version])
        }
        console.log(dryRun ? '[DRY RUN] Nothing rolled back.' : 'Rollback completed.')
        return 0
    }

    const pending = pendingMigrations(migrations, applied)
    if (pending.length === 0) {
        console.log('No pending migrations.')
        return 0
    }

    for (const m of pending) {
        const sql = readFileSync(m.upPath, 'utf8')
        if (dryRun) {
            console.log('---', m.version, m.name, '---\n', sql)
            continue
        }
        console.log('Applying', m.version, m.name, '...')
        await runInTransaction(
            sql,
            'INSERT INTO schema_migrations (version, name) VALUES ($1, $2)',
            [m.version, m.name]
        )
    }
    console.log(dryRun ? `[DRY RUN] ${pending.length} migration(s) pending.` : 'Migrations completed successfully.')
    return 0
}

run()
    .catch((err: unknown) => {
        console.error('Migration failed:', err)
        return 1
    })
    .then(async code => {
        await closePool()
        process.exit(code)
    })
