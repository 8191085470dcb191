import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { TRACKED_ASSETS } from '../config/sources.js'
import {
    PersistenceError,
    isAssetCategory,
    type Asset,
    type AssetCategory,
    type AssetOption,
    type AssetSeed,
    type PriceObservation,
    type SeriesPoint
} from '../types/index.js'
import { Dec } from '../utils/decimal.js'
import { logger } from '../utils/logger.js'
import {
    toSearchPattern,
    type AssetSearchFilter,
    type AssetSearchResult,
    type CycleEntry,
    type PriceStore
} from './priceStore.js'

// ─────────────────────────────────────────────
// Row shapes
// ─────────────────────────────────────────────

interface AssetRow {
    id: number
    canonical_name: string
    display_name: string
    english_name: string | null
    category: string | null
    description: string | null
    created_at: string
}

interface AssetWithLatestRow extends AssetRow {
    latest_price: number | null
    latest_recorded_at: string | null
}

interface ObservationRow {
    id: number
    asset_id: number
    price: number
    recorded_at: string
    source: string
}

interface SeriesRow {
    asset_id: number
    display_name: string
    english_name: string | null
    category: string | null
    price: number
    recorded_at: string
}

// ─────────────────────────────────────────────
// Schema SQL
// ─────────────────────────────────────────────

const SCHEMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS assets (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    canonical_name TEXT NOT NULL UNIQUE,
    display_name   TEXT NOT NULL,
    english_name   TEXT,
    category       TEXT,
    description    TEXT,
    created_at     TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS price_history (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    asset_id    INTEGER NOT NULL REFERENCES assets(id) ON DELETE CASCADE,
    price       NUMERIC NOT NULL CHECK (price > 0),
    recorded_at TEXT NOT NULL,
    source      TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_price_history_asset_id
    ON price_history (asset_id);

CREATE INDEX IF NOT EXISTS idx_price_history_asset_id_recorded_at
    ON price_history (asset_id, recorded_at);
`

const LATEST_PER_ASSET_SQL = `
    SELECT id, asset_id, price, recorded_at, source,
           ROW_NUMBER() OVER (PARTITION BY asset_id ORDER BY recorded_at DESC, id DESC) AS rn
    FROM price_history
`

// ─────────────────────────────────────────────
// Demo seed data
// ─────────────────────────────────────────────

const DEMO_BASE_PRICES: ReadonlyArray<[AssetSeed, number]> = [
    [TRACKED_ASSETS.exir, 41250],
    [TRACKED_ASSETS.firouze, 28730],
    [TRACKED_ASSETS.gold18k, 68500000],
    [TRACKED_ASSETS.usd, 1030000]
]

const DEMO_HOURS = 7 * 24

function seedDemoData(store: SqlitePriceStore, db: Database.Database): void {
    const now = Date.now()
    const seed = db.transaction(() => {
        DEMO_BASE_PRICES.forEach(([asset, basePrice], k) => {
            const assetId = store.resolveOrCreateSync(asset)
            for (let h = DEMO_HOURS; h >= 0; h--) {
                const drift = 1 + 0.015 * Math.sin((DEMO_HOURS - h) / 9 + k) + 0.0004 * (DEMO_HOURS - h)
                const recordedAt = new Date(now - h * 60 * 60 * 1000).toISOString()
                store.appendSync(assetId, basePrice * drift, recordedAt, 'demo-seed')
            }
        })
    })
    seed()
    logger.info('[DB] Demo data seeded', { assets: DEMO_BASE_PRICES.length, hours: DEMO_HOURS })
}

// ─────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────

function rowToAsset(row: AssetRow): Asset {
    return {
        id: row.id,
        canonicalName: row.canonical_name,
        displayName: row.display_name,
        englishName: row.english_name ?? undefined,
        category: row.category !== null && isAssetCategory(row.category) ? row.category : null,
        description: row.description ?? undefined,
        createdAt: row.created_at
    }
}

function rowToObservation(row: ObservationRow): PriceObservation {
    return {
        id: row.id,
        assetId: row.asset_id,
        price: Number(row.price),
        recordedAt: row.recorded_at,
        source: row.source
    }
}

function buildSearchWhere(filter: AssetSearchFilter): { clause: string; params: unknown[] } {
    const conditions: string[] = []
    const params: unknown[] = []
    const term = filter.searchTerm?.trim()
    if (term) {
        const pattern = toSearchPattern(term)
        conditions.push(`(ulower(a.canonical_name) LIKE ? ESCAPE '\\'
            OR ulower(a.display_name) LIKE ? ESCAPE '\\'
            OR ulower(COALESCE(a.english_name, '')) LIKE ? ESCAPE '\\')`)
        params.push(pattern, pattern, pattern)
    }
    if (filter.categories && filter.categories.length > 0) {
        conditions.push('a.category IN (SELECT value FROM json_each(?))')
        params.push(JSON.stringify(filter.categories))
    }
    return {
        clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
        params
    }
}

function openDatabase(dbPath: string): Database.Database {
    try {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true })
        }
        const db = new Database(dbPath)
        // SQLite's LOWER() folds ASCII only; search terms are lowercased in JS
        db.function('ulower', { deterministic: true }, (value: unknown) =>
            typeof value === 'string' ? value.toLowerCase() : null)
        db.exec(SCHEMA_SQL)
        return db
    } catch (err) {
        throw new PersistenceError('open', err)
    }
}

// ─────────────────────────────────────────────
// SqlitePriceStore
// ─────────────────────────────────────────────

export interface SqlitePriceStoreOptions {
    dbPath: string
    seedDemoData?: boolean
}

export class SqlitePriceStore implements PriceStore {
    readonly kind = 'sqlite' as const
    private db: Database.Database

    constructor(options: SqlitePriceStoreOptions) {
        const { dbPath } = options
        this.db = openDatabase(dbPath)

        const { cnt } = this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM assets').get() ?? { cnt: 0 }
        if (cnt === 0 && options.seedDemoData) {
            seedDemoData(this, this.db)
        }

        logger.info('[DB] SQLite price store ready', { dbPath })
    }

    private exec<T>(operation: string, fn: () => T): T {
        try {
            return fn()
        } catch (err) {
            if (err instanceof PersistenceError) throw err
            throw new PersistenceError(operation, err)
        }
    }

    // ──────────────────────────────────────────
    // Asset registry
    // ──────────────────────────────────────────

    /** @internal shared by resolveOrCreateAsset, recordCycle and the demo seed */
    resolveOrCreateSync(seed: AssetSeed): number {
        this.db.prepare(`
            INSERT INTO assets (canonical_name, display_name, english_name, category, description, created_at)
            VALUES (?, ?, ?, ?, ?, ?)
            ON CONFLICT (canonical_name) DO NOTHING
        `).run(
            seed.canonicalName,
            seed.displayName ?? seed.canonicalName,
            seed.englishName ?? null,
            seed.category ?? null,
            seed.description ?? null,
            new Date().toISOString()
        )
        const row = this.db.prepare<[string], { id: number }>('SELECT id FROM assets WHERE canonical_name = ?')
            .get(seed.canonicalName)
        if (!row) {
            throw new Error(`Asset '${seed.canonicalName}' missing after insert`)
        }
        return row.id
    }

    async resolveOrCreateAsset(seed: AssetSeed): Promise<number> {
        return this.exec('resolveOrCreateAsset', () => this.resolveOrCreateSync(seed))
    }

    async getAsset(id: number): Promise<Asset | undefined> {
        return this.exec('getAsset', () => {
            const row = this.db.prepare<[number], AssetRow>('SELECT * FROM assets WHERE id = ?').get(id)
            return row ? rowToAsset(row) : undefined
        })
    }

    async findAssetByName(canonicalName: string): Promise<Asset | undefined> {
        return this.exec('findAssetByName', () => {
            const row = this.db.prepare<[string], AssetRow>('SELECT * FROM assets WHERE canonical_name = ?')
                .get(canonicalName)
            return row ? rowToAsset(row) : undefined
        })
    }

    async removeAsset(id: number): Promise<boolean> {
        return this.exec('removeAsset', () => this.db.prepare('DELETE FROM assets WHERE id = ?').run(id).changes > 0)
    }

    // ──────────────────────────────────────────
    // Writes
    // ──────────────────────────────────────────

    /** @internal */
    appendSync(assetId: number, price: number, recordedAt: string, source: string): PriceObservation {
        const stored = Dec.roundPrice(price)
        const result = this.db.prepare(`
            INSERT INTO price_history (asset_id, price, recorded_at, source)
            VALUES (?, ?, ?, ?)
        `).run(assetId, stored, recordedAt, source)
        return {
            id: Number(result.lastInsertRowid),
            assetId,
            price: stored,
            recordedAt,
            source
        }
    }

    async append(assetId: number, price: number, recordedAt: string, source: string): Promise<PriceObservation> {
        return this.exec('append', () => this.appendSync(assetId, price, recordedAt, source))
    }

    async recordCycle(entries: CycleEntry[], recordedAt: string): Promise<PriceObservation[]> {
        return this.exec('recordCycle', () => {
            const write = this.db.transaction((batch: CycleEntry[]) =>
                batch.map(entry => {
                    const assetId = this.resolveOrCreateSync(entry.seed)
                    return this.appendSync(assetId, entry.price, recordedAt, entry.source)
                })
            )
            return write(entries)
        })
    }

    // ──────────────────────────────────────────
    // Reads
    // ──────────────────────────────────────────

    async latest(assetId: number): Promise<PriceObservation | undefined> {
        return this.exec('latest', () => {
            const row = this.db.prepare<[number], ObservationRow>(`
                SELECT id, asset_id, price, recorded_at, source
                FROM price_history
                WHERE asset_id = ?
                ORDER BY recorded_at DESC, id DESC
                LIMIT 1
            `).get(assetId)
            return row ? rowToObservation(row) : undefined
        })
    }

    async latestBatch(assetIds: number[]): Promise<Map<number, PriceObservation>> {
        const result = new Map<number, PriceObservation>()
        if (assetIds.length === 0) return result
        return this.exec('latestBatch', () => {
            const rows = this.db.prepare<[string], ObservationRow>(`
                SELECT id, asset_id, price, recorded_at, source
                FROM (${LATEST_PER_ASSET_SQL} WHERE asset_id IN (SELECT value FROM json_each(?)))
                WHERE rn = 1
            `).all(JSON.stringify(assetIds))
            for (const row of rows) {
                result.set(row.asset_id, rowToObservation(row))
            }
            return result
        })
    }

    async window(assetId: number, since: string): Promise<PriceObservation[]> {
        return this.exec('window', () => this.db.prepare<[number, string], ObservationRow>(`
                SELECT id, asset_id, price, recorded_at, source
                FROM price_history
                WHERE asset_id = ? AND recorded_at >= ?
                ORDER BY recorded_at ASC, id ASC
            `).all(assetId, since).map(rowToObservation))
    }

    async windowBatch(assetIds: number[], since: string): Promise<SeriesPoint[]> {
        if (assetIds.length === 0) return []
        return this.exec('windowBatch', () => this.db.prepare<[string, string], SeriesRow>(`
                SELECT ph.asset_id, a.display_name, a.english_name, a.category, ph.price, ph.recorded_at
                FROM price_history ph
                JOIN assets a ON a.id = ph.asset_id
                WHERE ph.asset_id IN (SELECT value FROM json_each(?)) AND ph.recorded_at >= ?
                ORDER BY ph.recorded_at ASC, ph.id ASC
            `).all(JSON.stringify(assetIds), since).map(row => ({
                assetId: row.asset_id,
                assetName: row.display_name,
                englishName: row.english_name ?? undefined,
                category: row.category !== null && isAssetCategory(row.category) ? row.category : null,
                price: Number(row.price),
                recordedAt: row.recorded_at
            })))
    }

    async searchAssets(filter: AssetSearchFilter): Promise<AssetSearchResult> {
        return this.exec('searchAssets', () => {
            const { clause, params } = buildSearchWhere(filter)
            const countRow = this.db.prepare<unknown[], { cnt: number }>(
                `SELECT COUNT(*) AS cnt FROM assets a ${clause}`
            ).get(...params)
            const rows = this.db.prepare<unknown[], AssetWithLatestRow>(`
                SELECT a.*, lp.price AS latest_price, lp.recorded_at AS latest_recorded_at
                FROM assets a
                LEFT JOIN (${LATEST_PER_ASSET_SQL}) lp ON lp.asset_id = a.id AND lp.rn = 1
                ${clause}
                ORDER BY a.id ASC
                LIMIT ? OFFSET ?
            `).all(...params, filter.limit, filter.offset)

            return {
                total: countRow?.cnt ?? 0,
                rows: rows.map(row => ({
                    ...rowToAsset(row),
                    latestPrice: row.latest_price === null ? null : Number(row.latest_price),
                    latestRecordedAt: row.latest_recorded_at
                }))
            }
        })
    }

    async assetOptions(categories: AssetCategory[]): Promise<AssetOption[]> {
        if (categories.length === 0) return []
        return this.exec('assetOptions', () => this.db.prepare<[string], { id: number; display_name: string }>(`
                SELECT id, display_name
                FROM assets
                WHERE category IN (SELECT value FROM json_each(?))
                ORDER BY display_name ASC, id ASC
            `).all(JSON.stringify(categories)).map(row => ({ id: row.id, displayName: row.display_name })))
    }

    async countObservations(assetId?: number): Promise<number> {
        return this.exec('countObservations', () => {
            const row = assetId === undefined
                ? this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM price_history').get()
                : this.db.prepare<[number], { cnt: number }>('SELECT COUNT(*) AS cnt FROM price_history WHERE asset_id = ?')
                    .get(assetId)
            return row?.cnt ?? 0
        })
    }

    async ping(): Promise<void> {
        this.exec('ping', () => this.db.prepare('SELECT 1').get())
    }

    async close(): Promise<void> {
        if (this.db.open) {
            this.db.close()
        }
    }
}
