import pg from 'pg'
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

// pg hands back BIGINT/NUMERIC as strings and TIMESTAMPTZ as Date
interface AssetRow {
    id: number | string
    canonical_name: string
    display_name: string
    english_name: string | null
    category: string | null
    description: string | null
    created_at: Date
}

interface AssetWithLatestRow extends AssetRow {
    latest_price: string | null
    latest_recorded_at: Date | null
}

interface ObservationRow {
    id: number | string
    asset_id: number | string
    price: string
    recorded_at: Date
    source: string
}

interface SeriesRow {
    asset_id: number | string
    display_name: string
    english_name: string | null
    category: string | null
    price: string
    recorded_at: Date
}

const OBSERVATION_COLUMNS = 'id, asset_id, price, recorded_at, source'

function rowToAsset(row: AssetRow): Asset {
    return {
        id: Number(row.id),
        canonicalName: row.canonical_name,
        displayName: row.display_name,
        englishName: row.english_name ?? undefined,
        category: row.category !== null && isAssetCategory(row.category) ? row.category : null,
        description: row.description ?? undefined,
        createdAt: row.created_at.toISOString()
    }
}

function rowToObservation(row: ObservationRow): PriceObservation {
    return {
        id: Number(row.id),
        assetId: Number(row.asset_id),
        price: Number(row.price),
        recordedAt: row.recorded_at.toISOString(),
        source: row.source
    }
}

function buildSearchWhere(filter: AssetSearchFilter): { clause: string; params: unknown[] } {
    const conditions: string[] = []
    const params: unknown[] = []
    const term = filter.searchTerm?.trim()
    if (term) {
        params.push(toSearchPattern(term))
        const p = `$${params.length}`
        conditions.push(`(LOWER(a.canonical_name) LIKE ${p} ESCAPE '\\'
            OR LOWER(a.display_name) LIKE ${p} ESCAPE '\\'
            OR LOWER(COALESCE(a.english_name, '')) LIKE ${p} ESCAPE '\\')`)
    }
    if (filter.categories && filter.categories.length > 0) {
        params.push(filter.categories)
        conditions.push(`a.category = ANY($${params.length}::text[])`)
    }
    return {
        clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
        params
    }
}

/**
 * PostgreSQL backend. Schema comes from the versioned migrations
 * (npm run db:migrate); this class never issues DDL.
 */
export class PgPriceStore implements PriceStore {
    readonly kind = 'postgres' as const
    private readonly pool: pg.Pool

    constructor(pool: pg.Pool) {
        this.pool = pool
    }

    private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (err) {
            if (err instanceof PersistenceError) throw err
            throw new PersistenceError(operation, err)
        }
    }

    private async transaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect()
        try {
            await client.query('BEGIN')
            const result = await fn(client)
            await client.query('COMMIT')
            return result
        } catch (err) {
            try {
                await client.query('ROLLBACK')
            } catch (rollbackErr) {
                logger.error('[DB] Rollback failed', { error: rollbackErr })
            }
            throw err
        } finally {
            client.release()
        }
    }

    private async resolveWith(client: pg.PoolClient, seed: AssetSeed): Promise<number> {
        await client.query(
            `INSERT INTO assets (canonical_name, display_name, english_name, category, description)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (canonical_name) DO NOTHING`,
            [
                seed.canonicalName,
                seed.displayName ?? seed.canonicalName,
                seed.englishName ?? null,
                seed.category ?? null,
                seed.description ?? null
            ]
        )
        const result = await client.query<{ id: number | string }>(
            'SELECT id FROM assets WHERE canonical_name = $1',
            [seed.canonicalName]
        )
        const row = result.rows[0]
        if (!row) {
            throw new Error(`Asset '${seed.canonicalName}' missing after insert`)
        }
        return Number(row.id)
    }

    private async appendWith(
        client: pg.PoolClient,
        assetId: number,
        price: number,
        recordedAt: string,
        source: string
    ): Promise<PriceObservation> {
        const result = await client.query<ObservationRow>(
            `INSERT INTO price_history (asset_id, price, recorded_at, source)
             VALUES ($1, $2, $3, $4)
             RETURNING ${OBSERVATION_COLUMNS}`,
            [assetId, Dec.roundPrice(price), recordedAt, source]
        )
        const row = result.rows[0]
        if (!row) {
            throw new Error('INSERT returned no row')
        }
        return rowToObservation(row)
    }

    async resolveOrCreateAsset(seed: AssetSeed): Promise<number> {
        return this.run('resolveOrCreateAsset', () => this.transaction(client => this.resolveWith(client, seed)))
    }

    async getAsset(id: number): Promise<Asset | undefined> {
        return this.run('getAsset', async () => {
            const result = await this.pool.query<AssetRow>('SELECT * FROM assets WHERE id = $1', [id])
            const row = result.rows[0]
            return row ? rowToAsset(row) : undefined
        })
    }

    async findAssetByName(canonicalName: string): Promise<Asset | undefined> {
        return this.run('findAssetByName', async () => {
            const result = await this.pool.query<AssetRow>('SELECT * FROM assets WHERE canonical_name = $1', [canonicalName])
            const row = result.rows[0]
            return row ? rowToAsset(row) : undefined
        })
    }

    async removeAsset(id: number): Promise<boolean> {
        return this.run('removeAsset', async () => {
            const result = await this.pool.query('DELETE FROM assets WHERE id = $1', [id])
            return (result.rowCount ?? 0) > 0
        })
    }

    async append(assetId: number, price: number, recordedAt: string, source: string): Promise<PriceObservation> {
        return this.run('append', () =>
            this.transaction(client => this.appendWith(client, assetId, price, recordedAt, source)))
    }

    async recordCycle(entries: CycleEntry[], recordedAt: string): Promise<PriceObservation[]> {
        return this.run('recordCycle', () => this.transaction(async client => {
            const written: PriceObservation[] = []
            for (const entry of entries) {
                const assetId = await this.resolveWith(client, entry.seed)
                written.push(await this.appendWith(client, assetId, entry.price, recordedAt, entry.source))
            }
            return written
        }))
    }

    async latest(assetId: number): Promise<PriceObservation | undefined> {
        return this.run('latest', async () => {
            const result = await this.pool.query<ObservationRow>(
                `SELECT ${OBSERVATION_COLUMNS}
                 FROM price_history
                 WHERE asset_id = $1
                 ORDER BY recorded_at DESC, id DESC
                 LIMIT 1`,
                [assetId]
            )
            const row = result.rows[0]
            return row ? rowToObservation(row) : undefined
        })
    }

    async latestBatch(assetIds: number[]): Promise<Map<number, PriceObservation>> {
        const latest = new Map<number, PriceObservation>()
        if (assetIds.length === 0) return latest
        return this.run('latestBatch', async () => {
            const result = await this.pool.query<ObservationRow>(
                `SELECT DISTINCT ON (asset_id) ${OBSERVATION_COLUMNS}
                 FROM price_history
                 WHERE asset_id = ANY($1::int[])
                 ORDER BY asset_id, recorded_at DESC, id DESC`,
                [assetIds]
            )
            for (const row of result.rows) {
                const observation = rowToObservation(row)
                latest.set(observation.assetId, observation)
            }
            return latest
        })
    }

    async window(assetId: number, since: string): Promise<PriceObservation[]> {
        return this.run('window', async () => {
            const result = await this.pool.query<ObservationRow>(
                `SELECT ${OBSERVATION_COLUMNS}
                 FROM price_history
                 WHERE asset_id = $1 AND recorded_at >= $2
                 ORDER BY recorded_at ASC, id ASC`,
                [assetId, since]
            )
            return result.rows.map(rowToObservation)
        })
    }

    async windowBatch(assetIds: number[], since: string): Promise<SeriesPoint[]> {
        if (assetIds.length === 0) return []
        return this.run('windowBatch', async () => {
            const result = await this.pool.query<SeriesRow>(
                `SELECT ph.asset_id, a.display_name, a.english_name, a.category, ph.price, ph.recorded_at
                 FROM price_history ph
                 JOIN assets a ON a.id = ph.asset_id
                 WHERE ph.asset_id = ANY($1::int[]) AND ph.recorded_at >= $2
                 ORDER BY ph.recorded_at ASC, ph.id ASC`,
                [assetIds, since]
            )
            return result.rows.map(row => ({
                assetId: Number(row.asset_id),
                assetName: row.display_name,
                englishName: row.english_name ?? undefined,
                category: row.category !== null && isAssetCategory(row.category) ? row.category : null,
                price: Number(row.price),
                recordedAt: row.recorded_at.toISOString()
            }))
        })
    }

    async searchAssets(filter: AssetSearchFilter): Promise<AssetSearchResult> {
        return this.run('searchAssets', async () => {
            const { clause, params } = buildSearchWhere(filter)
            const countResult = await this.pool.query<{ cnt: string }>(
                `SELECT COUNT(*) AS cnt FROM assets a ${clause}`,
                params
            )
            const limitIdx = params.length + 1
            const rowsResult = await this.pool.query<AssetWithLatestRow>(
                `SELECT a.*, lp.price AS latest_price, lp.recorded_at AS latest_recorded_at
                 FROM assets a
                 LEFT JOIN LATERAL (
                     SELECT price, recorded_at
                     FROM price_history ph
                     WHERE ph.asset_id = a.id
                     ORDER BY ph.recorded_at DESC, ph.id DESC
                     LIMIT 1
                 ) lp ON TRUE
                 ${clause}
                 ORDER BY a.id ASC
                 LIMIT $${limitIdx} OFFSET $${limitIdx + 1}`,
                [...params, filter.limit, filter.offset]
            )
            return {
                total: Number(countResult.rows[0]?.cnt ?? 0),
                rows: rowsResult.rows.map(row => ({
                    ...rowToAsset(row),
                    latestPrice: row.latest_price === null ? null : Number(row.latest_price),
                    latestRecordedAt: row.latest_recorded_at ? row.latest_recorded_at.toISOString() : null
                }))
            }
        })
    }

    async assetOptions(categories: AssetCategory[]): Promise<AssetOption[]> {
        if (categories.length === 0) return []
        return this.run('assetOptions', async () => {
            const result = await this.pool.query<{ id: number | string; display_name: string }>(
                `SELECT id, display_name
                 FROM assets
                 WHERE category = ANY($1::text[])
                 ORDER BY display_name ASC, id ASC`,
                [categories]
            )
            return result.rows.map(row => ({ id: Number(row.id), displayName: row.display_name }))
        })
    }

    async countObservations(assetId?: number): Promise<number> {
        return this.run('countObservations', async () => {
            const result = assetId === undefined
                ? await this.pool.query<{ cnt: string }>('SELECT COUNT(*) AS cnt FROM price_history')
                : await this.pool.query<{ cnt: string }>(
                    'SELECT COUNT(*) AS cnt FROM price_history WHERE asset_id = $1',
                    [assetId]
                )
            return Number(result.rows[0]?.cnt ?? 0)
        })
    }

    async ping(): Promise<void> {
        await this.run('ping', () => this.pool.query('SELECT 1'))
    }

    async close(): Promise<void> {
        await this.pool.end()
    }
}
