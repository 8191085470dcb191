import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SqlitePriceStore } from '../db/sqlitePriceStore.js'
import { IngestionService } from '../services/ingestionService.js'
import type { PriceSource } from '../sources/priceSource.js'
import { SourceError, type AssetSeed } from '../types/index.js'

class FakeSource implements PriceSource {
    readonly url: string
    calls = 0

    constructor(
        readonly id: string,
        readonly asset: AssetSeed,
        private readonly behaviour: (signal?: AbortSignal) => Promise<number>
    ) {
        this.url = `https://prices.test/${id}`
    }

    fetchPrice(signal?: AbortSignal): Promise<number> {
        this.calls++
        return this.behaviour(signal)
    }
}

const fixed = (id: string, canonicalName: string, price: number) =>
    new FakeSource(id, { canonicalName }, async () => price)

const failing = (id: string, canonicalName: string, error: Error) =>
    new FakeSource(id, { canonicalName }, async () => {
        throw error
    })

const FIXED_NOW = new Date('2026-03-01T08:00:00.000Z')

describe('IngestionService', () => {
    let store: SqlitePriceStore

    beforeEach(() => {
        store = new SqlitePriceStore({ dbPath: ':memory:' })
    })

    afterEach(async () => {
        await store.close()
    })

    it('commits one observation per source under a single timestamp', async () => {
        const service = new IngestionService({
            store,
            sources: [fixed('s:gold', 'Gold18K', 68500000), fixed('s:usd', 'USD', 1030000)],
            now: () => FIXED_NOW
        })

        const result = await service.runIngestionCycle()

        expect(result.success).toBe(true)
        expect(result.errors).toEqual([])
        expect(result.recordedAt).toBe('2026-03-01T08:00:00.000Z')
        expect(result.observations?.map(o => [o.source, o.price])).toEqual([
            ['s:gold', 68500000],
            ['s:usd', 1030000]
        ])
        expect(await store.countObservations()).toBe(2)
        expect(service.getLastResult()).toBe(result)
    })

    it('writes nothing when one source fails and reports every failure', async () => {
        const later = fixed('s:later', 'Later', 5)
        const service = new IngestionService({
            store,
            sources: [
                fixed('s:ok', 'Ok', 10),
                failing('s:parse', 'Parse', new SourceError('s:parse', 'parse', 'Row not found')),
                failing('s:boom', 'Boom', new Error('socket hang up')),
                later
            ]
        })

        const result = await service.runIngestionCycle()

        expect(result.success).toBe(false)
        expect(result.errors).toEqual([
            { stage: 'fetch', sourceId: 's:parse', kind: 'parse', message: '[s:parse] Row not found' },
            { stage: 'fetch', sourceId: 's:boom', kind: 'unexpected', message: 'socket hang up' }
        ])
        expect(later.calls).toBe(1)
        expect(await store.countObservations()).toBe(0)
        expect(await store.findAssetByName('Ok')).toBeUndefined()
    })

    it('treats an unusable price from a source as a data quality failure', async () => {
        const service = new IngestionService({ store, sources: [fixed('s:nan', 'Nan', Number.NaN)] })

        const result = await service.runIngestionCycle()

        expect(result.errors).toEqual([
            { stage: 'fetch', sourceId: 's:nan', kind: 'data_quality', message: '[s:nan] Source returned unusable price NaN' }
        ])
    })

    it('reports a persistence failure without throwing', async () => {
        const service = new IngestionService({ store, sources: [fixed('s:usd', 'USD', 1)] })
        await store.close()

        const result = await service.runIngestionCycle()

        expect(result.success).toBe(false)
        expect(result.errors).toHaveLength(1)
        expect(result.errors[0]).toMatchObject({ stage: 'persist', kind: 'persistence' })
        expect(result.errors[0]?.message).toMatch(/^Store operation 'recordCycle' failed: /)
    })

    it('wraps a non-persistence store error', async () => {
        const failingStore = new SqlitePriceStore({ dbPath: ':memory:' })
        failingStore.recordCycle = async () => {
            throw new Error('disk full')
        }
        const service = new IngestionService({ store: failingStore, sources: [fixed('s:usd', 'USD', 1)] })

        const result = await service.runIngestionCycle()

        expect(result.errors).toEqual([
            { stage: 'persist', kind: 'persistence', message: "Store operation 'recordCycle' failed: disk full" }
        ])
        await failingStore.close()
    })

    it('refuses to start a second cycle while one is running', async () => {
        let release: (price: number) => void = () => {}
        const slow = new FakeSource('s:slow', { canonicalName: 'Slow' }, () => new Promise<number>(resolve => {
            release = resolve
        }))
        const service = new IngestionService({ store, sources: [slow] })

        const first = service.runIngestionCycle()
        expect(service.isRunning()).toBe(true)

        const second = await service.runIngestionCycle()
        expect(second.success).toBe(false)
        expect(second.errors).toEqual([
            { stage: 'lock', kind: 'busy', message: 'An ingestion cycle is already running' }
        ])
        expect(service.getLastResult()).toBeNull()

        release(42)
        const done = await first
        expect(done.success).toBe(true)
        expect(service.isRunning()).toBe(false)
        expect(slow.calls).toBe(1)
    })

    it('aborts outstanding fetches at the cycle deadline', async () => {
        const hanging = new FakeSource('s:hang', { canonicalName: 'Hang' }, signal => new Promise<number>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new SourceError('s:hang', 'transport', 'Cycle deadline exceeded')))
        }))
        const never = fixed('s:after', 'After', 1)
        const service = new IngestionService({ store, sources: [hanging, never], cycleTimeoutMs: 20 })

        const result = await service.runIngestionCycle()

        expect(result.success).toBe(false)
        expect(result.errors).toEqual([
            { stage: 'fetch', sourceId: 's:hang', kind: 'transport', message: '[s:hang] Cycle deadline exceeded' },
            {
                stage: 'fetch',
                sourceId: 's:after',
                kind: 'transport',
                message: '[s:after] Cycle deadline exceeded before fetch'
            }
        ])
        expect(never.calls).toBe(0)
    })

    it('skips a source whose asset has a blank name before fetching it', async () => {
        const blank = fixed('s:blank', '  ', 10)
        const service = new IngestionService({ store, sources: [fixed('s:ok', 'Ok', 10), blank] })

        const result = await service.runIngestionCycle()

        expect(result.success).toBe(false)
        expect(result.errors).toEqual([
            { stage: 'fetch', sourceId: 's:blank', kind: 'unexpected', message: 'canonicalName must not be empty' }
        ])
        expect(blank.calls).toBe(0)
        expect(await store.countObservations()).toBe(0)
    })

    it('appends one row per asset per cycle and never rewrites history', async () => {
        let clock = Date.parse('2026-03-01T08:00:00.000Z')
        let tick = 0
        const gold = new FakeSource('s:gold', { canonicalName: 'Gold18K' }, async () => 68000000 + tick * 1000)
        const usd = new FakeSource('s:usd', { canonicalName: 'USD' }, async () => 1000000 + tick)
        const service = new IngestionService({ store, sources: [gold, usd], now: () => new Date(clock) })

        const stamps: string[] = []
        for (tick = 0; tick < 4; tick++) {
            const result = await service.runIngestionCycle()
            expect(result.success).toBe(true)
            stamps.push(result.recordedAt ?? '')
            // the last two cycles share a timestamp
            if (tick < 2) clock += 15 * 60 * 1000
        }

        const goldId = (await store.findAssetByName('Gold18K'))?.id ?? 0
        const usdId = (await store.findAssetByName('USD'))?.id ?? 0
        expect(await store.countObservations(goldId)).toBe(4)
        expect(await store.countObservations(usdId)).toBe(4)

        const goldRows = await store.window(goldId, '2026-03-01T00:00:00.000Z')
        expect(goldRows.map(o => o.recordedAt)).toEqual(stamps)
        expect(goldRows.map(o => o.price)).toEqual([68000000, 68001000, 68002000, 68003000])
        for (let i = 1; i < goldRows.length; i++) {
            expect(Date.parse(goldRows[i]?.recordedAt ?? '')).toBeGreaterThanOrEqual(Date.parse(goldRows[i - 1]?.recordedAt ?? ''))
            expect(goldRows[i]?.id).toBeGreaterThan(goldRows[i - 1]?.id ?? 0)
        }
        expect(stamps).toEqual([
            '2026-03-01T08:00:00.000Z',
            '2026-03-01T08:15:00.000Z',
            '2026-03-01T08:30:00.000Z',
            '2026-03-01T08:30:00.000Z'
        ])
    })
})
