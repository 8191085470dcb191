import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from '../app.js'
import { SqlitePriceStore } from '../db/sqlitePriceStore.js'
import { AnalyticsService } from '../services/analyticsService.js'
import { IngestionService } from '../services/ingestionService.js'
import { QueryService } from '../services/queryService.js'
import type { PriceSource } from '../sources/priceSource.js'
import { SourceError } from '../types/index.js'

const NOW_MS = Date.parse('2026-03-31T00:00:00.000Z')
const DAY_MS = 24 * 60 * 60 * 1000
const daysAgo = (n: number): string => new Date(NOW_MS - n * DAY_MS).toISOString()

const source = (id: string, canonicalName: string, fetchPrice: () => Promise<number>): PriceSource => ({
    id,
    asset: { canonicalName, category: 'Currency' },
    url: `https://prices.test/${id}`,
    fetchPrice
})

describe('HTTP API', () => {
    let store: SqlitePriceStore
    let ingestionService: IngestionService
    let app: Express
    let usd: number
    let gold: number

    const build = (sources: PriceSource[]) => {
        ingestionService = new IngestionService({ store, sources, now: () => new Date(NOW_MS) })
        app = createApp({
            store,
            queryService: new QueryService(store),
            analyticsService: new AnalyticsService({
                store,
                referenceAsset: 'USD',
                referenceRateTtlMs: 60000,
                now: () => NOW_MS
            }),
            ingestionService
        })
    }

    beforeEach(async () => {
        store = new SqlitePriceStore({ dbPath: ':memory:' })
        usd = await store.resolveOrCreateAsset({ canonicalName: 'USD', displayName: 'Dollar', category: 'Currency' })
        gold = await store.resolveOrCreateAsset({ canonicalName: 'Gold18K', displayName: 'Gold', category: 'Commodity' })
        await store.append(usd, 1000000, daysAgo(3), 'test')
        await store.append(usd, 2000000, daysAgo(2), 'test')
        await store.append(usd, 1000000, daysAgo(1), 'test')
        await store.append(gold, 60000000, daysAgo(3), 'test')
        await store.append(gold, 120000000, daysAgo(2), 'test')
        await store.append(gold, 66000000, daysAgo(1), 'test')
        build([source('s:usd', 'USD', async () => 1050000)])
    })

    afterEach(async () => {
        await store.close()
    })

    describe('GET /api/health', () => {
        it('reports store kind and echoes the request id', async () => {
            const res = await request(app).get('/api/health').set('X-Request-Id', 'req-123')

            expect(res.status).toBe(200)
            expect(res.headers['x-request-id']).toBe('req-123')
            expect(res.body).toMatchObject({
                success: true,
                error: null,
                requestId: 'req-123',
                data: { status: 'ok', store: 'sqlite', ingestionRunning: false, lastIngestion: null }
            })
        })

        it('answers 503 when the store is unreachable', async () => {
            await store.close()

            const res = await request(app).get('/api/health')

            expect(res.status).toBe(503)
            expect(res.body.error).toEqual({
                code: 'DATA_UNAVAILABLE',
                message: 'Price data is temporarily unavailable',
                details: { operation: 'ping' }
            })
        })
    })

    describe('assets', () => {
        it('lists assets with their latest price and page meta', async () => {
            const res = await request(app).get('/api/assets?pageSize=1&page=2')

            expect(res.status).toBe(200)
            expect(res.body.meta).toEqual({ total: 2, page: 2, pageSize: 1, pageCount: 2 })
            expect(res.body.data).toHaveLength(1)
            expect(res.body.data[0]).toMatchObject({
                id: gold,
                canonicalName: 'Gold18K',
                latestPrice: 66000000,
                latestRecordedAt: daysAgo(1)
            })
        })

        it('filters by search term and categories', async () => {
            const bySearch = await request(app).get('/api/assets?search=gold')
            expect(bySearch.body.data.map((a: { id: number }) => a.id)).toEqual([gold])

            const byCategory = await request(app).get('/api/assets?categories=Currency&categories=IranianStockFund')
            expect(byCategory.body.meta.total).toBe(1)
        })

        it('rejects an invalid query', async () => {
            const res = await request(app).get('/api/assets?pageSize=0&categories=Stocks')

            expect(res.status).toBe(400)
            expect(res.body.error.code).toBe('VALIDATION_ERROR')
            expect(res.body.error.message).toBe('Invalid request query')
            expect(res.body.error.details.map((d: { field: string }) => d.field).sort()).toEqual(['categories.0', 'pageSize'])
        })

        it('lists options for the selected categories', async () => {
            const res = await request(app).get('/api/assets/options?categories=Commodity,Currency')

            expect(res.body.data).toEqual([
                { id: usd, displayName: 'Dollar' },
                { id: gold, displayName: 'Gold' }
            ])
        })

        it('returns the latest observation of one asset', async () => {
            const res = await request(app).get(`/api/assets/${usd}/latest`)

            expect(res.status).toBe(200)
            expect(res.body.data.asset).toMatchObject({ id: usd, canonicalName: 'USD' })
            expect(res.body.data.latest).toMatchObject({ price: 1000000, recordedAt: daysAgo(1), source: 'test' })
        })

        it('answers null for an asset without observations', async () => {
            const empty = await store.resolveOrCreateAsset({ canonicalName: 'Empty' })
            const res = await request(app).get(`/api/assets/${empty}/latest`)

            expect(res.status).toBe(200)
            expect(res.body.data.latest).toBeNull()
        })

        it('answers 404 for an unknown asset and 400 for a bad id', async () => {
            const missing = await request(app).get('/api/assets/999/latest')
            expect(missing.status).toBe(404)
            expect(missing.body.error).toEqual({ code: 'NOT_FOUND', message: 'Asset 999 not found' })

            const bad = await request(app).get('/api/assets/abc/latest')
            expect(bad.status).toBe(400)
            expect(bad.body.error.code).toBe('VALIDATION_ERROR')
        })

        it('answers 404 without touching the store for ids past the integer range', async () => {
            const getAsset = vi.spyOn(store, 'getAsset')

            const latest = await request(app).get('/api/assets/3000000000/latest')
            expect(latest.status).toBe(404)
            expect(latest.body.error).toEqual({ code: 'NOT_FOUND', message: 'Asset 3000000000 not found' })

            const history = await request(app).get('/api/assets/3000000000/history')
            expect(history.status).toBe(404)
            expect(getAsset).not.toHaveBeenCalled()
        })

        it('returns price history in USD', async () => {
            const res = await request(app).get(`/api/assets/${gold}/history?days=7&currency=USD`)

            expect(res.status).toBe(200)
            expect(res.body.data.status).toBe('ok')
            expect(res.body.data.data.points.map((p: { price: number }) => p.price)).toEqual([60, 120, 66])
            expect(res.body.data.data.change).toMatchObject({ first: 60, last: 66, absolute: 6 })
            expect(res.body.data.data.change.percent).toBeCloseTo(10, 9)
        })

        it('answers 404 for the history of an unknown asset', async () => {
            const res = await request(app).get('/api/assets/999/history')
            expect(res.status).toBe(404)
        })
    })

    describe('GET /api/prices/latest', () => {
        it('returns found prices and lists missing ids', async () => {
            const res = await request(app).get(`/api/prices/latest?ids=${gold},${usd},999`)

            expect(res.status).toBe(200)
            expect(res.body.data.map((o: { assetId: number }) => o.assetId)).toEqual([usd, gold])
            expect(res.body.meta).toEqual({ missing: [999] })
        })

        it('requires at least one id', async () => {
            const res = await request(app).get('/api/prices/latest')

            expect(res.status).toBe(400)
            expect(res.body.error.details).toEqual([{ field: 'ids', message: 'At least one asset id is required' }])
        })
    })

    describe('portfolio', () => {
        it('values a portfolio', async () => {
            const res = await request(app)
                .post('/api/portfolio/valuation')
                .send({ holdings: { [String(gold)]: 2, [String(usd)]: 10 }, currency: 'USD' })

            expect(res.status).toBe(200)
            expect(res.body.data.status).toBe('ok')
            expect(res.body.data.data).toMatchObject({
                total: 142,
                totalLocal: 142000000,
                requestedCurrency: 'USD',
                currency: { currency: 'USD', converted: true, rate: 1000000 },
                distribution: 'ok'
            })
        })

        it('rejects unknown fields and non-numeric keys', async () => {
            const extra = await request(app).post('/api/portfolio/valuation').send({ holdings: {}, owner: 'x' })
            expect(extra.status).toBe(400)
            expect(extra.body.error.message).toBe('Invalid request payload')

            const badKey = await request(app).post('/api/portfolio/valuation').send({ holdings: { gold: 1 } })
            expect(badKey.status).toBe(400)
        })

        it('rejects malformed JSON', async () => {
            const res = await request(app)
                .post('/api/portfolio/valuation')
                .set('Content-Type', 'application/json')
                .send('{"holdings":')

            expect(res.status).toBe(400)
            expect(res.body.error).toEqual({ code: 'BAD_REQUEST', message: 'Malformed JSON body' })
        })

        it('returns normalized performance', async () => {
            const res = await request(app).post('/api/portfolio/performance').send({ holdings: { [String(usd)]: 1 } })

            expect(res.status).toBe(200)
            expect(res.body.data.data[0].points.map((p: { value: number }) => p.value)).toEqual([100, 200, 100])
        })
    })

    describe('GET /api/analytics/compare', () => {
        it('compares assets', async () => {
            const res = await request(app).get(`/api/analytics/compare?ids=${usd},${gold}&kind=performance`)

            expect(res.status).toBe(200)
            expect(res.body.data.status).toBe('ok')
            expect(res.body.data.data.kind).toBe('performance')
            expect(res.body.data.data.series).toHaveLength(2)
        })

        it('reports insufficient data as a successful response', async () => {
            const res = await request(app).get(`/api/analytics/compare?ids=${usd}`)

            expect(res.status).toBe(200)
            expect(res.body.data).toEqual({ status: 'insufficient_data', reason: 'Select at least two assets to compare' })
        })

        it('rejects an unknown kind', async () => {
            const res = await request(app).get(`/api/analytics/compare?ids=${usd},${gold}&kind=beta`)
            expect(res.status).toBe(400)
        })
    })

    describe('ingestion', () => {
        it('runs a cycle and refreshes the USD rate', async () => {
            const before = await request(app).post('/api/portfolio/valuation').send({ holdings: { [String(gold)]: 1 }, currency: 'USD' })
            expect(before.body.data.data.currency.rate).toBe(1000000)

            const res = await request(app).post('/api/ingestion/run')

            expect(res.status).toBe(200)
            expect(res.body.data).toMatchObject({ success: true, recordedAt: '2026-03-31T00:00:00.000Z', errors: [] })

            const after = await request(app).post('/api/portfolio/valuation').send({ holdings: { [String(gold)]: 1 }, currency: 'USD' })
            expect(after.body.data.data.currency.rate).toBe(1050000)

            const status = await request(app).get('/api/ingestion/status')
            expect(status.body.data).toMatchObject({ running: false, lastResult: { success: true } })
        })

        it('answers 502 with every failure when the cycle commits nothing', async () => {
            build([
                source('s:usd', 'USD', async () => 1050000),
                source('s:down', 'Down', async () => {
                    throw new SourceError('s:down', 'transport', 'HTTP 500 from https://prices.test/s:down')
                })
            ])

            const res = await request(app).post('/api/ingestion/run')

            expect(res.status).toBe(502)
            expect(res.body.error.code).toBe('INGESTION_FAILED')
            expect(res.body.error.details).toEqual([{
                stage: 'fetch',
                sourceId: 's:down',
                kind: 'transport',
                message: '[s:down] HTTP 500 from https://prices.test/s:down'
            }])
            expect(await store.countObservations()).toBe(6)
        })

        it('answers 409 while a cycle is running', async () => {
            let release: (price: number) => void = () => {}
            build([source('s:slow', 'USD', () => new Promise<number>(resolve => {
                release = resolve
            }))])

            const first = request(app).post('/api/ingestion/run').then(res => res)
            await vi.waitFor(() => expect(ingestionService.isRunning()).toBe(true))

            const second = await request(app).post('/api/ingestion/run')
            expect(second.status).toBe(409)
            expect(second.body.error).toEqual({ code: 'CONFLICT', message: 'An ingestion cycle is already running' })

            release(1100000)
            expect((await first).status).toBe(200)
        })
    })

    it('answers 404 for unknown routes', async () => {
        const res = await request(app).get('/api/nope')

        expect(res.status).toBe(404)
        expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route not found: GET /api/nope' })
    })
})
