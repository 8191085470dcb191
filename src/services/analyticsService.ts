import type { PriceStore } from '../db/priceStore.js'
import {
    isStorableAssetId,
    type AnalyticsResult,
    type Asset,
    type Currency,
    type PortfolioHoldings,
    type SeriesPoint
} from '../types/index.js'
import { logger } from '../utils/logger.js'
import {
    correlationMatrix,
    normalizePerformance,
    pivotByTimestamp,
    volatilityDistribution,
    type CorrelationMatrix,
    type NormalizedSeries,
    type VolatilityDistribution
} from '../utils/timeSeries.js'
import {
    parseHoldings,
    rebaseAmounts,
    rebaseValuation,
    valuePortfolio,
    type PortfolioValuation,
    type RebaseOutcome
} from '../utils/valuation.js'

export const COMPARISON_KINDS = ['performance', 'correlation', 'volatility'] as const

export type ComparisonKind = typeof COMPARISON_KINDS[number]

const DAY_MS = 24 * 60 * 60 * 1000

export interface PortfolioValuationReport extends PortfolioValuation {
    requestedCurrency: Currency
    currency: RebaseOutcome
    /** Total in rial, whatever currency the rest of the report is in */
    totalLocal: number
    /** Most recent observation time among the priced holdings */
    asOf: string | null
}

export type ComparisonReport = { currency: RebaseOutcome; days: number } & (
    | { kind: 'performance'; series: NormalizedSeries[] }
    | { kind: 'correlation'; correlation: CorrelationMatrix }
    | { kind: 'volatility'; volatility: VolatilityDistribution }
)

export interface AssetHistoryReport {
    asset: Asset
    currency: RebaseOutcome
    days: number
    points: { recordedAt: string; price: number }[]
    change: { first: number; last: number; absolute: number; percent: number | null }
}

export interface AnalyticsServiceOptions {
    store: PriceStore
    /** Canonical name of the asset whose latest price is the rial per USD rate */
    referenceAsset: string
    referenceRateTtlMs: number
    now?: () => number
}

export class AnalyticsService {
    private readonly store: PriceStore
    private readonly referenceAsset: string
    private readonly referenceRateTtlMs: number
    private readonly now: () => number
    private rateCache: { rate: number | null; fetchedAt: number } | null = null

    constructor(options: AnalyticsServiceOptions) {
        this.store = options.store
        this.referenceAsset = options.referenceAsset
        this.referenceRateTtlMs = options.referenceRateTtlMs
        this.now = options.now ?? Date.now
    }

    /**
     * Latest price of the reference asset, re-read from the store once the
     * cached value is older than the TTL. Null when it was never observed.
     */
    async getReferenceRate(): Promise<number | null> {
        const now = this.now()
        if (this.rateCache && now - this.rateCache.fetchedAt < this.referenceRateTtlMs) {
            return this.rateCache.rate
        }

        const asset = await this.store.findAssetByName(this.referenceAsset)
        const latest = asset ? await this.store.latest(asset.id) : undefined
        const rate = latest?.price ?? null
        if (rate === null) {
            logger.debug('[ANALYTICS] Reference rate unavailable', { referenceAsset: this.referenceAsset })
        }
        this.rateCache = { rate, fetchedAt: now }
        return rate
    }

    invalidateReferenceRate(): void {
        this.rateCache = null
    }

    private since(days: number): string {
        return new Date(this.now() - days * DAY_MS).toISOString()
    }

    async portfolioValuation(
        holdings: PortfolioHoldings,
        currency: Currency
    ): Promise<AnalyticsResult<PortfolioValuationReport>> {
        // ids outside the storable range stay out of the queries and surface as unknownAssets
        const ids = parseHoldings(holdings).map(h => h.assetId).filter(isStorableAssetId)

        const assets = new Map<number, Asset>()
        for (const asset of await Promise.all(ids.map(id => this.store.getAsset(id)))) {
            if (asset) assets.set(asset.id, asset)
        }
        const latest = await this.store.latestBatch(ids)
        const prices = new Map([...latest].map(([id, observation]): [number, number] => [id, observation.price]))

        const local = valuePortfolio(holdings, prices, assets)
        const rate = currency === 'USD' ? await this.getReferenceRate() : null
        const rebased = rebaseValuation(local, currency, rate)

        let asOf: string | null = null
        for (const observation of latest.values()) {
            if (asOf === null || Date.parse(observation.recordedAt) > Date.parse(asOf)) {
                asOf = observation.recordedAt
            }
        }

        return {
            status: 'ok',
            data: {
                ...rebased.values,
                requestedCurrency: currency,
                currency: rebased.outcome,
                totalLocal: local.total,
                asOf
            }
        }
    }

    async portfolioPerformance(
        holdings: PortfolioHoldings,
        days: number = 30
    ): Promise<AnalyticsResult<NormalizedSeries[]>> {
        const ids = parseHoldings(holdings).map(h => h.assetId).filter(isStorableAssetId)
        if (ids.length === 0) {
            return { status: 'insufficient_data', reason: 'Portfolio holds no assets with a positive quantity' }
        }
        const points = await this.store.windowBatch(ids, this.since(days))
        return normalizePerformance(points)
    }

    async compareAssets(
        assetIds: number[],
        kind: ComparisonKind,
        currency: Currency,
        days: number = 90
    ): Promise<AnalyticsResult<ComparisonReport>> {
        const ids = [...new Set(assetIds)].filter(isStorableAssetId)
        if (ids.length < 2) {
            return { status: 'insufficient_data', reason: 'Select at least two assets to compare' }
        }

        const raw = await this.store.windowBatch(ids, this.since(days))
        if (raw.length === 0) {
            return { status: 'insufficient_data', reason: 'No historical data available' }
        }

        const rate = currency === 'USD' ? await this.getReferenceRate() : null
        const rebased = rebaseAmounts(raw.map(p => p.price), currency, rate)
        const points: SeriesPoint[] = raw.map((p, i) => ({ ...p, price: rebased.values[i] ?? p.price }))
        const base = { currency: rebased.outcome, days }

        switch (kind) {
            case 'performance': {
                const result = normalizePerformance(points)
                return result.status === 'ok'
                    ? { status: 'ok', data: { ...base, kind, series: result.data } }
                    : result
            }
            case 'correlation': {
                const result = correlationMatrix(pivotByTimestamp(points))
                return result.status === 'ok'
                    ? { status: 'ok', data: { ...base, kind, correlation: result.data } }
                    : result
            }
            case 'volatility': {
                const result = volatilityDistribution(pivotByTimestamp(points))
                return result.status === 'ok'
                    ? { status: 'ok', data: { ...base, kind, volatility: result.data } }
                    : result
            }
        }
    }

    /**
     * Window of one asset's prices. Resolves undefined when the asset does
     * not exist.
     */
    async assetHistory(
        assetId: number,
        days: number,
        currency: Currency
    ): Promise<AnalyticsResult<AssetHistoryReport> | undefined> {
        if (!isStorableAssetId(assetId)) return undefined
        const asset = await this.store.getAsset(assetId)
        if (!asset) return undefined

        const observations = await this.store.window(assetId, this.since(days))
        if (observations.length === 0) {
            return { status: 'insufficient_data', reason: `No observations in the last ${days} day(s)` }
        }

        const rate = currency === 'USD' ? await this.getReferenceRate() : null
        const rebased = rebaseAmounts(observations.map(o => o.price), currency, rate)
        const points = observations.map((o, i) => ({ recordedAt: o.recordedAt, price: rebased.values[i] ?? o.price }))

        const first = points[0]?.price ?? 0
        const last = points[points.length - 1]?.price ?? 0
        return {
            status: 'ok',
            data: {
                asset,
                currency: rebased.outcome,
                days,
                points,
                change: {
                    first,
                    last,
                    absolute: last - first,
                    percent: first === 0 ? null : ((last - first) / first) * 100
                }
            }
        }
    }
}
