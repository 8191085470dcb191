import type { Asset, Currency, PortfolioHoldings } from '../types/index.js'
import { Dec } from './decimal.js'

export const UNCATEGORIZED = 'Uncategorized'

export interface Holding {
    assetId: number
    quantity: number
}

export interface ValuationLine {
    assetId: number
    assetName: string
    category: string
    quantity: number
    price: number | null
    value: number
}

export interface CategoryValue {
    category: string
    value: number
    assets: { assetId: number; assetName: string; value: number }[]
}

export interface PortfolioValuation {
    lines: ValuationLine[]
    total: number
    byCategory: CategoryValue[]
    /** Held assets without any recorded price; valued at 0 */
    missingPrices: number[]
    /** Held ids that match no asset */
    unknownAssets: number[]
    distribution: 'ok' | 'no_data'
}

export type RebaseOutcome =
    | { currency: Currency; converted: boolean; rate: number | null }
    | { currency: 'IRR'; converted: false; rate: null; reason: 'reference_rate_unavailable' }

export interface Rebased<T> {
    values: T
    outcome: RebaseOutcome
}

/** 1 is what the rate reads before the reference asset was ever fetched. */
export function isUsableRate(rate: number | null | undefined): rate is number {
    return typeof rate === 'number' && Number.isFinite(rate) && rate > 1
}

/**
 * Converts rial amounts into `target`. When USD is asked for but no usable
 * reference rate exists the amounts stay in rial and the outcome says why.
 */
export function rebaseAmounts(
    values: readonly number[],
    target: Currency,
    referenceRate: number | null | undefined
): Rebased<number[]> {
    if (target === 'IRR') {
        return { values: [...values], outcome: { currency: 'IRR', converted: false, rate: null } }
    }
    if (!isUsableRate(referenceRate)) {
        return {
            values: [...values],
            outcome: { currency: 'IRR', converted: false, rate: null, reason: 'reference_rate_unavailable' }
        }
    }
    return {
        values: values.map(v => Dec.div(v, referenceRate)),
        outcome: { currency: 'USD', converted: true, rate: referenceRate }
    }
}

/**
 * Keeps positive finite quantities keyed by a positive integer id. Later
 * duplicates of the same id (e.g. "7" and "07") overwrite earlier ones.
 */
export function parseHoldings(holdings: PortfolioHoldings): Holding[] {
    const byId = new Map<number, number>()
    for (const [key, quantity] of Object.entries(holdings)) {
        if (!/^\d+$/.test(key.trim())) continue
        const assetId = Number(key.trim())
        if (!Number.isSafeInteger(assetId) || assetId <= 0) continue
        if (typeof quantity !== 'number' || !Number.isFinite(quantity) || quantity <= 0) continue
        byId.set(assetId, quantity)
    }
    return [...byId.entries()]
        .map(([assetId, quantity]) => ({ assetId, quantity }))
        .sort((a, b) => a.assetId - b.assetId)
}

export function valuePortfolio(
    holdings: PortfolioHoldings,
    prices: ReadonlyMap<number, number>,
    assets: ReadonlyMap<number, Asset>
): PortfolioValuation {
    const lines: ValuationLine[] = []
    const missingPrices: number[] = []
    const unknownAssets: number[] = []

    for (const { assetId, quantity } of parseHoldings(holdings)) {
        const asset = assets.get(assetId)
        if (!asset) {
            unknownAssets.push(assetId)
            continue
        }
        const price = prices.get(assetId)
        if (price === undefined) missingPrices.push(assetId)
        lines.push({
            assetId,
            assetName: asset.displayName,
            category: asset.category ?? UNCATEGORIZED,
            quantity,
            price: price ?? null,
            value: price === undefined ? 0 : Dec.mul(quantity, price)
        })
    }

    const categories = new Map<string, CategoryValue>()
    for (const line of lines) {
        let bucket = categories.get(line.category)
        if (!bucket) {
            bucket = { category: line.category, value: 0, assets: [] }
            categories.set(line.category, bucket)
        }
        bucket.value = Dec.add(bucket.value, line.value)
        bucket.assets.push({ assetId: line.assetId, assetName: line.assetName, value: line.value })
    }

    const total = Dec.sum(lines.map(l => l.value))
    return {
        lines,
        total,
        byCategory: [...categories.values()],
        missingPrices,
        unknownAssets,
        distribution: total > 0 ? 'ok' : 'no_data'
    }
}

/** Applies a USD rate to every amount of a rial valuation. */
export function rebaseValuation(
    valuation: PortfolioValuation,
    target: Currency,
    referenceRate: number | null | undefined
): Rebased<PortfolioValuation> {
    const { outcome } = rebaseAmounts([], target, referenceRate)
    if (!outcome.converted || outcome.rate === null) {
        return { values: valuation, outcome }
    }
    const rate = outcome.rate
    const convert = (amount: number) => Dec.div(amount, rate)
    return {
        outcome,
        values: {
            ...valuation,
            total: convert(valuation.total),
            lines: valuation.lines.map(line => ({
                ...line,
                price: line.price === null ? null : convert(line.price),
                value: convert(line.value)
            })),
            byCategory: valuation.byCategory.map(bucket => ({
                ...bucket,
                value: convert(bucket.value),
                assets: bucket.assets.map(a => ({ ...a, value: convert(a.value) }))
            }))
        }
    }
}
