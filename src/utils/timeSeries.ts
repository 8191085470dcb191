import type { AnalyticsResult, SeriesPoint } from '../types/index.js'

export interface AssetRef {
    assetId: number
    assetName: string
}

export interface PivotColumn extends AssetRef {
    values: (number | null)[]
}

/** Rows are timestamps (ascending), columns are assets. */
export interface PivotTable {
    timestamps: string[]
    columns: PivotColumn[]
}

export interface ReturnsColumn extends AssetRef {
    values: number[]
}

export interface ReturnsTable {
    timestamps: string[]
    columns: ReturnsColumn[]
}

export interface NormalizedSeries extends AssetRef {
    points: { recordedAt: string; value: number }[]
}

export interface CorrelationMatrix {
    assets: AssetRef[]
    /** matrix[i][j] is Pearson r of assets i and j; null when either side is constant */
    matrix: (number | null)[][]
    observations: number
}

export interface ReturnPoint extends AssetRef {
    recordedAt: string
    dailyReturn: number
}

export interface ReturnSummary extends AssetRef {
    count: number
    mean: number
    std: number | null
    min: number
    q1: number
    median: number
    q3: number
    max: number
}

export interface VolatilityDistribution {
    points: ReturnPoint[]
    summary: ReturnSummary[]
}

const byTime = (a: string, b: string): number => Date.parse(a) - Date.parse(b)

/**
 * Rebases a series so its first value reads 100. An empty series, or one
 * starting at 0, is returned unchanged.
 */
export function normalizeSeries(values: readonly number[]): number[] {
    const first = values[0]
    if (first === undefined || first === 0) return [...values]
    return values.map(v => (v * 100) / first)
}

function groupByAsset(points: readonly SeriesPoint[]): Map<number, { ref: AssetRef; points: SeriesPoint[] }> {
    const groups = new Map<number, { ref: AssetRef; points: SeriesPoint[] }>()
    for (const point of points) {
        let group = groups.get(point.assetId)
        if (!group) {
            group = { ref: { assetId: point.assetId, assetName: point.assetName }, points: [] }
            groups.set(point.assetId, group)
        }
        group.points.push(point)
    }
    return groups
}

/**
 * Per-asset normalized performance over a shared window. Needs at least two
 * distinct timestamps across all points.
 */
export function normalizePerformance(points: readonly SeriesPoint[]): AnalyticsResult<NormalizedSeries[]> {
    const distinct = new Set(points.map(p => p.recordedAt))
    if (distinct.size < 2) {
        return { status: 'insufficient_data', reason: 'At least two distinct observation times are required' }
    }

    const series: NormalizedSeries[] = []
    for (const { ref, points: assetPoints } of groupByAsset(points).values()) {
        const ordered = [...assetPoints].sort((a, b) => byTime(a.recordedAt, b.recordedAt))
        const normalized = normalizeSeries(ordered.map(p => p.price))
        series.push({
            ...ref,
            points: ordered.map((p, i) => ({ recordedAt: p.recordedAt, value: normalized[i] ?? p.price }))
        })
    }
    series.sort((a, b) => a.assetId - b.assetId)
    return { status: 'ok', data: series }
}

/**
 * Outer join of every asset's observations on timestamp. Several samples for
 * the same asset and timestamp are averaged; columns without any value are
 * dropped.
 */
export function pivotByTimestamp(points: readonly SeriesPoint[]): PivotTable {
    const timestamps = [...new Set(points.map(p => p.recordedAt))].sort(byTime)
    const rowIndex = new Map(timestamps.map((t, i): [string, number] => [t, i]))

    const columns: PivotColumn[] = []
    for (const { ref, points: assetPoints } of groupByAsset(points).values()) {
        const sums = Array.from({ length: timestamps.length }, () => 0)
        const counts = Array.from({ length: timestamps.length }, () => 0)
        for (const p of assetPoints) {
            const row = rowIndex.get(p.recordedAt)
            if (row === undefined || !Number.isFinite(p.price)) continue
            sums[row] = (sums[row] ?? 0) + p.price
            counts[row] = (counts[row] ?? 0) + 1
        }
        const values = sums.map((sum, i) => {
            const count = counts[i] ?? 0
            return count > 0 ? sum / count : null
        })
        if (values.some(v => v !== null)) {
            columns.push({ ...ref, values })
        }
    }
    columns.sort((a, b) => a.assetId - b.assetId)
    return { timestamps, columns }
}

function forwardFill(values: readonly (number | null)[]): (number | null)[] {
    let last: number | null = null
    return values.map(v => {
        if (v !== null) last = v
        return last
    })
}

/**
 * Period-over-period returns `p_t / p_{t-1} - 1` after forward-filling each
 * column. A null or zero predecessor yields no return, and any row with a
 * missing return in some column is dropped.
 */
export function percentChange(pivot: PivotTable): ReturnsTable {
    const filled = pivot.columns.map(c => forwardFill(c.values))
    const rawReturns = filled.map(values => values.map((current, i) => {
        if (i === 0) return null
        const previous = values[i - 1]
        if (current === null || previous === null || previous === undefined || previous === 0) return null
        return current / previous - 1
    }))

    const keptRows: number[] = []
    for (let row = 1; row < pivot.timestamps.length; row++) {
        if (rawReturns.every(col => col[row] !== null)) keptRows.push(row)
    }

    return {
        timestamps: keptRows.map(row => pivot.timestamps[row] ?? ''),
        columns: pivot.columns.map((column, c) => ({
            assetId: column.assetId,
            assetName: column.assetName,
            values: keptRows.map(row => rawReturns[c]?.[row] ?? 0)
        }))
    }
}

function mean(values: readonly number[]): number {
    let total = 0
    for (const v of values) total += v
    return values.length > 0 ? total / values.length : 0
}

export function pearson(x: readonly number[], y: readonly number[]): number | null {
    const n = Math.min(x.length, y.length)
    if (n < 2) return null
    const mx = mean(x.slice(0, n))
    const my = mean(y.slice(0, n))
    let cov = 0
    let vx = 0
    let vy = 0
    for (let i = 0; i < n; i++) {
        const dx = (x[i] ?? 0) - mx
        const dy = (y[i] ?? 0) - my
        cov += dx * dy
        vx += dx * dx
        vy += dy * dy
    }
    if (vx === 0 || vy === 0) return null
    return Math.max(-1, Math.min(1, cov / Math.sqrt(vx * vy)))
}

export function correlationMatrix(pivot: PivotTable): AnalyticsResult<CorrelationMatrix> {
    if (pivot.columns.length < 2) {
        return { status: 'insufficient_data', reason: 'Need more than one asset with data' }
    }
    const returns = percentChange(pivot)
    if (returns.timestamps.length < 1) {
        return { status: 'insufficient_data', reason: 'Not enough overlapping history to compute returns' }
    }

    const matrix = returns.columns.map(a => returns.columns.map(b => pearson(a.values, b.values)))
    return {
        status: 'ok',
        data: {
            assets: returns.columns.map(({ assetId, assetName }) => ({ assetId, assetName })),
            matrix,
            observations: returns.timestamps.length
        }
    }
}

/** Linear interpolation between closest ranks on sorted input. */
export function quantile(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return NaN
    const position = (sorted.length - 1) * q
    const lower = Math.floor(position)
    const upper = Math.ceil(position)
    const lo = sorted[lower] ?? NaN
    const hi = sorted[upper] ?? NaN
    return lo + (hi - lo) * (position - lower)
}

function summarize(ref: AssetRef, values: readonly number[]): ReturnSummary {
    const sorted = [...values].sort((a, b) => a - b)
    const m = mean(values)
    let squares = 0
    for (const v of values) squares += (v - m) ** 2
    return {
        ...ref,
        count: values.length,
        mean: m,
        std: values.length > 1 ? Math.sqrt(squares / (values.length - 1)) : null,
        min: sorted[0] ?? NaN,
        q1: quantile(sorted, 0.25),
        median: quantile(sorted, 0.5),
        q3: quantile(sorted, 0.75),
        max: sorted[sorted.length - 1] ?? NaN
    }
}

export function volatilityDistribution(pivot: PivotTable): AnalyticsResult<VolatilityDistribution> {
    if (pivot.columns.length < 2) {
        return { status: 'insufficient_data', reason: 'Need more than one asset with data' }
    }
    const returns = percentChange(pivot)
    if (returns.timestamps.length < 1) {
        return { status: 'insufficient_data', reason: 'Not enough overlapping history to compute returns' }
    }

    const points: ReturnPoint[] = []
    for (const column of returns.columns) {
        column.values.forEach((dailyReturn, i) => {
            points.push({
                assetId: column.assetId,
                assetName: column.assetName,
                recordedAt: returns.timestamps[i] ?? '',
                dailyReturn
            })
        })
    }

    return {
        status: 'ok',
        data: {
            points,
            summary: returns.columns.map(c => summarize({ assetId: c.assetId, assetName: c.assetName }, c.values))
        }
    }
}
