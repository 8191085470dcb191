export const ASSET_CATEGORIES = ['Currency', 'Commodity', 'IranianStockFund', 'CryptoCurrency'] as const

export type AssetCategory = typeof ASSET_CATEGORIES[number]

export const CURRENCIES = ['IRR', 'USD'] as const

export type Currency = typeof CURRENCIES[number]

export interface Asset {
    id: number
    canonicalName: string
    displayName: string
    englishName?: string
    /** Null when the creating source declared none */
    category: AssetCategory | null
    description?: string
    createdAt: string
}

/** Metadata a source declares for the asset it feeds. Only used when the asset is first created. */
export interface AssetSeed {
    canonicalName: string
    displayName?: string
    englishName?: string
    category?: AssetCategory
    description?: string
}

export interface PriceObservation {
    id: number
    assetId: number
    price: number
    recordedAt: string
    source: string
}

/** One observation joined with the display metadata of its asset. */
export interface SeriesPoint {
    assetId: number
    assetName: string
    englishName?: string
    category: AssetCategory | null
    price: number
    recordedAt: string
}

export interface AssetWithLatestPrice extends Asset {
    latestPrice: number | null
    latestRecordedAt: string | null
}

export interface AssetOption {
    id: number
    displayName: string
}

/** Holdings keyed by asset id as a string. Owned by the caller, never persisted. */
export type PortfolioHoldings = Record<string, number>

export type AnalyticsResult<T> =
    | { status: 'ok'; data: T }
    | { status: 'insufficient_data'; reason: string }

// ─────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────

export type SourceErrorKind = 'transport' | 'parse' | 'data_quality'

export class SourceError extends Error {
    readonly sourceId: string
    readonly kind: SourceErrorKind

    constructor(sourceId: string, kind: SourceErrorKind, message: string, options?: { cause?: unknown }) {
        super(`[${sourceId}] ${message}`, options)
        this.name = 'SourceError'
        this.sourceId = sourceId
        this.kind = kind
    }
}

/** A value was located but is not a usable price (non-numeric, zero, negative). */
export class DataQualityError extends SourceError {
    readonly rawValue: string

    constructor(sourceId: string, rawValue: string, message: string) {
        super(sourceId, 'data_quality', message)
        this.name = 'DataQualityError'
        this.rawValue = rawValue
    }
}

export class PersistenceError extends Error {
    readonly operation: string

    constructor(operation: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause)
        super(`Store operation '${operation}' failed: ${detail}`, { cause })
        this.name = 'PersistenceError'
        this.operation = operation
    }
}

/** Asset ids are PostgreSQL `integer` serials; anything larger names no asset. */
export const MAX_ASSET_ID = 2147483647

export function isStorableAssetId(id: number): boolean {
    return Number.isInteger(id) && id > 0 && id <= MAX_ASSET_ID
}

export function isAssetCategory(value: string): value is AssetCategory {
    return ASSET_CATEGORIES.some(category => category === value)
}
