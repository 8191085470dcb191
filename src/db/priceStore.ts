import type {
    Asset,
    AssetCategory,
    AssetOption,
    AssetSeed,
    AssetWithLatestPrice,
    PriceObservation,
    SeriesPoint
} from '../types/index.js'

export interface AssetSearchFilter {
    searchTerm?: string
    categories?: AssetCategory[]
    limit: number
    offset: number
}

export interface AssetSearchResult {
    rows: AssetWithLatestPrice[]
    total: number
}

/** One asset's price for an ingestion cycle. */
export interface CycleEntry {
    seed: AssetSeed
    price: number
    source: string
}

/**
 * Append-only price history plus the asset registry it references.
 *
 * Every driver failure surfaces as PersistenceError. Observations are never
 * updated or deleted except through the asset cascade.
 */
export interface PriceStore {
    readonly kind: 'sqlite' | 'postgres'

    resolveOrCreateAsset(seed: AssetSeed): Promise<number>
    getAsset(id: number): Promise<Asset | undefined>
    findAssetByName(canonicalName: string): Promise<Asset | undefined>
    /** Deletes the asset and, by cascade, its observations. */
    removeAsset(id: number): Promise<boolean>

    append(assetId: number, price: number, recordedAt: string, source: string): Promise<PriceObservation>
    /** Resolves every seed and appends one observation each, all in one transaction. */
    recordCycle(entries: CycleEntry[], recordedAt: string): Promise<PriceObservation[]>

    /** Highest recordedAt; exact ties go to the highest observation id. */
    latest(assetId: number): Promise<PriceObservation | undefined>
    latestBatch(assetIds: number[]): Promise<Map<number, PriceObservation>>
    /** Ascending by recordedAt then id, inclusive of `since`. */
    window(assetId: number, since: string): Promise<PriceObservation[]>
    windowBatch(assetIds: number[], since: string): Promise<SeriesPoint[]>

    searchAssets(filter: AssetSearchFilter): Promise<AssetSearchResult>
    assetOptions(categories: AssetCategory[]): Promise<AssetOption[]>

    countObservations(assetId?: number): Promise<number>
    ping(): Promise<void>
    close(): Promise<void>
}

/** Escapes LIKE wildcards so a search term matches literally (ESCAPE '\'). */
export function escapeLikePattern(term: string): string {
    return term.replace(/[\\%_]/g, ch => `\\${ch}`)
}

export function toSearchPattern(term: string): string {
    return `%${escapeLikePattern(term.toLowerCase())}%`
}
