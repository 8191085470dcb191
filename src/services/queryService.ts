import type { PriceStore } from '../db/priceStore.js'
import {
    isStorableAssetId,
    type Asset,
    type AssetCategory,
    type AssetOption,
    type AssetWithLatestPrice,
    type PriceObservation
} from '../types/index.js'

export interface ListAssetsParams {
    searchTerm?: string
    categories?: AssetCategory[]
    page: number
    pageSize: number
}

export interface AssetPage {
    rows: AssetWithLatestPrice[]
    total: number
    page: number
    pageSize: number
    pageCount: number
}

export const MAX_PAGE_SIZE = 100

/**
 * Read-only view over the store for selection and listing screens.
 */
export class QueryService {
    constructor(private readonly store: PriceStore) {}

    /** Pages are 1-based and ordered by asset id. */
    async listAssets(params: ListAssetsParams): Promise<AssetPage> {
        const page = Math.max(1, Math.floor(params.page))
        const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(params.pageSize)))
        const { rows, total } = await this.store.searchAssets({
            searchTerm: params.searchTerm,
            categories: params.categories,
            limit: pageSize,
            offset: (page - 1) * pageSize
        })
        return { rows, total, page, pageSize, pageCount: Math.ceil(total / pageSize) }
    }

    assetOptionsFor(categories: AssetCategory[]): Promise<AssetOption[]> {
        return this.store.assetOptions(categories)
    }

    async latestPrice(assetId: number): Promise<PriceObservation | undefined> {
        if (!isStorableAssetId(assetId)) return undefined
        return this.store.latest(assetId)
    }

    async getAsset(assetId: number): Promise<Asset | undefined> {
        if (!isStorableAssetId(assetId)) return undefined
        return this.store.getAsset(assetId)
    }

    async latestPrices(assetIds: number[]): Promise<PriceObservation[]> {
        const latest = await this.store.latestBatch([...new Set(assetIds)].filter(isStorableAssetId))
        return [...latest.values()].sort((a, b) => a.assetId - b.assetId)
    }
}
