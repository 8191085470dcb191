import type { CycleEntry, PriceStore } from '../db/priceStore.js'
import type { Asset, AssetSeed, PriceObservation } from '../types/index.js'

export class InvalidAssetSeedError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'InvalidAssetSeedError'
    }
}

/**
 * Maps canonical names to stable asset ids. Creation is insert-if-absent on
 * the unique canonical name, so repeated or racing calls converge; metadata
 * from later calls is ignored. Every write path, ingestion included, goes
 * through here so a seed is checked before the store sees it.
 */
export class AssetRegistryService {
    constructor(private readonly store: PriceStore) {}

    validateSeed(seed: AssetSeed): AssetSeed {
        if (!seed.canonicalName.trim()) {
            throw new InvalidAssetSeedError('canonicalName must not be empty')
        }
        return seed
    }

    async resolveOrCreate(seed: AssetSeed): Promise<number> {
        return this.store.resolveOrCreateAsset(this.validateSeed(seed))
    }

    /** Resolves every entry's asset and appends its observation, all or nothing. */
    async recordCycle(entries: CycleEntry[], recordedAt: string): Promise<PriceObservation[]> {
        for (const entry of entries) this.validateSeed(entry.seed)
        return this.store.recordCycle(entries, recordedAt)
    }

    get(id: number): Promise<Asset | undefined> {
        return this.store.getAsset(id)
    }

    findByName(canonicalName: string): Promise<Asset | undefined> {
        return this.store.findAssetByName(canonicalName)
    }

    /** Deletes the asset with its whole price history. */
    remove(id: number): Promise<boolean> {
        return this.store.removeAsset(id)
    }
}
