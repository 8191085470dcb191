import type { StoreConfig } from '../config/startupConfig.js'
import { logger } from '../utils/logger.js'
import { createPool } from './client.js'
import { PgPriceStore } from './pgPriceStore.js'
import type { PriceStore } from './priceStore.js'
import { SqlitePriceStore } from './sqlitePriceStore.js'

export function createPriceStore(config: StoreConfig, options: { seedDemoData?: boolean } = {}): PriceStore {
    if (config.kind === 'postgres') {
        logger.info('[DB] Using PostgreSQL price store')
        return new PgPriceStore(createPool(config.databaseUrl))
    }
    return new SqlitePriceStore({ dbPath: config.dbPath, seedDemoData: options.seedDemoData })
}
