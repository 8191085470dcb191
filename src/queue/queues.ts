import { Queue } from 'bullmq'
import { getConnectionOptions } from './connection.js'
import { logger } from '../utils/logger.js'

export const QUEUE_NAMES = {
    PRICE_INGESTION: 'price-ingestion',
} as const

export interface IngestionJobData {
    triggeredBy?: 'scheduler' | 'manual' | 'startup'
}

let ingestionQueue: Queue<IngestionJobData> | null = null

// A failed cycle is not retried; the next repeat is the retry.
function getDefaultJobOptions() {
    return {
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 200 },
        attempts: 1,
    }
}

export function getIngestionQueue(): Queue<IngestionJobData> | null {
    try {
        if (!ingestionQueue) {
            ingestionQueue = new Queue<IngestionJobData>(QUEUE_NAMES.PRICE_INGESTION, {
                connection: getConnectionOptions(),
                defaultJobOptions: getDefaultJobOptions(),
            })
            logger.info(`[QUEUE] Created queue: ${QUEUE_NAMES.PRICE_INGESTION}`)
        }
        return ingestionQueue
    } catch (err) {
        logger.warn('[QUEUE] Could not create ingestion queue', {
            error: err instanceof Error ? err.message : String(err),
        })
        return null
    }
}

export async function closeAllQueues(): Promise<void> {
    if (ingestionQueue) {
        await ingestionQueue.close()
        ingestionQueue = null
        logger.info('[QUEUE] Ingestion queue closed')
    }
}
