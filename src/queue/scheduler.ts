import { getIngestionQueue } from './queues.js'
import { logger } from '../utils/logger.js'

const REPEAT_JOB_ID = 'repeatable-price-ingestion'

/**
 * Registers the repeatable ingestion job plus one immediate startup run.
 * Safe to call repeatedly: BullMQ deduplicates the repeat by jobId.
 */
export async function startQueueScheduler(periodMs: number): Promise<boolean> {
    const queue = getIngestionQueue()
    if (!queue) {
        logger.warn('[SCHEDULER] Redis unavailable, queue scheduler not started')
        return false
    }

    await queue.add(
        'scheduled-price-ingestion',
        { triggeredBy: 'scheduler' },
        {
            repeat: { every: periodMs },
            jobId: REPEAT_JOB_ID,
        }
    )

    await queue.add('startup-price-ingestion', { triggeredBy: 'startup' }, { priority: 1 })

    logger.info('[SCHEDULER] Repeatable ingestion job registered', { everyMs: periodMs })
    return true
}

export async function stopQueueScheduler(): Promise<void> {
    const queue = getIngestionQueue()
    if (!queue) return

    const repeatableJobs = await queue.getRepeatableJobs()
    for (const job of repeatableJobs) {
        await queue.removeRepeatableByKey(job.key)
    }
    logger.info('[SCHEDULER] Repeatable ingestion jobs removed', { removed: repeatableJobs.length })
}
