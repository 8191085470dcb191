import { Worker, type Job } from 'bullmq'
import { getConnectionOptions } from '../connection.js'
import { QUEUE_NAMES, type IngestionJobData } from '../queues.js'
import type { IngestionCycleResult, IngestionService } from '../../services/ingestionService.js'
import { logger } from '../../utils/logger.js'

let worker: Worker<IngestionJobData, IngestionCycleResult> | null = null

/**
 * Runs one cycle for a job. A cycle that commits nothing fails the job so it
 * shows up in the queue's failed set; the repeat schedule is unaffected.
 */
export async function processIngestionJob(
    service: IngestionService,
    job: Job<IngestionJobData>
): Promise<IngestionCycleResult> {
    logger.info('[WORKER:price-ingestion] Starting ingestion cycle', {
        jobId: job.id,
        triggeredBy: job.data.triggeredBy ?? 'scheduler',
    })

    const result = await service.runIngestionCycle()
    if (!result.success) {
        const summary = result.errors.map(e => e.message).join('; ')
        throw new Error(`Ingestion cycle ${result.cycleId} failed at ${result.errors[0]?.stage ?? 'unknown'}: ${summary}`)
    }
    return result
}

/**
 * Starts the single ingestion worker. Concurrency 1 keeps one writer.
 */
export function startIngestionWorker(service: IngestionService): Worker<IngestionJobData, IngestionCycleResult> | null {
    if (worker) return worker

    try {
        worker = new Worker<IngestionJobData, IngestionCycleResult>(
            QUEUE_NAMES.PRICE_INGESTION,
            job => processIngestionJob(service, job),
            {
                connection: getConnectionOptions(),
                concurrency: 1,
            }
        )
    } catch (err) {
        logger.warn('[WORKER:price-ingestion] Failed to start, Redis may be unavailable', {
            error: err instanceof Error ? err.message : String(err),
        })
        return null
    }

    worker.on('completed', (job, result) => {
        logger.info('[WORKER:price-ingestion] Job completed', {
            jobId: job.id,
            recordedAt: result.recordedAt,
        })
    })

    worker.on('failed', (job, err) => {
        logger.error('[WORKER:price-ingestion] Job failed', {
            jobId: job?.id,
            error: err.message,
        })
    })

    logger.info('[WORKER:price-ingestion] Worker started')
    return worker
}

export async function stopIngestionWorker(): Promise<void> {
    if (worker) {
        await worker.close()
        worker = null
        logger.info('[WORKER:price-ingestion] Worker stopped')
    }
}
