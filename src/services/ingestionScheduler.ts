import type { IngestionCycleResult } from './ingestionService.js'
import { errorMessage, logger } from '../utils/logger.js'

export interface CycleRunner {
    runIngestionCycle(): Promise<IngestionCycleResult>
}

export const DEFAULT_INGESTION_PERIOD_MS = 15 * 60 * 1000

/**
 * In-process ingestion loop. `periodMs` is the minimum spacing between cycle
 * starts: a slow cycle delays the next one, missed ticks are never replayed
 * and cycles never overlap.
 */
export class IngestionScheduler {
    private readonly runner: CycleRunner
    private readonly periodMs: number
    private active = false
    private loop: Promise<void> | null = null
    private timer: NodeJS.Timeout | null = null
    private wake: (() => void) | null = null

    constructor(runner: CycleRunner, periodMs: number = DEFAULT_INGESTION_PERIOD_MS) {
        if (!Number.isFinite(periodMs) || periodMs <= 0) {
            throw new Error(`periodMs must be a positive number, got ${periodMs}`)
        }
        this.runner = runner
        this.periodMs = periodMs
    }

    isActive(): boolean {
        return this.active
    }

    /** Runs a cycle now, then keeps going until stop(). */
    start(): Promise<void> {
        if (this.loop) return this.loop
        this.active = true
        logger.info('[SCHEDULER] In-process ingestion scheduler started', { periodMs: this.periodMs })
        this.loop = this.run().finally(() => {
            this.loop = null
        })
        return this.loop
    }

    /** Ends the loop after the running cycle, if any, finishes. */
    async stop(): Promise<void> {
        if (!this.active) return
        this.active = false
        if (this.timer) {
            clearTimeout(this.timer)
            this.timer = null
        }
        this.wake?.()
        this.wake = null
        await this.loop
        logger.info('[SCHEDULER] In-process ingestion scheduler stopped')
    }

    private async run(): Promise<void> {
        while (this.active) {
            const cycleStart = Date.now()
            try {
                const result = await this.runner.runIngestionCycle()
                if (!result.success) {
                    logger.warn('[SCHEDULER] Ingestion cycle did not commit', {
                        cycleId: result.cycleId,
                        failures: result.errors.length
                    })
                }
            } catch (error) {
                logger.error('[SCHEDULER] Ingestion cycle threw, continuing', { error: errorMessage(error) })
            }

            if (!this.active) break
            await this.sleep(Math.max(0, cycleStart + this.periodMs - Date.now()))
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.wake = resolve
            this.timer = setTimeout(() => {
                this.timer = null
                this.wake = null
                resolve()
            }, ms)
        })
    }
}

/**
 * Starts a scheduler and returns its loop, which only settles once `signal`
 * aborts.
 */
export function startScheduler(runner: CycleRunner, periodMs: number, signal?: AbortSignal): Promise<void> {
    const scheduler = new IngestionScheduler(runner, periodMs)
    if (signal) {
        if (signal.aborted) return Promise.resolve()
        signal.addEventListener('abort', () => {
            scheduler.stop().catch(error => {
                logger.error('[SCHEDULER] Stop failed', { error: errorMessage(error) })
            })
        }, { once: true })
    }
    return scheduler.start()
}
