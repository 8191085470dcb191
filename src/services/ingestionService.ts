import { randomUUID } from 'node:crypto'
import type { CycleEntry, PriceStore } from '../db/priceStore.js'
import type { PriceSource } from '../sources/priceSource.js'
import { AssetRegistryService } from './assetRegistryService.js'
import {
    DataQualityError,
    PersistenceError,
    SourceError,
    type PriceObservation,
    type SourceErrorKind
} from '../types/index.js'
import { errorMessage, logAudit, logger } from '../utils/logger.js'
import { runWithRequestContext } from '../utils/requestContext.js'

export type IngestionStage = 'lock' | 'fetch' | 'persist'

export interface IngestionFailure {
    stage: IngestionStage
    sourceId?: string
    kind: SourceErrorKind | 'persistence' | 'busy' | 'unexpected'
    message: string
}

export interface IngestionCycleResult {
    success: boolean
    cycleId: string
    startedAt: string
    finishedAt: string
    /** Shared timestamp of every observation written by the cycle */
    recordedAt?: string
    observations?: PriceObservation[]
    errors: IngestionFailure[]
}

export interface IngestionServiceOptions {
    store: PriceStore
    /** Defaults to a registry over `store` */
    registry?: AssetRegistryService
    sources: PriceSource[]
    /** Aborts fetches still outstanding after this many ms; null disables */
    cycleTimeoutMs?: number | null
    now?: () => Date
}

function toFetchFailure(sourceId: string, error: unknown): IngestionFailure {
    if (error instanceof SourceError) {
        return { stage: 'fetch', sourceId, kind: error.kind, message: error.message }
    }
    return { stage: 'fetch', sourceId, kind: 'unexpected', message: errorMessage(error) }
}

/**
 * One cycle fetches every tracked source and commits all prices under one
 * timestamp, or commits nothing. Only one cycle runs at a time per process.
 */
export class IngestionService {
    private readonly registry: AssetRegistryService
    private readonly sources: PriceSource[]
    private readonly cycleTimeoutMs: number | null
    private readonly now: () => Date
    private running = false
    private lastResult: IngestionCycleResult | null = null

    constructor(options: IngestionServiceOptions) {
        this.registry = options.registry ?? new AssetRegistryService(options.store)
        this.sources = options.sources
        this.cycleTimeoutMs = options.cycleTimeoutMs ?? null
        this.now = options.now ?? (() => new Date())
    }

    isRunning(): boolean {
        return this.running
    }

    getLastResult(): IngestionCycleResult | null {
        return this.lastResult
    }

    async runIngestionCycle(): Promise<IngestionCycleResult> {
        const cycleId = randomUUID()
        const startedAt = this.now().toISOString()

        if (this.running) {
            logger.warn('[INGESTION] Cycle already in progress, refusing to start another', { cycleId })
            return {
                success: false,
                cycleId,
                startedAt,
                finishedAt: startedAt,
                errors: [{ stage: 'lock', kind: 'busy', message: 'An ingestion cycle is already running' }]
            }
        }

        this.running = true
        try {
            const result = await runWithRequestContext({ cycleId }, () => this.execute(cycleId, startedAt))
            this.lastResult = result
            return result
        } finally {
            this.running = false
        }
    }

    private async execute(cycleId: string, startedAt: string): Promise<IngestionCycleResult> {
        logger.info('[INGESTION] Cycle started', { sources: this.sources.length })

        const { entries, errors } = await this.fetchAll()

        if (errors.length > 0) {
            for (const failure of errors) {
                logger.error('[INGESTION] Source failed', { ...failure })
            }
            logger.error('[INGESTION] Cycle aborted, nothing written', {
                failedSources: errors.map(e => e.sourceId),
                succeeded: entries.length
            })
            return { success: false, cycleId, startedAt, finishedAt: this.now().toISOString(), errors }
        }

        const recordedAt = this.now().toISOString()
        try {
            const observations = await this.registry.recordCycle(entries, recordedAt)
            logAudit('ingestion.cycle_committed', {
                cycleId,
                recordedAt,
                observations: observations.length
            })
            logger.info('[INGESTION] Cycle committed', { recordedAt, observations: observations.length })
            return {
                success: true,
                cycleId,
                startedAt,
                finishedAt: this.now().toISOString(),
                recordedAt,
                observations,
                errors: []
            }
        } catch (error) {
            const persistenceError = error instanceof PersistenceError
                ? error
                : new PersistenceError('recordCycle', error)
            logger.error('[INGESTION] Persisting cycle failed, transaction rolled back', {
                error: persistenceError.message
            })
            return {
                success: false,
                cycleId,
                startedAt,
                finishedAt: this.now().toISOString(),
                errors: [{ stage: 'persist', kind: 'persistence', message: persistenceError.message }]
            }
        }
    }

    /**
     * Sequential on purpose: the sources are few and share hosts. Every
     * source is attempted so the failure report is complete.
     */
    private async fetchAll(): Promise<{ entries: CycleEntry[]; errors: IngestionFailure[] }> {
        const entries: CycleEntry[] = []
        const errors: IngestionFailure[] = []
        const controller = new AbortController()
        const deadline = this.cycleTimeoutMs === null
            ? null
            : setTimeout(() => controller.abort(), this.cycleTimeoutMs)

        try {
            for (const source of this.sources) {
                if (controller.signal.aborted) {
                    errors.push({
                        stage: 'fetch',
                        sourceId: source.id,
                        kind: 'transport',
                        message: `[${source.id}] Cycle deadline exceeded before fetch`
                    })
                    continue
                }
                try {
                    this.registry.validateSeed(source.asset)
                    const price = await source.fetchPrice(controller.signal)
                    if (!Number.isFinite(price) || price <= 0) {
                        throw new DataQualityError(source.id, String(price), `Source returned unusable price ${price}`)
                    }
                    entries.push({ seed: source.asset, price, source: source.id })
                    logger.debug('[INGESTION] Source fetched', { sourceId: source.id, price })
                } catch (error) {
                    errors.push(toFetchFailure(source.id, error))
                }
            }
        } finally {
            if (deadline) clearTimeout(deadline)
        }

        return { entries, errors }
    }
}
