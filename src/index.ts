import 'dotenv/config'
import { createServer } from 'node:http'
import { createApp } from './app.js'
import { createTrackedSources } from './config/sources.js'
import { buildStartupSummary, validateStartupConfigOrThrow, type StartupConfig } from './config/startupConfig.js'
import { createPriceStore } from './db/createPriceStore.js'
import type { PriceStore } from './db/priceStore.js'
import { isRedisAvailable, logQueueStartup } from './queue/connection.js'
import { closeAllQueues } from './queue/queues.js'
import { startQueueScheduler, stopQueueScheduler } from './queue/scheduler.js'
import { startIngestionWorker, stopIngestionWorker } from './queue/workers/ingestionWorker.js'
import { AnalyticsService } from './services/analyticsService.js'
import { startScheduler } from './services/ingestionScheduler.js'
import { IngestionService } from './services/ingestionService.js'
import { QueryService } from './services/queryService.js'
import { errorMessage, logger } from './utils/logger.js'

type SchedulerMode = 'queue' | 'in-process' | 'disabled'

let config: StartupConfig
try {
    config = validateStartupConfigOrThrow()
} catch (error) {
    logger.fatal(errorMessage(error))
    process.exit(1)
}

const store: PriceStore = createPriceStore(config.store, { seedDemoData: config.featureFlags.enableDemoDbSeed })
const ingestionService = new IngestionService({
    store,
    sources: createTrackedSources({ timeoutMs: config.sourceTimeoutMs }, { goldApiUrl: config.goldApiUrl }),
    cycleTimeoutMs: config.cycleTimeoutMs
})
const analyticsService = new AnalyticsService({
    store,
    referenceAsset: config.referenceAsset,
    referenceRateTtlMs: config.referenceRateTtlMs
})
const queryService = new QueryService(store)

const app = createApp({ store, queryService, analyticsService, ingestionService }, config.corsOrigins)
const server = createServer(app)
const schedulerAbort = new AbortController()
let schedulerLoop: Promise<void> | null = null
let schedulerMode: SchedulerMode = 'disabled'

async function startIngestion(): Promise<SchedulerMode> {
    if (!config.featureFlags.enableScheduler) {
        logger.info('[SCHEDULER] Scheduled ingestion disabled by ENABLE_SCHEDULER')
        return 'disabled'
    }

    if (config.featureFlags.useQueueScheduler) {
        const redisAvailable = await isRedisAvailable()
        logQueueStartup(redisAvailable)
        if (redisAvailable) {
            startIngestionWorker(ingestionService)
            if (await startQueueScheduler(config.ingestionPeriodMs)) return 'queue'
            await stopIngestionWorker()
        }
    }

    schedulerLoop = startScheduler(ingestionService, config.ingestionPeriodMs, schedulerAbort.signal)
    return 'in-process'
}

server.listen(config.port, () => {
    logger.info('Asset price tracker API started', buildStartupSummary(config))
    startIngestion()
        .then(mode => {
            schedulerMode = mode
            logger.info('[SCHEDULER] Ingestion scheduling ready', { mode })
        })
        .catch(error => logger.error('[SCHEDULER] Failed to start ingestion', { error: errorMessage(error) }))
})

let shuttingDown = false

const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`${signal} received, starting graceful shutdown`)

    const forceExit = setTimeout(() => {
        logger.warn('Forced shutdown after timeout')
        process.exit(1)
    }, 10000)
    forceExit.unref()

    let exitCode = 0
    try {
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())))

        schedulerAbort.abort()
        await schedulerLoop
        if (schedulerMode === 'queue') {
            await stopIngestionWorker()
            await stopQueueScheduler()
        }
        await closeAllQueues()

        await store.close()
        logger.info('Server shut down successfully')
    } catch (error) {
        logger.error('Error during shutdown', { error: errorMessage(error) })
        exitCode = 1
    }
    process.exit(exitCode)
}

const onSignal = (signal: string) => () => {
    gracefulShutdown(signal).catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) })
        process.exit(1)
    })
}

process.on('SIGTERM', onSignal('SIGTERM'))
process.on('SIGINT', onSignal('SIGINT'))

process.on('uncaughtException', error => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack })
    onSignal('UNCAUGHT_EXCEPTION')()
})

process.on('unhandledRejection', reason => {
    logger.error('Unhandled Rejection', { reason: errorMessage(reason) })
    onSignal('UNHANDLED_REJECTION')()
})
