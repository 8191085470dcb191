/**
 * Runs a single ingestion cycle against the configured store and exits.
 * Exit code is 0 when the cycle committed, 1 otherwise.
 * Run: npm run ingest:once
 */
import 'dotenv/config'
import { createTrackedSources } from '../src/config/sources.js'
import { validateStartupConfigOrThrow } from '../src/config/startupConfig.js'
import { createPriceStore } from '../src/db/createPriceStore.js'
import { IngestionService } from '../src/services/ingestionService.js'
import { errorMessage, logger } from '../src/utils/logger.js'

async function main(): Promise<number> {
    const config = validateStartupConfigOrThrow()
    const store = createPriceStore(config.store)
    try {
        const service = new IngestionService({
            store,
            sources: createTrackedSources({ timeoutMs: config.sourceTimeoutMs }, { goldApiUrl: config.goldApiUrl }),
            cycleTimeoutMs: config.cycleTimeoutMs
        })
        const result = await service.runIngestionCycle()
        if (result.success) {
            logger.info('Ingestion cycle committed', {
                cycleId: result.cycleId,
                recordedAt: result.recordedAt,
                observations: result.observations?.length ?? 0
            })
            return 0
        }
        logger.error('Ingestion cycle failed, nothing was written', {
            cycleId: result.cycleId,
            errors: result.errors
        })
        return 1
    } finally {
        await store.close()
    }
}

main()
    .then(code => process.exit(code))
    .catch(error => {
        logger.fatal('ingest-once crashed', { error: errorMessage(error) })
        process.exit(1)
    })
