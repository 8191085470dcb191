export interface FeatureFlags {
    enableScheduler: boolean
    useQueueScheduler: boolean
    enableDemoDbSeed: boolean
}

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
    if (value === undefined || value.trim() === '') return fallback
    const normalized = value.trim().toLowerCase()
    if (normalized === 'true') return true
    if (normalized === 'false') return false
    return fallback
}

export const getFeatureFlags = (env: NodeJS.ProcessEnv = process.env): FeatureFlags => {
    const nodeEnv = (env.NODE_ENV || 'development').trim().toLowerCase()

    // The scheduler scrapes live pages; keep it off under test unless asked for
    const enableScheduler = parseBoolean(env.ENABLE_SCHEDULER, nodeEnv !== 'test')
    const useQueueScheduler = parseBoolean(env.USE_QUEUE_SCHEDULER, false)
    const enableDemoDbSeed = parseBoolean(env.ENABLE_DEMO_DB_SEED, false)

    return {
        enableScheduler,
        useQueueScheduler,
        enableDemoDbSeed
    }
}
