import { getFeatureFlags, type FeatureFlags } from './featureFlags.js'
import { logger } from '../utils/logger.js'

export type StoreConfig =
    | { kind: 'postgres'; databaseUrl: string }
    | { kind: 'sqlite'; dbPath: string }

export interface StartupConfig {
    nodeEnv: 'development' | 'test' | 'production'
    port: number
    store: StoreConfig
    ingestionPeriodMs: number
    sourceTimeoutMs: number
    cycleTimeoutMs: number | null
    referenceAsset: string
    referenceRateTtlMs: number
    /** JSON gold price API replacing the scraped 18K gold page when set */
    goldApiUrl: string | null
    corsOrigins: string[]
    featureFlags: FeatureFlags
}

const NODE_ENVS: ReadonlySet<string> = new Set(['development', 'test', 'production'])

const isNodeEnv = (value: string): value is StartupConfig['nodeEnv'] => NODE_ENVS.has(value)

const DEFAULT_PERIOD_MINUTES = 15
const DEFAULT_SOURCE_TIMEOUT_MS = 15000
const DEFAULT_REFERENCE_RATE_TTL_MS = 60000
const DEFAULT_DB_PATH = './data/prices.db'

function parseIntegerEnv(
    raw: string | undefined,
    fallback: number,
    name: string,
    min: number,
    max: number,
    errors: string[]
): number {
    if (raw === undefined || raw.trim() === '') return fallback
    const value = Number(raw.trim())
    if (!Number.isInteger(value) || value < min || value > max) {
        errors.push(`${name} '${raw}' is invalid. Provide an integer between ${min} and ${max}.`)
        return fallback
    }
    return value
}

export function validateStartupConfigOrThrow(env: NodeJS.ProcessEnv = process.env): StartupConfig {
    const errors: string[] = []
    const warnings: string[] = []

    const nodeEnvRaw = (env.NODE_ENV || 'development').trim().toLowerCase()
    const nodeEnv = isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : undefined
    if (!nodeEnv) {
        errors.push(`NODE_ENV '${env.NODE_ENV}' is invalid. Allowed values: development, test, production.`)
    }

    const port = parseIntegerEnv(env.PORT, 3001, 'PORT', 1, 65535, errors)

    const periodMinutes = parseIntegerEnv(
        env.INGESTION_PERIOD_MINUTES, DEFAULT_PERIOD_MINUTES, 'INGESTION_PERIOD_MINUTES', 1, 24 * 60, errors
    )
    const sourceTimeoutMs = parseIntegerEnv(
        env.SOURCE_TIMEOUT_MS, DEFAULT_SOURCE_TIMEOUT_MS, 'SOURCE_TIMEOUT_MS', 100, 120000, errors
    )
    const cycleTimeoutRaw = parseIntegerEnv(env.CYCLE_TIMEOUT_MS, 0, 'CYCLE_TIMEOUT_MS', 0, 60 * 60 * 1000, errors)
    const cycleTimeoutMs = cycleTimeoutRaw > 0 ? cycleTimeoutRaw : null
    if (cycleTimeoutMs !== null && cycleTimeoutMs < sourceTimeoutMs) {
        warnings.push('CYCLE_TIMEOUT_MS is shorter than SOURCE_TIMEOUT_MS; a single slow source can exhaust the cycle.')
    }
    if (cycleTimeoutMs !== null && cycleTimeoutMs >= periodMinutes * 60000) {
        warnings.push('CYCLE_TIMEOUT_MS is not shorter than the ingestion period; cycles may delay the next tick.')
    }

    const referenceRateTtlMs = parseIntegerEnv(
        env.REFERENCE_RATE_TTL_MS, DEFAULT_REFERENCE_RATE_TTL_MS, 'REFERENCE_RATE_TTL_MS', 0, 24 * 60 * 60 * 1000, errors
    )

    const referenceAsset = (env.REFERENCE_ASSET || 'USD').trim()
    if (!referenceAsset) {
        errors.push('REFERENCE_ASSET must name the canonical asset used as the USD rate.')
    }

    let store: StoreConfig
    const databaseUrl = (env.DATABASE_URL || '').trim()
    if (databaseUrl) {
        try {
            const parsed = new URL(databaseUrl)
            if (parsed.protocol !== 'postgres:' && parsed.protocol !== 'postgresql:') {
                errors.push('DATABASE_URL must use the postgres:// or postgresql:// scheme.')
            }
        } catch {
            errors.push('DATABASE_URL is not a valid URL.')
        }
        store = { kind: 'postgres', databaseUrl }
        if (env.DB_PATH) {
            warnings.push('DB_PATH is ignored because DATABASE_URL is set.')
        }
    } else {
        store = { kind: 'sqlite', dbPath: (env.DB_PATH || DEFAULT_DB_PATH).trim() }
    }

    const featureFlags = getFeatureFlags(env)
    if (nodeEnv === 'production' && featureFlags.enableDemoDbSeed) {
        warnings.push('ENABLE_DEMO_DB_SEED is enabled in production.')
    }
    if (featureFlags.enableDemoDbSeed && store.kind === 'postgres') {
        warnings.push('ENABLE_DEMO_DB_SEED only applies to the SQLite store.')
    }
    if (featureFlags.useQueueScheduler && !env.REDIS_URL) {
        warnings.push('USE_QUEUE_SCHEDULER is set without REDIS_URL; the default redis://localhost:6379 will be probed.')
    }

    const goldApiUrl = (env.GOLD_API_URL || '').trim() || null
    if (goldApiUrl) {
        try {
            const parsed = new URL(goldApiUrl)
            if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
                errors.push('GOLD_API_URL must use the http:// or https:// scheme.')
            }
        } catch {
            errors.push('GOLD_API_URL is not a valid URL.')
        }
    }

    const corsOrigins = (env.CORS_ORIGINS || '')
        .split(',')
        .map(v => v.trim())
        .filter(Boolean)

    if (errors.length > 0) {
        const numberedErrors = errors.map((msg, idx) => `${idx + 1}. ${msg}`).join('\n')
        throw new Error(
            [
                '[STARTUP-CONFIG] Validation failed. Server will not start.',
                numberedErrors,
                'Fix the values in .env and restart the server.'
            ].join('\n')
        )
    }

    if (warnings.length > 0) {
        logger.warn('[STARTUP-CONFIG] Warnings', { warnings })
    }

    return {
        nodeEnv: nodeEnv || 'development',
        port,
        store,
        ingestionPeriodMs: periodMinutes * 60000,
        sourceTimeoutMs,
        cycleTimeoutMs,
        referenceAsset,
        referenceRateTtlMs,
        goldApiUrl,
        corsOrigins,
        featureFlags
    }
}

export function buildStartupSummary(config: StartupConfig): Record<string, unknown> {
    return {
        nodeEnv: config.nodeEnv,
        port: config.port,
        store: config.store.kind === 'postgres'
            ? { kind: 'postgres', host: safeUrlHost(config.store.databaseUrl) }
            : { kind: 'sqlite', dbPath: config.store.dbPath },
        ingestionPeriodMinutes: config.ingestionPeriodMs / 60000,
        sourceTimeoutMs: config.sourceTimeoutMs,
        cycleTimeoutMs: config.cycleTimeoutMs,
        referenceAsset: config.referenceAsset,
        goldSource: config.goldApiUrl ? { kind: 'json', host: safeUrlHost(config.goldApiUrl) } : { kind: 'html' },
        corsOriginsConfigured: config.corsOrigins.length,
        featureFlags: config.featureFlags
    }
}

function safeUrlHost(url: string): string {
    try {
        return new URL(url).host
    } catch {
        return '<invalid-url>'
    }
}
