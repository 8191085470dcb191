import { errorMessage, logger } from '../utils/logger.js'
import { redactString } from '../utils/secretRedactor.js'

// BullMQ bundles its own ioredis; queues and workers get plain connection
// options, and the standalone ioredis is only used for the reachability probe.

export const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379'

export interface RedisConnectionOptions {
    host: string
    port: number
    username?: string
    password?: string
    db?: number
    maxRetriesPerRequest: null
    enableReadyCheck: boolean
    lazyConnect: boolean
}

/**
 * Splits a redis:// URL into ioredis options. ioredis only reads a URL when
 * it is passed as the first constructor argument, which BullMQ never does.
 */
export function parseRedisUrl(url: string): Pick<RedisConnectionOptions, 'host' | 'port' | 'username' | 'password' | 'db'> {
    const parsed = new URL(url)
    const db = parsed.pathname.replace(/^\//, '')
    return {
        host: parsed.hostname || 'localhost',
        port: parsed.port ? Number(parsed.port) : 6379,
        ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
        ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
        ...(db && /^\d+$/.test(db) ? { db: Number(db) } : {}),
    }
}

export function getConnectionOptions(): RedisConnectionOptions {
    return {
        ...parseRedisUrl(REDIS_URL),
        maxRetriesPerRequest: null, // required by BullMQ workers
        enableReadyCheck: false,
        lazyConnect: false,
    }
}

/**
 * Lightweight connect + PING against REDIS_URL.
 */
export async function isRedisAvailable(): Promise<boolean> {
    const { Redis } = await import('ioredis')
    const probe = new Redis(REDIS_URL, {
        lazyConnect: true,
        connectTimeout: 3000,
        maxRetriesPerRequest: 1,
        enableReadyCheck: false,
    })
    try {
        await probe.connect()
        await probe.ping()
        return true
    } catch (err) {
        logger.debug('[QUEUE] Redis probe failed', { error: errorMessage(err) })
        return false
    } finally {
        probe.disconnect()
    }
}

export function logQueueStartup(redisAvailable: boolean) {
    if (redisAvailable) {
        logger.info('[QUEUE] Redis available, ingestion runs on the BullMQ scheduler', {
            redisUrl: redactString(REDIS_URL),
        })
    } else {
        logger.warn('[QUEUE] Redis unavailable, falling back to the in-process ingestion scheduler')
    }
}
