import pg from 'pg'

let pool: pg.Pool | null = null

export function createPool(connectionString: string): pg.Pool {
    return new pg.Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000
    })
}

/** Process-wide pool for DATABASE_URL, used by the migration CLI. */
export function getPool(): pg.Pool {
    if (!pool) {
        const connectionString = process.env.DATABASE_URL
        if (!connectionString) {
            throw new Error('DATABASE_URL is not set')
        }
        pool = createPool(connectionString)
    }
    return pool
}

export async function closePool(): Promise<void> {
    if (pool) {
        await pool.end()
        pool = null
    }
}

export function isDbConfigured(): boolean {
    return Boolean(process.env.DATABASE_URL)
}
