import { SourceError, DataQualityError, type AssetSeed } from '../types/index.js'
import { parseNumeral } from '../utils/numerals.js'
import { errorMessage } from '../utils/logger.js'

/**
 * One external page that yields exactly one price for one asset.
 * Implementations never retry; the ingestion cycle owns failure policy.
 */
export interface PriceSource {
    /** Stable tag written to price_history.source */
    readonly id: string
    readonly asset: AssetSeed
    readonly url: string
    /** Rejects with SourceError on any transport, parse or data-quality failure */
    fetchPrice(signal?: AbortSignal): Promise<number>
}

export interface HttpSourceOptions {
    timeoutMs?: number
    headers?: Record<string, string>
}

export const DEFAULT_SOURCE_TIMEOUT_MS = 15000

const DEFAULT_HEADERS: Record<string, string> = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) '
        + 'Chrome/124.0.0.0 Safari/537.36',
    'Accept-Language': 'fa-IR,fa;q=0.9,en;q=0.8'
}

/**
 * Shared GET plumbing: finite timeout, outer abort signal, non-2xx handling.
 */
export abstract class HttpPriceSource implements PriceSource {
    readonly id: string
    readonly asset: AssetSeed
    readonly url: string
    protected readonly timeoutMs: number
    protected readonly headers: Record<string, string>

    protected constructor(id: string, asset: AssetSeed, url: string, options: HttpSourceOptions = {}) {
        this.id = id
        this.asset = asset
        this.url = url
        this.timeoutMs = options.timeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS
        this.headers = { ...DEFAULT_HEADERS, ...options.headers }
    }

    abstract fetchPrice(signal?: AbortSignal): Promise<number>

    protected async fetchBody(accept: string, signal?: AbortSignal): Promise<string> {
        if (signal?.aborted) {
            throw new SourceError(this.id, 'transport', 'Cycle aborted before request was sent')
        }

        const controller = new AbortController()
        let timedOut = false
        const timeoutId = setTimeout(() => {
            timedOut = true
            controller.abort()
        }, this.timeoutMs)
        const onOuterAbort = () => controller.abort()
        signal?.addEventListener('abort', onOuterAbort, { once: true })

        try {
            const response = await fetch(this.url, {
                method: 'GET',
                headers: { ...this.headers, Accept: accept },
                signal: controller.signal
            })

            if (!response.ok) {
                throw new SourceError(this.id, 'transport', `HTTP ${response.status} from ${this.url}`)
            }

            return await response.text()
        } catch (error) {
            if (error instanceof SourceError) throw error
            if (timedOut) {
                throw new SourceError(this.id, 'transport', `Request timed out after ${this.timeoutMs}ms`, { cause: error })
            }
            if (signal?.aborted) {
                throw new SourceError(this.id, 'transport', 'Cycle deadline exceeded', { cause: error })
            }
            throw new SourceError(this.id, 'transport', `Request failed: ${errorMessage(error)}`, { cause: error })
        } finally {
            clearTimeout(timeoutId)
            signal?.removeEventListener('abort', onOuterAbort)
        }
    }

    /**
     * Parses a located price text, rejecting non-numeric and non-positive values.
     */
    protected toPrice(rawText: string, multiplier: number = 1): number {
        const value = parseNumeral(rawText)
        if (value === null) {
            throw new DataQualityError(this.id, rawText, `Located value '${rawText}' is not a number`)
        }
        const price = value * multiplier
        if (!Number.isFinite(price) || price <= 0) {
            throw new DataQualityError(this.id, rawText, `Located value '${rawText}' is not a positive price`)
        }
        return price
    }
}
