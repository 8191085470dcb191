import { SourceError, type AssetSeed } from '../types/index.js'
import { HttpPriceSource, type HttpSourceOptions } from './priceSource.js'

export interface JsonPriceSourceConfig extends HttpSourceOptions {
    id: string
    asset: AssetSeed
    url: string
    /** Dotted path to the price, array indexes as segments: `gold.0.price` */
    path: string
    /** Applied after parsing, e.g. 10 for APIs quoting toman instead of rial */
    multiplier?: number
}

export class JsonPriceSource extends HttpPriceSource {
    readonly path: string
    private readonly multiplier: number

    constructor(config: JsonPriceSourceConfig) {
        super(config.id, config.asset, config.url, config)
        this.path = config.path
        this.multiplier = config.multiplier ?? 1
    }

    async fetchPrice(signal?: AbortSignal): Promise<number> {
        const body = await this.fetchBody('application/json, text/plain, */*', signal)
        return this.extractPrice(body)
    }

    extractPrice(body: string): number {
        let document: unknown
        try {
            document = JSON.parse(body)
        } catch (error) {
            throw new SourceError(this.id, 'parse', 'Response is not valid JSON', { cause: error })
        }

        const value = readPath(document, this.path)
        if (typeof value === 'number') {
            return this.toPrice(String(value), this.multiplier)
        }
        if (typeof value === 'string') {
            return this.toPrice(value, this.multiplier)
        }
        throw new SourceError(this.id, 'parse', `No price at path '${this.path}'`)
    }
}

function readPath(document: unknown, path: string): unknown {
    let current: unknown = document
    for (const segment of path.split('.')) {
        if (Array.isArray(current)) {
            const index = Number(segment)
            current = Number.isInteger(index) ? current[index] : undefined
        } else if (current !== null && typeof current === 'object') {
            current = Object.getOwnPropertyDescriptor(current, segment)?.value
        } else {
            return undefined
        }
    }
    return current
}
