import * as cheerio from 'cheerio'
import { SourceError, type AssetSeed } from '../types/index.js'
import { HttpPriceSource, type HttpSourceOptions } from './priceSource.js'

/**
 * Where the price sits in a page. With `row`, the first element matching
 * `row` is found and `selector` is resolved inside it (table pages list many
 * instruments, each row tagged with a slug attribute).
 */
export interface HtmlLocator {
    row?: string
    selector: string
}

export interface HtmlPriceSourceConfig extends HttpSourceOptions {
    id: string
    asset: AssetSeed
    url: string
    locator: HtmlLocator
    multiplier?: number
}

export class HtmlPriceSource extends HttpPriceSource {
    readonly locator: HtmlLocator
    private readonly multiplier: number

    constructor(config: HtmlPriceSourceConfig) {
        super(config.id, config.asset, config.url, config)
        this.locator = config.locator
        this.multiplier = config.multiplier ?? 1
    }

    async fetchPrice(signal?: AbortSignal): Promise<number> {
        const html = await this.fetchBody('text/html,application/xhtml+xml', signal)
        return this.extractPrice(html)
    }

    extractPrice(html: string): number {
        const $ = cheerio.load(html)

        let element = $(this.locator.selector).first()
        if (this.locator.row) {
            const row = $(this.locator.row).first()
            if (row.length === 0) {
                throw new SourceError(this.id, 'parse', `Row '${this.locator.row}' not found`)
            }
            element = row.find(this.locator.selector).first()
        }
        if (element.length === 0) {
            throw new SourceError(this.id, 'parse', `Price element '${this.locator.selector}' not found`)
        }

        return this.toPrice(element.text(), this.multiplier)
    }
}
