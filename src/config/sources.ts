import { HtmlPriceSource } from '../sources/htmlPriceSource.js'
import { JsonPriceSource } from '../sources/jsonPriceSource.js'
import type { PriceSource, HttpSourceOptions } from '../sources/priceSource.js'
import type { AssetSeed } from '../types/index.js'

const AGAH_FUND_URL = 'https://research.agah.com/fund/mutual'
const AGAH_PRICE_SELECTOR = 'span.top-info_price-number__ZEf_q'
const TGJU_HOME_URL = 'https://www.tgju.org/'
const TGJU_DOLLAR_URL = 'https://www.tgju.org/%D9%82%DB%8C%D9%85%D8%AA-%D8%AF%D9%84%D8%A7%D8%B1'

export const TRACKED_ASSETS = {
    exir: {
        canonicalName: 'Exir',
        displayName: 'صندوق اکسیر',
        englishName: 'Exir Fund',
        category: 'IranianStockFund',
        description: 'Exir mutual fund unit price'
    },
    firouze: {
        canonicalName: 'Firouze',
        displayName: 'صندوق فیروزه',
        englishName: 'Firouze Fund',
        category: 'IranianStockFund',
        description: 'Firouze mutual fund unit price'
    },
    gold18k: {
        canonicalName: 'Gold18K',
        displayName: 'طلای ۱۸ عیار',
        englishName: '18K Gold (gram)',
        category: 'Commodity',
        description: 'Price of one gram of 18 karat gold'
    },
    usd: {
        canonicalName: 'USD',
        displayName: 'دلار آمریکا',
        englishName: 'US Dollar',
        category: 'Currency',
        description: 'Free-market US dollar rate'
    }
} as const satisfies Record<string, AssetSeed>

export interface TrackedSourceOverrides {
    /** Gold API quoting toman at `gold.0.price`; replaces the scraped gold row */
    goldApiUrl?: string | null
}

function goldSource(options: HttpSourceOptions, goldApiUrl: string | null | undefined): PriceSource {
    if (goldApiUrl) {
        return new JsonPriceSource({
            ...options,
            id: 'api:gold18k',
            asset: TRACKED_ASSETS.gold18k,
            url: goldApiUrl,
            path: 'gold.0.price',
            multiplier: 10
        })
    }
    return new HtmlPriceSource({
        ...options,
        id: 'tgju:geram18',
        asset: TRACKED_ASSETS.gold18k,
        url: TGJU_HOME_URL,
        locator: { row: 'tr[data-market-nameslug="geram18"]', selector: 'td.nf' }
    })
}

/**
 * Sources the ingestion cycle fetches, in fetch order. Every entry must
 * succeed for a cycle to commit.
 */
export function createTrackedSources(
    options: HttpSourceOptions = {},
    overrides: TrackedSourceOverrides = {}
): PriceSource[] {
    return [
        new HtmlPriceSource({
            ...options,
            id: 'agah:14004329930',
            asset: TRACKED_ASSETS.exir,
            url: `${AGAH_FUND_URL}/14004329930`,
            locator: { selector: AGAH_PRICE_SELECTOR }
        }),
        new HtmlPriceSource({
            ...options,
            id: 'agah:10320814789',
            asset: TRACKED_ASSETS.firouze,
            url: `${AGAH_FUND_URL}/10320814789`,
            locator: { selector: AGAH_PRICE_SELECTOR }
        }),
        goldSource(options, overrides.goldApiUrl),
        new HtmlPriceSource({
            ...options,
            id: 'tgju:price_dollar_rl',
            asset: TRACKED_ASSETS.usd,
            url: TGJU_DOLLAR_URL,
            locator: { row: 'tr[data-market-nameslug="price_dollar_rl"]', selector: 'td.nf' }
        })
    ]
}
