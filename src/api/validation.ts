import { z } from 'zod';
import { ASSET_CATEGORIES, CURRENCIES } from '../types/index.js';
import { COMPARISON_KINDS } from '../services/analyticsService.js';
import { MAX_PAGE_SIZE } from '../services/queryService.js';

// Accepts ?x=a,b and ?x=a&x=b alike; empty means no filter
const commaList = <T extends z.ZodTypeAny>(item: T) => z.preprocess((val) => {
    if (val === undefined || val === null || val === '') return [];
    const raw = Array.isArray(val) ? val.map(String) : [String(val)];
    return raw
        .flatMap((part) => part.split(','))
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}, z.array(item));

const assetId = z.coerce.number().int().positive();

const currency = z.enum(CURRENCIES).default('IRR');

const categoryList = commaList(z.enum(ASSET_CATEGORIES));

const holdings = z.record(
    z.string().regex(/^\d+$/, 'Holding keys must be numeric asset ids'),
    z.number().finite()
);

export const assetIdParamSchema = z.object({
    id: assetId,
});

// GET /assets
export const listAssetsQuerySchema = z.object({
    search: z.string().trim().max(100).optional(),
    categories: categoryList,
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(15),
});

// GET /assets/options
export const assetOptionsQuerySchema = z.object({
    categories: categoryList,
});

// GET /assets/:id/history
export const assetHistoryQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(3650).default(30),
    currency,
});

// GET /prices/latest
export const latestPricesQuerySchema = z.object({
    ids: commaList(assetId).pipe(z.array(assetId).min(1, 'At least one asset id is required').max(100)),
});

// GET /analytics/compare
export const compareQuerySchema = z.object({
    ids: commaList(assetId).pipe(z.array(assetId).max(20)),
    kind: z.enum(COMPARISON_KINDS).default('performance'),
    currency,
    days: z.coerce.number().int().min(1).max(3650).default(90),
});

// POST /portfolio/valuation
export const portfolioValuationSchema = z.object({
    holdings,
    currency,
}).strict();

// POST /portfolio/performance
export const portfolioPerformanceSchema = z.object({
    holdings,
    days: z.number().int().min(1).max(3650).default(30),
}).strict();

export type ListAssetsQuery = z.infer<typeof listAssetsQuerySchema>;
export type AssetOptionsQuery = z.infer<typeof assetOptionsQuerySchema>;
export type AssetHistoryQuery = z.infer<typeof assetHistoryQuerySchema>;
export type LatestPricesQuery = z.infer<typeof latestPricesQuerySchema>;
export type CompareQuery = z.infer<typeof compareQuerySchema>;
export type PortfolioValuationBody = z.infer<typeof portfolioValuationSchema>;
export type PortfolioPerformanceBody = z.infer<typeof portfolioPerformanceSchema>;
