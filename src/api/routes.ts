import { Router, type Request, type RequestHandler, type Response } from 'express'
import type { PriceStore } from '../db/priceStore.js'
import type { AnalyticsService } from '../services/analyticsService.js'
import type { IngestionService } from '../services/ingestionService.js'
import type { QueryService } from '../services/queryService.js'
import { validateQuery, validateRequest } from '../middleware/validate.js'
import { conflict, notFound } from '../utils/apiErrors.js'
import { fail, ok, okPage } from '../utils/apiResponse.js'
import { logger } from '../utils/logger.js'
import {
    assetHistoryQuerySchema,
    assetIdParamSchema,
    assetOptionsQuerySchema,
    compareQuerySchema,
    latestPricesQuerySchema,
    listAssetsQuerySchema,
    portfolioPerformanceSchema,
    portfolioValuationSchema,
    type AssetHistoryQuery,
    type AssetOptionsQuery,
    type CompareQuery,
    type LatestPricesQuery,
    type ListAssetsQuery,
    type PortfolioPerformanceBody,
    type PortfolioValuationBody
} from './validation.js'

export interface ApiDependencies {
    store: PriceStore
    queryService: QueryService
    analyticsService: AnalyticsService
    ingestionService: IngestionService
}

// Express 4 does not forward rejected promises to the error handler by itself
const asyncRoute = (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
    (req, res, next) => {
        handler(req, res).catch(next)
    }

export function createApiRouter(deps: ApiDependencies): Router {
    const { store, queryService, analyticsService, ingestionService } = deps
    const router = Router()

    // ================================
    // HEALTH
    // ================================

    router.get('/health', asyncRoute(async (_req, res) => {
        await store.ping()
        const last = ingestionService.getLastResult()
        ok(res, {
            status: 'ok',
            store: store.kind,
            ingestionRunning: ingestionService.isRunning(),
            lastIngestion: last
                ? { cycleId: last.cycleId, success: last.success, finishedAt: last.finishedAt }
                : null
        })
    }))

    // ================================
    // ASSETS
    // ================================

    router.get('/assets', validateQuery(listAssetsQuerySchema), asyncRoute(async (_req, res) => {
        const query: ListAssetsQuery = res.locals.query
        const page = await queryService.listAssets({
            searchTerm: query.search,
            categories: query.categories,
            page: query.page,
            pageSize: query.pageSize
        })
        okPage(res, page.rows, page)
    }))

    router.get('/assets/options', validateQuery(assetOptionsQuerySchema), asyncRoute(async (_req, res) => {
        const query: AssetOptionsQuery = res.locals.query
        ok(res, await queryService.assetOptionsFor(query.categories))
    }))

    router.get('/assets/:id/latest', asyncRoute(async (req, res) => {
        const { id } = assetIdParamSchema.parse(req.params)
        const asset = await queryService.getAsset(id)
        if (!asset) throw notFound(`Asset ${id} not found`)
        const latest = await queryService.latestPrice(id)
        ok(res, { asset, latest: latest ?? null })
    }))

    router.get('/assets/:id/history', validateQuery(assetHistoryQuerySchema), asyncRoute(async (req, res) => {
        const { id } = assetIdParamSchema.parse(req.params)
        const query: AssetHistoryQuery = res.locals.query
        const result = await analyticsService.assetHistory(id, query.days, query.currency)
        if (!result) throw notFound(`Asset ${id} not found`)
        ok(res, result)
    }))

    // ================================
    // PRICES
    // ================================

    router.get('/prices/latest', validateQuery(latestPricesQuerySchema), asyncRoute(async (_req, res) => {
        const query: LatestPricesQuery = res.locals.query
        const prices = await queryService.latestPrices(query.ids)
        const found = new Set(prices.map(p => p.assetId))
        ok(res, prices, { meta: { missing: query.ids.filter(id => !found.has(id)) } })
    }))

    // ================================
    // PORTFOLIO & ANALYTICS
    // ================================

    router.post('/portfolio/valuation', validateRequest(portfolioValuationSchema), asyncRoute(async (req, res) => {
        const body: PortfolioValuationBody = req.body
        ok(res, await analyticsService.portfolioValuation(body.holdings, body.currency))
    }))

    router.post('/portfolio/performance', validateRequest(portfolioPerformanceSchema), asyncRoute(async (req, res) => {
        const body: PortfolioPerformanceBody = req.body
        ok(res, await analyticsService.portfolioPerformance(body.holdings, body.days))
    }))

    router.get('/analytics/compare', validateQuery(compareQuerySchema), asyncRoute(async (_req, res) => {
        const query: CompareQuery = res.locals.query
        ok(res, await analyticsService.compareAssets(query.ids, query.kind, query.currency, query.days))
    }))

    // ================================
    // INGESTION
    // ================================

    router.post('/ingestion/run', asyncRoute(async (_req, res) => {
        if (ingestionService.isRunning()) {
            throw conflict('An ingestion cycle is already running')
        }

        const result = await ingestionService.runIngestionCycle()
        if (result.success) {
            analyticsService.invalidateReferenceRate()
            ok(res, result)
            return
        }
        if (result.errors.some(e => e.stage === 'lock')) {
            throw conflict('An ingestion cycle is already running')
        }

        logger.warn('Manual ingestion cycle failed', { cycleId: result.cycleId, failures: result.errors.length })
        fail(res, 502, 'INGESTION_FAILED', 'Ingestion cycle failed, nothing was written', result.errors, {
            meta: { cycleId: result.cycleId }
        })
    }))

    router.get('/ingestion/status', (_req, res) => {
        ok(res, {
            running: ingestionService.isRunning(),
            lastResult: ingestionService.getLastResult()
        })
    })

    return router
}
