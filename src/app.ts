import express, { type Express } from 'express'
import cors, { type CorsOptions } from 'cors'
import { createApiRouter, type ApiDependencies } from './api/routes.js'
import { apiErrorHandler, notFoundHandler } from './middleware/apiErrorHandler.js'
import { requestContextMiddleware } from './middleware/requestContext.js'
import { logger } from './utils/logger.js'

/**
 * Builds the CORS policy. With no configured origins every origin is
 * allowed; otherwise only exact matches and origin-less requests pass.
 */
export function buildCorsOptions(allowedOrigins: string[]): CorsOptions {
    if (allowedOrigins.length === 0) {
        return { origin: true, methods: ['GET', 'POST', 'OPTIONS'] }
    }

    const allowed = new Set(allowedOrigins)
    return {
        origin(origin, callback) {
            if (!origin || allowed.has(origin)) return callback(null, true)
            logger.warn('CORS rejected origin', { origin })
            callback(null, false)
        },
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Request-Id'],
        exposedHeaders: ['X-Request-Id'],
        optionsSuccessStatus: 200
    }
}

export function createApp(deps: ApiDependencies, corsOrigins: string[] = []): Express {
    const app = express()

    app.use(cors(buildCorsOptions(corsOrigins)))
    app.use(express.json({ limit: '1mb' }))
    app.use(requestContextMiddleware)

    app.get('/', (_req, res) => {
        res.json({
            message: 'Asset Price Tracker API',
            status: 'running',
            timestamp: new Date().toISOString()
        })
    })

    app.use('/api', createApiRouter(deps))

    app.use(notFoundHandler)
    app.use(apiErrorHandler)

    return app
}
