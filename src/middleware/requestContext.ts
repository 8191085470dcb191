import type { Request, Response, NextFunction } from 'express'
import { randomUUID } from 'node:crypto'
import { logger } from '../utils/logger.js'
import { runWithRequestContext } from '../utils/requestContext.js'

const MAX_REQUEST_ID_LENGTH = 128
const PRINTABLE_ID = /^[\x21-\x7e]+$/

/** Reuses the caller's X-Request-Id when it is short printable ASCII. */
export function resolveRequestId(header: string | string[] | undefined): string {
    const inbound = (Array.isArray(header) ? header[0] : header)?.trim()
    if (inbound && inbound.length <= MAX_REQUEST_ID_LENGTH && PRINTABLE_ID.test(inbound)) {
        return inbound
    }
    return randomUUID()
}

const isHealthProbe = (req: Request): boolean => req.originalUrl.startsWith('/api/health')

/**
 * Tags each request with an id for the logger context and the X-Request-Id
 * response header, then writes one access line once the response is sent.
 * Client errors log at warn, server errors at error, health probes at debug.
 */
export const requestContextMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    const requestId = resolveRequestId(req.headers['x-request-id'])
    req.requestId = requestId
    res.setHeader('X-Request-Id', requestId)

    const start = process.hrtime.bigint()

    res.on('finish', () => {
        const fields = {
            requestId,
            method: req.method,
            path: req.originalUrl,
            statusCode: res.statusCode,
            durationMs: Number(process.hrtime.bigint() - start) / 1_000_000
        }
        if (res.statusCode >= 500) logger.error('http_request', fields)
        else if (res.statusCode >= 400) logger.warn('http_request', fields)
        else if (isHealthProbe(req)) logger.debug('http_request', fields)
        else logger.info('http_request', fields)
    })

    runWithRequestContext({ requestId }, next)
}
