import type { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger.js'
import { mapUnknownError, notFound } from '../utils/apiErrors.js'
import { fail } from '../utils/apiResponse.js'

export function apiErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err)
        return
    }

    const mapped = mapUnknownError(err)
    const fields = {
        requestId: req.requestId,
        method: req.method,
        url: req.originalUrl,
        status: mapped.status,
        code: mapped.code,
        details: mapped.details
    }
    if (mapped.status >= 500) {
        logger.error('Unhandled API error', { ...fields, error: err })
    } else {
        logger.warn('API request rejected', fields)
    }

    fail(res, mapped.status, mapped.code, mapped.message, mapped.details)
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(notFound(`Route not found: ${req.method} ${req.originalUrl}`))
}
