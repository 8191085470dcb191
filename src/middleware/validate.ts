import type { Request, Response, NextFunction } from 'express'
import type { ZodTypeAny } from 'zod'
import { logger } from '../utils/logger.js'
import { fail } from '../utils/apiResponse.js'
import { formatZodIssues } from '../utils/apiErrors.js'

type RequestPart = 'body' | 'query'

/**
 * Validates `req[part]` against a zod schema and replaces it with the parsed
 * value, so handlers read coerced numbers and defaults.
 */
export const validateRequest = (schema: ZodTypeAny, part: RequestPart = 'body') => {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req[part])

        if (!result.success) {
            const formattedErrors = formatZodIssues(result.error)
            logger.warn('Request validation failed', {
                path: req.originalUrl,
                part,
                errors: formattedErrors
            })
            fail(res, 400, 'VALIDATION_ERROR', `Invalid request ${part === 'body' ? 'payload' : 'query'}`, formattedErrors)
            return
        }

        if (part === 'body') {
            req.body = result.data
        } else {
            res.locals.query = result.data
        }
        next()
    }
}

export const validateQuery = (schema: ZodTypeAny) => validateRequest(schema, 'query')
