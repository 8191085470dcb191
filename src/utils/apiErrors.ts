import { ZodError } from 'zod'
import { PersistenceError } from '../types/index.js'

export class ApiError extends Error {
    status: number
    code: string
    details?: unknown

    constructor(status: number, code: string, message: string, details?: unknown) {
        super(message)
        this.name = 'ApiError'
        this.status = status
        this.code = code
        this.details = details
    }
}

export const badRequest = (message: string, details?: unknown): ApiError =>
    new ApiError(400, 'BAD_REQUEST', message, details)

export const validationError = (message: string, details?: unknown): ApiError =>
    new ApiError(400, 'VALIDATION_ERROR', message, details)

export const notFound = (message: string, details?: unknown): ApiError =>
    new ApiError(404, 'NOT_FOUND', message, details)

export const conflict = (message: string, details?: unknown): ApiError =>
    new ApiError(409, 'CONFLICT', message, details)

export const dataUnavailable = (message: string, details?: unknown): ApiError =>
    new ApiError(503, 'DATA_UNAVAILABLE', message, details)

export const internalError = (message: string, details?: unknown): ApiError =>
    new ApiError(500, 'INTERNAL_ERROR', message, details)

export const formatZodIssues = (error: ZodError): { field: string; message: string }[] =>
    error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message
    }))

export const mapUnknownError = (error: unknown): ApiError => {
    if (error instanceof ApiError) return error

    // Store internals stay in the logs, not in the response
    if (error instanceof PersistenceError) {
        return dataUnavailable('Price data is temporarily unavailable', { operation: error.operation })
    }

    // express.json() rejects unparseable bodies with a SyntaxError carrying status 400
    if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
        return badRequest('Malformed JSON body')
    }

    if (error instanceof ZodError) {
        return validationError('Invalid request', formatZodIssues(error))
    }

    if (error instanceof Error) {
        return internalError(error.message || 'Internal server error')
    }

    return internalError('Internal server error')
}
