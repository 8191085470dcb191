import type { Response } from 'express'

export interface ApiErrorBody {
    code: string
    message: string
    details?: unknown
}

export interface ApiResponseEnvelope<T> {
    success: boolean
    data: T | null
    error: ApiErrorBody | null
    timestamp: string
    requestId?: string
    meta?: Record<string, unknown>
}

interface ResponseOptions {
    status?: number
    meta?: Record<string, unknown>
}

export interface PageMeta {
    total: number
    page: number
    pageSize: number
    pageCount: number
}

const nowIso = (): string => new Date().toISOString()

// res.req is unset when a handler is driven without an Express request
const requestIdOf = (res: Response): { requestId?: string } => {
    const requestId = res.req?.requestId
    return requestId ? { requestId } : {}
}

export function ok<T>(
    res: Response,
    data: T,
    options: ResponseOptions = {}
): Response<ApiResponseEnvelope<T>> {
    const payload: ApiResponseEnvelope<T> = {
        success: true,
        data,
        error: null,
        timestamp: nowIso(),
        ...requestIdOf(res),
        ...(options.meta ? { meta: options.meta } : {})
    }

    return res.status(options.status ?? 200).json(payload)
}

/** Success envelope for one page of a listing. */
export function okPage<T>(res: Response, rows: T[], page: PageMeta): Response<ApiResponseEnvelope<T[]>> {
    return ok(res, rows, {
        meta: { total: page.total, page: page.page, pageSize: page.pageSize, pageCount: page.pageCount }
    })
}

export function fail(
    res: Response,
    status: number,
    code: string,
    message: string,
    details?: unknown,
    options: ResponseOptions = {}
): Response<ApiResponseEnvelope<null>> {
    const payload: ApiResponseEnvelope<null> = {
        success: false,
        data: null,
        error: {
            code,
            message,
            ...(details === undefined ? {} : { details })
        },
        timestamp: nowIso(),
        ...requestIdOf(res),
        ...(options.meta ? { meta: options.meta } : {})
    }

    return res.status(status).json(payload)
}
