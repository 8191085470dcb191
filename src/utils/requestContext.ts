import { AsyncLocalStorage } from 'node:async_hooks'

/**
 * Correlation ids carried through async work. HTTP requests set `requestId`,
 * ingestion cycles set `cycleId`; the logger mixes both into every line.
 */
export interface RequestContext {
    requestId?: string
    cycleId?: string
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>()

export const runWithRequestContext = <T>(context: RequestContext, fn: () => T): T =>
    requestContextStorage.run({ ...requestContextStorage.getStore(), ...context }, fn)

export const getRequestContext = (): RequestContext | undefined =>
    requestContextStorage.getStore()

