import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { IngestionScheduler, startScheduler, type CycleRunner } from '../services/ingestionScheduler.js'
import type { IngestionCycleResult } from '../services/ingestionService.js'

const result = (success: boolean): IngestionCycleResult => ({
    success,
    cycleId: 'cycle-test',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:00.000Z',
    errors: success ? [] : [{ stage: 'fetch', sourceId: 's', kind: 'transport', message: 'down' }]
})

describe('IngestionScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it('runs a cycle at start and then once per period', async () => {
        const runner: CycleRunner = { runIngestionCycle: vi.fn(async () => result(true)) }
        const scheduler = new IngestionScheduler(runner, 1000)

        const loop = scheduler.start()
        await vi.advanceTimersByTimeAsync(0)
        expect(runner.runIngestionCycle).toHaveBeenCalledTimes(1)

        await vi.advanceTimersByTimeAsync(1000)
        expect(runner.runIngestionCycle).toHaveBeenCalledTimes(2)

        await vi.advanceTimersByTimeAsync(2500)
        expect(runner.runIngestionCycle).toHaveBeenCalledTimes(4)

        await scheduler.stop()
        await loop
        expect(scheduler.isActive()).toBe(false)
    })

    it('starts the next cycle right after a slow one without replaying missed ticks', async () => {
        const t0 = Date.now()
        const starts: number[] = []
        const runner: CycleRunner = {
            runIngestionCycle: () => {
                starts.push(Date.now() - t0)
                return new Promise(resolve => setTimeout(() => resolve(result(true)), 2500))
            }
        }
        const scheduler = new IngestionScheduler(runner, 1000)

        scheduler.start()
        await vi.advanceTimersByTimeAsync(6000)

        expect(starts).toEqual([0, 2500, 5000])
        const stopping = scheduler.stop()
        await vi.advanceTimersByTimeAsync(2500)
        await stopping
    })

    it('keeps going after failed and throwing cycles', async () => {
        const runIngestionCycle = vi.fn<() => Promise<IngestionCycleResult>>()
            .mockResolvedValueOnce(result(false))
            .mockRejectedValueOnce(new Error('unexpected'))
            .mockResolvedValue(result(true))
        const scheduler = new IngestionScheduler({ runIngestionCycle }, 100)

        scheduler.start()
        await vi.advanceTimersByTimeAsync(250)

        expect(runIngestionCycle).toHaveBeenCalledTimes(3)
        await scheduler.stop()
    })

    it('stop wakes a sleeping loop', async () => {
        const runner: CycleRunner = { runIngestionCycle: vi.fn(async () => result(true)) }
        const scheduler = new IngestionScheduler(runner, 60 * 60 * 1000)

        const loop = scheduler.start()
        await vi.advanceTimersByTimeAsync(0)
        await scheduler.stop()

        await expect(loop).resolves.toBeUndefined()
        expect(vi.getTimerCount()).toBe(0)
    })

    it('returns the running loop when started twice', async () => {
        const runner: CycleRunner = { runIngestionCycle: vi.fn(async () => result(true)) }
        const scheduler = new IngestionScheduler(runner, 1000)

        expect(scheduler.start()).toBe(scheduler.start())
        await vi.advanceTimersByTimeAsync(0)
        expect(runner.runIngestionCycle).toHaveBeenCalledTimes(1)
        await scheduler.stop()
    })

    it('rejects a non-positive period', () => {
        const runner: CycleRunner = { runIngestionCycle: async () => result(true) }
        expect(() => new IngestionScheduler(runner, 0)).toThrow('periodMs must be a positive number, got 0')
    })
})

describe('startScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it('settles once the signal aborts', async () => {
        const runner: CycleRunner = { runIngestionCycle: vi.fn(async () => result(true)) }
        const controller = new AbortController()

        const loop = startScheduler(runner, 1000, controller.signal)
        await vi.advanceTimersByTimeAsync(1500)
        controller.abort()

        await expect(loop).resolves.toBeUndefined()
        expect(runner.runIngestionCycle).toHaveBeenCalledTimes(2)
    })

    it('does nothing with an already aborted signal', async () => {
        const runner: CycleRunner = { runIngestionCycle: vi.fn(async () => result(true)) }
        const controller = new AbortController()
        controller.abort()

        await startScheduler(runner, 1000, controller.signal)
        expect(runner.runIngestionCycle).not.toHaveBeenCalled()
    })
})
