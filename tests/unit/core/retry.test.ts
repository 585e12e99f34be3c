import { describe, it, expect, vi } from 'vitest'
import { withRetry } from '../../../src/core/retry.js'
import { HandshakeError, TransportError } from '../../../src/core/errors.js'

describe('withRetry', () => {
    it('returns on first success', async () => {
        const fn = vi.fn(() => Promise.resolve('ok'))
        const result = await withRetry(fn, { maxRetries: 3, baseDelay: 1, maxDelay: 10 })
        expect(result).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on transient error', async () => {
        let callCount = 0
        const fn = vi.fn(() => {
            callCount++
            if (callCount === 1) return Promise.reject(new TransportError('server exited'))
            return Promise.resolve('recovered')
        })

        const result = await withRetry(fn, { maxRetries: 3, baseDelay: 1, maxDelay: 10 })
        expect(result).toBe('recovered')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('throws immediately on permanent error', async () => {
        const fn = vi.fn(() => Promise.reject(new HandshakeError('rejected')))
        await expect(withRetry(fn, { maxRetries: 3, baseDelay: 1, maxDelay: 10 })).rejects.toThrow('rejected')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('throws after max retries', async () => {
        const fn = vi.fn(() => Promise.reject(new TransportError('timeout')))
        await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1, maxDelay: 10 })).rejects.toThrow('timeout')
        expect(fn).toHaveBeenCalledTimes(3) // initial + 2 retries
    })

    it('reports each retry with an exponential, capped delay', async () => {
        const onRetry = vi.fn()
        const fn = vi.fn(() => Promise.reject(new TransportError('down')))

        await expect(withRetry(fn, { maxRetries: 3, baseDelay: 2, maxDelay: 5, onRetry })).rejects.toThrow('down')

        expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
            [1, 2],
            [2, 4],
            [3, 5],
        ])
    })
})
