import { classifyError } from './errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    onRetry?: (error: unknown, attempt: number, delay: number) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 60000,
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Caller-level retry with exponential backoff. Only transient errors are
 * retried; the protocol client and the orchestrator never retry on their own.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            opts.onRetry?.(error, attempt + 1, delay)
            await sleep(delay)
        }
    }
}
