import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'

import type {
    CompletionConfig,
    Message,
    ModelProvider,
    ModelResponse,
    RetryEvent,
    RetryPolicy,
} from '../types'
import {
    AgentError,
    BadRequestError,
    RateLimitError,
    TransientUnavailableError,
    TransportError,
} from '../errors'

export const DEFAULT_COMPLETION_CONFIG: CompletionConfig = {
    temperature: 0.1,
    maxOutputTokens: 2000,
    modelId: 'deepseek-chat',
    timeoutMs: 30_000,
    maxRetries: 3,
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
    jitter: 0.25,
}

const completionConfigSchema = z.object({
    temperature: z.number().min(0).max(1),
    maxOutputTokens: z.number().int().positive(),
    modelId: z.string().min(1),
    timeoutMs: z.number().positive(),
    maxRetries: z.number().int().min(1),
})

export interface LLMClientOptions {
    retry?: Partial<RetryPolicy> | undefined
    onRetry?: ((event: RetryEvent) => void | Promise<void>) | undefined
    /** Injected for tests; defaults to a timer-based sleep */
    sleep?: ((ms: number) => Promise<void>) | undefined
    /** Injected for tests; defaults to Math.random */
    random?: (() => number) | undefined
}

/**
 * Exponential backoff for the attempt that just failed (1-based), capped,
 * plus up to `jitter` of the capped delay at random.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    const exponential = policy.baseDelayMs * 2 ** (attempt - 1)
    const capped = Math.min(exponential, policy.maxDelayMs)
    return Math.round(capped + capped * policy.jitter * random())
}

function isRetryable(error: AgentError): boolean {
    return error.kind === 'transport' || error.kind === 'server'
}

/**
 * Sends transcripts to a `ModelProvider`, retrying transient failures.
 *
 * Each attempt is cut off after `timeoutMs`; the provider's request signal
 * is aborted at that point.
 *
 * Connection errors, timeouts and 5xx replies are retried with backoff up to
 * `maxRetries` attempts in total. A rate limit is retried once per response
 * only when the server says how long to wait. Auth and other client errors
 * are returned to the caller untouched on the first occurrence.
 */
export class LLMClient {
    private readonly policy: RetryPolicy
    private readonly sleep: (ms: number) => Promise<void>
    private readonly random: () => number
    private readonly onRetry: ((event: RetryEvent) => void | Promise<void>) | undefined

    constructor(
        private readonly provider: ModelProvider,
        options: LLMClientOptions = {},
    ) {
        this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry }
        this.sleep = options.sleep ?? ((ms) => delay(ms))
        this.random = options.random ?? Math.random
        this.onRetry = options.onRetry
    }

    get providerName(): string {
        return this.provider.name
    }

    async complete(transcript: readonly Message[], config: CompletionConfig): Promise<ModelResponse> {
        const checked = completionConfigSchema.safeParse(config)
        if (!checked.success) {
            const fields = checked.error.issues.map((i) => i.path.join('.')).join(', ')
            throw new BadRequestError(`Invalid completion config: ${fields}`)
        }

        let lastError: AgentError | undefined

        for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
            try {
                return await this.attempt(transcript, config)
            } catch (err) {
                const error = classify(err)
                lastError = error

                let wait: number
                if (error instanceof RateLimitError) {
                    if (error.retryAfterMs === undefined) throw error
                    wait = error.retryAfterMs
                } else if (isRetryable(error)) {
                    wait = backoffDelay(attempt, this.policy, this.random)
                } else {
                    throw error
                }

                if (attempt === config.maxRetries) break

                await this.onRetry?.({ attempt, delayMs: wait, error })
                await this.sleep(wait)
            }
        }

        throw new TransientUnavailableError(config.maxRetries, lastError ?? new TransportError('no attempt was made'))
    }

    /** One provider call, bounded by `timeoutMs` of wall-clock time. */
    private async attempt(transcript: readonly Message[], config: CompletionConfig): Promise<ModelResponse> {
        const controller = new AbortController()
        const timeout = delay(config.timeoutMs, undefined, { signal: controller.signal }).then(() => {
            throw new TransportError(`Model call timed out after ${config.timeoutMs}ms`)
        })

        try {
            return await Promise.race([
                this.provider.complete({ messages: transcript, config, signal: controller.signal }),
                timeout,
            ])
        } finally {
            controller.abort()
        }
    }
}

/**
 * Providers are expected to throw classified errors; anything else that
 * escapes them is treated as a transport failure.
 */
function classify(err: unknown): AgentError {
    if (err instanceof AgentError) return err
    const message = err instanceof Error ? err.message : String(err)
    return new TransportError(message, { cause: err })
}
