import { describe, it, expect, vi } from 'vitest'
import {
    AuthError,
    BadRequestError,
    LLMClient,
    RateLimitError,
    ServerError,
    TransientUnavailableError,
    TransportError,
    backoffDelay,
    type CompletionConfig,
    type Message,
    type ModelProvider,
    type ModelRequest,
    type ModelResponse,
    type RetryEvent,
} from '../../src'

const config: CompletionConfig = {
    temperature: 0.1,
    maxOutputTokens: 256,
    modelId: 'test-model',
    timeoutMs: 5_000,
    maxRetries: 3,
}

const transcript: Message[] = [
    { role: 'system', content: 'You are a test.' },
    { role: 'user', content: 'Compute 123 + 456' },
]

/** Provider that plays back one outcome per attempt. */
function scripted(outcomes: Array<string | Error>) {
    const requests: ModelRequest[] = []
    const provider: ModelProvider = {
        name: 'scripted',
        async complete(request) {
            requests.push(request)
            const next = outcomes[requests.length - 1]
            if (next === undefined) throw new Error('script exhausted')
            if (next instanceof Error) throw next
            return { text: next }
        },
    }
    return { provider, requests }
}

function clientFor(provider: ModelProvider, onRetry?: (event: RetryEvent) => void) {
    const sleep = vi.fn(async (_ms: number) => undefined)
    const client = new LLMClient(provider, {
        retry: { baseDelayMs: 100, maxDelayMs: 1_000, jitter: 0.5 },
        random: () => 0,
        sleep,
        onRetry,
    })
    return { client, sleep }
}

describe('LLMClient', () => {
    it('returns the raw reply text unmodified', async () => {
        const { provider, requests } = scripted(['  Final Answer: 579\n'])
        const { client } = clientFor(provider)

        const response = await client.complete(transcript, config)

        expect(response.text).toBe('  Final Answer: 579\n')
        expect(requests).toHaveLength(1)
        expect(requests[0]?.messages).toBe(transcript)
        expect(requests[0]?.config).toEqual(config)
    })

    it('retries transport failures and returns the first success', async () => {
        const { provider, requests } = scripted([
            new TransportError('connection reset'),
            new TransportError('timed out'),
            'ok',
        ])
        const { client, sleep } = clientFor(provider)

        await expect(client.complete(transcript, config)).resolves.toEqual({ text: 'ok' })
        expect(requests).toHaveLength(3)
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200])
    })

    it('retries 5xx responses', async () => {
        const { provider } = scripted([new ServerError(503, 'unavailable'), 'ok'])
        const { client } = clientFor(provider)

        await expect(client.complete(transcript, config)).resolves.toEqual({ text: 'ok' })
    })

    it('gives up with TransientUnavailableError after max_retries attempts', async () => {
        const last = new ServerError(502, 'bad gateway')
        const { provider, requests } = scripted([new TransportError('down'), new TransportError('down'), last])
        const { client, sleep } = clientFor(provider)

        const error = await client.complete(transcript, config).catch((e: unknown) => e)

        expect(error).toBeInstanceOf(TransientUnavailableError)
        if (!(error instanceof TransientUnavailableError)) return
        expect(error.attempts).toBe(3)
        expect(error.cause).toBe(last)
        expect(requests).toHaveLength(3)
        expect(sleep).toHaveBeenCalledTimes(2)
    })

    it.each([
        ['auth', new AuthError('invalid api key', { status: 401 })],
        ['bad request', new BadRequestError('unknown model', { status: 400 })],
        ['rate limit without retry-after', new RateLimitError('slow down')],
    ])('does not retry a %s error', async (_label, failure) => {
        const { provider, requests } = scripted([failure, 'never reached'])
        const { client, sleep } = clientFor(provider)

        await expect(client.complete(transcript, config)).rejects.toBe(failure)
        expect(requests).toHaveLength(1)
        expect(sleep).not.toHaveBeenCalled()
    })

    it('honours a rate limit retry-after hint as the delay for that retry', async () => {
        const { provider, requests } = scripted([new RateLimitError('slow down', { retryAfterMs: 1_500 }), 'ok'])
        const { client, sleep } = clientFor(provider)

        await expect(client.complete(transcript, config)).resolves.toEqual({ text: 'ok' })
        expect(requests).toHaveLength(2)
        expect(sleep).toHaveBeenCalledWith(1_500)
    })

    it('treats unclassified provider failures as transport errors', async () => {
        const { provider } = scripted([new Error('socket hang up'), 'ok'])
        const { client } = clientFor(provider)

        await expect(client.complete(transcript, config)).resolves.toEqual({ text: 'ok' })
    })

    it('reports each retry before sleeping', async () => {
        const events: RetryEvent[] = []
        const { provider } = scripted([new TransportError('down'), 'ok'])
        const { client } = clientFor(provider, (event) => {
            events.push(event)
        })

        await client.complete(transcript, config)

        expect(events).toHaveLength(1)
        expect(events[0]?.attempt).toBe(1)
        expect(events[0]?.delayMs).toBe(100)
        expect(events[0]?.error.message).toBe('down')
    })

    it('cuts off an attempt after timeoutMs and retries it', async () => {
        const signals: AbortSignal[] = []
        const provider: ModelProvider = {
            name: 'slow',
            complete(request) {
                if (request.signal) signals.push(request.signal)
                if (signals.length === 1) return new Promise<ModelResponse>(() => undefined)
                return Promise.resolve({ text: 'ok' })
            },
        }
        const { client, sleep } = clientFor(provider)

        await expect(client.complete(transcript, { ...config, timeoutMs: 20 })).resolves.toEqual({ text: 'ok' })
        expect(signals).toHaveLength(2)
        expect(signals[0]?.aborted).toBe(true)
        expect(sleep).toHaveBeenCalledTimes(1)
    })

    it('reports a provider that never answers as unavailable', async () => {
        const provider: ModelProvider = {
            name: 'hung',
            complete: () => new Promise<ModelResponse>(() => undefined),
        }
        const { client } = clientFor(provider)

        const error = await client.complete(transcript, { ...config, timeoutMs: 20, maxRetries: 2 }).catch((e: unknown) => e)

        expect(error).toBeInstanceOf(TransientUnavailableError)
        if (!(error instanceof TransientUnavailableError)) return
        expect(error.attempts).toBe(2)
        expect(error.cause).toBeInstanceOf(TransportError)
        expect(error.message).toBe('Model unavailable after 2 attempt(s): Model call timed out after 20ms')
    })

    it('rejects an invalid config before sending anything', async () => {
        const { provider, requests } = scripted(['ok'])
        const { client } = clientFor(provider)

        await expect(client.complete(transcript, { ...config, temperature: 2 })).rejects.toBeInstanceOf(BadRequestError)
        await expect(client.complete(transcript, { ...config, maxRetries: 0 })).rejects.toBeInstanceOf(BadRequestError)
        expect(requests).toHaveLength(0)
    })
})

describe('backoffDelay', () => {
    const policy = { baseDelayMs: 100, maxDelayMs: 500, jitter: 0.5 }

    it('doubles per attempt up to the cap', () => {
        expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, policy, () => 0))).toEqual([100, 200, 400, 500, 500])
    })

    it('adds jitter proportional to the capped delay', () => {
        expect(backoffDelay(1, policy, () => 1)).toBe(150)
        expect(backoffDelay(4, policy, () => 1)).toBe(750)
        expect(backoffDelay(2, policy, () => 0.5)).toBe(250)
    })
})
