import OpenAI from 'openai'
import {
    AgentError,
    AuthError,
    BadRequestError,
    RateLimitError,
    ServerError,
    TransportError,
} from '@thoughtline/core'

type ResponseHeaders = Record<string, string | null | undefined>

/**
 * Delay requested by a 429 response, from `retry-after-ms` or `retry-after`
 * (seconds or an HTTP date).
 */
export function retryAfterMs(headers: ResponseHeaders | undefined, now: number = Date.now()): number | undefined {
    const millis = headers?.['retry-after-ms']
    if (millis) {
        const value = Number(millis)
        if (Number.isFinite(value) && value >= 0) return value
    }

    const header = headers?.['retry-after']
    if (!header) return undefined

    const seconds = Number(header)
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000

    const date = Date.parse(header)
    if (!Number.isNaN(date)) return Math.max(0, date - now)

    return undefined
}

/**
 * Map anything the SDK throws onto the runtime's error taxonomy.
 */
export function classifyOpenAIError(err: unknown): AgentError {
    if (err instanceof AgentError) return err

    if (err instanceof OpenAI.APIConnectionTimeoutError) {
        return new TransportError('[OpenAIProvider] Request timed out.', { cause: err })
    }
    if (err instanceof OpenAI.APIConnectionError || err instanceof OpenAI.APIUserAbortError) {
        return new TransportError(`[OpenAIProvider] ${err.message}`, { cause: err })
    }

    if (err instanceof OpenAI.APIError) {
        const status = err.status
        const message = `[OpenAIProvider] ${err.message}`

        if (status === undefined) return new TransportError(message, { cause: err })
        if (status === 401 || status === 403) return new AuthError(message, { cause: err, status })
        if (status === 429) {
            return new RateLimitError(message, { cause: err, retryAfterMs: retryAfterMs(err.headers) })
        }
        if (status === 408) return new TransportError(message, { cause: err })
        if (status >= 500) return new ServerError(status, message, { cause: err })
        return new BadRequestError(message, { cause: err, status })
    }

    const detail = err instanceof Error ? err.message : String(err)
    return new TransportError(`[OpenAIProvider] ${detail}`, { cause: err })
}
