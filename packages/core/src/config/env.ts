import { z } from 'zod'

import type { CompletionConfig } from '../types'
import { ConfigError } from '../errors'

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface ProviderSettings {
    apiKey: string
    baseURL: string
}

export interface RuntimeConfig {
    provider: ProviderSettings
    completion: CompletionConfig
    maxSteps: number
    logLevel: LogLevelName
}

const envSchema = z.object({
    LLM_API_KEY: z.string().min(1, 'is required'),
    LLM_BASE_URL: z.string().url().default('https://api.deepseek.com/v1'),
    LLM_MODEL: z.string().min(1).default('deepseek-chat'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    AGENT_MAX_STEPS: z.coerce.number().int().min(1).default(5),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

type Env = Record<string, string | undefined>

/** Empty strings count as unset so `.env` placeholders fall back to defaults. */
function withoutBlanks(env: Env): Env {
    const cleaned: Env = {}
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim()
    }
    return cleaned
}

/**
 * Read runtime settings from environment variables.
 *
 * @example
 * ```ts
 * import 'dotenv/config'
 * const config = loadConfig()
 * ```
 */
export function loadConfig(env: Env = process.env): RuntimeConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env))
    if (!parsed.success) {
        const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))]
        const details = parsed.error.issues.map((i) => `${String(i.path[0])}: ${i.message}`).join('; ')
        throw new ConfigError(`Invalid environment configuration (${details})`, variables)
    }

    const e = parsed.data
    return {
        provider: { apiKey: e.LLM_API_KEY, baseURL: e.LLM_BASE_URL },
        completion: {
            temperature: e.LLM_TEMPERATURE,
            maxOutputTokens: e.LLM_MAX_TOKENS,
            modelId: e.LLM_MODEL,
            timeoutMs: e.LLM_TIMEOUT_MS,
            maxRetries: e.LLM_MAX_RETRIES,
        },
        maxSteps: e.AGENT_MAX_STEPS,
        logLevel: e.LOG_LEVEL,
    }
}
