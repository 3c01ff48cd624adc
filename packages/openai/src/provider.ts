import OpenAI from 'openai'
import {
    BadRequestError,
    type Message,
    type ModelProvider,
    type ModelRequest,
    type ModelResponse,
    type TokenUsage,
} from '@thoughtline/core'
import { classifyOpenAIError } from './errors'

/**
 * The slice of the SDK client the provider uses. An `OpenAI` instance
 * satisfies it; tests pass a stub.
 */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(
                body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
                options?: { timeout?: number; maxRetries?: number; signal?: AbortSignal | undefined },
            ): Promise<OpenAI.Chat.ChatCompletion>
        }
    }
}

export interface OpenAIProviderConfig {
    apiKey: string
    /** Any OpenAI-compatible endpoint, e.g. https://api.deepseek.com/v1 */
    baseURL?: string | undefined
    organization?: string | undefined
    client?: ChatCompletionsClient | undefined
}

/**
 * Chat completions only know system, user and assistant turns, so
 * observations travel as user messages.
 */
export function toOpenAIMessages(messages: readonly Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'system':
                return { role: 'system', content: msg.content }
            case 'assistant':
                return { role: 'assistant', content: msg.content }
            case 'user':
            case 'observation':
                return { role: 'user', content: msg.content }
        }
    })
}

function extractUsage(usage: OpenAI.CompletionUsage | undefined): TokenUsage | undefined {
    if (!usage) return undefined
    return {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
    }
}

/**
 * One-attempt transport to an OpenAI-compatible chat completions API.
 *
 * The SDK's own retries are disabled; `LLMClient` owns the retry policy and
 * relies on the classified errors thrown here.
 */
export class OpenAIProvider implements ModelProvider {
    readonly name = 'openai'

    private readonly client: ChatCompletionsClient

    constructor(config: OpenAIProviderConfig) {
        this.client = config.client ?? new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            organization: config.organization,
            maxRetries: 0,
        })
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const { config } = request

        let completion: OpenAI.Chat.ChatCompletion
        try {
            completion = await this.client.chat.completions.create(
                {
                    model: config.modelId,
                    temperature: config.temperature,
                    max_tokens: config.maxOutputTokens,
                    messages: toOpenAIMessages(request.messages),
                    stream: false,
                },
                { timeout: config.timeoutMs, maxRetries: 0, signal: request.signal },
            )
        } catch (err) {
            throw classifyOpenAIError(err)
        }

        const choice = completion.choices[0]
        if (!choice) throw new BadRequestError('[OpenAIProvider] Empty response from API.')

        return {
            text: choice.message.content ?? '',
            usage: extractUsage(completion.usage),
            raw: completion,
        }
    }
}

/**
 * Create an OpenAI-compatible model provider.
 *
 * @example
 * ```ts
 * agent.provider(openai({ apiKey: process.env['LLM_API_KEY'] ?? '' }))
 * agent.provider(openai({ apiKey: '...', baseURL: 'https://api.deepseek.com/v1' }))
 * ```
 */
export function openai(config: OpenAIProviderConfig): OpenAIProvider {
    return new OpenAIProvider(config)
}
