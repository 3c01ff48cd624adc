export { OpenAIProvider, openai, toOpenAIMessages } from './provider'
export type { ChatCompletionsClient, OpenAIProviderConfig } from './provider'
export { classifyOpenAIError, retryAfterMs } from './errors'
