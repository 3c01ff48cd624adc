// Types
export * from './types'

// Errors
export * from './errors'

// Agent
export { AgentInstance, engineRegistry, registerEngine } from './agent/agent'
export { createAgent, toolsFromInstance } from './factory/agent'
export type { AgentClass } from './factory/agent'
export * from './factory/decorators'

// Tools
export { ToolRegistry, defineTool, schemaValidator } from './tool/registry'

// Model
export { LLMClient, backoffDelay, DEFAULT_COMPLETION_CONFIG, DEFAULT_RETRY_POLICY } from './model/client'
export type { LLMClientOptions } from './model/client'

// Config
export { loadConfig } from './config/env'
export type { LogLevelName, ProviderSettings, RuntimeConfig } from './config/env'

// Middleware
export { MiddlewarePipeline } from './middleware/pipeline'

// Event
export { EventEmitter } from './event/emitter'

// Context
export { createContext } from './context/factory'
export type { CreateContextOptions, OwnedContext } from './context/factory'

// Reasoning
export { createReasoningContext } from './reasoning/context'
export type { CreateReasoningContextOptions } from './reasoning/context'
