import type {
    AgentConfig,
    AgentPolicy,
    CompletionConfig,
    CoreEvent,
    EventHandler,
    ExecutionContext,
    Middleware,
    ModelProvider,
    ReasoningEngine,
    ReasoningStrategy,
    RetryPolicy,
    RunOptions,
    RunResult,
    ToolDefinition,
} from '../types'
import { EventEmitter } from '../event/emitter'
import { ToolRegistry, defineTool } from '../tool/registry'
import { MiddlewarePipeline } from '../middleware/pipeline'
import { createContext } from '../context/factory'
import { createReasoningContext } from '../reasoning/context'
import { DEFAULT_COMPLETION_CONFIG, LLMClient } from '../model/client'

/**
 * Agent: the central runtime orchestrator.
 *
 * Holds everything shared between runs (provider, tools, middleware,
 * policy) and gives every `run()` a fresh context and transcript. The step
 * loop itself lives in a pluggable ReasoningEngine.
 */
export class AgentInstance<TData = unknown> {
    private readonly config: AgentConfig<TData>
    private _model: ModelProvider | undefined
    private _engine: ReasoningEngine<TData> | undefined
    private _strategy: ReasoningStrategy | undefined
    private _policy: AgentPolicy = {}
    private _completion: Partial<CompletionConfig> = {}
    private _retry: Partial<RetryPolicy> = {}
    private readonly _tools: ToolRegistry<TData> = new ToolRegistry()
    private readonly _middleware: MiddlewarePipeline<TData> = new MiddlewarePipeline()
    private readonly _emitter: EventEmitter = new EventEmitter()

    constructor(config: AgentConfig<TData> = { name: 'agent' }) {
        this.config = config
        if (config.model) this._model = config.model
        if (config.policy) this._policy = config.policy
        if (config.completion) this._completion = config.completion
        if (config.retry) this._retry = config.retry
        if (config.tools) config.tools.forEach((t) => this._tools.register(t))
        if (config.middleware) config.middleware.forEach((m) => this._middleware.use(m))
        if (config.reasoning) this.reasoning(config.reasoning)
    }

    get name(): string {
        return this.config.name
    }

    /** Tools registered on this agent. Frozen by the first `run()`. */
    get tools(): ToolRegistry<TData> {
        return this._tools
    }

    provider(model: ModelProvider): this { this._model = model; return this }
    tool(definition: ToolDefinition<TData>): this { this._tools.register(definition); return this }
    use(middleware: Middleware<TData>): this { this._middleware.use(middleware); return this }
    policy(policy: AgentPolicy): this { this._policy = { ...this._policy, ...policy }; return this }
    completion(config: Partial<CompletionConfig>): this { this._completion = { ...this._completion, ...config }; return this }
    retry(policy: Partial<RetryPolicy>): this { this._retry = { ...this._retry, ...policy }; return this }

    reasoning(engine: ReasoningEngine<TData> | ReasoningStrategy): this {
        if (typeof engine === 'string') {
            this._strategy = engine
            this._engine = undefined
        } else {
            this._engine = engine
        }
        return this
    }

    on<TPayload = unknown>(event: CoreEvent | string, handler: EventHandler<TPayload>): this {
        this._emitter.on(event, handler)
        return this
    }

    /**
     * Execute one task. Resolves with the loop's result whatever its status;
     * rejects only when the agent is misconfigured or a middleware or event
     * handler throws.
     */
    async run(options: RunOptions<TData> | string): Promise<RunResult> {
        const opts: RunOptions<TData> = typeof options === 'string' ? { input: options } : options
        const data = this._mergeData(opts.data)

        const ctx = createContext<TData>({
            input: opts.input, data, emitter: this._emitter,
            sessionId: opts.sessionId, signal: opts.signal,
        })

        this._tools.freeze()

        try {
            await this._emitter.emit('run:start', { agent: this.config.name, input: opts.input, sessionId: ctx.sessionId })
            await this._middleware.run({ scope: 'run:before', ctx })
            const result = await this._executeWithEngine(ctx)
            ctx.state.finishedAt = new Date()
            await this._middleware.run({ scope: 'run:after', ctx, result })
            await this._emitter.emit('run:end', { sessionId: ctx.sessionId, result })
            return result
        } catch (err) {
            await this._emitter.emit('error', err)
            throw err
        } finally {
            ctx.dispose()
        }
    }

    private _mergeData(overrides: Partial<TData> | undefined): TData {
        const defaults = this.config.data
        if (overrides === undefined) return defaults ?? ({} as TData)
        return { ...defaults, ...overrides } as TData
    }

    private async _executeWithEngine(ctx: ExecutionContext<TData>) {
        if (!this._model) throw new Error(`[Agent:${this.config.name}] No model provider configured.`)

        const engine = this._resolveEngine()
        const client = new LLMClient(this._model, {
            retry: this._retry,
            onRetry: (event) => this._emitter.emit('model:retry', { sessionId: ctx.sessionId, ...event }),
        })

        const rCtx = createReasoningContext({
            ctx,
            client,
            completion: { ...DEFAULT_COMPLETION_CONFIG, ...this._completion },
            tools: this._tools,
            policy: this._policy,
            systemPrompt: this.config.systemPrompt,
            emitter: this._emitter,
            middleware: this._middleware,
        })

        return engine.execute(rCtx)
    }

    private _resolveEngine(): ReasoningEngine<TData> {
        if (this._engine) return this._engine

        const strategyName = this._strategy ?? 'react'
        const factory = engineRegistry.get(strategyName)
        // Registered factories are generic over the agent's data type.
        if (factory) return factory() as ReasoningEngine<TData>

        throw new Error(
            `[Agent] Reasoning strategy "${strategyName}" not registered. ` +
            `Import @thoughtline/reasoning first.`,
        )
    }
}

export const engineRegistry = new Map<string, () => ReasoningEngine<unknown>>()

export function registerEngine(
    name: ReasoningStrategy | string,
    factory: () => ReasoningEngine<unknown>,
): void {
    engineRegistry.set(name, factory)
}

export { defineTool }
