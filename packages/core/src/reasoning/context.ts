import type {
    AgentPolicy,
    CompletionConfig,
    ExecutionContext,
    Message,
    ModelResponse,
    ReasoningContext,
    ReasoningStep,
    StepOutcome,
    ToolOutcome,
} from '../types'
import type { ToolRegistry } from '../tool/registry'
import type { EventEmitter } from '../event/emitter'
import type { MiddlewarePipeline } from '../middleware/pipeline'
import type { LLMClient } from '../model/client'
import { ToolNotAllowedError, isAgentError } from '../errors'

export interface CreateReasoningContextOptions<TData> {
    ctx: ExecutionContext<TData>
    client: LLMClient
    completion: CompletionConfig
    tools: ToolRegistry<TData>
    policy: AgentPolicy
    systemPrompt?: string | undefined
    emitter: EventEmitter
    middleware: MiddlewarePipeline<TData>
}

/**
 * Creates a ReasoningContext that bridges the Agent runtime to any ReasoningEngine.
 *
 * Engines use this to:
 * - Push typed steps for observability
 * - Call the model (retries happen inside the client)
 * - Call tools (which fires middleware and events, and turns tool-layer
 *   errors into outcomes)
 */
export function createReasoningContext<TData>(
    options: CreateReasoningContextOptions<TData>,
): ReasoningContext<TData> {
    const { ctx, client, completion, tools, policy, systemPrompt, emitter, middleware } = options

    return {
        ctx,
        tools,
        policy,
        systemPrompt,

        async pushStep(step: ReasoningStep): Promise<void> {
            ctx.state.steps.push(step)
            await emitter.emit('step:reasoning', step)
        },

        async callModel(messages: readonly Message[]): Promise<ModelResponse> {
            await emitter.emit('model:request', {
                sessionId: ctx.sessionId,
                provider: client.providerName,
                model: completion.modelId,
                messages: messages.length,
            })

            const response = await client.complete(messages, completion)

            if (response.usage) {
                ctx.state.usage.promptTokens += response.usage.promptTokens
                ctx.state.usage.completionTokens += response.usage.completionTokens
                ctx.state.usage.totalTokens += response.usage.totalTokens
            }

            await emitter.emit('model:response', { sessionId: ctx.sessionId, text: response.text, usage: response.usage })
            return response
        },

        async callTool(name: string, args: Record<string, unknown>, step: number): Promise<ToolOutcome> {
            await middleware.run({ scope: 'tool:before', ctx, tool: { name, args } })
            await emitter.emit('tool:before', { tool: name, args, step })

            let outcome: ToolOutcome
            try {
                if (!tools.isAllowed(name, policy.allowedTools)) throw new ToolNotAllowedError(name)
                const result = await tools.invoke(name, args, ctx)
                outcome = { ok: true, result }
            } catch (err) {
                if (!isAgentError(err)) throw err
                outcome = { ok: false, error: { kind: err.kind, message: err.message } }
            }

            ctx.state.toolCalls.push({ name, args, outcome })

            await emitter.emit('tool:after', { tool: name, step, outcome })
            await middleware.run({ scope: 'tool:after', ctx, tool: { name, args, outcome } })

            return outcome
        },

        async enterStep(step: number): Promise<void> {
            await middleware.run({ scope: 'step:before', ctx, step: { number: step } })
        },

        async exitStep(step: number, outcome: StepOutcome): Promise<void> {
            await middleware.run({ scope: 'step:after', ctx, step: { number: step, outcome } })
        },
    }
}
