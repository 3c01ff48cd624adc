import {
    CancelledError,
    ConfigError,
    isAgentError,
    type AgentError,
    type LoopResult,
    type LoopState,
    type ReasoningContext,
    type ReasoningEngine,
} from '@thoughtline/core'
import { DEFAULT_MARKERS, createParser, type ReplyMarkers, type ReplyParser } from '../parser'
import { buildSystemPrompt } from '../prompt'
import { formatCorrection, formatToolObservation } from '../observation'

export interface ReactEngineConfig {
    /**
     * Max number of model calls before the run ends as step_limit_exceeded.
     * `AgentPolicy.maxSteps` takes precedence when set.
     * @default 10
     */
    maxSteps?: number | undefined

    /** Override the literal markers of the reply protocol */
    markers?: Partial<ReplyMarkers> | undefined
}

type Terminal = Exclude<LoopState, 'running'>

function checkMaxSteps(value: number, source: string): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${source} must be a positive integer, got ${value}`)
    }
    return value
}

/**
 * ReactEngine: Reason + Act (ReAct) loop over a plain-text protocol.
 *
 *   1. The model writes a Thought and either an action block or a Final Answer
 *   2. Actions run through the tool registry; the result (or the error) is
 *      appended to the transcript as an Observation
 *   3. Replies that cannot be parsed get a corrective Observation
 *   4. Repeat until a Final Answer, a model failure, cancellation, or the
 *      step limit
 *
 * Paper: "ReAct: Synergizing Reasoning and Acting in Language Models" (Yao et al., 2022)
 *
 * @example
 * ```ts
 * import { ReactEngine } from '@thoughtline/reasoning'
 * agent.reasoning(new ReactEngine({ maxSteps: 8 }))
 * ```
 */
export class ReactEngine<TData = unknown> implements ReasoningEngine<TData> {
    readonly name = 'react'
    private readonly maxSteps: number
    private readonly markers: ReplyMarkers
    private readonly parse: ReplyParser

    constructor(config: ReactEngineConfig = {}) {
        this.maxSteps = checkMaxSteps(config.maxSteps ?? 10, 'ReactEngine maxSteps')
        this.markers = { ...DEFAULT_MARKERS, ...config.markers }
        this.parse = createParser(this.markers)
    }

    async execute(rCtx: ReasoningContext<TData>): Promise<LoopResult> {
        const { ctx, tools, policy } = rCtx
        const maxSteps = policy.maxSteps === undefined
            ? this.maxSteps
            : checkMaxSteps(policy.maxSteps, 'policy.maxSteps')
        const messages = ctx.state.messages

        messages.push({
            role: 'system',
            content: buildSystemPrompt({
                instructions: rCtx.systemPrompt,
                tools: tools.describe(policy.allowedTools),
                markers: this.markers,
            }),
        })
        messages.push({ role: 'user', content: ctx.input })

        let step = 0

        while (step < maxSteps) {
            if (ctx.cancelled) {
                const error = new CancelledError(ctx.cancelReason)
                await ctx.emit('cancel', { sessionId: ctx.sessionId, step, reason: ctx.cancelReason })
                return this.finish(rCtx, 'failed', step, { failure: error })
            }

            step++
            await rCtx.enterStep(step)

            let text: string
            try {
                text = (await rCtx.callModel(messages)).text
            } catch (err) {
                if (!isAgentError(err)) throw err
                await rCtx.exitStep(step, 'error')
                return this.finish(rCtx, 'failed', step, { failure: err })
            }

            messages.push({ role: 'assistant', content: text })
            const reply = this.parse(text)

            if (reply.kind === 'final_answer') {
                if (reply.reasoning) {
                    await rCtx.pushStep({ type: 'thought', step, content: reply.reasoning, engine: this.name })
                }
                await rCtx.pushStep({ type: 'response', step, content: reply.answer, engine: this.name })
                await rCtx.exitStep(step, 'final_answer')
                return this.finish(rCtx, 'succeeded', step, { answer: reply.answer })
            }

            if (reply.kind === 'malformed') {
                await rCtx.pushStep({ type: 'correction', step, reason: reply.reason, engine: this.name })
                messages.push({ role: 'observation', content: formatCorrection(reply.reason, this.markers) })
                await rCtx.exitStep(step, 'malformed')
                continue
            }

            if (reply.reasoning) {
                await rCtx.pushStep({ type: 'thought', step, content: reply.reasoning, engine: this.name })
            }
            await rCtx.pushStep({
                type: 'tool_call',
                step,
                toolName: reply.toolName,
                args: reply.arguments,
                engine: this.name,
            })

            const outcome = await rCtx.callTool(reply.toolName, reply.arguments, step)

            await rCtx.pushStep({
                type: 'tool_result',
                step,
                toolName: reply.toolName,
                result: outcome.ok ? outcome.result : null,
                error: outcome.ok ? undefined : outcome.error,
                engine: this.name,
            })
            messages.push({ role: 'observation', content: formatToolObservation(outcome) })
            await rCtx.exitStep(step, 'action')
        }

        return this.finish(rCtx, 'exhausted', step, {})
    }

    private finish(
        rCtx: ReasoningContext<TData>,
        state: Terminal,
        steps: number,
        extra: { answer?: string; failure?: AgentError },
    ): LoopResult {
        const { ctx } = rCtx
        ctx.state.finishedAt = new Date()

        return {
            status: state === 'succeeded' ? 'success' : state === 'exhausted' ? 'step_limit_exceeded' : 'fatal_error',
            state,
            answer: extra.answer,
            failure: extra.failure ? { kind: extra.failure.kind, message: extra.failure.message } : undefined,
            transcript: ctx.state.messages.map((m) => ({ ...m })),
            steps,
            reasoning: [...ctx.state.steps],
            usage: { ...ctx.state.usage },
        }
    }
}
