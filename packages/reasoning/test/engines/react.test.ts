import { describe, it, expect } from 'vitest'
import {
    AuthError,
    ConfigError,
    TransportError,
    createAgent,
    defineTool,
    type Message,
    type ModelProvider,
} from '@thoughtline/core'
import { ReactEngine, buildSystemPrompt, formatCorrection } from '../../src'

function scripted(replies: Array<string | Error>) {
    const requests: Message[][] = []
    const provider: ModelProvider = {
        name: 'scripted',
        async complete(request) {
            requests.push(request.messages.map((m) => ({ ...m })))
            const next = replies[Math.min(requests.length, replies.length) - 1]
            if (next === undefined) throw new Error('no scripted reply')
            if (next instanceof Error) throw next
            return { text: next, usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 } }
        },
    }
    return { provider, requests }
}

const addNumbers = defineTool({
    name: 'add_numbers',
    description: 'Add two numbers.',
    parameters: { a: { type: 'number' }, b: { type: 'number' } },
    execute: async (args) => Number(args['a']) + Number(args['b']),
})

const divide = defineTool({
    name: 'divide',
    description: 'Divide a by b.',
    parameters: { a: { type: 'number' }, b: { type: 'number' } },
    execute: async (args) => {
        if (args['b'] === 0) throw new Error('division by zero')
        return Number(args['a']) / Number(args['b'])
    },
})

function action(tool: string, args: Record<string, unknown>): string {
    return `Thought: calling ${tool}.\n[ACTION_START]\n${JSON.stringify({ tool, args })}\n[ACTION_END]`
}

function calculator(provider: ModelProvider, maxSteps = 5) {
    return createAgent({
        name: 'calculator',
        model: provider,
        tools: [addNumbers, divide],
        policy: { maxSteps },
        completion: { modelId: 'test-model', maxRetries: 2 },
        retry: { baseDelayMs: 0, maxDelayMs: 0, jitter: 0 },
    })
}

describe('ReactEngine', () => {
    it('answers after one tool call', async () => {
        const { provider, requests } = scripted([
            action('add_numbers', { a: 123, b: 456 }),
            'Thought: I have the sum.\nFinal Answer: 579',
        ])

        const result = await calculator(provider).run('Compute 123 + 456')

        expect(result.status).toBe('success')
        expect(result.state).toBe('succeeded')
        expect(result.answer).toBe('579')
        expect(result.failure).toBeUndefined()
        expect(result.steps).toBe(2)
        expect(result.usage).toEqual({ promptTokens: 2, completionTokens: 2, totalTokens: 4 })
        expect(result.transcript.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'observation', 'assistant'])
        expect(result.transcript[1]).toEqual({ role: 'user', content: 'Compute 123 + 456' })
        expect(result.transcript[3]).toEqual({ role: 'observation', content: 'Observation: 579' })
        expect(result.reasoning.map((s) => s.type)).toEqual(['thought', 'tool_call', 'tool_result', 'thought', 'response'])
        expect(requests.map((messages) => messages.length)).toEqual([2, 4])
    })

    it('sends the system prompt built from the allowed tools', async () => {
        const { provider } = scripted(['Final Answer: ok'])
        const agent = createAgent({
            name: 'calculator',
            model: provider,
            tools: [addNumbers, divide],
            systemPrompt: 'Be exact.',
            policy: { allowedTools: ['add_numbers'] },
        })

        const result = await agent.run('Say ok')

        expect(result.transcript[0]).toEqual({
            role: 'system',
            content: buildSystemPrompt({ instructions: 'Be exact.', tools: agent.tools.describe(['add_numbers']) }),
        })
        expect(result.transcript[0]?.content.includes('- divide:')).toBe(false)
    })

    it('corrects malformed replies until the step limit', async () => {
        const { provider, requests } = scripted(['I am not sure what to do.'])

        const result = await calculator(provider, 3).run('Compute 1 + 1')

        expect(result.status).toBe('step_limit_exceeded')
        expect(result.state).toBe('exhausted')
        expect(result.answer).toBeUndefined()
        expect(result.steps).toBe(3)
        expect(requests).toHaveLength(3)
        expect(result.transcript).toHaveLength(8)
        expect(result.transcript[7]).toEqual({
            role: 'observation',
            content: formatCorrection('no recognized directive'),
        })
        expect(result.reasoning).toEqual([
            { type: 'correction', step: 1, reason: 'no recognized directive', engine: 'react' },
            { type: 'correction', step: 2, reason: 'no recognized directive', engine: 'react' },
            { type: 'correction', step: 3, reason: 'no recognized directive', engine: 'react' },
        ])
    })

    it('feeds tool failures back as observations', async () => {
        const { provider } = scripted([
            action('search', { q: 'x' }),
            action(' add_numbers', { a: 1, b: 2 }),
            action('add_numbers', { a: 1 }),
            action('divide', { a: 1, b: 0 }),
            'Final Answer: cannot divide by zero',
        ])

        const result = await calculator(provider).run('Compute 1 / 0')
        const observations = result.transcript.filter((m) => m.role === 'observation').map((m) => m.content)

        expect(result.status).toBe('success')
        expect(result.steps).toBe(5)
        expect(observations).toEqual([
            'Observation: Error (unknown_tool): Unknown tool "search"',
            'Observation: Error (unknown_tool): Unknown tool " add_numbers"',
            'Observation: Error (argument_validation): Invalid arguments for "add_numbers": b (Required)',
            'Observation: Error (tool_execution): Tool "divide" failed: division by zero',
        ])
    })

    it('stops before the next step once cancelled', async () => {
        const { provider, requests } = scripted([action('add_numbers', { a: 1, b: 2 }), 'Final Answer: 3'])
        const cancels: unknown[] = []
        const agent = calculator(provider)
            .use({
                scope: 'step:after',
                async run(mCtx, next) {
                    if (mCtx.step?.number === 1) mCtx.ctx.cancel('user stop')
                    await next()
                },
            })
            .on('cancel', (payload) => {
                cancels.push(payload)
            })

        const result = await agent.run({ input: 'Compute 1 + 2', sessionId: 'session-1' })

        expect(result.status).toBe('fatal_error')
        expect(result.state).toBe('failed')
        expect(result.failure).toEqual({ kind: 'cancelled', message: 'Run cancelled: user stop' })
        expect(result.steps).toBe(1)
        expect(requests).toHaveLength(1)
        expect(cancels).toEqual([{ sessionId: 'session-1', step: 1, reason: 'user stop' }])
    })

    it('makes no model call when the signal is already aborted', async () => {
        const { provider, requests } = scripted(['Final Answer: 3'])
        const controller = new AbortController()
        controller.abort('shutdown')

        const result = await calculator(provider).run({ input: 'Compute 1 + 2', signal: controller.signal })

        expect(result.failure).toEqual({ kind: 'cancelled', message: 'Run cancelled: shutdown' })
        expect(result.steps).toBe(0)
        expect(requests).toHaveLength(0)
    })

    it('fails the run on a non-retryable model error', async () => {
        const { provider, requests } = scripted([new AuthError('invalid api key', { status: 401 })])

        const result = await calculator(provider).run('Compute 1 + 2')

        expect(result.status).toBe('fatal_error')
        expect(result.failure).toEqual({ kind: 'auth', message: 'invalid api key' })
        expect(result.steps).toBe(1)
        expect(result.transcript.map((m) => m.role)).toEqual(['system', 'user'])
        expect(requests).toHaveLength(1)
    })

    it('fails the run once retries are exhausted', async () => {
        const { provider, requests } = scripted([new TransportError('connection reset')])
        const retries: unknown[] = []
        const agent = calculator(provider).on('model:retry', (event) => {
            retries.push(event)
        })

        const result = await agent.run('Compute 1 + 2')

        expect(result.failure).toEqual({
            kind: 'transient_unavailable',
            message: 'Model unavailable after 2 attempt(s): connection reset',
        })
        expect(requests).toHaveLength(2)
        expect(retries).toHaveLength(1)
    })

    it.each([0, -1, 2.5, Number.NaN])('rejects a policy step limit of %s before calling the model', async (maxSteps) => {
        const { provider, requests } = scripted(['Final Answer: 3'])

        await expect(calculator(provider, maxSteps).run('Compute 1 + 2')).rejects.toThrow(ConfigError)
        expect(requests).toHaveLength(0)
    })

    it('rejects an engine step limit that is not a positive integer', () => {
        expect(() => new ReactEngine({ maxSteps: 0 })).toThrow('ReactEngine maxSteps must be a positive integer, got 0')
    })

    it('uses the engine step limit when the policy sets none', async () => {
        const { provider, requests } = scripted(['still thinking'])
        const agent = createAgent({ name: 'calculator', model: provider }).reasoning(new ReactEngine({ maxSteps: 2 }))

        const result = await agent.run('Compute 1 + 2')

        expect(result.status).toBe('step_limit_exceeded')
        expect(requests).toHaveLength(2)
    })
})
