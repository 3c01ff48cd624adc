/**
 * thoughtline: calculator agent
 *
 * A single `add_numbers` tool and a task that needs it more than once.
 * Settings come from the environment (see .env.example).
 */
import 'dotenv/config'

import { createAgent, defineTool, loadConfig } from '@thoughtline/core'
import { openai } from '@thoughtline/openai'
import { createLogger } from '@thoughtline/logger'
import '@thoughtline/reasoning'

const addNumbers = defineTool({
    name: 'add_numbers',
    description: 'Add two numbers.',
    parameters: {
        a: { type: 'number', description: 'first addend' },
        b: { type: 'number', description: 'second addend' },
    },
    async execute({ a, b }) {
        return Number(a) + Number(b)
    },
})

async function main() {
    const config = loadConfig()

    const agent = createAgent({
        name: 'calculator',
        systemPrompt: 'You are a calculator agent. Use the tools for every arithmetic step.',
        policy: { maxSteps: config.maxSteps },
        completion: config.completion,
    })
        .provider(openai(config.provider))
        .tool(addNumbers)
        .use(createLogger({ level: config.logLevel }))

    const result = await agent.run('What is 123 plus 456, plus 789?')

    switch (result.status) {
        case 'success':
            console.log(`Final answer: ${result.answer ?? ''}`)
            break
        case 'step_limit_exceeded':
            console.log(`No answer after ${result.steps} steps.`)
            break
        case 'fatal_error':
            console.log(`Run failed (${result.failure?.kind ?? 'unknown'}): ${result.failure?.message ?? ''}`)
            break
    }
}

main().catch(console.error)
