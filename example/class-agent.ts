/**
 * thoughtline: class-based tools
 *
 * Decorated methods become tools; arguments are validated before the method
 * runs. A Ctrl+C cancels the run before its next step.
 */
import 'dotenv/config'
import 'reflect-metadata'

import { createAgent, Agent, Tool, Arg, loadConfig } from '@thoughtline/core'
import { openai } from '@thoughtline/openai'
import type { ReasoningStep } from '@thoughtline/core'
import '@thoughtline/reasoning'

@Agent({
    name: 'unit-converter',
    systemPrompt: 'You convert between units. Always use a tool for the conversion itself.',
    policy: { maxSteps: 6 },
})
class UnitConverter {
    @Tool('celsius_to_fahrenheit', 'Convert a temperature from Celsius to Fahrenheit.')
    async celsiusToFahrenheit(@Arg({ name: 'celsius', type: 'number' }) celsius: number) {
        return celsius * 9 / 5 + 32
    }

    @Tool({ name: 'km_to_miles', description: 'Convert a distance from kilometres to miles.' })
    async kmToMiles(@Arg({ name: 'km', type: 'number', description: 'distance in km' }) km: number) {
        return Math.round(km * 0.621371 * 100) / 100
    }
}

async function main() {
    const config = loadConfig()
    const controller = new AbortController()
    process.once('SIGINT', () => controller.abort('interrupted'))

    const agent = createAgent(UnitConverter)
        .provider(openai(config.provider))
        .completion(config.completion)

    agent.on('step:reasoning', (step: ReasoningStep) => {
        if (step.type === 'thought') console.log(`[${step.step}] thought: ${step.content}`)
        if (step.type === 'tool_call') console.log(`[${step.step}] ${step.toolName}(${JSON.stringify(step.args)})`)
    })

    const result = await agent.run({
        input: 'It is 21 degrees Celsius and the shop is 12 km away. Give both in US units.',
        signal: controller.signal,
    })

    console.log(result.status, result.answer ?? result.failure?.message ?? '')
}

main().catch(console.error)
