import 'reflect-metadata'
import { describe, it, expect } from 'vitest'
import { Agent, Arg, Tool, createAgent, getAgentMetadata, toolsFromInstance } from '../../src'

@Agent({ name: 'converter', policy: { maxSteps: 4 }, systemPrompt: 'Convert units.' })
class Converter {
    @Tool('celsius_to_fahrenheit', 'Convert Celsius to Fahrenheit')
    toFahrenheit(@Arg({ name: 'celsius', type: 'number', description: 'Degrees Celsius' }) celsius: number) {
        return celsius * 9 / 5 + 32
    }

    @Tool({ name: 'subtract', description: 'Subtract b from a' })
    subtract(
        @Arg({ name: 'a', type: 'number' }) a: number,
        @Arg({ name: 'b', type: 'number' }) b: number,
    ) {
        return a - b
    }

    @Tool('greet', 'Greet someone')
    async greet(
        @Arg({ name: 'name', type: 'string' }) name: string,
        @Arg({ name: 'punctuation', type: 'string', required: false }) punctuation?: string,
    ) {
        return `Hello, ${name}${punctuation ?? '.'}`
    }

    helper() {
        return 'not a tool'
    }
}

class Plain {}

@Agent('broken')
class MissingArg {
    @Tool('half', 'Half of y')
    half(_x: number, @Arg({ name: 'y', type: 'number' }) y: number) {
        return y / 2
    }
}

@Agent('doubler')
class Doubler {
    @Tool('double', 'Double n')
    double(@Arg('n') n: number) {
        return n * 2
    }
}

describe('createAgent', () => {
    it('builds an agent from a config object', () => {
        const agent = createAgent({ name: 'calculator' })

        expect(agent.name).toBe('calculator')
        expect(agent.tools.getAll()).toEqual([])
    })

    it('defaults the agent name', () => {
        expect(createAgent().name).toBe('agent')
    })

    it('reads @Agent metadata', () => {
        expect(getAgentMetadata(Converter)).toEqual({
            name: 'converter',
            policy: { maxSteps: 4 },
            systemPrompt: 'Convert units.',
        })
    })

    it('registers every @Tool method of a decorated class', () => {
        const agent = createAgent(Converter)

        expect(agent.name).toBe('converter')
        expect(agent.tools.describe().map((t) => t.name)).toEqual(['celsius_to_fahrenheit', 'subtract', 'greet'])
        expect(agent.tools.get('greet')?.parameters).toEqual({
            name: { type: 'string', description: undefined, required: true },
            punctuation: { type: 'string', description: undefined, required: false },
        })
    })

    it('calls tool methods with arguments in declaration order', async () => {
        const agent = createAgent(Converter)

        await expect(agent.tools.invoke('celsius_to_fahrenheit', { celsius: 100 })).resolves.toBe(212)
        await expect(agent.tools.invoke('subtract', { b: 2, a: 10 })).resolves.toBe(8)
        await expect(agent.tools.invoke('greet', { name: 'Ada' })).resolves.toBe('Hello, Ada.')
        await expect(agent.tools.invoke('greet', { name: 'Ada', punctuation: '!' })).resolves.toBe('Hello, Ada!')
    })

    it('rejects a class without @Agent', () => {
        expect(() => createAgent(Plain)).toThrow('Class Plain is not decorated with @Agent')
        expect(toolsFromInstance(new Plain())).toEqual([])
    })

    it('infers a bare @Arg type from emitted parameter metadata', async () => {
        Reflect.defineMetadata('design:paramtypes', [Number], Doubler.prototype, 'double')
        const agent = createAgent(Doubler)

        expect(agent.tools.get('double')?.parameters).toEqual({ n: { type: 'number', required: true } })
        await expect(agent.tools.invoke('double', { n: 4 })).resolves.toBe(8)
    })

    it('rejects a bare @Arg when no parameter type was emitted', () => {
        Reflect.deleteMetadata('design:paramtypes', Doubler.prototype, 'double')

        expect(() => createAgent(Doubler)).toThrow(
            `[Agent] Cannot infer the type of "n" in double(); declare it with @Arg({ name: 'n', type }).`,
        )
    })

    it('rejects a tool parameter without @Arg', () => {
        expect(() => createAgent(MissingArg)).toThrow('[Agent] Parameter 0 of half() is missing an @Arg decorator.')
    })
})
