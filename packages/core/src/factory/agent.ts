import { AgentInstance } from '../agent/agent'
import type { AgentConfig, ParameterSchema, ParameterType, ToolDefinition } from '../types'
import { getAgentMetadata, getArgMetadata, getParamTypes, getToolMetadata } from './decorators'

export type AgentClass = new () => object

/** Maps an emitted parameter constructor; undefined when nothing was emitted. */
function typeFromConstructor(paramType: unknown): ParameterType | undefined {
    if (typeof paramType !== 'function') return undefined
    if (paramType === String) return 'string'
    if (paramType === Number) return 'number'
    if (paramType === Boolean) return 'boolean'
    if (paramType === Array) return 'array'
    return 'object'
}

/**
 * Build tool definitions from the `@Tool` methods of a class instance.
 */
export function toolsFromInstance<TData = unknown>(instance: object): ToolDefinition<TData>[] {
    const prototype: unknown = Object.getPrototypeOf(instance)
    if (typeof prototype !== 'object' || prototype === null) return []

    const tools: ToolDefinition<TData>[] = []

    for (const methodName of Object.getOwnPropertyNames(prototype)) {
        if (methodName === 'constructor') continue

        const toolMeta = getToolMetadata(prototype, methodName)
        if (!toolMeta) continue

        const args = getArgMetadata(prototype, methodName)
        const paramTypes = getParamTypes(prototype, methodName)
        const parameters: ParameterSchema = {}
        const order: string[] = []

        args.forEach((arg, index) => {
            if (!arg) {
                throw new Error(`[Agent] Parameter ${index} of ${methodName}() is missing an @Arg decorator.`)
            }
            const type = arg.type ?? typeFromConstructor(paramTypes[index])
            if (!type) {
                throw new Error(
                    `[Agent] Cannot infer the type of "${arg.name}" in ${methodName}(); ` +
                    `declare it with @Arg({ name: '${arg.name}', type }).`,
                )
            }
            order[index] = arg.name
            parameters[arg.name] = {
                type,
                description: arg.description,
                required: arg.required !== false,
            }
        })

        tools.push({
            name: toolMeta.name,
            description: toolMeta.description,
            parameters,
            execute: async (callArgs) => {
                const method: unknown = Reflect.get(instance, methodName)
                if (typeof method !== 'function') {
                    throw new Error(`[Agent] ${methodName} is not a method.`)
                }
                const result: unknown = await method.apply(instance, order.map((name) => callArgs[name]))
                return result
            },
        })
    }

    return tools
}

/**
 * Creates an agent instance from a configuration object or a decorated class.
 */
export function createAgent<TData = unknown>(
    configOrClass?: AgentConfig<TData> | AgentClass,
): AgentInstance<TData> {
    if (configOrClass === undefined) return new AgentInstance<TData>()

    if (typeof configOrClass !== 'function') return new AgentInstance<TData>(configOrClass)

    const metadata = getAgentMetadata(configOrClass)
    if (!metadata) {
        throw new Error(`Class ${configOrClass.name} is not decorated with @Agent`)
    }

    return new AgentInstance<TData>({
        ...metadata,
        tools: toolsFromInstance<TData>(new configOrClass()),
    })
}
