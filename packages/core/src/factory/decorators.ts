import 'reflect-metadata'
import type { AgentConfig, ParameterType, ReasoningStrategy } from '../types'

export const AGENT_METADATA_KEY = Symbol('thoughtline:agent')
export const TOOL_METADATA_KEY = Symbol('thoughtline:tool')
export const ARG_METADATA_KEY = Symbol('thoughtline:arg')

export interface AgentDecoratorConfig
    extends Pick<AgentConfig, 'systemPrompt' | 'policy' | 'completion' | 'retry'> {
    name: string
    reasoning?: ReasoningStrategy | undefined
}

export function Agent(configOrName: string | AgentDecoratorConfig): ClassDecorator {
    return (target) => {
        const config = typeof configOrName === 'string' ? { name: configOrName } : configOrName
        Reflect.defineMetadata(AGENT_METADATA_KEY, config, target)
    }
}

export interface ToolDecoratorConfig {
    name: string
    description: string
}

export function Tool(nameOrConfig: string | ToolDecoratorConfig, description = ''): MethodDecorator {
    return (target, propertyKey) => {
        const config = typeof nameOrConfig === 'string' ? { name: nameOrConfig, description } : nameOrConfig
        Reflect.defineMetadata(TOOL_METADATA_KEY, config, target, propertyKey)
    }
}

export interface ArgDecoratorConfig {
    name: string
    description?: string | undefined
    /** Falls back to the emitted parameter type; one of the two is required */
    type?: ParameterType | undefined
    required?: boolean | undefined
}

export function Arg(nameOrConfig: string | ArgDecoratorConfig): ParameterDecorator {
    return (target, propertyKey, parameterIndex) => {
        if (!propertyKey) return
        const config = typeof nameOrConfig === 'string' ? { name: nameOrConfig } : nameOrConfig
        const existingArgs = getArgMetadata(target, propertyKey)
        existingArgs[parameterIndex] = config
        Reflect.defineMetadata(ARG_METADATA_KEY, existingArgs, target, propertyKey)
    }
}

export function getAgentMetadata(target: Object): AgentDecoratorConfig | undefined {
    return Reflect.getMetadata(AGENT_METADATA_KEY, target)
}

export function getToolMetadata(target: Object, propertyKey: string | symbol): ToolDecoratorConfig | undefined {
    return Reflect.getMetadata(TOOL_METADATA_KEY, target, propertyKey)
}

export function getArgMetadata(target: Object, propertyKey: string | symbol): Array<ArgDecoratorConfig | undefined> {
    const args: unknown = Reflect.getMetadata(ARG_METADATA_KEY, target, propertyKey)
    return Array.isArray(args) ? [...args] : []
}

/** Parameter constructors emitted under `emitDecoratorMetadata`, when the compiler emitted them */
export function getParamTypes(target: Object, propertyKey: string | symbol): unknown[] {
    const types: unknown = Reflect.getMetadata('design:paramtypes', target, propertyKey)
    return Array.isArray(types) ? types : []
}
