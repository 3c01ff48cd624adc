import { z } from 'zod'

import type {
    ExecutionContext,
    ParameterSchema,
    ParameterSpec,
    ToolDefinition,
    ToolDescription,
    ToolRegistryView,
} from '../types'
import {
    ArgumentValidationError,
    DuplicateToolError,
    RegistryFrozenError,
    ToolExecutionError,
    UnknownToolError,
    type ArgumentIssue,
} from '../errors'

interface RegisteredTool<TData> {
    definition: ToolDefinition<TData>
    validator: z.ZodTypeAny
}

function parameterValidator(spec: ParameterSpec): z.ZodTypeAny {
    let base: z.ZodTypeAny
    switch (spec.type) {
        case 'string':
            base = z.string()
            break
        case 'number':
            base = z.number()
            break
        case 'integer':
            base = z.number().int()
            break
        case 'boolean':
            base = z.boolean()
            break
        case 'array':
            base = z.array(z.unknown())
            break
        case 'object':
            base = z.record(z.unknown())
            break
    }
    return spec.required === false ? base.optional() : base
}

/**
 * Builds the runtime validator for a tool's arguments.
 * Unexpected keys are rejected rather than dropped.
 */
export function schemaValidator(parameters: ParameterSchema): z.ZodTypeAny {
    const shape: Record<string, z.ZodTypeAny> = {}
    for (const [key, spec] of Object.entries(parameters)) {
        shape[key] = parameterValidator(spec)
    }
    return z.object(shape).strict()
}

function toIssues(error: z.ZodError): ArgumentIssue[] {
    const issues: ArgumentIssue[] = []
    for (const issue of error.issues) {
        if (issue.code === z.ZodIssueCode.unrecognized_keys) {
            for (const key of issue.keys) issues.push({ key, message: 'unexpected argument' })
            continue
        }
        const key = issue.path.length > 0 ? issue.path.map(String).join('.') : '(arguments)'
        issues.push({ key, message: issue.message })
    }
    return issues
}

/**
 * Name → tool mapping for an agent.
 *
 * Registration happens while the agent is being assembled; during runs the
 * registry is only read, so one instance can serve any number of concurrent
 * runs.
 */
export class ToolRegistry<TData = unknown> implements ToolRegistryView<TData> {
    private readonly tools = new Map<string, RegisteredTool<TData>>()
    private frozen = false

    register(tool: ToolDefinition<TData>): this {
        if (this.frozen) throw new RegistryFrozenError(tool.name)
        if (this.tools.has(tool.name)) throw new DuplicateToolError(tool.name)
        this.tools.set(tool.name, { definition: tool, validator: schemaValidator(tool.parameters) })
        return this
    }

    get(name: string): ToolDefinition<TData> | undefined {
        return this.tools.get(name)?.definition
    }

    lookup(name: string): ToolDefinition<TData> {
        const entry = this.tools.get(name)
        if (!entry) throw new UnknownToolError(name)
        return entry.definition
    }

    /** Reject further registrations. Idempotent. */
    freeze(): this {
        this.frozen = true
        return this
    }

    get isFrozen(): boolean {
        return this.frozen
    }

    getAll(): ToolDefinition<TData>[] {
        return [...this.tools.values()].map((t) => t.definition)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    isAllowed(name: string, allowedTools?: readonly string[]): boolean {
        if (!allowedTools) return true
        return allowedTools.includes(name)
    }

    describe(allowedTools?: readonly string[]): ToolDescription[] {
        return this.getAll()
            .filter((t) => this.isAllowed(t.name, allowedTools))
            .map(({ name, description, parameters }) => ({ name, description, parameters }))
    }

    /**
     * Validate `args` against the tool's schema, then call its handler.
     *
     * @throws UnknownToolError when no tool has that name
     * @throws ArgumentValidationError before the handler runs, listing the offending keys
     * @throws ToolExecutionError wrapping whatever the handler threw
     */
    async invoke(name: string, args: Record<string, unknown>, ctx?: ExecutionContext<TData>): Promise<unknown> {
        const entry = this.tools.get(name)
        if (!entry) throw new UnknownToolError(name)

        const parsed = entry.validator.safeParse(args)
        if (!parsed.success) throw new ArgumentValidationError(name, toIssues(parsed.error))

        try {
            return await entry.definition.execute(args, ctx)
        } catch (err) {
            throw new ToolExecutionError(name, err)
        }
    }
}

/**
 * Helper to define a tool with full type inference.
 */
export function defineTool<TData = unknown>(
    definition: ToolDefinition<TData>,
): ToolDefinition<TData> {
    return definition
}
