import type { ParameterSpec, ToolDescription } from '@thoughtline/core'
import { DEFAULT_MARKERS, type ReplyMarkers } from './parser'

export const DEFAULT_INSTRUCTIONS = 'You are a helpful assistant that solves tasks step by step, using tools when they help.'

function describeParameter(name: string, spec: ParameterSpec): string {
    const optional = spec.required === false ? ', optional' : ''
    const description = spec.description ? `: ${spec.description}` : ''
    return `${name} (${spec.type}${optional})${description}`
}

/**
 * One entry per tool, e.g.
 * `- add_numbers: Add two numbers. Arguments: a (number), b (number)`
 */
export function describeTools(tools: readonly ToolDescription[]): string {
    if (tools.length === 0) return 'No tools are available. Answer from your own knowledge.'

    return tools
        .map((tool) => {
            const params = Object.entries(tool.parameters).map(([name, spec]) => describeParameter(name, spec))
            const args = params.length ? params.join(', ') : 'none'
            return `- ${tool.name}: ${tool.description} Arguments: ${args}`
        })
        .join('\n')
}

export interface SystemPromptOptions {
    instructions?: string | undefined
    tools: readonly ToolDescription[]
    markers?: ReplyMarkers | undefined
}

/**
 * System message for a ReAct run: the agent's instructions, the reply
 * format the parser understands, and the tool catalogue.
 */
export function buildSystemPrompt(options: SystemPromptOptions): string {
    const { instructions = DEFAULT_INSTRUCTIONS, tools, markers = DEFAULT_MARKERS } = options

    return [
        instructions.trim(),
        '',
        'Work in cycles of Thought, Action and Observation.',
        '',
        '## Reply format',
        '1. Thought: explain your reasoning and what you will do next.',
        `2. Action: to use a tool, write exactly one JSON object between ${markers.actionStart} and ${markers.actionEnd}, then stop and wait for the Observation:`,
        markers.actionStart,
        '{"tool": "<tool name>", "args": {"<argument>": <value>}}',
        markers.actionEnd,
        `3. When the task is done, write "${markers.finalAnswer}" followed by the answer.`,
        '',
        '## Rules',
        '- Start every reply with a Thought.',
        `- Never put an Action and a ${markers.finalAnswer.replace(/:$/, '')} in the same reply.`,
        '- Observations are written by the system; never write one yourself.',
        '',
        '## Available tools',
        describeTools(tools),
    ].join('\n')
}
