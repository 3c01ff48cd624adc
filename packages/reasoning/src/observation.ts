import type { ToolOutcome } from '@thoughtline/core'
import { DEFAULT_MARKERS, type ReplyMarkers } from './parser'

export const OBSERVATION_PREFIX = 'Observation: '

/** Strings pass through; anything else is rendered as JSON. */
export function formatResult(result: unknown): string {
    if (typeof result === 'string') return result
    if (result === undefined) return '(no result)'
    try {
        return JSON.stringify(result) ?? String(result)
    } catch {
        // Circular structures and BigInt values have no JSON form.
        return String(result)
    }
}

export function formatToolObservation(outcome: ToolOutcome): string {
    if (outcome.ok) return `${OBSERVATION_PREFIX}${formatResult(outcome.result)}`
    return `${OBSERVATION_PREFIX}Error (${outcome.error.kind}): ${outcome.error.message}`
}

/** Sent back when a reply could not be parsed, so the model can fix its format. */
export function formatCorrection(reason: string, markers: ReplyMarkers = DEFAULT_MARKERS): string {
    return (
        `${OBSERVATION_PREFIX}Your last reply could not be processed: ${reason}. ` +
        `Reply with a Thought followed by either one action block ` +
        `${markers.actionStart} {"tool": "<tool name>", "args": {...}} ${markers.actionEnd} ` +
        `or "${markers.finalAnswer} <answer>".`
    )
}
