/**
 * Literal markers of the text protocol the model is asked to follow.
 *
 * ```
 * Thought: I need to add the two numbers.
 * [ACTION_START]
 * {"tool": "add_numbers", "args": {"a": 123, "b": 456}}
 * [ACTION_END]
 * ```
 *
 * or
 *
 * ```
 * Thought: I have the result.
 * Final Answer: 579
 * ```
 */
export interface ReplyMarkers {
    finalAnswer: string
    actionStart: string
    actionEnd: string
}

export const DEFAULT_MARKERS: Readonly<ReplyMarkers> = {
    finalAnswer: 'Final Answer:',
    actionStart: '[ACTION_START]',
    actionEnd: '[ACTION_END]',
}

export interface ActionReply {
    kind: 'action'
    reasoning: string
    toolName: string
    arguments: Record<string, unknown>
}

export interface FinalAnswerReply {
    kind: 'final_answer'
    reasoning: string
    answer: string
}

export interface MalformedReply {
    kind: 'malformed'
    rawText: string
    reason: string
}

export type ParsedReply = ActionReply | FinalAnswerReply | MalformedReply

export type ReplyParser = (rawText: string) => ParsedReply

const THOUGHT_LABEL = /^thought\s*:\s*/i

function reasoningOf(text: string): string {
    return text.trim().replace(THOUGHT_LABEL, '').trim()
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function malformed(rawText: string, reason: string): MalformedReply {
    return { kind: 'malformed', rawText, reason }
}

type PayloadCheck =
    | { ok: true; tool: string; args: Record<string, unknown> }
    | { ok: false; reason: string }

/** An action payload has exactly `tool` (non-empty string) and `args` (object). */
function checkPayload(payload: unknown): PayloadCheck {
    if (!isPlainObject(payload)) return { ok: false, reason: 'action payload must be a JSON object' }

    const keys = Object.keys(payload)
    const missing = ['tool', 'args'].filter((k) => !keys.includes(k))
    if (missing.length) return { ok: false, reason: `action payload is missing key(s): ${missing.join(', ')}` }

    const extra = keys.filter((k) => k !== 'tool' && k !== 'args')
    if (extra.length) return { ok: false, reason: `action payload has unexpected key(s): ${extra.join(', ')}` }

    const { tool, args } = payload
    if (typeof tool !== 'string' || tool.trim() === '') {
        return { ok: false, reason: '"tool" must be a non-empty string' }
    }
    if (!isPlainObject(args)) return { ok: false, reason: '"args" must be a JSON object' }

    return { ok: true, tool, args }
}

function parseAction(rawText: string, markers: ReplyMarkers, start: number): ParsedReply {
    const bodyStart = start + markers.actionStart.length
    const end = rawText.indexOf(markers.actionEnd, bodyStart)
    if (end < 0) return malformed(rawText, 'action block is not terminated')

    if (rawText.includes(markers.actionStart, end + markers.actionEnd.length)) {
        return malformed(rawText, 'only one action block is allowed per reply')
    }

    const body = rawText.slice(bodyStart, end).trim()
    if (body === '') return malformed(rawText, 'action block is empty')

    let payload: unknown
    try {
        payload = JSON.parse(body)
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        return malformed(rawText, `action payload is not valid JSON: ${detail}`)
    }

    const checked = checkPayload(payload)
    if (!checked.ok) return malformed(rawText, checked.reason)

    return {
        kind: 'action',
        reasoning: reasoningOf(rawText.slice(0, start)),
        toolName: checked.tool,
        arguments: checked.args,
    }
}

/**
 * Classify a raw model reply. Never throws.
 *
 * A Final Answer marker wins over an action block in the same reply, so a
 * model that both acts and answers terminates the run.
 */
export function parse(rawText: string, markers: ReplyMarkers = DEFAULT_MARKERS): ParsedReply {
    const finalAt = rawText.indexOf(markers.finalAnswer)
    if (finalAt >= 0) {
        return {
            kind: 'final_answer',
            reasoning: reasoningOf(rawText.slice(0, finalAt)),
            answer: rawText.slice(finalAt + markers.finalAnswer.length).trim(),
        }
    }

    const actionAt = rawText.indexOf(markers.actionStart)
    if (actionAt >= 0) return parseAction(rawText, markers, actionAt)

    if (rawText.includes(markers.actionEnd)) {
        return malformed(rawText, 'action end marker without a start marker')
    }

    return malformed(rawText, 'no recognized directive')
}

/** Bind a parser to custom markers, falling back to the defaults for any not given. */
export function createParser(markers: Partial<ReplyMarkers> = {}): ReplyParser {
    const resolved: ReplyMarkers = { ...DEFAULT_MARKERS, ...markers }
    return (rawText) => parse(rawText, resolved)
}
