import { registerEngine } from '@thoughtline/core'
import { ReactEngine } from './engines/react'

// ─── Auto-register built-in engines ──────────────────────────────────────────
//
// Importing @thoughtline/reasoning registers the ReAct engine with the global
// registry, which makes it the default strategy for every agent:
//
//   agent.reasoning('react')

registerEngine('react', () => new ReactEngine())

// ─── Exports ──────────────────────────────────────────────────────────────────

export { ReactEngine } from './engines/react'
export type { ReactEngineConfig } from './engines/react'

export { parse, createParser, DEFAULT_MARKERS } from './parser'
export type {
    ActionReply,
    FinalAnswerReply,
    MalformedReply,
    ParsedReply,
    ReplyMarkers,
    ReplyParser,
} from './parser'

export { buildSystemPrompt, describeTools, DEFAULT_INSTRUCTIONS } from './prompt'
export type { SystemPromptOptions } from './prompt'

export { formatCorrection, formatResult, formatToolObservation, OBSERVATION_PREFIX } from './observation'
