export type AgentErrorKind =
    | 'transport'
    | 'server'
    | 'auth'
    | 'rate_limit'
    | 'bad_request'
    | 'transient_unavailable'
    | 'unknown_tool'
    | 'tool_not_allowed'
    | 'argument_validation'
    | 'tool_execution'
    | 'duplicate_tool'
    | 'registry_frozen'
    | 'cancelled'
    | 'config'

/**
 * Base class of every error the runtime raises on purpose.
 * `kind` is stable and safe to switch on; messages are for humans.
 */
export class AgentError extends Error {
    readonly kind: AgentErrorKind

    constructor(kind: AgentErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.kind = kind
    }
}

export function isAgentError(value: unknown): value is AgentError {
    return value instanceof AgentError
}

// ─── Model / transport ───────────────────────────────────────────────────────

/** Connection failure or per-attempt timeout. Retried. */
export class TransportError extends AgentError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transport', message, options)
    }
}

/** 5xx-class response. Retried. */
export class ServerError extends AgentError {
    readonly status: number

    constructor(status: number, message: string, options?: { cause?: unknown }) {
        super('server', message, options)
        this.status = status
    }
}

export class AuthError extends AgentError {
    readonly status: number | undefined

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super('auth', message, options)
        this.status = options?.status
    }
}

export class RateLimitError extends AgentError {
    /** Delay requested by the server, when it sent one */
    readonly retryAfterMs: number | undefined

    constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number | undefined }) {
        super('rate_limit', message, options)
        this.retryAfterMs = options?.retryAfterMs
    }
}

export class BadRequestError extends AgentError {
    readonly status: number | undefined

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super('bad_request', message, options)
        this.status = options?.status
    }
}

/** Every attempt failed with a retryable error. `cause` is the last one. */
export class TransientUnavailableError extends AgentError {
    readonly attempts: number

    constructor(attempts: number, cause: Error) {
        super('transient_unavailable', `Model unavailable after ${attempts} attempt(s): ${cause.message}`, { cause })
        this.attempts = attempts
    }
}

// ─── Tools ───────────────────────────────────────────────────────────────────

export class DuplicateToolError extends AgentError {
    constructor(readonly toolName: string) {
        super('duplicate_tool', `Tool "${toolName}" is already registered`)
    }
}

export class RegistryFrozenError extends AgentError {
    constructor(readonly toolName: string) {
        super('registry_frozen', `Cannot register "${toolName}": the tool registry is frozen once a run has started`)
    }
}

export class UnknownToolError extends AgentError {
    constructor(readonly toolName: string) {
        super('unknown_tool', `Unknown tool "${toolName}"`)
    }
}

export class ToolNotAllowedError extends AgentError {
    constructor(readonly toolName: string) {
        super('tool_not_allowed', `Tool "${toolName}" is not allowed by policy`)
    }
}

export interface ArgumentIssue {
    key: string
    message: string
}

export class ArgumentValidationError extends AgentError {
    /** Offending argument names, in order of first appearance */
    readonly keys: string[]

    constructor(readonly toolName: string, readonly issues: ArgumentIssue[]) {
        super(
            'argument_validation',
            `Invalid arguments for "${toolName}": ${issues.map((i) => `${i.key} (${i.message})`).join(', ')}`,
        )
        this.keys = [...new Set(issues.map((i) => i.key))]
    }
}

export class ToolExecutionError extends AgentError {
    constructor(readonly toolName: string, cause: unknown) {
        super('tool_execution', `Tool "${toolName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    }
}

// ─── Run control ─────────────────────────────────────────────────────────────

export class CancelledError extends AgentError {
    constructor(reason?: string) {
        super('cancelled', reason ? `Run cancelled: ${reason}` : 'Run cancelled')
    }
}

export class ConfigError extends AgentError {
    constructor(message: string, readonly variables: string[] = []) {
        super('config', message)
    }
}
