import type { AgentErrorKind } from '../errors'

// ─── Transcript Types ────────────────────────────────────────────────────────

export type MessageRole = 'system' | 'user' | 'assistant' | 'observation'

export interface Message {
    role: MessageRole
    content: string
}

/** Ordered conversation history of a single run. Append-only while the run is live. */
export type Transcript = Message[]

// ─── Model Provider Types ───────────────────────────────────────────────────

export interface CompletionConfig {
    /** Sampling randomness, 0..1 */
    temperature: number
    /** Upper bound on reply length */
    maxOutputTokens: number
    /** Backend model identifier */
    modelId: string
    /** Per-attempt wall-clock limit */
    timeoutMs: number
    /** Total number of attempts, including the first one */
    maxRetries: number
}

export interface ModelRequest {
    messages: readonly Message[]
    config: CompletionConfig
    /** Aborted when the attempt times out or settles; providers should stop work on abort */
    signal?: AbortSignal | undefined
}

export interface ModelResponse {
    /** Raw reply text, exactly as the backend produced it */
    text: string
    usage?: TokenUsage | undefined
    raw?: unknown | undefined
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

/**
 * Transport seam to an LLM backend.
 *
 * `complete` performs exactly one attempt and rejects with a classified
 * `AgentError` (`TransportError`, `ServerError`, `AuthError`,
 * `RateLimitError`, `BadRequestError`). Retrying is the `LLMClient`'s job.
 */
export interface ModelProvider {
    name: string
    complete(request: ModelRequest): Promise<ModelResponse>
}

export interface RetryPolicy {
    /** Delay before the second attempt; doubles for each later one */
    baseDelayMs: number
    maxDelayMs: number
    /** Fraction of the computed delay added as random jitter */
    jitter: number
}

export interface RetryEvent {
    attempt: number
    delayMs: number
    error: Error
}

// ─── Tool Types ──────────────────────────────────────────────────────────────

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object'

export interface ParameterSpec {
    type: ParameterType
    description?: string | undefined
    /** @default true */
    required?: boolean | undefined
}

export type ParameterSchema = Record<string, ParameterSpec>

export interface ToolDefinition<TData = unknown> {
    name: string
    description: string
    parameters: ParameterSchema
    execute(args: Record<string, unknown>, ctx: ExecutionContext<TData> | undefined): Promise<unknown>
}

/** Prompt-facing summary of a registered tool */
export interface ToolDescription {
    name: string
    description: string
    parameters: ParameterSchema
}

/** Read-only view of the tool registry handed to reasoning engines */
export interface ToolRegistryView<TData = unknown> {
    get(name: string): ToolDefinition<TData> | undefined
    has(name: string): boolean
    lookup(name: string): ToolDefinition<TData>
    invoke(name: string, args: Record<string, unknown>, ctx?: ExecutionContext<TData>): Promise<unknown>
    describe(allowedTools?: readonly string[]): ToolDescription[]
    isAllowed(name: string, allowedTools?: readonly string[]): boolean
}

// ─── Reasoning Types ─────────────────────────────────────────────────────────

export type ReasoningStrategy = 'react'

/**
 * A single reasoning step emitted by an engine during execution.
 * Steps are appended to ctx.state.steps and emitted as events.
 */
export type ReasoningStep =
    | ThoughtStep
    | ToolCallStep
    | ToolResultStep
    | CorrectionStep
    | ResponseStep

export interface ThoughtStep {
    type: 'thought'
    step: number
    content: string
    engine: string
}

export interface ToolCallStep {
    type: 'tool_call'
    step: number
    toolName: string
    args: Record<string, unknown>
    engine: string
}

export interface ToolResultStep {
    type: 'tool_result'
    step: number
    toolName: string
    result: unknown
    error?: { kind: AgentErrorKind; message: string } | undefined
    engine: string
}

/** The model's reply could not be parsed and a corrective observation was sent */
export interface CorrectionStep {
    type: 'correction'
    step: number
    reason: string
    engine: string
}

export interface ResponseStep {
    type: 'response'
    step: number
    content: string
    engine: string
}

export type StepOutcome = 'action' | 'final_answer' | 'malformed' | 'error'

/**
 * Outcome of one tool invocation as seen by an engine.
 * Tool-layer failures are values here, not exceptions.
 */
export type ToolOutcome =
    | { ok: true; result: unknown }
    | { ok: false; error: { kind: AgentErrorKind; message: string } }

/**
 * The contract every reasoning engine must implement.
 *
 * Engines receive a `ReasoningContext` and drive the conversation until a
 * terminal state. They never throw for provider, parse or tool failures:
 * those end up in the returned `LoopResult`.
 */
export interface ReasoningEngine<TData = unknown> {
    readonly name: string
    execute(rCtx: ReasoningContext<TData>): Promise<LoopResult>
}

/**
 * Runtime context passed into every engine.
 */
export interface ReasoningContext<TData = unknown> {
    ctx: ExecutionContext<TData>
    tools: ToolRegistryView<TData>
    policy: AgentPolicy
    /** Agent instructions; engines decide how to embed them in the system message */
    systemPrompt?: string | undefined
    /** Append a step to state.steps and emit a 'step:reasoning' event */
    pushStep(step: ReasoningStep): Promise<void>
    /** Send the transcript to the model through the retrying client. Rejects with an AgentError. */
    callModel(messages: readonly Message[]): Promise<ModelResponse>
    /** Invoke a tool through the registry, firing tool middleware. Never rejects for tool-layer errors. */
    callTool(name: string, args: Record<string, unknown>, step: number): Promise<ToolOutcome>
    /** Run step:before middleware */
    enterStep(step: number): Promise<void>
    /** Run step:after middleware */
    exitStep(step: number, outcome: StepOutcome): Promise<void>
}

// ─── Execution Context ───────────────────────────────────────────────────────

export interface ExecutionState {
    steps: ReasoningStep[]
    messages: Transcript
    toolCalls: Array<{ name: string; args: Record<string, unknown>; outcome: ToolOutcome }>
    usage: TokenUsage
    startedAt: Date
    finishedAt?: Date | undefined
}

export interface ExecutionContext<TData = unknown> {
    /** User task for this run */
    input: string
    /** User-defined typed state */
    data: TData
    /** Internal runtime state, do not mutate */
    state: ExecutionState
    sessionId: string
    /** True once the run's signal aborted or cancel() was called */
    readonly cancelled: boolean
    /** Reason given to cancel(), or the signal's abort reason */
    readonly cancelReason: string | undefined
    /** Request cancellation; honored before the next step */
    cancel(reason?: string): void
    /** Emit a custom event */
    emit(event: string, payload?: unknown): Promise<void>
}

// ─── Loop Result ─────────────────────────────────────────────────────────────

export type LoopStatus = 'success' | 'step_limit_exceeded' | 'fatal_error'

export type LoopState = 'running' | 'succeeded' | 'exhausted' | 'failed'

export interface LoopFailure {
    kind: AgentErrorKind
    message: string
}

export interface LoopResult {
    status: LoopStatus
    state: Exclude<LoopState, 'running'>
    answer?: string | undefined
    failure?: LoopFailure | undefined
    /** Full conversation, including the system prompt, whatever the outcome */
    transcript: Transcript
    /** Number of model calls issued */
    steps: number
    reasoning: ReasoningStep[]
    usage: TokenUsage
}

// ─── Middleware Types ─────────────────────────────────────────────────────────

export type MiddlewareScope =
    | 'run:before'
    | 'run:after'
    | 'step:before'
    | 'step:after'
    | 'tool:before'
    | 'tool:after'

export interface MiddlewareContext<TData = unknown> {
    scope: MiddlewareScope
    ctx: ExecutionContext<TData>
    /** Present when scope is step:* */
    step?: {
        number: number
        outcome?: StepOutcome | undefined
    } | undefined
    /** Present when scope is tool:* */
    tool?: {
        name: string
        args: Record<string, unknown>
        outcome?: ToolOutcome | undefined
    } | undefined
    /** Present on run:after */
    result?: LoopResult | undefined
}

export type NextFn = () => Promise<void>

export interface Middleware<TData = unknown> {
    name?: string
    scope?: MiddlewareScope | MiddlewareScope[]
    run(mCtx: MiddlewareContext<TData>, next: NextFn): Promise<void>
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export type CoreEvent =
    | 'run:start'
    | 'run:end'
    | 'step:reasoning'
    | 'model:request'
    | 'model:response'
    | 'model:retry'
    | 'tool:before'
    | 'tool:after'
    | 'cancel'
    | 'error'

export type EventHandler<TPayload = unknown> = (payload: TPayload) => void | Promise<void>

// ─── Agent Policy Types ───────────────────────────────────────────────────────

export interface AgentPolicy {
    /** Model calls allowed per run before it ends as step_limit_exceeded */
    maxSteps?: number | undefined
    /** Restricts which registered tools a run may invoke */
    allowedTools?: string[] | undefined
}

// ─── Agent Config Types ───────────────────────────────────────────────────────

export interface AgentConfig<TData = unknown> {
    name: string
    model?: ModelProvider | undefined
    tools?: ToolDefinition<TData>[] | undefined
    reasoning?: ReasoningStrategy | ReasoningEngine<TData> | undefined
    middleware?: Middleware<TData>[] | undefined
    policy?: AgentPolicy | undefined
    completion?: Partial<CompletionConfig> | undefined
    retry?: Partial<RetryPolicy> | undefined
    systemPrompt?: string | undefined
    data?: TData | undefined
}

export interface RunOptions<TData = unknown> {
    input: string
    data?: Partial<TData> | undefined
    signal?: AbortSignal | undefined
    /** Correlation id for logs and events. Defaults to a random UUID per run. */
    sessionId?: string | undefined
}

export type RunResult = LoopResult
