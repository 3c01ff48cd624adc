import type { Middleware, MiddlewareContext, MiddlewareScope, NextFn } from '@thoughtline/core'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LogEntry {
    level: LogLevel
    scope: MiddlewareScope
    sessionId: string
    timestamp: string
    step?: number | undefined
    tool?: string | undefined
    durationMs?: number | undefined
    meta?: Record<string, unknown> | undefined
}

export type LogTransport = (entry: LogEntry) => void

export interface LoggerMiddlewareConfig {
    /**
     * Minimum log level to emit.
     * @default 'info'
     */
    level?: LogLevel | undefined

    /**
     * Which middleware scopes to log.
     * Defaults to all scopes.
     */
    scopes?: MiddlewareScope[] | undefined

    /**
     * Custom transport. Defaults to structured console output.
     */
    transport?: LogTransport | undefined

    /**
     * Whether to measure and log duration per scope pair (e.g. before→after).
     * @default true
     */
    timing?: boolean | undefined

    /**
     * Prefix prepended to all log output (when using default transport).
     * @default '[thoughtline]'
     */
    prefix?: string | undefined

    /** Injected for tests */
    now?: (() => number) | undefined
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 99,
}

function shouldLog(entry: LogLevel, min: LogLevel): boolean {
    return LEVEL_RANK[entry] >= LEVEL_RANK[min]
}

export function formatEntry(prefix: string, entry: LogEntry): string {
    const { level, scope, timestamp, sessionId, step, durationMs, tool, meta } = entry

    const parts: string[] = [
        prefix,
        `[${timestamp}]`,
        `[${level.toUpperCase()}]`,
        `scope=${scope}`,
        `session=${sessionId}`,
    ]

    if (step !== undefined) parts.push(`step=${step}`)
    if (tool) parts.push(`tool=${tool}`)
    if (durationMs !== undefined) parts.push(`duration=${durationMs}ms`)
    if (meta && Object.keys(meta).length) parts.push(JSON.stringify(meta))

    return parts.join(' ')
}

function defaultTransport(prefix: string): LogTransport {
    return (entry: LogEntry) => {
        const line = formatEntry(prefix, entry)

        switch (entry.level) {
            case 'debug':
                console.debug(line)
                break
            case 'info':
                console.info(line)
                break
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
        }
    }
}

/**
 * Run boundaries are info; steps and tools are debug unless something went
 * wrong, in which case they are raised to warn (self-corrected) or error
 * (run failed).
 */
function levelFor<TData>(mCtx: MiddlewareContext<TData>): LogLevel {
    const { scope, step, tool, result } = mCtx

    if (scope === 'run:after' && result) {
        if (result.status === 'fatal_error') return 'error'
        if (result.status === 'step_limit_exceeded') return 'warn'
    }
    if (scope === 'step:after') {
        if (step?.outcome === 'error') return 'error'
        if (step?.outcome === 'malformed') return 'warn'
    }
    if (scope === 'tool:after' && tool?.outcome && !tool.outcome.ok) return 'warn'

    return scope.startsWith('run:') ? 'info' : 'debug'
}

function metaFor<TData>(mCtx: MiddlewareContext<TData>): Record<string, unknown> | undefined {
    const { scope, ctx, step, tool, result } = mCtx

    switch (scope) {
        case 'run:before':
            return { input: ctx.input }
        case 'run:after':
            return result
                ? { status: result.status, steps: result.steps, answer: result.answer, failure: result.failure }
                : undefined
        case 'step:after':
            return step?.outcome ? { outcome: step.outcome } : undefined
        case 'tool:before':
            return tool ? { args: tool.args } : undefined
        case 'tool:after':
            if (!tool?.outcome) return undefined
            return tool.outcome.ok ? { result: tool.outcome.result } : { error: tool.outcome.error }
        default:
            return undefined
    }
}

/**
 * Structured logging middleware.
 *
 * Logs lifecycle events across all (or selected) scopes with optional timing.
 *
 * @example
 * ```ts
 * agent.use(createLogger())
 * agent.use(createLogger({ level: 'debug', timing: true }))
 * agent.use(createLogger({ transport: (entry) => myLogger.log(entry) }))
 * ```
 */
export function createLogger<TData = unknown>(
    config: LoggerMiddlewareConfig = {},
): Middleware<TData> {
    const {
        level: minLevel = 'info',
        scopes,
        timing = true,
        prefix = '[thoughtline]',
        transport = defaultTransport(prefix),
        now = Date.now,
    } = config

    // Timing store: session + scope family + step/tool → start time
    const timers = new Map<string, number>()

    const timerKey = <T>(mCtx: MiddlewareContext<T>): string => {
        const family = mCtx.scope.split(':')[0] ?? mCtx.scope
        return [mCtx.ctx.sessionId, family, mCtx.step?.number ?? '', mCtx.tool?.name ?? ''].join('|')
    }

    return {
        name: 'logger',
        run: async (mCtx: MiddlewareContext<TData>, next: NextFn) => {
            const { scope, ctx, step, tool } = mCtx

            // Before scopes always start their timer so that filtering on the
            // after scope alone still reports durations.
            if (timing && scope.endsWith(':before')) timers.set(timerKey(mCtx), now())

            let durationMs: number | undefined
            if (timing && scope.endsWith(':after')) {
                const key = timerKey(mCtx)
                const start = timers.get(key)
                if (start !== undefined) {
                    durationMs = now() - start
                    timers.delete(key)
                }
            }

            const level = levelFor(mCtx)
            if ((!scopes || scopes.includes(scope)) && shouldLog(level, minLevel)) {
                transport({
                    level,
                    scope,
                    sessionId: ctx.sessionId,
                    timestamp: new Date(now()).toISOString(),
                    step: step?.number,
                    tool: tool?.name,
                    durationMs,
                    meta: metaFor(mCtx),
                })
            }

            await next()
        },
    }
}
