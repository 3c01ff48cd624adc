import { randomUUID } from 'node:crypto'

import type { ExecutionContext, ExecutionState, TokenUsage } from '../types'
import type { EventEmitter } from '../event/emitter'

function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

function emptyState(): ExecutionState {
    return {
        steps: [],
        messages: [],
        toolCalls: [],
        usage: emptyUsage(),
        startedAt: new Date(),
    }
}

export interface CreateContextOptions<TData> {
    input: string
    data: TData
    emitter: EventEmitter
    sessionId?: string | undefined
    signal?: AbortSignal | undefined
}

/** A context plus the hook that detaches it from the caller's signal. */
export interface OwnedContext<TData> extends ExecutionContext<TData> {
    dispose(): void
}

function describeReason(reason: unknown): string | undefined {
    if (reason === undefined) return undefined
    if (reason instanceof Error) return reason.message
    return String(reason)
}

/**
 * Creates an isolated ExecutionContext for a single `.run()` call.
 *
 * Cancellation is a flag: the engine checks it between steps, so a call that
 * is already in flight finishes (or times out) first. Call `dispose()` once
 * the run is over so a long-lived signal does not keep the listener.
 */
export function createContext<TData>(options: CreateContextOptions<TData>): OwnedContext<TData> {
    const { input, data, emitter, signal } = options
    const state = emptyState()
    const sessionId = options.sessionId ?? randomUUID()

    let cancelled = signal?.aborted ?? false
    let cancelReason = signal?.aborted ? describeReason(signal.reason) : undefined

    const onAbort = () => {
        cancelled = true
        cancelReason ??= describeReason(signal?.reason)
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    return {
        input,
        data,
        state,
        sessionId,
        get cancelled() {
            return cancelled
        },
        get cancelReason() {
            return cancelReason
        },
        cancel(reason?: string) {
            cancelled = true
            cancelReason ??= reason
        },
        emit(event, payload) {
            return emitter.emit(event, payload)
        },
        dispose() {
            signal?.removeEventListener('abort', onAbort)
        },
    }
}
