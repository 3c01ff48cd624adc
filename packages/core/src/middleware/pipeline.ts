import type { Middleware, MiddlewareContext } from '../types'

/**
 * Composable Koa-style async middleware pipeline.
 * Middleware runs in registration order, each calling `next()` to continue.
 * A middleware that returns without calling `next()` stops the chain for
 * that scope.
 */
export class MiddlewarePipeline<TData = unknown> {
    private readonly middlewares: Middleware<TData>[] = []

    use(middleware: Middleware<TData>): this {
        this.middlewares.push(middleware)
        return this
    }

    get size(): number {
        return this.middlewares.length
    }

    /**
     * Execute all middleware matching the given scope.
     */
    async run(mCtx: MiddlewareContext<TData>): Promise<void> {
        const scoped = this.middlewares.filter((m) => {
            if (!m.scope) return true
            const scopes = Array.isArray(m.scope) ? m.scope : [m.scope]
            return scopes.includes(mCtx.scope)
        })

        const dispatch = async (index: number): Promise<void> => {
            const middleware = scoped[index]
            if (!middleware) return
            await middleware.run(mCtx, () => dispatch(index + 1))
        }

        await dispatch(0)
    }
}
