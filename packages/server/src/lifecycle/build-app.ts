import type { ErrorHandler } from "../errors/error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  options: ResolvedServerOptions
  isReady: () => boolean
  createApp: () => Application
  createErrorHandler: () => ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Health routes come first so they bypass request middleware and catch-all routes.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { options } = ctx

  const app = ctx.createApp()

  registerHealthRoutes(app, options.health, ctx.isReady)

  applyMiddleware(app, ctx.defaultMiddleware)
  applyMiddleware(app, options.middleware.pre)

  options.routes(app)

  applyMiddleware(app, options.middleware.post)

  app.onError(ctx.createErrorHandler())

  return app
}

export type BuildAppFn = typeof buildApp

function applyMiddleware(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
