import { Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveDependencies,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createApp(): Application {
  return new Hono()
}

export class Server {
  private readonly deps: Required<ServerDependencies>

  private state: ServerState = "idle"
  private ready = false
  private handle?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.deps = resolveDependencies(deps)
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.handle?.stop() ?? this.noopStop(),
    })

    return this
  }

  /**
   * The application as it is served, without listening. Used for in-process requests.
   */
  buildApp(): Application {
    return this.collabs.buildApp({
      options: this.options,
      isReady: () => this.ready,
      createApp,
      createErrorHandler: () => this.collabs.createErrorHandler(this.deps.logger),
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
    })
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new Error("Server already started")
    }

    this.state = "starting"

    try {
      const started = await this.collabs.onStartup({
        now: this.deps.now,
        logger: this.deps.logger,
        deadlineMs: this.deps.now() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) {
        throw new Error(
          started.timedOut ? "Startup timed out" : `Startup hook failed: ${started.failures[0]?.hook}`,
          { cause: started.failures[0]?.error },
        )
      }

      const listening = await this.collabs.listen(this.buildApp(), this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        listening,
        deps: this.deps,
        options: this.options,
        stopHooks: this.options.stopHooks,
        setReady: (v) => {
          this.ready = v
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      this.handle = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
