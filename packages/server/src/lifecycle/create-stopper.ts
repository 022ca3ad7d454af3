import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { ListeningServer } from "./listen"
import type { ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  /** Idempotent: later calls return the first call's result. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  listening: ListeningServer

  deps: Required<ServerDependencies>
  options: ResolvedServerOptions

  setReady: (value: boolean) => void

  onStop: () => void
  shutdown: ShutdownFn
  stopHooks: LifecycleHook[]
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)

      return stopping
    },
    address: ctx.listening.address,
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.listening.server,
      now: ctx.deps.now,
      logger: ctx.deps.logger,
      deadlineMs: ctx.deps.now() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
