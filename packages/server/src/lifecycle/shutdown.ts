import type { Logger } from "@kvrest/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  now: () => number
  logger: Logger
  deadlineMs: number
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean

  failures: HookFailure[]

  /**
   * The deadline passed before every hook finished. Open sockets are not force-closed.
   */
  timedOut: boolean
}

/**
 * Closes the listener first, then runs the stop hooks. Hook failures do not stop the
 * remaining hooks.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const hooks: LifecycleHook[] = [closeServerHook(ctx.server), ...ctx.stopHooks]

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", now: ctx.now, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    hooks,
    { failFast: false },
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete", { ok, failures: failures.length, timedOut })

  return { ok, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const res = await closeUntilAborted(server, signal)

      if (res.aborted) return
      if (res.error) throw res.error
    },
  }
}

const ABORTED = Symbol("aborted")

type CloseResult = { aborted: true } | { aborted: false; error?: Error }

async function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<CloseResult> {
  if (signal.aborted) return { aborted: true }

  let onAbort: (() => void) | undefined

  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  const closed = new Promise<{ error?: Error }>((resolve) => {
    server.close((err) => resolve(err ? { error: err } : {}))
  })

  try {
    const res = await Promise.race([closed, aborted])

    if (res === ABORTED) return { aborted: true }

    return { aborted: false, ...res }
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}
