import type { Logger } from "@kvrest/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  now: () => number
  logger: Logger
  /** Epoch milliseconds. */
  deadlineMs: number
}

export type RunHooksPolicy = {
  /** Stop after the first failure. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

/**
 * Runs hooks one after another, each with an abort signal that fires at the shared
 * deadline.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(
  ctx: RunHooksContext,
  hook: LifecycleHook,
): Promise<{ failure?: HookFailure; timedOut: boolean }> {
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.now())

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), msLeft)

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (deadlineHit(ctx, controller)) {
      ctx.logger.warn(`${label(ctx.phase)} deadline exceeded during hook: ${hook.name}`)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${label(ctx.phase)} hook failed: ${hook.name}`, { err })

    return { failure: { hook: hook.name, error: err }, timedOut: deadlineHit(ctx, controller) }
  } finally {
    clearTimeout(timeoutId)
  }
}

function deadlineHit(ctx: RunHooksContext, controller: AbortController): boolean {
  return controller.signal.aborted || ctx.now() >= ctx.deadlineMs
}

function label(phase: HookPhase): string {
  return phase === "startup" ? "Startup" : "Shutdown"
}
