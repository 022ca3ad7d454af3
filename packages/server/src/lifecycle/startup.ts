import type { Logger } from "@kvrest/logger"
import type { LifecycleHook } from "./lifecycle-hook"
import { type RunHooksResult, runHooks } from "./run-hooks"

export type StartupContext = {
  now: () => number
  logger: Logger
  deadlineMs: number
  startHooks: LifecycleHook[]
}

export type StartResult = RunHooksResult & { ok: boolean }

export async function startup(ctx: StartupContext): Promise<StartResult> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    { phase: "startup", now: ctx.now, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup
