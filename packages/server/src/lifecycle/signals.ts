import type { EventEmitter } from "node:events"
import type { Logger } from "@kvrest/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>

  /**
   * How long a fatal shutdown may take before the process is killed.
   * @default 10_000
   */
  fatalTimeoutMs?: number

  /** @default process.exit */
  exit?: (code: number) => void

  /** Where signals and fatal errors are observed. @default process */
  events?: ProcessEvents
}

export type ProcessEvents = Pick<EventEmitter, "on" | "off">

export interface SignalHandler {
  unregister: () => void
}

/**
 * Stops the server on SIGINT/SIGTERM, and on uncaught errors stops it and exits with 1.
 * A second signal while stopping is ignored; a second fatal error exits at once.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const events = ctx.events ?? process

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      exit(1)
    }, fatalTimeoutMs)

    timer.unref()

    void runStop(ctx, reason).finally(() => {
      clearTimeout(timer)
      exit(1)
    })
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  events.on("SIGINT", sigint)
  events.on("SIGTERM", sigterm)
  events.on("uncaughtException", uncaught)
  events.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      events.off("SIGINT", sigint)
      events.off("SIGTERM", sigterm)
      events.off("uncaughtException", uncaught)
      events.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  ctx.logger.warn("Shutdown triggered", { reason })

  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
