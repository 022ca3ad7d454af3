import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"
import type { Application } from "../server/server"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

type CheckResult = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json({ ok: false, reason: "starting" }, { status: 503, headers: NO_CACHE_HEADERS })
    }

    for (const check of config.readinessChecks) {
      const res = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json({ ok: false, reason: res.reason }, { status: 503, headers: NO_CACHE_HEADERS })
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: number): Promise<CheckResult> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const passed = await check.fn(controller.signal)

    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return passed ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    // the check's own error is not exposed on the readiness endpoint
    return {
      ok: false,
      reason: controller.signal.aborted ? `${check.name}:timeout` : `${check.name}:error`,
    }
  } finally {
    clearTimeout(timer)
  }
}
