import type { Milliseconds } from "@configurator/clock"
import type { Application } from "../server/server"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE = { "Cache-Control": "no-store" } as const

type CheckOutcome = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json({ ok: false, reason: "starting" }, { status: 503, headers: NO_CACHE })
    }

    for (const check of config.readinessChecks) {
      const res = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json({ ok: false, reason: res.reason }, { status: 503, headers: NO_CACHE })
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE })
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: Milliseconds): Promise<CheckOutcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const passed = await check.fn(controller.signal)

    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return passed ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    // The reason string is the whole report; the check logs its own error.
    return {
      ok: false,
      reason: controller.signal.aborted ? `${check.name}:timeout` : `${check.name}:error`,
    }
  } finally {
    clearTimeout(timer)
  }
}
