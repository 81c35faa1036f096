import { buildServer } from "../../server"
import { validateConfiguration } from "../config"
import { createAppContext } from "../create-context"
import type { CommandContext } from "./command"

/** Serves HTTP until the command's signal aborts, then stops gracefully. */
export async function runService({ config, core, signal }: CommandContext): Promise<void> {
  validateConfiguration(config)

  const ctx = await createAppContext({ config, coreOverrides: core })
  const { server } = buildServer(ctx)

  const running = await server.setupProcessHandlers().start()

  core.logger.info("Server started", {
    host: running.address.host,
    port: running.address.port,
  })

  await untilAborted(signal)

  const result = await running.stop()

  if (!result.ok) {
    core.logger.warn("Server stopped with failures", {
      failures: result.failures.map((failure) => failure.hook),
      timedOut: result.timedOut,
    })
  }
}

function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}
