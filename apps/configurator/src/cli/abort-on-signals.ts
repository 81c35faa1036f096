export type SignalScope = {
  signal: AbortSignal
  dispose: () => void
}

/** An abort signal tripped by the first of `signals` the process receives. */
export function abortOnSignals(
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): SignalScope {
  const controller = new AbortController()
  const onSignal = (name: NodeJS.Signals) => controller.abort(name)

  for (const name of signals) process.on(name, onSignal)

  return {
    signal: controller.signal,
    dispose: () => {
      for (const name of signals) process.off(name, onSignal)
    },
  }
}
