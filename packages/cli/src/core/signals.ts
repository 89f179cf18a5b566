export interface SignalManager {
  /** Aborts on the first SIGINT or SIGTERM */
  signal: AbortSignal
  dispose: () => void
}

export interface SignalManagerOptions {
  signals?: NodeJS.Signals[]
  exit?: (code: number) => void
}

/**
 * The first signal aborts the run in flight and sets the exit code; the
 * command then unwinds through its normal error path. A second SIGINT
 * exits straight away.
 */
export function createSignalManager(
  options: SignalManagerOptions = {}
): SignalManager {
  const abortController = new AbortController()
  const signalList = options.signals ?? ['SIGINT', 'SIGTERM']
  const exitFn = options.exit ?? ((code: number) => process.exit(code))

  let handling = false

  const handleSignal = (signal: NodeJS.Signals) => {
    if (handling) {
      if (signal === 'SIGINT') exitFn(130)
      return
    }

    handling = true
    process.exitCode = signal === 'SIGTERM' ? 143 : 130
    abortController.abort()
  }

  const listeners = new Map<NodeJS.Signals, () => void>()

  for (const signal of signalList) {
    const listener = () => handleSignal(signal)
    listeners.set(signal, listener)
    process.on(signal, listener)
  }

  return {
    signal: abortController.signal,
    dispose() {
      for (const [signal, listener] of listeners.entries()) {
        process.off(signal, listener)
      }
    },
  }
}
