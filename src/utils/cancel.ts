export class CancellationError extends Error {
  constructor(message = "Harvest interrupted") {
    super(message)
    this.name = "CancellationError"
  }
}

export const toCancellationError = (signal: AbortSignal): CancellationError => {
  const reason: unknown = signal.reason
  if (reason instanceof Error) {
    return new CancellationError(reason.message)
  }
  if (typeof reason === "string" && reason.trim()) {
    return new CancellationError(reason)
  }
  return new CancellationError()
}

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return
  }
  throw toCancellationError(signal)
}

export const isCancellationError = (value: unknown): boolean => {
  if (value instanceof CancellationError) {
    return true
  }
  if (!(value instanceof Error)) {
    return false
  }
  return value.name === "AbortError" || value.name === "CancellationError"
}

export interface InterruptHandlers {
  /** First CTRL+C: stop dispatching, let in-flight work finish. */
  onInterrupt: () => void
  /** Second CTRL+C. */
  onForceExit: () => void
}

export interface InterruptHandle {
  signal: AbortSignal
  dispose: () => void
}

export const listenForInterrupt = (handlers: InterruptHandlers): InterruptHandle => {
  const controller = new AbortController()
  let interruptCount = 0
  const onSigint = () => {
    interruptCount += 1
    if (interruptCount === 1) {
      handlers.onInterrupt()
      controller.abort(new CancellationError("Interrupted by user (SIGINT)"))
      return
    }
    handlers.onForceExit()
  }
  process.on("SIGINT", onSigint)
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onSigint),
  }
}
