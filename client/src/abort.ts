/**
 * Raised when an operation's AbortSignal fires.
 */
export class AbortError extends Error {
  constructor(message = 'The operation was aborted', options?: ErrorOptions) {
    super(message, options)
    this.name = 'AbortError'
  }
}

/**
 * @throws AbortError if `signal` has already fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new AbortError(`${what} aborted`, { cause: signal.reason })
  }
}
