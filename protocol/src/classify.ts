/**
 * Failure classification.
 *
 * Maps a failure to the error taxonomy by looking through its cause chain.
 * Rules are tried in priority order; for each rule the chain is walked from
 * the outermost error inwards and the first matching link decides:
 * 1. ResponseFailure → DockerRequestError
 * 2. ReadTimeoutError / ConnectTimeoutError / ETIMEDOUT → DockerTimeoutError
 * 3. AbortError / ABORT_ERR → InterruptedError
 * 4. nothing matched → DockerError wrapping the outer failure
 *
 * A response anywhere in the chain outranks a timeout on the same call.
 *
 * @module
 */

import {
  ConnectTimeoutError,
  DockerError,
  DockerRequestError,
  DockerTimeoutError,
  InterruptedError,
  ReadTimeoutError,
  ResponseFailure
} from './errors.js'

/**
 * Result of classifying a failure.
 */
export type ClassifiedFailure = DockerError | InterruptedError

/**
 * Iterate an error and its causes, outermost first. Stops on cycles.
 */
export function* causeChain(error: unknown): Generator<unknown, void, unknown> {
  const seen = new Set<unknown>()
  let current: unknown = error

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current)
    yield current
    current = current instanceof Error ? current.cause : undefined
  }
}

function errorCode(error: unknown): string | undefined {
  if (error === null || typeof error !== 'object' || !('code' in error)) {
    return undefined
  }
  return typeof error.code === 'string' ? error.code : undefined
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof ReadTimeoutError ||
    error instanceof ConnectTimeoutError ||
    errorCode(error) === 'ETIMEDOUT'
  )
}

function isInterruption(error: unknown): boolean {
  if (error instanceof InterruptedError) {
    return true
  }
  if (error !== null && typeof error === 'object' && 'name' in error && error.name === 'AbortError') {
    return true
  }
  return errorCode(error) === 'ABORT_ERR'
}

/**
 * Map a failure to the taxonomy.
 *
 * @param method - HTTP method of the failed request
 * @param uri - Logical request URI (endpoint + path + query)
 * @param error - The failure as caught
 */
export function classifyFailure(method: string, uri: string, error: unknown): ClassifiedFailure {
  // Already classified (e.g. rethrown through a stream wrapper)
  if (error instanceof DockerError) {
    return error
  }

  const chain = [...causeChain(error)]

  const response = chain.find((cause): cause is ResponseFailure => cause instanceof ResponseFailure)
  if (response) {
    return new DockerRequestError(method, uri, response.status, response.body, { cause: response })
  }

  const timeout = chain.find(isTimeout)
  if (timeout !== undefined) {
    return new DockerTimeoutError(method, uri, { cause: timeout })
  }

  const interruption = chain.find(isInterruption)
  if (interruption !== undefined) {
    return new InterruptedError(`Interrupted: ${method} ${uri}`, { cause: interruption })
  }

  return DockerError.wrap(error)
}

/**
 * Classify and throw. Convenience for `catch` blocks.
 */
export function rethrowClassified(method: string, uri: string, error: unknown): never {
  throw classifyFailure(method, uri, error)
}
