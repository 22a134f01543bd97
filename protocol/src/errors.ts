/**
 * Error taxonomy for engine API calls.
 *
 * Every public operation either resolves with a complete result or rejects
 * with exactly one of:
 * - DockerRequestError: the engine answered with a non-success status
 * - DockerTimeoutError: no response within the configured window
 * - DockerError: anything else (local I/O, protocol violations, ...)
 *
 * Caller cancellation is reported as InterruptedError, which is not a
 * DockerError: an `instanceof DockerError` check never matches an abort.
 *
 * The second half of this module holds the transport-level failures that
 * classification consumes (ResponseFailure, ConnectTimeoutError,
 * ReadTimeoutError). They never escape an operation unwrapped.
 *
 * @module
 */

/**
 * Base class for every engine failure. Wraps its cause.
 */
export class DockerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DockerError'
  }

  /**
   * Wrap an arbitrary failure, reusing its message when it has one.
   */
  static wrap(cause: unknown): DockerError {
    if (cause instanceof DockerError) {
      return cause
    }
    const message = cause instanceof Error ? cause.message : String(cause)
    return new DockerError(message, { cause })
  }
}

/**
 * The engine rejected a request with a non-success HTTP status.
 */
export class DockerRequestError extends DockerError {
  constructor(
    public readonly method: string,
    public readonly uri: string,
    public readonly status: number,
    /** Response body decoded as text, or null when it could not be read */
    public readonly serverMessage: string | null,
    options?: { cause?: unknown }
  ) {
    super(
      `Request error: ${method} ${uri}: ${status}${serverMessage ? `, body: ${serverMessage.trim()}` : ''}`,
      options
    )
    this.name = 'DockerRequestError'
  }
}

/**
 * No response (or no further bytes) within the configured window.
 */
export class DockerTimeoutError extends DockerError {
  constructor(
    public readonly method: string,
    public readonly uri: string,
    options?: { cause?: unknown }
  ) {
    super(`Timeout: ${method} ${uri}`, options)
    this.name = 'DockerTimeoutError'
  }
}

/**
 * The caller aborted the operation while it was waiting.
 */
export class InterruptedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InterruptedError'
  }
}

/**
 * A container-scoped request answered 404.
 */
export class ContainerNotFoundError extends DockerError {
  constructor(
    public readonly containerId: string,
    cause?: unknown
  ) {
    super(`Container not found: ${containerId}`, { cause })
    this.name = 'ContainerNotFoundError'
  }
}

/**
 * An image-scoped request answered 404, or a pull reported a missing image.
 */
export class ImageNotFoundError extends DockerError {
  constructor(
    public readonly image: string,
    detail?: string,
    cause?: unknown
  ) {
    super(`Image not found: ${image}${detail ? `: ${detail}` : ''}`, { cause })
    this.name = 'ImageNotFoundError'
  }
}

/**
 * A pull progress stream reported an error event.
 */
export class ImagePullFailedError extends DockerError {
  constructor(
    public readonly image: string,
    detail: string
  ) {
    super(`Image pull failed: ${image}: ${detail}`)
    this.name = 'ImagePullFailedError'
  }
}

/**
 * A push progress stream reported an error event.
 */
export class ImagePushFailedError extends DockerError {
  constructor(
    public readonly image: string,
    detail: string
  ) {
    super(`Image push failed: ${image}: ${detail}`)
    this.name = 'ImagePushFailedError'
  }
}

/**
 * A build progress stream reported an error event.
 */
export class BuildFailedError extends DockerError {
  constructor(detail: string) {
    super(`Build failed: ${detail}`)
    this.name = 'BuildFailedError'
  }
}

// ============================================
// Transport-level failures (classification input)
// ============================================

/**
 * The engine answered with a non-success status. Raised by the request
 * executor, turned into DockerRequestError by classification.
 */
export class ResponseFailure extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string | null
  ) {
    super(`Unexpected response status ${status}`)
    this.name = 'ResponseFailure'
  }
}

/**
 * A connection (or a wait for a pooled connection) did not complete in time.
 */
export class ConnectTimeoutError extends Error {
  constructor(message = 'Connect timed out') {
    super(message)
    this.name = 'ConnectTimeoutError'
  }
}

/**
 * A connected socket stayed idle longer than the read timeout.
 */
export class ReadTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Read timed out after ${timeoutMs}ms`)
    this.name = 'ReadTimeoutError'
  }
}
