/**
 * Progress events streamed by build, pull and push.
 */

/**
 * Numeric progress of a layer transfer.
 */
export interface ProgressDetail {
  readonly current?: number
  readonly start?: number
  readonly total?: number
}

/**
 * Structured error detail attached to a failing event.
 */
export interface ErrorDetail {
  readonly code?: number
  readonly message?: string
}

/**
 * One decoded progress event. Unknown fields are dropped.
 */
export interface ProgressMessage {
  /** Layer or image identifier */
  readonly id?: string
  readonly status?: string
  /** Build output line (includes trailing newline) */
  readonly stream?: string
  /** Human-readable progress bar */
  readonly progress?: string
  readonly progressDetail?: ProgressDetail
  readonly error?: string
  readonly errorDetail?: ErrorDetail
  /** Auxiliary payload; `ID` carries the built image id on newer engines */
  readonly aux?: { readonly ID?: string }
}

const BUILD_SUCCESS_PREFIX = 'Successfully built'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function toProgressDetail(value: unknown): ProgressDetail | undefined {
  if (!isRecord(value)) return undefined
  const current = optionalNumber(value.current)
  const start = optionalNumber(value.start)
  const total = optionalNumber(value.total)
  return {
    ...(current !== undefined && { current }),
    ...(start !== undefined && { start }),
    ...(total !== undefined && { total })
  }
}

function toErrorDetail(value: unknown): ErrorDetail | undefined {
  if (!isRecord(value)) return undefined
  const code = optionalNumber(value.code)
  const message = optionalString(value.message)
  return {
    ...(code !== undefined && { code }),
    ...(message !== undefined && { message })
  }
}

/**
 * Project a decoded JSON value onto the ProgressMessage field set.
 *
 * @throws TypeError if the value is not a JSON object
 */
export function toProgressMessage(value: unknown): ProgressMessage {
  if (!isRecord(value)) {
    throw new TypeError(`progress event must be a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}`)
  }

  const id = optionalString(value.id)
  const status = optionalString(value.status)
  const stream = optionalString(value.stream)
  const progress = optionalString(value.progress)
  const progressDetail = toProgressDetail(value.progressDetail)
  const error = optionalString(value.error)
  const errorDetail = toErrorDetail(value.errorDetail)
  const auxId = isRecord(value.aux) ? optionalString(value.aux.ID) : undefined

  return {
    ...(id !== undefined && { id }),
    ...(status !== undefined && { status }),
    ...(stream !== undefined && { stream }),
    ...(progress !== undefined && { progress }),
    ...(progressDetail !== undefined && { progressDetail }),
    ...(error !== undefined && { error }),
    ...(errorDetail !== undefined && { errorDetail }),
    ...(auxId !== undefined && { aux: { ID: auxId } })
  }
}

/**
 * Image id announced by a build event, or null.
 *
 * `aux.ID` wins when present; otherwise a `Successfully built <id>` stream
 * line yields its last word.
 */
export function buildImageId(message: ProgressMessage): string | null {
  if (message.aux?.ID) {
    return message.aux.ID
  }

  const stream = message.stream
  if (stream === undefined || !stream.startsWith(BUILD_SUCCESS_PREFIX)) {
    return null
  }

  const trimmed = stream.trim()
  if (trimmed === BUILD_SUCCESS_PREFIX) {
    return null
  }
  return trimmed.slice(trimmed.lastIndexOf(' ') + 1)
}

/**
 * One-line rendering used in logs and error messages.
 */
export function describeProgress(message: ProgressMessage): string {
  const parts: string[] = []
  if (message.id) parts.push(message.id)
  if (message.status) parts.push(message.status)
  if (message.progress) parts.push(message.progress)
  if (message.stream) parts.push(message.stream.trim())
  if (message.error) parts.push(`error: ${message.error}`)
  return parts.join(' ')
}
