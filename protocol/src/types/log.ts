/**
 * Frames of the multiplexed log/attach stream.
 */

/**
 * Stream a frame belongs to. `stdin` frames are echoes of attached input and
 * `unknown` covers tags the engine does not define; both are ignorable.
 */
export type StreamType = 'stdin' | 'stdout' | 'stderr' | 'unknown'

/**
 * Wire tags of the multiplexed format.
 */
export const STREAM_TAGS = {
  stdin: 0,
  stdout: 1,
  stderr: 2
} as const

/**
 * One decoded frame.
 */
export interface LogMessage {
  readonly stream: StreamType
  /** Raw tag byte as received */
  readonly tag: number
  readonly payload: Buffer
}

/**
 * Map a tag byte to its stream.
 */
export function streamTypeOf(tag: number): StreamType {
  switch (tag) {
    case STREAM_TAGS.stdin:
      return 'stdin'
    case STREAM_TAGS.stdout:
      return 'stdout'
    case STREAM_TAGS.stderr:
      return 'stderr'
    default:
      return 'unknown'
  }
}
