/**
 * Writes into the stdout/stderr sinks handed to `LogStream.attach()`.
 *
 * Each demultiplexed payload is awaited until its sink takes it. While a
 * sink is over its high-water mark no further frames are read, so the
 * engine connection is throttled to the slower of the two sinks.
 *
 * @module
 */
import type { Writable } from 'node:stream'

/**
 * The sink went away while a payload was being delivered to it.
 */
export class StreamClosedError extends Error {
  constructor(reason: 'destroyed' | 'ended' | 'close' | 'finish') {
    super(`Output stream unavailable: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * Deliver one payload to an attach sink, resolving once the sink can take
 * more (immediately, or on `drain`).
 *
 * @throws StreamClosedError if the sink is destroyed, ended or closes first
 * @throws Error whatever the sink emits as `error`
 */
export function writeWithBackpressure(sink: Writable, payload: Uint8Array): Promise<void> {
  if (sink.destroyed) {
    return Promise.reject(new StreamClosedError('destroyed'))
  }
  if (sink.writableEnded || sink.writableFinished) {
    return Promise.reject(new StreamClosedError('ended'))
  }

  return new Promise((resolve, reject) => {
    let done = false

    const listeners = {
      error: (err: Error): void => finish(err),
      close: (): void => finish(new StreamClosedError('close')),
      finish: (): void => finish(new StreamClosedError('finish')),
      drain: (): void => finish()
    }

    const finish = (err?: Error): void => {
      if (done) return
      done = true
      sink.off('error', listeners.error)
      sink.off('close', listeners.close)
      sink.off('finish', listeners.finish)
      sink.off('drain', listeners.drain)
      if (err === undefined) resolve()
      else reject(err)
    }

    sink.on('error', listeners.error)
    sink.on('close', listeners.close)
    sink.on('finish', listeners.finish)

    if (sink.write(payload)) {
      // A failed write reports its error on a later tick
      setImmediate(() => finish())
    } else {
      sink.on('drain', listeners.drain)
    }
  })
}
