/**
 * Pull-based reader over a live response body.
 *
 * Subclasses turn raw chunks into records; the base class owns the
 * lifecycle: one chunk is read per empty queue, the lease goes back as soon
 * as the body ends, fails or is closed, and `hasNext()` never turns true
 * again once it returned false.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { classifyFailure, DockerError } from '@dockwire/protocol'
import type { ExchangeContext } from './request.js'

export interface StreamContext extends ExchangeContext {
  /** Return the lease and destroy an unfinished body. Idempotent. */
  release(): void
}

export abstract class BodyReader<T> implements AsyncIterable<T> {
  private readonly chunks: AsyncIterator<unknown>
  private readonly queue: T[] = []
  private finished = false
  private closed = false
  private failure: unknown
  private pending: Promise<boolean> | undefined

  constructor(
    body: Readable,
    protected readonly context: StreamContext
  ) {
    this.chunks = body[Symbol.asyncIterator]()
  }

  /**
   * Decode one chunk into complete records.
   */
  protected abstract decode(chunk: Buffer): T[]

  /**
   * Called once at end of body; throws if bytes were left over.
   */
  protected abstract finish(): T[]

  /**
   * Resolve true when another record is available, false once the body has
   * ended with nothing left. Concurrent calls share one read.
   */
  hasNext(): Promise<boolean> {
    if (this.queue.length > 0) {
      return Promise.resolve(true)
    }
    this.pending ??= this.fill().finally(() => {
      this.pending = undefined
    })
    return this.pending
  }

  /**
   * Next record.
   *
   * @throws DockerError when the stream is exhausted
   */
  async next(): Promise<T> {
    if (!(await this.hasNext())) {
      throw new DockerError(`No more records: ${this.context.method} ${this.context.uri}`)
    }
    return this.take()
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      while (await this.hasNext()) {
        yield this.take()
      }
    } finally {
      this.close()
    }
  }

  /**
   * Stop reading and return the lease. Idempotent.
   */
  close(): void {
    this.closed = true
    this.finished = true
    this.queue.length = 0
    this.context.release()
  }

  protected take(): T {
    const record = this.queue.shift()
    if (record === undefined) {
      throw new DockerError(`No buffered record: ${this.context.method} ${this.context.uri}`)
    }
    return record
  }

  private async fill(): Promise<boolean> {
    if (this.failure !== undefined) {
      throw this.failure
    }

    while (this.queue.length === 0) {
      if (this.finished) {
        return false
      }

      try {
        const { value, done } = await this.chunks.next()
        if (done === true) {
          this.finished = true
          this.queue.push(...this.finish())
          this.context.release()
        } else if (!this.finished) {
          this.queue.push(...this.decode(toBuffer(value)))
        }
      } catch (error) {
        // Closed while a read was in flight: the destroyed body is expected
        if (this.closed) {
          return false
        }
        this.close()
        this.failure = classifyFailure(this.context.method, this.context.uri, error)
        throw this.failure
      }
    }
    return true
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk
  if (typeof chunk === 'string') return Buffer.from(chunk)
  if (chunk instanceof Uint8Array) return Buffer.from(chunk)
  throw new TypeError(`Unexpected body chunk of type ${typeof chunk}`)
}
