/**
 * Multiplexed log / attach stream.
 *
 * @module
 */
import type { Readable, Writable } from 'node:stream'
import { classifyFailure, DockerError, FrameDecoder, type LogMessage } from '@dockwire/protocol'
import { BodyReader, type StreamContext } from './body-reader.js'
import { writeWithBackpressure } from './sink.js'

export class LogStream extends BodyReader<LogMessage> {
  private readonly decoder = new FrameDecoder()

  constructor(body: Readable, context: StreamContext) {
    super(body, context)
  }

  protected decode(chunk: Buffer): LogMessage[] {
    return this.decoder.push(chunk)
  }

  protected finish(): LogMessage[] {
    this.decoder.end()
    return []
  }

  /**
   * Copy stdout and stderr payloads into the given sinks until the body
   * ends. Stdin echoes and unknown tags are dropped. Sinks are not ended.
   *
   * @throws DockerError if a sink fails
   */
  async attach(stdout: Writable, stderr: Writable): Promise<void> {
    try {
      for await (const message of this) {
        const sink = message.stream === 'stdout' ? stdout : message.stream === 'stderr' ? stderr : undefined
        if (sink === undefined) continue

        try {
          await writeWithBackpressure(sink, message.payload)
        } catch (error) {
          throw new DockerError(`Failed writing ${message.stream}: ${this.context.method} ${this.context.uri}`, {
            cause: error
          })
        }
      }
    } catch (error) {
      throw classifyFailure(this.context.method, this.context.uri, error)
    } finally {
      this.close()
    }
  }

  /**
   * Collect stdout and stderr payloads, in arrival order, as UTF-8 text.
   */
  async readFully(): Promise<string> {
    const payloads: Buffer[] = []
    try {
      for await (const message of this) {
        if (message.stream === 'stdout' || message.stream === 'stderr') {
          payloads.push(message.payload)
        }
      }
    } finally {
      this.close()
    }
    return Buffer.concat(payloads).toString('utf8')
  }
}
