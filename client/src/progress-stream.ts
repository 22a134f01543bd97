/**
 * Progress event stream (pull, push, build).
 *
 * The engine writes one JSON object per event with arbitrary whitespace (or
 * none) between them and chunk boundaries anywhere, so events are cut out
 * with a JsonRecordScanner rather than by splitting lines.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { classifyFailure, JsonRecordScanner, type ProgressMessage, toProgressMessage } from '@dockwire/protocol'
import { BodyReader, type StreamContext } from './body-reader.js'

/**
 * Receives each event of a progress stream. Throwing stops the stream.
 */
export interface ProgressHandler {
  progress(message: ProgressMessage): void | Promise<void>
}

export class ProgressStream extends BodyReader<ProgressMessage> {
  private readonly scanner = new JsonRecordScanner()

  constructor(body: Readable, context: StreamContext) {
    super(body, context)
  }

  protected decode(chunk: Buffer): ProgressMessage[] {
    return this.scanner.push(chunk).map(toProgressMessage)
  }

  protected finish(): ProgressMessage[] {
    return this.scanner.end().map(toProgressMessage)
  }

  /**
   * Feed every remaining event to `handler`, then close.
   *
   * @throws whatever the handler throws, classified
   */
  async tail(handler: ProgressHandler): Promise<void> {
    try {
      for await (const message of this) {
        await handler.progress(message)
      }
    } catch (error) {
      throw classifyFailure(this.context.method, this.context.uri, error)
    } finally {
      this.close()
    }
  }
}
