/**
 * Multiplexed stream framing (logs and attach without a TTY).
 *
 * Frame structure:
 * - 1 byte stream tag (0 stdin, 1 stdout, 2 stderr)
 * - 3 reserved bytes
 * - 4-byte payload length (unsigned, big-endian)
 * - payload bytes
 *
 * Frames repeat until the connection closes. Zero leftover bytes at close
 * is the normal end; a short header or payload is a protocol error.
 *
 * @module
 * @remarks Node.js only. Uses Buffer for transport efficiency.
 */

import { type LogMessage, STREAM_TAGS, type StreamType, streamTypeOf } from './types/log.js'

/**
 * Header size in bytes.
 */
export const HEADER_SIZE = 8

/**
 * Offset of the payload length within the header.
 */
export const LENGTH_OFFSET = 4

/**
 * Error thrown when the stream closes in the middle of a frame.
 */
export class TruncatedFrameError extends Error {
  constructor(
    public readonly part: 'header' | 'payload',
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`Truncated frame ${part}: expected ${expected} bytes, got ${received}`)
    this.name = 'TruncatedFrameError'
  }
}

/**
 * Encode one frame.
 *
 * @param stream - Target stream; `unknown` is rejected, pass a raw tag instead
 * @param payload - Payload bytes or UTF-8 text
 */
export function encodeFrame(stream: Exclude<StreamType, 'unknown'> | number, payload: Uint8Array | string): Buffer {
  const tag = typeof stream === 'number' ? stream : STREAM_TAGS[stream]
  if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
    throw new RangeError(`Stream tag must be a byte, got ${tag}`)
  }

  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload
  const frame = Buffer.alloc(HEADER_SIZE + body.length)
  frame.writeUInt8(tag, 0)
  frame.writeUInt32BE(body.length, LENGTH_OFFSET)
  frame.set(body, HEADER_SIZE)

  return frame
}

/**
 * Incremental frame decoder.
 *
 * Feed chunks as they arrive with push(); complete frames come back in
 * arrival order. Call end() once the source closes. Chunks are queued
 * as-is and each header or payload is copied out once, when all of its
 * bytes have arrived.
 */
export class FrameDecoder {
  private chunks: Buffer[] = []
  private size = 0
  /** Header of the frame whose payload is still arriving */
  private header: Buffer | undefined
  private ended = false

  /**
   * Bytes held back waiting for the rest of a frame.
   */
  get buffered(): number {
    return this.size + (this.header?.length ?? 0)
  }

  /**
   * Append a chunk and return every frame it completes.
   */
  push(chunk: Uint8Array): LogMessage[] {
    if (this.ended) {
      throw new Error('FrameDecoder already ended')
    }
    if (chunk.length > 0) {
      this.chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength))
      this.size += chunk.length
    }

    const frames: LogMessage[] = []
    for (;;) {
      if (this.header === undefined) {
        if (this.size < HEADER_SIZE) break
        this.header = this.take(HEADER_SIZE)
      }

      const payloadLen = this.header.readUInt32BE(LENGTH_OFFSET)
      if (this.size < payloadLen) break

      const tag = this.header.readUInt8(0)
      frames.push({ stream: streamTypeOf(tag), tag, payload: this.take(payloadLen) })
      this.header = undefined
    }

    return frames
  }

  /**
   * Signal end of input.
   *
   * @throws TruncatedFrameError if a partial header or payload is pending
   */
  end(): void {
    this.ended = true

    if (this.header !== undefined) {
      throw new TruncatedFrameError('payload', this.header.readUInt32BE(LENGTH_OFFSET), this.size)
    }
    if (this.size > 0) {
      throw new TruncatedFrameError('header', HEADER_SIZE, this.size)
    }
  }

  /**
   * Copy the next `length` queued bytes into a fresh buffer.
   */
  private take(length: number): Buffer {
    const out = Buffer.allocUnsafe(length)
    let offset = 0

    while (offset < length) {
      const head = this.chunks[0]
      if (head === undefined) break
      const count = Math.min(head.length, length - offset)
      head.copy(out, offset, 0, count)
      offset += count
      if (count === head.length) {
        this.chunks.shift()
      } else {
        this.chunks[0] = head.subarray(count)
      }
    }

    this.size -= length
    return out
  }
}
