/**
 * End-of-stream handling for both decoders.
 *
 * Zero pending bytes at close is the normal end. Anything else is a
 * protocol error, never a silent truncation.
 */
import { describe, expect, it } from 'vitest'
import { encodeFrame, FrameDecoder, HEADER_SIZE, TruncatedFrameError } from '../../src/frame.js'
import { JsonRecordError, JsonRecordScanner } from '../../src/json-records.js'

describe('FrameDecoder end of stream', () => {
  it('accepts an empty stream', () => {
    expect(() => new FrameDecoder().end()).not.toThrow()
  })

  it('rejects a header claiming 10 bytes with only 4 delivered', () => {
    const decoder = new FrameDecoder()
    const header = Buffer.from([1, 0, 0, 0, 0, 0, 0, 10])

    expect(decoder.push(Buffer.concat([header, Buffer.from('abcd')]))).toEqual([])

    let caught: unknown
    try {
      decoder.end()
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(TruncatedFrameError)
    expect(caught).toMatchObject({ part: 'payload', expected: 10, received: 4 })
  })

  it('rejects a partial header', () => {
    const decoder = new FrameDecoder()
    decoder.push(Buffer.from([2, 0, 0]))

    expect(() => decoder.end()).toThrow('Truncated frame header: expected 8 bytes, got 3')
  })

  it('rejects a partial header after complete frames', () => {
    const decoder = new FrameDecoder()
    const frames = decoder.push(Buffer.concat([encodeFrame('stdout', 'ok'), Buffer.from([1, 0])]))

    expect(frames).toHaveLength(1)
    expect(() => decoder.end()).toThrow(TruncatedFrameError)
  })

  it('rejects a header with no payload at all', () => {
    const decoder = new FrameDecoder()
    decoder.push(encodeFrame('stdout', 'xyz').subarray(0, HEADER_SIZE))

    expect(() => decoder.end()).toThrow('Truncated frame payload: expected 3 bytes, got 0')
  })
})

describe('JsonRecordScanner end of stream', () => {
  it('rejects a record cut off mid-object', () => {
    const scanner = new JsonRecordScanner()
    scanner.push('{"status":"a"}\n{"status":"Down')

    expect(() => scanner.end()).toThrow(JsonRecordError)
  })

  it('rejects stray text between records', () => {
    const scanner = new JsonRecordScanner()
    expect(() => scanner.push('{"a":1}\nnot json')).toThrow('Unexpected character "n" between JSON records')
  })

  it('reports malformed records with the parse error as cause', () => {
    const scanner = new JsonRecordScanner()

    let caught: unknown
    try {
      scanner.push('{"a":}')
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(JsonRecordError)
    expect(caught).toHaveProperty('cause', expect.any(SyntaxError))
  })

  it('rejects pushes after end', () => {
    const scanner = new JsonRecordScanner()
    scanner.end()
    expect(() => scanner.push('{}')).toThrow('JsonRecordScanner already ended')
  })
})
