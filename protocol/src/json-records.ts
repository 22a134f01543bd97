/**
 * Incremental scanner for concatenated JSON values.
 *
 * Progress responses are a sequence of JSON objects with no delimiter
 * beyond the value boundaries themselves (engines usually add a newline,
 * but nothing requires it). A record may arrive split across any number of
 * chunks, including in the middle of a multi-byte UTF-8 sequence.
 *
 * @module
 */

/**
 * Error thrown when the body is not a sequence of JSON values.
 */
export class JsonRecordError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'JsonRecordError'
  }
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t'
}

/**
 * Scans a byte stream for complete top-level JSON objects or arrays.
 */
export class JsonRecordScanner {
  private readonly decoder = new TextDecoder('utf-8')
  private text = ''
  /** Index in `text` where scanning resumes */
  private cursor = 0
  /** Start of the value being assembled, -1 between values */
  private start = -1
  private depth = 0
  private inString = false
  private escaped = false
  private ended = false

  /**
   * True while part of a value is held back.
   */
  get pending(): boolean {
    return this.start !== -1
  }

  /**
   * Append a chunk and return every value it completes, in order.
   *
   * @throws JsonRecordError on bytes that cannot start a value or a value that fails to parse
   */
  push(chunk: Uint8Array | string): unknown[] {
    if (this.ended) {
      throw new JsonRecordError('JsonRecordScanner already ended')
    }
    this.text += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true })
    return this.scan()
  }

  /**
   * Signal end of input.
   *
   * @returns Values completed by the decoder flush (normally none)
   * @throws JsonRecordError if a value is incomplete
   */
  end(): unknown[] {
    this.text += this.decoder.decode()
    const values = this.scan()
    this.ended = true

    if (this.start !== -1) {
      throw new JsonRecordError(
        `Truncated JSON record: ${this.text.length - this.start} characters without a closing bracket`
      )
    }
    return values
  }

  private scan(): unknown[] {
    const values: unknown[] = []
    const text = this.text

    for (let i = this.cursor; i < text.length; i++) {
      const ch = text[i]

      if (this.start === -1) {
        if (isWhitespace(ch)) continue
        if (ch !== '{' && ch !== '[') {
          throw new JsonRecordError(`Unexpected character ${JSON.stringify(ch)} between JSON records`)
        }
        this.start = i
        this.depth = 1
        continue
      }

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false
        } else if (ch === '\\') {
          this.escaped = true
        } else if (ch === '"') {
          this.inString = false
        }
        continue
      }

      if (ch === '"') {
        this.inString = true
      } else if (ch === '{' || ch === '[') {
        this.depth++
      } else if (ch === '}' || ch === ']') {
        this.depth--
        if (this.depth === 0) {
          values.push(parseRecord(text.slice(this.start, i + 1)))
          this.start = -1
        }
      }
    }

    // Drop consumed text, keep the partial value
    const keepFrom = this.start === -1 ? text.length : this.start
    this.text = text.slice(keepFrom)
    if (this.start !== -1) {
      this.start = 0
    }
    this.cursor = this.text.length

    return values
  }
}

function parseRecord(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch (err) {
    throw new JsonRecordError(`Malformed JSON record: ${raw.length > 80 ? `${raw.slice(0, 80)}...` : raw}`, {
      cause: err
    })
  }
}
