/**
 * Request executor.
 *
 * Runs one HTTP exchange against the engine through a pool lease and turns
 * every failure into the error taxonomy. The returned EngineResponse owns
 * the lease until its body is consumed, released or destroyed.
 *
 * @module
 */
import {
  type ClientRequest,
  type IncomingHttpHeaders,
  type IncomingMessage,
  request as httpRequest,
  type RequestOptions
} from 'node:http'
import { request as httpsRequest } from 'node:https'
import type { Readable } from 'node:stream'
import { ReadTimeoutError, ResponseFailure, rethrowClassified } from '@dockwire/protocol'
import { AbortError, throwIfAborted } from './abort.js'
import { requestUri } from './endpoint.js'
import type { Logger } from './logger.js'
import type { Lease } from './pool.js'
import type { PoolClass, PoolManager } from './pool-manager.js'

export type HttpMethod = 'GET' | 'POST' | 'DELETE'

export type QueryValue = string | number | boolean | undefined

/**
 * Request body. `json` is serialized; `stream` and `bytes` are sent as-is.
 */
export type RequestBody =
  | { readonly json: unknown }
  | { readonly bytes: Uint8Array | string; readonly contentType: string }
  | { readonly stream: Readable; readonly contentType: string }

export interface RequestSpec {
  readonly method: HttpMethod
  /** Path below the API version prefix, e.g. `/containers/json` */
  readonly path: string
  readonly query?: Readonly<Record<string, QueryValue>>
  readonly pool: PoolClass
  readonly body?: RequestBody
  readonly headers?: Readonly<Record<string, string>>
  readonly accept?: string
  readonly signal?: AbortSignal
}

/**
 * Identity of an exchange, carried into stream wrappers for error messages.
 */
export interface ExchangeContext {
  readonly method: HttpMethod
  readonly uri: string
}

export interface RequestExecutorOptions {
  readonly pools: PoolManager
  readonly apiVersion: string
  readonly logger: Logger
}

/**
 * Build query parameters, skipping undefined values. Booleans become
 * `1` / `0`, as the engine expects.
 */
export function toSearchParams(query: Readonly<Record<string, QueryValue>> | undefined): URLSearchParams {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined) continue
    params.append(key, typeof value === 'boolean' ? (value ? '1' : '0') : String(value))
  }
  return params
}

async function readAll(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []
  // Async iteration also reports a body that failed before anyone listened
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks)
}

/**
 * A successful response. Holds the pool lease; every consuming helper
 * releases it whatever happens.
 */
export class EngineResponse {
  constructor(
    readonly context: ExchangeContext,
    readonly status: number,
    readonly headers: IncomingHttpHeaders,
    /** Live body; callers reading it directly must call release() */
    readonly body: Readable,
    private readonly lease: Lease
  ) {}

  get released(): boolean {
    return this.lease.released
  }

  /**
   * Return the lease. An unfinished body is destroyed so its socket is not
   * reused. Idempotent.
   */
  release(): void {
    if (!this.body.readableEnded && !this.body.destroyed) {
      this.body.destroy()
    }
    this.lease.release()
  }

  async buffer(): Promise<Buffer> {
    try {
      return await readAll(this.body)
    } catch (error) {
      rethrowClassified(this.context.method, this.context.uri, error)
    } finally {
      this.release()
    }
  }

  async text(): Promise<string> {
    return (await this.buffer()).toString('utf8')
  }

  /**
   * Parse the body as JSON. An empty body yields null.
   */
  async json(): Promise<unknown> {
    const text = await this.text()
    if (text.trim() === '') {
      return null
    }
    try {
      return JSON.parse(text)
    } catch (error) {
      rethrowClassified(this.context.method, this.context.uri, error)
    }
  }

  /**
   * Read and drop the body.
   */
  async discard(): Promise<void> {
    await this.buffer()
  }
}

export class RequestExecutor {
  constructor(private readonly options: RequestExecutorOptions) {}

  /**
   * Logical URI of a request, as reported in errors.
   */
  uriOf(path: string, query?: Readonly<Record<string, QueryValue>>): string {
    const { endpoint } = this.options.pools.options
    return requestUri(endpoint, `/${this.options.apiVersion}${path}`, toSearchParams(query))
  }

  /**
   * Run a request and wait for its response head.
   *
   * @throws DockerRequestError on a non-2xx status
   * @throws DockerTimeoutError on connect, queue or read timeout
   * @throws InterruptedError when `spec.signal` fires
   * @throws DockerError on anything else
   */
  async execute(spec: RequestSpec): Promise<EngineResponse> {
    const context: ExchangeContext = { method: spec.method, uri: this.uriOf(spec.path, spec.query) }
    try {
      return await this.send(spec, context)
    } catch (error) {
      this.options.logger.debug('request failed', { method: context.method, uri: context.uri, error })
      rethrowClassified(context.method, context.uri, error)
    }
  }

  private async send(spec: RequestSpec, context: ExchangeContext): Promise<EngineResponse> {
    const lease = await this.options.pools.acquire(spec.pool, spec.signal)

    try {
      // The pool stops watching the signal once it grants the lease
      throwIfAborted(spec.signal, 'Request')
      const response = await this.dispatch(spec)
      const status = response.statusCode ?? 0

      if (status < 200 || status >= 300) {
        const body = await readAll(response).then(
          (bytes) => bytes.toString('utf8'),
          () => null
        )
        throw new ResponseFailure(status, body)
      }

      this.options.logger.debug('response', { method: context.method, uri: context.uri, status })
      return new EngineResponse(context, status, response.headers, response, lease)
    } catch (error) {
      lease.release()
      throw error
    }
  }

  private dispatch(spec: RequestSpec): Promise<IncomingMessage> {
    const pool = this.options.pools.pool(spec.pool)
    const { endpoint, options: poolOptions } = pool
    const search = toSearchParams(spec.query).toString()
    const path = `/${this.options.apiVersion}${spec.path}${search ? `?${search}` : ''}`
    const { signal } = spec
    const { logger } = this.options

    return new Promise<IncomingMessage>((resolve, reject) => {
      let response: IncomingMessage | undefined
      throwIfAborted(signal, 'Request')

      const requestOptions: RequestOptions = {
        agent: pool.agent(),
        host: endpoint.host,
        port: endpoint.port,
        method: spec.method,
        path,
        headers: {
          ...(spec.accept !== undefined && { accept: spec.accept }),
          ...contentTypeOf(spec.body),
          ...spec.headers
        },
        ...(poolOptions.readTimeoutMs > 0 && { timeout: poolOptions.readTimeoutMs })
      }
      const request: ClientRequest =
        endpoint.scheme === 'https' ? httpsRequest(requestOptions) : httpRequest(requestOptions)

      const fail = (error: Error): void => {
        if (response !== undefined) {
          response.destroy(error)
        }
        request.destroy(error)
      }

      const onAbort = (): void => fail(new AbortError('Request aborted', { cause: signal?.reason }))
      signal?.addEventListener('abort', onAbort, { once: true })
      const detach = (): void => signal?.removeEventListener('abort', onAbort)

      request.on('timeout', () => fail(new ReadTimeoutError(poolOptions.readTimeoutMs)))
      request.on('error', (error) => {
        detach()
        reject(error)
      })
      request.once('response', (res) => {
        response = res
        // Consumers attach their own listeners; this one keeps an error
        // raised before they do from going unhandled
        res.on('error', (error) => logger.debug('response body failed', { path, error }))
        res.once('close', detach)
        resolve(res)
      })

      writeBody(request, spec.body)
    })
  }
}

function contentTypeOf(body: RequestBody | undefined): Record<string, string> {
  if (body === undefined) return {}
  if ('json' in body) return { 'content-type': 'application/json' }
  return { 'content-type': body.contentType }
}

function writeBody(request: ClientRequest, body: RequestBody | undefined): void {
  if (body === undefined) {
    request.end()
    return
  }
  if ('json' in body) {
    request.end(JSON.stringify(body.json))
    return
  }
  if ('bytes' in body) {
    request.end(body.bytes)
    return
  }
  body.stream.once('error', (error) => request.destroy(error))
  body.stream.pipe(request)
}
