import { Readable } from 'node:stream'
import {
  DockerError,
  DockerRequestError,
  DockerTimeoutError,
  InterruptedError,
  ReadTimeoutError
} from '@dockwire/protocol'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { parseEndpoint } from '../src/endpoint.js'
import { createLogger } from '../src/logger.js'
import { PoolTimeoutError } from '../src/pool.js'
import { PoolManager, type PoolManagerOptions } from '../src/pool-manager.js'
import { RequestExecutor, toSearchParams } from '../src/request.js'
import { FakeDaemon, waitFor } from './_harness/fake-daemon.js'

let daemon: FakeDaemon
let pools: PoolManager | undefined

beforeEach(async () => {
  daemon = await FakeDaemon.start('unix')
})

afterEach(async () => {
  pools?.shutdown()
  pools = undefined
  await daemon.close()
})

function executorFor(uri: string, overrides: Partial<Omit<PoolManagerOptions, 'endpoint'>> = {}): RequestExecutor {
  pools = new PoolManager({
    endpoint: parseEndpoint(uri),
    poolSize: 2,
    connectTimeoutMs: 1000,
    readTimeoutMs: 1000,
    ...overrides
  })
  return new RequestExecutor({ pools, apiVersion: 'v1.12', logger: createLogger('silent') })
}

function leased(): number {
  if (pools === undefined) throw new Error('no pools')
  return pools.pool('bounded').stats().leased + pools.pool('unbounded').stats().leased
}

describe('toSearchParams', () => {
  it('skips undefined values and encodes booleans as 1/0', () => {
    const params = toSearchParams({ all: true, size: false, limit: 3, since: undefined, name: 'a b' })

    expect(params.toString()).toBe('all=1&size=0&limit=3&name=a+b')
  })
})

describe('RequestExecutor', () => {
  it('answers JSON over a Unix socket and returns the lease', async () => {
    daemon.json('GET', '/version', { Version: '1.0.0', ApiVersion: '1.12' })
    const executor = executorFor(daemon.uri)

    const response = await executor.execute({ method: 'GET', path: '/version', pool: 'bounded' })
    expect(leased()).toBe(1)

    await expect(response.json()).resolves.toEqual({ Version: '1.0.0', ApiVersion: '1.12' })
    expect(leased()).toBe(0)
    expect(daemon.requests[0]?.path).toBe('/version')
  })

  it('talks plain HTTP over TCP', async () => {
    const tcp = await FakeDaemon.start('tcp')
    try {
      tcp.status('GET', '/_ping', 200, 'OK')
      const executor = executorFor(tcp.uri)

      const response = await executor.execute({ method: 'GET', path: '/_ping', pool: 'bounded' })

      await expect(response.text()).resolves.toBe('OK')
    } finally {
      pools?.shutdown()
      await tcp.close()
    }
  })

  it('reports the logical URI with the sentinel authority and query', () => {
    const executor = executorFor(daemon.uri)

    expect(executor.uriOf('/containers/json', { all: true, limit: 3 })).toBe(
      'unix://localhost:80/v1.12/containers/json?all=1&limit=3'
    )
  })

  it('sends query, headers and a JSON body', async () => {
    daemon.json('POST', '/containers/create', { Id: 'abc' }, 201)
    const executor = executorFor(daemon.uri)

    const response = await executor.execute({
      method: 'POST',
      path: '/containers/create',
      pool: 'bounded',
      query: { name: 'web' },
      headers: { 'X-Test': 'yes' },
      body: { json: { Image: 'busybox' } }
    })
    await response.discard()

    const [request] = daemon.requests
    expect(request?.query.get('name')).toBe('web')
    expect(request?.headers['x-test']).toBe('yes')
    expect(request?.headers['content-type']).toBe('application/json')
    expect(JSON.parse(request?.body.toString('utf8') ?? '')).toEqual({ Image: 'busybox' })
  })

  it('streams a request body', async () => {
    daemon.status('POST', '/build', 200)
    const executor = executorFor(daemon.uri)

    const response = await executor.execute({
      method: 'POST',
      path: '/build',
      pool: 'bounded',
      body: { stream: Readable.from([Buffer.from('tar-'), Buffer.from('bytes')]), contentType: 'application/tar' }
    })
    await response.discard()

    expect(daemon.requests[0]?.body.toString('utf8')).toBe('tar-bytes')
    expect(daemon.requests[0]?.headers['content-type']).toBe('application/tar')
  })

  it('turns a non-2xx status into DockerRequestError with the body', async () => {
    daemon.status('GET', '/containers/abc/json', 500, 'boom\n')
    const executor = executorFor(daemon.uri)

    const failure = await executor
      .execute({ method: 'GET', path: '/containers/abc/json', pool: 'bounded' })
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerRequestError)
    expect(failure).toMatchObject({
      method: 'GET',
      uri: 'unix://localhost:80/v1.12/containers/abc/json',
      status: 500,
      serverMessage: 'boom\n',
      message: 'Request error: GET unix://localhost:80/v1.12/containers/abc/json: 500, body: boom'
    })
    expect(leased()).toBe(0)
  })

  it('turns an idle socket into DockerTimeoutError', async () => {
    daemon.hang('GET', '/_ping')
    const executor = executorFor(daemon.uri, { readTimeoutMs: 50 })

    const failure = await executor
      .execute({ method: 'GET', path: '/_ping', pool: 'bounded' })
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerTimeoutError)
    expect(failure).toHaveProperty('message', 'Timeout: GET unix://localhost:80/v1.12/_ping')
    expect(failure).toHaveProperty('cause', expect.any(ReadTimeoutError))
    expect(leased()).toBe(0)
  })

  it('keeps the read timeout on the unbounded pool', async () => {
    daemon.hang('POST', '/containers/abc/wait')
    const executor = executorFor(daemon.uri, { readTimeoutMs: 50 })

    await expect(
      executor.execute({ method: 'POST', path: '/containers/abc/wait', pool: 'unbounded' })
    ).rejects.toBeInstanceOf(DockerTimeoutError)
    expect(leased()).toBe(0)
  })

  it('turns an abort into InterruptedError', async () => {
    daemon.hang('GET', '/_ping')
    const executor = executorFor(daemon.uri)
    const controller = new AbortController()

    const pending = executor.execute({ method: 'GET', path: '/_ping', pool: 'bounded', signal: controller.signal })
    await waitFor(() => daemon.requests.length === 1)
    controller.abort()
    const failure = await pending.catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(InterruptedError)
    expect(failure).not.toBeInstanceOf(DockerError)
    expect(failure).toHaveProperty('message', 'Interrupted: GET unix://localhost:80/v1.12/_ping')
    expect(leased()).toBe(0)
  })

  it('honours an abort that lands right after a queued lease is granted', async () => {
    daemon.json('POST', '/containers/abc/wait', { StatusCode: 0 })
    const executor = executorFor(daemon.uri, { poolSize: 1, readTimeoutMs: 0 })
    if (pools === undefined) throw new Error('no pools')
    const held = await pools.acquire('bounded')
    const controller = new AbortController()

    const pending = executor.execute({
      method: 'POST',
      path: '/containers/abc/wait',
      pool: 'bounded',
      signal: controller.signal
    })
    await waitFor(() => pools?.pool('bounded').stats().pending === 1)
    held.release()
    controller.abort()
    const failure = await pending.catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(InterruptedError)
    expect(failure).toHaveProperty('message', 'Interrupted: POST unix://localhost:80/v1.12/containers/abc/wait')
    expect(daemon.requests).toHaveLength(0)
    expect(leased()).toBe(0)
  })

  it('times out waiting for a pooled connection', async () => {
    daemon.on('GET', '/containers/abc/logs', (_req, res) => {
      res.writeHead(200)
      res.write('partial')
    })
    const executor = executorFor(daemon.uri, { poolSize: 1, connectTimeoutMs: 50 })

    const held = await executor.execute({ method: 'GET', path: '/containers/abc/logs', pool: 'bounded' })
    const failure = await executor
      .execute({ method: 'GET', path: '/_ping', pool: 'bounded' })
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerTimeoutError)
    expect(failure).toHaveProperty('cause', expect.any(PoolTimeoutError))
    held.release()
    expect(leased()).toBe(0)
  })

  it('reports a missing socket as a plain DockerError', async () => {
    const executor = executorFor('unix:///nonexistent/dockwire/engine.sock')

    const failure = await executor
      .execute({ method: 'GET', path: '/_ping', pool: 'bounded' })
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerError)
    expect(failure).not.toBeInstanceOf(DockerTimeoutError)
    expect(failure).not.toBeInstanceOf(DockerRequestError)
    expect(leased()).toBe(0)
  })

  it('reports a body cut off mid-read as DockerError', async () => {
    daemon.on('GET', '/containers/abc/export', (_req, res) => {
      res.writeHead(200, { 'content-length': '100' })
      res.write('only part')
      setImmediate(() => res.socket?.destroy())
    })
    const executor = executorFor(daemon.uri)

    const response = await executor.execute({ method: 'GET', path: '/containers/abc/export', pool: 'bounded' })
    const failure = await response.buffer().catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerError)
    expect(failure).not.toBeInstanceOf(DockerTimeoutError)
    expect(leased()).toBe(0)
  })

  it('returns every lease whatever the mix of outcomes', async () => {
    daemon.json('GET', '/ok', {})
    daemon.status('GET', '/fail', 500, 'no')
    daemon.status('GET', '/missing', 404)
    daemon.hang('GET', '/slow')
    const executor = executorFor(daemon.uri, { poolSize: 2 })
    const controller = new AbortController()
    const paths = ['/ok', '/fail', '/missing', '/slow', '/ok', '/fail', '/slow', '/missing', '/ok', '/ok']

    const outcomes = Promise.allSettled(
      paths.map(async (path) => {
        const response = await executor.execute({ method: 'GET', path, pool: 'bounded', signal: controller.signal })
        return response.json()
      })
    )
    await waitFor(() => daemon.requests.some((request) => request.path === '/slow'))
    controller.abort()
    const settled = await outcomes

    expect(settled.filter((outcome) => outcome.status === 'fulfilled').length).toBeLessThanOrEqual(4)
    expect(leased()).toBe(0)
    expect(pools?.pool('bounded').stats().pending).toBe(0)
  })
})
