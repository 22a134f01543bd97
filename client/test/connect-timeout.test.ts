import { EventEmitter } from 'node:events'
import { ConnectTimeoutError, DockerTimeoutError } from '@dockwire/protocol'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { parseEndpoint } from '../src/endpoint.js'
import { createLogger } from '../src/logger.js'
import { PoolManager } from '../src/pool-manager.js'
import { RequestExecutor } from '../src/request.js'
import { armConnectTimeout, type ConnectingSocket } from '../src/transport/connect-timeout.js'

// Every dial made from this file stays in the connecting state forever
vi.mock('node:net', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:net')>()
  return {
    ...actual,
    createConnection: () => {
      const socket = new actual.Socket()
      Object.defineProperty(socket, 'connecting', { value: true, writable: true })
      return socket
    }
  }
})

class StalledSocket extends EventEmitter implements ConnectingSocket {
  connecting = true
  destroyedWith: Error | undefined

  destroy(error?: Error): this {
    this.destroyedWith = error
    this.connecting = false
    this.emit('close')
    return this
  }
}

describe('armConnectTimeout', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('destroys a socket that is still connecting with ConnectTimeoutError', () => {
    vi.useFakeTimers()
    const socket = new StalledSocket()

    armConnectTimeout(socket, 50)
    vi.advanceTimersByTime(49)
    expect(socket.destroyedWith).toBeUndefined()

    vi.advanceTimersByTime(1)
    expect(socket.destroyedWith).toBeInstanceOf(ConnectTimeoutError)
    expect(socket.destroyedWith?.message).toBe('Connect timed out after 50ms')
  })

  it('clears the timer once the socket connects', () => {
    vi.useFakeTimers()
    const socket = new StalledSocket()

    armConnectTimeout(socket, 50)
    socket.connecting = false
    socket.emit('connect')
    vi.advanceTimersByTime(100)

    expect(socket.destroyedWith).toBeUndefined()
    expect(vi.getTimerCount()).toBe(0)
  })

  it('does nothing with a timeout of 0 or an already connected socket', () => {
    vi.useFakeTimers()
    const connected = new StalledSocket()
    connected.connecting = false

    armConnectTimeout(new StalledSocket(), 0)
    armConnectTimeout(connected, 50)

    expect(vi.getTimerCount()).toBe(0)
  })
})

describe('connect timeout through the executor', () => {
  let pools: PoolManager | undefined

  afterEach(() => {
    pools?.shutdown()
    pools = undefined
  })

  it('surfaces a stalled Unix connect as DockerTimeoutError', async () => {
    const manager = new PoolManager({
      endpoint: parseEndpoint('unix:///tmp/dockwire-stalled.sock'),
      poolSize: 1,
      connectTimeoutMs: 30,
      readTimeoutMs: 0
    })
    pools = manager
    const executor = new RequestExecutor({ pools: manager, apiVersion: 'v1.12', logger: createLogger('silent') })

    const failure = await executor
      .execute({ method: 'GET', path: '/_ping', pool: 'bounded' })
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(DockerTimeoutError)
    expect(failure).toHaveProperty('message', 'Timeout: GET unix://localhost:80/v1.12/_ping')
    expect(failure).toHaveProperty('cause', expect.any(ConnectTimeoutError))
    expect(manager.pool('bounded').stats().leased).toBe(0)
  })
})
