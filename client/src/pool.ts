/**
 * Connection pool.
 *
 * A pool couples a permit counter with the scheme's transport agents.
 * Every request holds one lease for its whole lifetime, body included, so
 * `leased` never exceeds `size`; the agents are sized the same and never
 * need to queue sockets themselves.
 *
 * Waiters are served FIFO. Queue wait is bounded by `queueTimeoutMs`
 * (0 = wait forever) and can be cut short by an AbortSignal.
 *
 * @module
 */
import { ConnectTimeoutError } from '@dockwire/protocol'
import { AbortError } from './abort.js'
import type { Endpoint, EndpointScheme } from './endpoint.js'
import {
  createTransportRegistry,
  destroyTransports,
  type DockerCertificates,
  type EngineAgent,
  type TransportRegistry
} from './transport/index.js'

/**
 * Raised when no lease became free within the queue timeout.
 */
export class PoolTimeoutError extends ConnectTimeoutError {
  constructor(
    public readonly pool: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for a connection from the ${pool} pool`)
    this.name = 'PoolTimeoutError'
  }
}

/**
 * Raised for acquisitions on, or waiting on, a pool that was shut down.
 */
export class PoolClosedError extends Error {
  constructor(public readonly pool: string) {
    super(`Connection pool "${pool}" is shut down`)
    this.name = 'PoolClosedError'
  }
}

/**
 * One permit. `release()` may be called any number of times; only the
 * first call returns the permit.
 */
export interface Lease {
  readonly released: boolean
  release(): void
}

export interface PoolStats {
  leased: number
  pending: number
  max: number
}

export interface ConnectionPoolOptions {
  /** Maximum concurrent leases and sockets per agent */
  readonly size: number
  /** TCP/TLS/Unix connect timeout; 0 disables */
  readonly connectTimeoutMs: number
  /** Wait for a free lease; 0 waits forever */
  readonly queueTimeoutMs: number
  /** Socket idle timeout applied to each request; 0 disables */
  readonly readTimeoutMs: number
  readonly certificates?: DockerCertificates
}

interface Waiter {
  grant(lease: Lease): void
  fail(error: Error): void
}

export class ConnectionPool {
  private leased = 0
  private closed = false
  private readonly waiters: Waiter[] = []
  private readonly transports: TransportRegistry

  constructor(
    readonly name: string,
    readonly endpoint: Endpoint,
    readonly options: ConnectionPoolOptions
  ) {
    this.transports = createTransportRegistry(endpoint, {
      connectTimeoutMs: options.connectTimeoutMs,
      maxSockets: options.size,
      ...(options.certificates !== undefined && { certificates: options.certificates })
    })
  }

  get isShutdown(): boolean {
    return this.closed
  }

  /**
   * Agent registered for `scheme`, the endpoint's scheme by default.
   */
  agent(scheme: EndpointScheme = this.endpoint.scheme): EngineAgent {
    const agent = this.transports.get(scheme)
    if (agent === undefined) {
      throw new Error(`No transport registered for scheme "${scheme}" in the ${this.name} pool`)
    }
    return agent
  }

  /**
   * Wait for a lease.
   *
   * @throws PoolTimeoutError when the queue wait exceeds `queueTimeoutMs`
   * @throws AbortError when `signal` fires first
   * @throws PoolClosedError after shutdown
   */
  acquire(signal?: AbortSignal): Promise<Lease> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError(this.name))
    }
    if (signal?.aborted) {
      return Promise.reject(new AbortError('Connection acquisition aborted', { cause: signal.reason }))
    }
    if (this.waiters.length === 0 && this.leased < this.options.size) {
      return Promise.resolve(this.grant())
    }

    return new Promise<Lease>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined

      const cleanup = (): void => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)
      }

      const waiter: Waiter = {
        grant: (lease) => {
          cleanup()
          resolve(lease)
        },
        fail: (error) => {
          cleanup()
          reject(error)
        }
      }

      const onAbort = (): void => {
        waiter.fail(new AbortError('Connection acquisition aborted', { cause: signal?.reason }))
      }

      const { queueTimeoutMs } = this.options
      if (queueTimeoutMs > 0) {
        timer = setTimeout(() => waiter.fail(new PoolTimeoutError(this.name, queueTimeoutMs)), queueTimeoutMs)
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  stats(): PoolStats {
    return { leased: this.leased, pending: this.waiters.length, max: this.options.size }
  }

  /**
   * Reject every waiter and destroy all sockets. Outstanding leases may
   * still be released afterwards. Idempotent.
   */
  shutdown(): void {
    if (this.closed) return
    this.closed = true

    for (const waiter of [...this.waiters]) {
      waiter.fail(new PoolClosedError(this.name))
    }
    destroyTransports(this.transports)
  }

  private grant(): Lease {
    this.leased++
    let released = false

    return {
      get released() {
        return released
      },
      release: () => {
        if (released) return
        released = true
        this.leased--
        this.drain()
      }
    }
  }

  private drain(): void {
    while (!this.closed && this.leased < this.options.size) {
      const waiter = this.waiters.shift()
      if (waiter === undefined) return
      waiter.grant(this.grant())
    }
  }
}
