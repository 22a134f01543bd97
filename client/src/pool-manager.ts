/**
 * The client's two connection pools.
 *
 * `bounded` serves ordinary calls with connect, queue and read timeouts.
 * `unbounded` serves calls that may legitimately take as long as the
 * engine needs (stop, wait): connect and queue timeouts are off, the read
 * timeout stays.
 *
 * Each pool is sized to `poolSize` on its own, so a client may hold up to
 * `2 * poolSize` connections at once.
 *
 * @module
 */
import type { Endpoint } from './endpoint.js'
import { ConnectionPool, type Lease } from './pool.js'
import type { DockerCertificates } from './transport/index.js'

export type PoolClass = 'bounded' | 'unbounded'

export const POOL_CLASSES: readonly PoolClass[] = ['bounded', 'unbounded']

export interface PoolManagerOptions {
  readonly endpoint: Endpoint
  /** Per-pool ceiling; the client-wide ceiling is twice this */
  readonly poolSize: number
  readonly connectTimeoutMs: number
  readonly readTimeoutMs: number
  readonly certificates?: DockerCertificates
}

export class PoolManager {
  private readonly pools: Readonly<Record<PoolClass, ConnectionPool>>
  private closed = false

  constructor(readonly options: PoolManagerOptions) {
    const { endpoint, poolSize, connectTimeoutMs, readTimeoutMs, certificates } = options
    const shared = {
      size: poolSize,
      readTimeoutMs,
      ...(certificates !== undefined && { certificates })
    }

    this.pools = {
      bounded: new ConnectionPool('bounded', endpoint, {
        ...shared,
        connectTimeoutMs,
        queueTimeoutMs: connectTimeoutMs
      }),
      unbounded: new ConnectionPool('unbounded', endpoint, {
        ...shared,
        connectTimeoutMs: 0,
        queueTimeoutMs: 0
      })
    }
  }

  /**
   * Connections the client may hold across both pools.
   */
  get maxConnections(): number {
    return POOL_CLASSES.reduce((total, poolClass) => total + this.pools[poolClass].options.size, 0)
  }

  get isShutdown(): boolean {
    return this.closed
  }

  pool(poolClass: PoolClass): ConnectionPool {
    return this.pools[poolClass]
  }

  acquire(poolClass: PoolClass, signal?: AbortSignal): Promise<Lease> {
    return this.pools[poolClass].acquire(signal)
  }

  /**
   * Shut both pools down. Idempotent.
   */
  shutdown(): void {
    if (this.closed) return
    this.closed = true
    for (const poolClass of POOL_CLASSES) {
      this.pools[poolClass].shutdown()
    }
  }
}
