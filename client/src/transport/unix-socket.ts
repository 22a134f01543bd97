/**
 * Unix domain socket transport.
 *
 * An http.Agent whose connection step dials a filesystem socket instead of
 * resolving the request's host. Requests still carry the sentinel
 * `localhost:80` authority; the agent ignores it.
 *
 * @module
 */
import { Agent, type AgentOptions, type ClientRequestArgs } from 'node:http'
import { createConnection, type Socket } from 'node:net'
import type { Duplex } from 'node:stream'
import { armConnectTimeout } from './connect-timeout.js'
import type { EngineAgent } from './types.js'

export class UnixSocketAgent extends Agent implements EngineAgent {
  readonly scheme = 'unix'

  /**
   * @param socketPath - Filesystem path of the engine socket
   * @param connectTimeoutMs - Connect timeout; 0 waits forever
   * @param options - Pool options (maxSockets etc.)
   */
  constructor(
    readonly socketPath: string,
    private readonly connectTimeoutMs: number,
    options: AgentOptions = {}
  ) {
    super({ keepAlive: true, ...options })
  }

  /**
   * Never secure, whatever scheme the request nominally used.
   */
  isSecure(): boolean {
    return false
  }

  /**
   * Called by the agent for every new pooled connection.
   */
  createConnection(
    _options: ClientRequestArgs,
    _callback?: (err: Error | null, stream: Duplex) => void
  ): Socket {
    const socket = createConnection({ path: this.socketPath })
    armConnectTimeout(socket, this.connectTimeoutMs)
    return socket
  }
}
