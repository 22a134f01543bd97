import type { Endpoint, EndpointScheme } from '../endpoint.js'
import { TcpAgent, TlsAgent } from './tcp.js'
import type { DockerCertificates, EngineAgent } from './types.js'
import { UnixSocketAgent } from './unix-socket.js'

export { armConnectTimeout } from './connect-timeout.js'
export { TcpAgent, TlsAgent } from './tcp.js'
export type { DockerCertificates, EngineAgent } from './types.js'
export { UnixSocketAgent } from './unix-socket.js'

export interface TransportOptions {
  readonly connectTimeoutMs: number
  /** Per-agent connection ceiling; 0 means unlimited */
  readonly maxSockets: number
  readonly certificates?: DockerCertificates
}

/**
 * Agents keyed by scheme. The registry is built per pool and keyed only by
 * scheme; destinations are taken from each request.
 */
export type TransportRegistry = ReadonlyMap<EndpointScheme, EngineAgent>

/**
 * Build the agents for one pool: http and https always, unix when the
 * endpoint names a socket.
 */
export function createTransportRegistry(endpoint: Endpoint, options: TransportOptions): TransportRegistry {
  const agentOptions = options.maxSockets > 0 ? { maxSockets: options.maxSockets } : {}
  const registry = new Map<EndpointScheme, EngineAgent>([
    ['http', new TcpAgent(options.connectTimeoutMs, agentOptions)],
    ['https', new TlsAgent(options.connectTimeoutMs, options.certificates, agentOptions)]
  ])

  if (endpoint.socketPath !== undefined) {
    registry.set('unix', new UnixSocketAgent(endpoint.socketPath, options.connectTimeoutMs, agentOptions))
  }
  return registry
}

/**
 * Destroy every agent's sockets.
 */
export function destroyTransports(registry: TransportRegistry): void {
  for (const agent of registry.values()) {
    agent.destroy()
  }
}
