import type { Agent } from 'node:http'
import type { EndpointScheme } from '../endpoint.js'

/**
 * PEM material for TLS endpoints. Loaded by the caller; passed through to
 * node:tls untouched.
 */
export interface DockerCertificates {
  readonly ca?: string | Buffer
  readonly cert?: string | Buffer
  readonly key?: string | Buffer
}

/**
 * An agent registered for one URI scheme.
 */
export interface EngineAgent extends Agent {
  readonly scheme: EndpointScheme
  isSecure(): boolean
}
