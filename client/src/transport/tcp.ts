/**
 * Plain and TLS TCP transports.
 *
 * Both agents dial the host and port of each request themselves so the
 * connect timeout covers the TCP handshake. Only the connection fields are
 * forwarded; the request path must never reach net.createConnection, which
 * would treat it as an IPC path.
 *
 * @module
 */
import { Agent, type AgentOptions, type ClientRequestArgs } from 'node:http'
import { Agent as HttpsAgent } from 'node:https'
import { createConnection, isIP, type Socket } from 'node:net'
import type { Duplex } from 'node:stream'
import { connect as tlsConnect, type TLSSocket } from 'node:tls'
import { armConnectTimeout } from './connect-timeout.js'
import type { DockerCertificates, EngineAgent } from './types.js'

function targetOf(options: ClientRequestArgs, defaultPort: number): { host: string; port: number } {
  const host = options.hostname ?? options.host ?? 'localhost'
  const port = options.port === undefined || options.port === null ? defaultPort : Number(options.port)
  return { host: host.replace(/^\[(.*)\]$/, '$1'), port }
}

export class TcpAgent extends Agent implements EngineAgent {
  readonly scheme = 'http'

  constructor(
    private readonly connectTimeoutMs: number,
    options: AgentOptions = {}
  ) {
    super({ keepAlive: true, ...options })
  }

  isSecure(): boolean {
    return false
  }

  createConnection(
    options: ClientRequestArgs,
    _callback?: (err: Error | null, stream: Duplex) => void
  ): Socket {
    const socket = createConnection(targetOf(options, 80))
    armConnectTimeout(socket, this.connectTimeoutMs)
    return socket
  }
}

export class TlsAgent extends HttpsAgent implements EngineAgent {
  readonly scheme = 'https'

  constructor(
    private readonly connectTimeoutMs: number,
    private readonly certificates: DockerCertificates = {},
    options: AgentOptions = {}
  ) {
    super({ keepAlive: true, ...options, ...certificates })
  }

  isSecure(): boolean {
    return true
  }

  createConnection(
    options: ClientRequestArgs,
    _callback?: (err: Error | null, stream: Duplex) => void
  ): TLSSocket {
    const { host, port } = targetOf(options, 443)
    const socket = tlsConnect({
      host,
      port,
      ...(isIP(host) === 0 && { servername: host }),
      ...this.certificates
    })
    armConnectTimeout(socket, this.connectTimeoutMs)
    return socket
  }
}
