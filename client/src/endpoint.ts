/**
 * Engine endpoint parsing.
 *
 * A Unix endpoint is rewritten to the sentinel `unix://localhost:80` so that
 * request URIs look like ordinary host:port URIs; the socket path is kept
 * alongside and only the Unix transport reads it.
 *
 * @module
 */

export type EndpointScheme = 'http' | 'https' | 'unix'

/**
 * The single destination a client talks to. Frozen.
 */
export interface Endpoint {
  readonly scheme: EndpointScheme
  /** Host name without IPv6 brackets; `localhost` for Unix endpoints */
  readonly host: string
  readonly port: number
  /** Filesystem path of the socket, Unix endpoints only */
  readonly socketPath?: string
  /** Canonical URI used to build request URIs */
  readonly uri: string
}

/**
 * Sentinel host:port a Unix endpoint is routed as.
 */
export const UNIX_SENTINEL_URI = 'unix://localhost:80'

const DEFAULT_PORTS = { http: 80, https: 443 } as const

/**
 * Error thrown when an endpoint URI cannot be used.
 */
export class EndpointError extends Error {
  constructor(
    public readonly uri: string,
    public readonly reason: string
  ) {
    super(`Invalid engine endpoint "${uri}": ${reason}`)
    this.name = 'EndpointError'
  }
}

/**
 * Recover the socket path from `unix:///path` or `unix://localhost/path`.
 *
 * @throws EndpointError for any other form
 */
export function socketPathFromUri(uri: string): string {
  const path = uri.replace(/^unix:\/\/\//, 'unix://localhost/').replace(/^unix:\/\/localhost/, '')

  if (!path.startsWith('/') || path.length === 1) {
    throw new EndpointError(uri, 'expected unix:///absolute/path/to/socket')
  }
  return path
}

/**
 * Parse an endpoint URI.
 *
 * @throws EndpointError on unsupported schemes, missing hosts or bad ports
 */
export function parseEndpoint(uri: string): Endpoint {
  if (uri.startsWith('unix://')) {
    const endpoint: Endpoint = {
      scheme: 'unix',
      host: 'localhost',
      port: 80,
      socketPath: socketPathFromUri(uri),
      uri: UNIX_SENTINEL_URI
    }
    return Object.freeze(endpoint)
  }

  let url: URL
  try {
    url = new URL(uri)
  } catch {
    throw new EndpointError(uri, 'not a URI')
  }

  const scheme = url.protocol.slice(0, -1)
  if (scheme !== 'http' && scheme !== 'https') {
    throw new EndpointError(uri, `unsupported scheme "${scheme}"`)
  }
  if (url.hostname === '') {
    throw new EndpointError(uri, 'missing host')
  }

  const host = url.hostname.replace(/^\[(.*)\]$/, '$1')
  const port = url.port === '' ? DEFAULT_PORTS[scheme] : Number(url.port)
  const hostForUri = host.includes(':') ? `[${host}]` : host

  const endpoint: Endpoint = {
    scheme,
    host,
    port,
    uri: `${scheme}://${hostForUri}:${port}`
  }
  return Object.freeze(endpoint)
}

/**
 * Build the logical URI of a request, used in error messages.
 */
export function requestUri(endpoint: Endpoint, path: string, query?: URLSearchParams): string {
  const search = query?.toString()
  return `${endpoint.uri}${path}${search ? `?${search}` : ''}`
}
