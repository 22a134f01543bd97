/**
 * Client configuration: option validation and environment loading.
 *
 * @module
 */
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { type Endpoint, parseEndpoint } from './endpoint.js'
import { createLogger, isLogThreshold, type Logger, LOG_THRESHOLDS } from './logger.js'
import type { DockerCertificates } from './transport/index.js'

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000
export const DEFAULT_READ_TIMEOUT_MS = 30000
export const DEFAULT_POOL_SIZE = 100
export const DEFAULT_API_VERSION = 'v1.12'
export const DEFAULT_UNIX_ENDPOINT = 'unix:///var/run/docker.sock'
export const DEFAULT_HOST = 'localhost'
export const DEFAULT_PORT = 2375

/**
 * Registry credentials for pull and push.
 */
export interface RegistryAuth {
  readonly username?: string
  readonly password?: string
  readonly email?: string
  readonly serverAddress?: string
}

export interface DockerClientOptions {
  /** `unix:///path`, `http://host:port` or `https://host:port` */
  readonly uri: string
  /** TCP/Unix connect timeout and pooled-connection wait; 0 disables */
  readonly connectTimeoutMs?: number
  /** Socket idle timeout; 0 disables */
  readonly readTimeoutMs?: number
  /**
   * Connections per pool. The client keeps two pools, so up to twice this
   * many connections can be open at once.
   */
  readonly poolSize?: number
  /** PEM material; only valid with an https URI */
  readonly certificates?: DockerCertificates
  readonly auth?: RegistryAuth
  /** Path prefix of every request, e.g. `v1.12` */
  readonly apiVersion?: string
  readonly logger?: Logger
}

/**
 * Options after validation and defaulting.
 */
export interface ResolvedClientOptions {
  readonly endpoint: Endpoint
  readonly connectTimeoutMs: number
  readonly readTimeoutMs: number
  readonly poolSize: number
  readonly certificates?: DockerCertificates
  readonly auth?: RegistryAuth
  readonly apiVersion: string
  readonly logger: Logger
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function isLogger(value: unknown): value is Logger {
  return (
    isRecord(value) &&
    typeof value.debug === 'function' &&
    typeof value.info === 'function' &&
    typeof value.warn === 'function' &&
    typeof value.error === 'function'
  )
}

function nonNegativeInteger(obj: Record<string, unknown>, field: string, fallback: number): number {
  const value = obj[field]
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new RangeError(`${field} must be a non-negative integer`)
  }
  return value
}

function optionalString(obj: Record<string, unknown>, field: string, prefix: string): string | undefined {
  const value = obj[field]
  if (value === undefined || typeof value === 'string') {
    return value
  }
  throw new Error(`${prefix}${field} must be a string`)
}

function parseCertificates(input: unknown): DockerCertificates {
  if (!isRecord(input)) {
    throw new Error('certificates must be an object')
  }
  const fields: Record<string, unknown> = input
  const pick = (field: 'ca' | 'cert' | 'key'): string | Buffer | undefined => {
    const value = fields[field]
    if (value === undefined || typeof value === 'string' || Buffer.isBuffer(value)) {
      return value
    }
    throw new Error(`certificates.${field} must be a string or Buffer`)
  }

  const ca = pick('ca')
  const cert = pick('cert')
  const key = pick('key')
  if ((cert === undefined) !== (key === undefined)) {
    throw new Error('certificates.cert and certificates.key must be provided together')
  }
  return {
    ...(ca !== undefined && { ca }),
    ...(cert !== undefined && { cert }),
    ...(key !== undefined && { key })
  }
}

function parseAuth(input: unknown): RegistryAuth {
  if (!isRecord(input)) {
    throw new Error('auth must be an object')
  }
  const username = optionalString(input, 'username', 'auth.')
  const password = optionalString(input, 'password', 'auth.')
  const email = optionalString(input, 'email', 'auth.')
  const serverAddress = optionalString(input, 'serverAddress', 'auth.')
  return {
    ...(username !== undefined && { username }),
    ...(password !== undefined && { password }),
    ...(email !== undefined && { email }),
    ...(serverAddress !== undefined && { serverAddress })
  }
}

/**
 * Validate client options and fill in defaults.
 *
 * @throws EndpointError if the URI cannot be used
 * @throws RangeError for out-of-range numbers
 * @throws Error for any other invalid field
 */
export function parseClientOptions(input: unknown): ResolvedClientOptions {
  if (!isRecord(input)) {
    throw new Error('client options must be an object')
  }
  const { uri, logger } = input
  if (typeof uri !== 'string' || uri === '') {
    throw new Error('uri must be a non-empty string')
  }

  const endpoint = parseEndpoint(uri)
  const poolSize = nonNegativeInteger(input, 'poolSize', DEFAULT_POOL_SIZE)
  if (poolSize < 1) {
    throw new RangeError('poolSize must be at least 1')
  }

  const apiVersion = optionalString(input, 'apiVersion', '') ?? DEFAULT_API_VERSION
  if (!/^v\d+\.\d+$/.test(apiVersion)) {
    throw new Error(`apiVersion must look like v1.12, got "${apiVersion}"`)
  }

  const certificates = input.certificates === undefined ? undefined : parseCertificates(input.certificates)
  if (certificates !== undefined && endpoint.scheme !== 'https') {
    throw new Error(`certificates require an https URI, got ${endpoint.scheme}`)
  }

  if (logger !== undefined && !isLogger(logger)) {
    throw new Error('logger must implement debug, info, warn and error')
  }

  return {
    endpoint,
    connectTimeoutMs: nonNegativeInteger(input, 'connectTimeoutMs', DEFAULT_CONNECT_TIMEOUT_MS),
    readTimeoutMs: nonNegativeInteger(input, 'readTimeoutMs', DEFAULT_READ_TIMEOUT_MS),
    poolSize,
    apiVersion,
    logger: isLogger(logger) ? logger : createLogger(),
    ...(certificates !== undefined && { certificates }),
    ...(input.auth !== undefined && { auth: parseAuth(input.auth) })
  }
}

/**
 * Read `ca.pem`, `cert.pem` and `key.pem` from a directory. The contents are
 * passed to TLS as-is.
 */
export function loadCertificates(dir: string): DockerCertificates {
  const read = (name: string): string => readFileSync(join(dir, name), 'utf8')
  return { ca: read('ca.pem'), cert: read('cert.pem'), key: read('key.pem') }
}

/**
 * Split `host`, `host:port` or `[v6]:port` after dropping any scheme prefix.
 */
export function parseHostAndPort(value: string): { host: string; port: number } {
  const stripped = value.replace(/^.*:\/\//, '')
  const match = /^(?:\[([^\]]*)\]|([^:]*))(?::(\d*))?$/.exec(stripped)
  if (match === null) {
    throw new Error(`DOCKER_HOST must be host[:port], got "${value}"`)
  }

  const host = match[1] ?? match[2] ?? ''
  const port = match[3] === undefined || match[3] === '' ? DEFAULT_PORT : Number(match[3])
  if (port < 1 || port > 65535) {
    throw new RangeError(`DOCKER_HOST port must be between 1 and 65535, got ${port}`)
  }
  return { host: host === '' ? DEFAULT_HOST : host, port }
}

/**
 * Build client options from `DOCKER_HOST`, `DOCKER_CERT_PATH` and
 * `DOCKWIRE_LOG_LEVEL`.
 */
export function clientOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): DockerClientOptions {
  const defaultHost = platform === 'linux' ? DEFAULT_UNIX_ENDPOINT : `${DEFAULT_HOST}:${DEFAULT_PORT}`
  const dockerHost = env.DOCKER_HOST || defaultHost
  const certPath = env.DOCKER_CERT_PATH || undefined

  const level = env.DOCKWIRE_LOG_LEVEL || 'warn'
  if (!isLogThreshold(level)) {
    throw new Error(`DOCKWIRE_LOG_LEVEL must be one of: ${LOG_THRESHOLDS.join(', ')}`)
  }
  const logger = createLogger(level)

  if (dockerHost.startsWith('unix://')) {
    return { uri: dockerHost, logger }
  }

  const { host, port } = parseHostAndPort(dockerHost)
  const hostForUri = host.includes(':') ? `[${host}]` : host
  const scheme = certPath === undefined ? 'http' : 'https'

  return {
    uri: `${scheme}://${hostForUri}:${port}`,
    logger,
    ...(certPath !== undefined && { certificates: loadCertificates(certPath) })
  }
}
