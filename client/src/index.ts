/**
 * dockwire client
 *
 * Docker Engine API client over TCP, TLS or a Unix socket: pooled
 * transports, a classifying request executor, and readers for progress
 * and multiplexed log streams.
 *
 * @packageDocumentation
 */

// Client
export {
  type AttachOptions,
  type BuildOptions,
  type CallOptions,
  type CommitOptions,
  CONTAINER_NAME_PATTERN,
  DEFAULT_RESTART_SECONDS,
  DockerClient,
  type ListContainersOptions,
  type ListImagesOptions,
  type LogsOptions,
  type ProgressOptions,
  RAW_STREAM_MEDIA_TYPE,
  registryAuthHeader,
  type RemoveImageOptions
} from './docker-client.js'

// Configuration
export {
  clientOptionsFromEnv,
  DEFAULT_API_VERSION,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_POOL_SIZE,
  DEFAULT_READ_TIMEOUT_MS,
  type DockerClientOptions,
  loadCertificates,
  parseClientOptions,
  parseHostAndPort,
  type RegistryAuth,
  type ResolvedClientOptions
} from './config.js'
export { type Endpoint, EndpointError, type EndpointScheme, parseEndpoint, socketPathFromUri } from './endpoint.js'
export { createLogger, type Logger, type LogLevel, type LogThreshold } from './logger.js'

// Transport
export { AbortError } from './abort.js'
export { ConnectionPool, type Lease, PoolClosedError, type PoolStats, PoolTimeoutError } from './pool.js'
export { type PoolClass, PoolManager } from './pool-manager.js'
export { EngineResponse, type HttpMethod, RequestExecutor, type RequestSpec } from './request.js'
export { type DockerCertificates, TcpAgent, TlsAgent, UnixSocketAgent } from './transport/index.js'

// Streams
export { LogStream } from './log-stream.js'
export { BuildProgressHandler, PullProgressHandler, PushProgressHandler } from './progress-handlers.js'
export { type ProgressHandler, ProgressStream } from './progress-stream.js'
export { StreamClosedError } from './sink.js'

// Engine payloads
export type { ContainerCreation, ContainerExit, EngineRecord, ImageCommit, RemovedImage, VersionInfo } from './types.js'

// Errors and decoders
export * from '@dockwire/protocol'
