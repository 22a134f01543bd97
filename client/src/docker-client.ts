/**
 * DockerClient: engine operations on top of the transport.
 *
 * Ordinary calls go through the bounded pool. `stopContainer` and
 * `waitContainer` may legitimately block for as long as the container
 * takes, so they use the unbounded pool, which has no connect or queue
 * timeout (the read timeout still applies).
 *
 * A 404 on a container- or image-scoped call is re-raised as
 * ContainerNotFoundError / ImageNotFoundError with the original request
 * error as cause.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { ContainerNotFoundError, type DockerError, DockerRequestError, ImageNotFoundError } from '@dockwire/protocol'
import type { StreamContext } from './body-reader.js'
import {
  type DockerClientOptions,
  parseClientOptions,
  type RegistryAuth,
  type ResolvedClientOptions
} from './config.js'
import { parseImageRef } from './image-ref.js'
import { LogStream } from './log-stream.js'
import type { Logger } from './logger.js'
import { BuildProgressHandler, PullProgressHandler, PushProgressHandler } from './progress-handlers.js'
import { type ProgressHandler, ProgressStream } from './progress-stream.js'
import { PoolManager } from './pool-manager.js'
import { type EngineResponse, RequestExecutor, type RequestSpec } from './request.js'
import {
  type ContainerCreation,
  type ContainerExit,
  type EngineRecord,
  type ImageCommit,
  type RemovedImage,
  toContainerCreation,
  toContainerExit,
  toImageCommit,
  toRecord,
  toRecordList,
  toRemovedImages,
  toVersionInfo,
  type VersionInfo
} from './types.js'

/**
 * Valid container names: an optional leading slash, then letters, digits,
 * underscores and dashes.
 */
export const CONTAINER_NAME_PATTERN = /^\/?[a-zA-Z0-9_-]+$/

export const DEFAULT_RESTART_SECONDS = 10

/**
 * Accept header of the raw multiplexed attach stream.
 */
export const RAW_STREAM_MEDIA_TYPE = 'application/vnd.docker.raw-stream'

export interface CallOptions {
  readonly signal?: AbortSignal
}

export interface ListContainersOptions extends CallOptions {
  readonly all?: boolean
  readonly limit?: number
  readonly since?: string
  readonly before?: string
  readonly size?: boolean
}

export interface ListImagesOptions extends CallOptions {
  readonly all?: boolean
  /** Serialized as JSON, e.g. `{ dangling: ['true'] }` */
  readonly filters?: Readonly<Record<string, readonly string[]>>
}

export interface CommitOptions extends CallOptions {
  readonly repo?: string
  readonly tag?: string
  readonly comment?: string
  readonly author?: string
  /** Container config applied to the new image */
  readonly config?: EngineRecord
}

export interface ProgressOptions extends CallOptions {
  /** Receives every event after the client has logged it */
  readonly onProgress?: ProgressHandler
}

export interface BuildOptions extends ProgressOptions {
  /** Repository name (and optional tag) of the resulting image */
  readonly name?: string
  readonly quiet?: boolean
  readonly noCache?: boolean
  readonly removeIntermediate?: boolean
  /** Called once the build finished, whatever the outcome */
  readonly dispose?: () => void | Promise<void>
}

export interface RemoveImageOptions extends CallOptions {
  readonly force?: boolean
  readonly noPrune?: boolean
}

export interface LogsOptions extends CallOptions {
  readonly stdout?: boolean
  readonly stderr?: boolean
  readonly timestamps?: boolean
  readonly follow?: boolean
  /** Number of trailing lines, or `all` */
  readonly tail?: number | 'all'
}

export interface AttachOptions extends CallOptions {
  /** Replay output produced before the attach */
  readonly logs?: boolean
  /** Keep streaming live output */
  readonly stream?: boolean
  readonly stdout?: boolean
  readonly stderr?: boolean
}

/**
 * Encode `X-Registry-Auth`: base64url JSON of the credentials, or the
 * literal `null` when there are none.
 */
export function registryAuthHeader(auth: RegistryAuth | undefined): string {
  if (auth === undefined) {
    return 'null'
  }
  const body = {
    ...(auth.username !== undefined && { username: auth.username }),
    ...(auth.password !== undefined && { password: auth.password }),
    ...(auth.email !== undefined && { email: auth.email }),
    ...(auth.serverAddress !== undefined && { serveraddress: auth.serverAddress })
  }
  return Buffer.from(JSON.stringify(body), 'utf8').toString('base64url')
}

function containerPath(containerId: string, suffix = ''): string {
  return `/containers/${encodeURIComponent(containerId)}${suffix}`
}

// Registry hosts (`host:5000/app`) and digests (`app@sha256:...`) stay readable
function imagePath(image: string, suffix = ''): string {
  const segments = image.split('/').map((segment) => encodeURIComponent(segment).replace(/%3A/g, ':').replace(/%40/g, '@'))
  return `/images/${segments.join('/')}${suffix}`
}

function isNotFound(error: unknown): error is DockerRequestError {
  return error instanceof DockerRequestError && error.status === 404
}

export class DockerClient {
  readonly options: ResolvedClientOptions
  private readonly pools: PoolManager
  private readonly executor: RequestExecutor
  private readonly logger: Logger

  /**
   * @throws EndpointError, RangeError or Error for invalid options
   */
  constructor(options: DockerClientOptions) {
    this.options = parseClientOptions(options)
    this.logger = this.options.logger
    this.pools = new PoolManager({
      endpoint: this.options.endpoint,
      poolSize: this.options.poolSize,
      connectTimeoutMs: this.options.connectTimeoutMs,
      readTimeoutMs: this.options.readTimeoutMs,
      ...(this.options.certificates !== undefined && { certificates: this.options.certificates })
    })
    this.executor = new RequestExecutor({
      pools: this.pools,
      apiVersion: this.options.apiVersion,
      logger: this.logger
    })
  }

  /**
   * Connection pools, for inspection.
   */
  get connectionPools(): PoolManager {
    return this.pools
  }

  // ============================================
  // System
  // ============================================

  async ping(options: CallOptions = {}): Promise<string> {
    const response = await this.request({ method: 'GET', path: '/_ping', pool: 'bounded' }, options)
    return response.text()
  }

  async version(options: CallOptions = {}): Promise<VersionInfo> {
    const response = await this.request({ method: 'GET', path: '/version', pool: 'bounded' }, options)
    return toVersionInfo(await response.json())
  }

  async info(options: CallOptions = {}): Promise<EngineRecord> {
    const response = await this.request({ method: 'GET', path: '/info', pool: 'bounded' }, options)
    return toRecord(await response.json(), 'info')
  }

  // ============================================
  // Containers
  // ============================================

  async listContainers(options: ListContainersOptions = {}): Promise<EngineRecord[]> {
    const response = await this.request(
      {
        method: 'GET',
        path: '/containers/json',
        pool: 'bounded',
        query: {
          all: options.all,
          limit: options.limit,
          since: options.since,
          before: options.before,
          size: options.size
        }
      },
      options
    )
    return toRecordList(await response.json(), 'containers')
  }

  /**
   * @throws ImageNotFoundError when the config names a missing image
   */
  async createContainer(config: EngineRecord, name?: string, options: CallOptions = {}): Promise<ContainerCreation> {
    if (name !== undefined && !CONTAINER_NAME_PATTERN.test(name)) {
      throw new RangeError(`Invalid container name "${name}"`)
    }
    const image = typeof config.Image === 'string' ? config.Image : '<unspecified>'

    return this.notFound(
      async () => {
        const response = await this.request(
          {
            method: 'POST',
            path: '/containers/create',
            pool: 'bounded',
            query: { name },
            body: { json: config }
          },
          options
        )
        return toContainerCreation(await response.json())
      },
      (error) => new ImageNotFoundError(image, undefined, error)
    )
  }

  async startContainer(containerId: string, hostConfig?: EngineRecord, options: CallOptions = {}): Promise<void> {
    await this.containerCall(
      containerId,
      {
        method: 'POST',
        path: containerPath(containerId, '/start'),
        pool: 'bounded',
        ...(hostConfig !== undefined && { body: { json: hostConfig } })
      },
      options
    )
  }

  async pauseContainer(containerId: string, options: CallOptions = {}): Promise<void> {
    await this.containerCall(
      containerId,
      { method: 'POST', path: containerPath(containerId, '/pause'), pool: 'bounded' },
      options
    )
  }

  async unpauseContainer(containerId: string, options: CallOptions = {}): Promise<void> {
    await this.containerCall(
      containerId,
      { method: 'POST', path: containerPath(containerId, '/unpause'), pool: 'bounded' },
      options
    )
  }

  async restartContainer(
    containerId: string,
    secondsToWaitBeforeRestart = DEFAULT_RESTART_SECONDS,
    options: CallOptions = {}
  ): Promise<void> {
    await this.containerCall(
      containerId,
      {
        method: 'POST',
        path: containerPath(containerId, '/restart'),
        pool: 'bounded',
        query: { t: secondsToWaitBeforeRestart }
      },
      options
    )
  }

  async killContainer(containerId: string, options: CallOptions = {}): Promise<void> {
    await this.containerCall(
      containerId,
      { method: 'POST', path: containerPath(containerId, '/kill'), pool: 'bounded' },
      options
    )
  }

  /**
   * Stop a container, waiting up to `secondsToWaitBeforeKilling` before the
   * engine kills it. An already stopped container (304) is not an error.
   */
  async stopContainer(containerId: string, secondsToWaitBeforeKilling: number, options: CallOptions = {}): Promise<void> {
    try {
      await this.containerCall(
        containerId,
        {
          method: 'POST',
          path: containerPath(containerId, '/stop'),
          pool: 'unbounded',
          query: { t: secondsToWaitBeforeKilling }
        },
        options
      )
    } catch (error) {
      if (error instanceof DockerRequestError && error.status === 304) {
        this.logger.debug('container already stopped', { containerId })
        return
      }
      throw error
    }
  }

  /**
   * Block until the container exits.
   */
  async waitContainer(containerId: string, options: CallOptions = {}): Promise<ContainerExit> {
    return this.notFound(
      async () => {
        const response = await this.request(
          { method: 'POST', path: containerPath(containerId, '/wait'), pool: 'unbounded' },
          options
        )
        return toContainerExit(await response.json())
      },
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  async removeContainer(containerId: string, removeVolumes = false, options: CallOptions = {}): Promise<void> {
    await this.containerCall(
      containerId,
      { method: 'DELETE', path: containerPath(containerId), pool: 'bounded', query: { v: removeVolumes } },
      options
    )
  }

  async inspectContainer(containerId: string, options: CallOptions = {}): Promise<EngineRecord> {
    return this.notFound(
      async () => {
        const response = await this.request(
          { method: 'GET', path: containerPath(containerId, '/json'), pool: 'bounded' },
          options
        )
        return toRecord(await response.json(), 'container')
      },
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  /**
   * Tar archive of the container's filesystem. The stream holds a pooled
   * connection until it ends or is destroyed.
   */
  async exportContainer(containerId: string, options: CallOptions = {}): Promise<Readable> {
    return this.notFound(
      async () =>
        this.streamOf(
          await this.request({ method: 'GET', path: containerPath(containerId, '/export'), pool: 'bounded' }, options)
        ),
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  /**
   * Tar archive of one path inside the container. Same lifetime rules as
   * exportContainer.
   */
  async copyContainer(containerId: string, path: string, options: CallOptions = {}): Promise<Readable> {
    return this.notFound(
      async () =>
        this.streamOf(
          await this.request(
            {
              method: 'POST',
              path: containerPath(containerId, '/copy'),
              pool: 'bounded',
              body: { json: { Resource: path } }
            },
            options
          )
        ),
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  async commitContainer(containerId: string, options: CommitOptions = {}): Promise<string> {
    return this.notFound(
      async () => {
        const response = await this.request(
          {
            method: 'POST',
            path: '/commit',
            pool: 'bounded',
            query: {
              container: containerId,
              repo: options.repo,
              tag: options.tag,
              comment: options.comment,
              author: options.author
            },
            body: { json: options.config ?? {} }
          },
          options
        )
        const commit: ImageCommit = toImageCommit(await response.json())
        return commit.Id
      },
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  /**
   * Container output. Use `readFully()` for finished containers and
   * `attach()` or iteration with `follow`.
   */
  async logs(containerId: string, options: LogsOptions = {}): Promise<LogStream> {
    return this.notFound(
      async () =>
        this.logStreamOf(
          await this.request(
            {
              method: 'GET',
              path: containerPath(containerId, '/logs'),
              pool: 'bounded',
              query: {
                stdout: options.stdout ?? true,
                stderr: options.stderr ?? true,
                timestamps: options.timestamps,
                follow: options.follow,
                tail: options.tail
              }
            },
            options
          )
        ),
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  async attachContainer(containerId: string, options: AttachOptions = {}): Promise<LogStream> {
    return this.notFound(
      async () =>
        this.logStreamOf(
          await this.request(
            {
              method: 'POST',
              path: containerPath(containerId, '/attach'),
              pool: 'bounded',
              accept: RAW_STREAM_MEDIA_TYPE,
              query: {
                logs: options.logs ?? true,
                stream: options.stream ?? false,
                stdout: options.stdout ?? true,
                stderr: options.stderr ?? true
              }
            },
            options
          )
        ),
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  // ============================================
  // Images
  // ============================================

  async listImages(options: ListImagesOptions = {}): Promise<EngineRecord[]> {
    const response = await this.request(
      {
        method: 'GET',
        path: '/images/json',
        pool: 'bounded',
        query: {
          all: options.all,
          filters: options.filters === undefined ? undefined : JSON.stringify(options.filters)
        }
      },
      options
    )
    return toRecordList(await response.json(), 'images')
  }

  /**
   * Pull an image and wait for the engine to finish.
   *
   * @throws ImageNotFoundError if the registry has no such image
   * @throws ImagePullFailedError if the pull reported any other error
   */
  async pull(image: string, options: ProgressOptions = {}): Promise<void> {
    const ref = parseImageRef(image)
    const stream = await this.notFound(
      async () =>
        this.progressStreamOf(
          await this.request(
            {
              method: 'POST',
              path: '/images/create',
              pool: 'bounded',
              query: { fromImage: ref.repository, tag: ref.tag },
              headers: { 'X-Registry-Auth': registryAuthHeader(this.options.auth) }
            },
            options
          )
        ),
      (error) => new ImageNotFoundError(image, undefined, error)
    )
    await stream.tail(new PullProgressHandler(image, this.logger, options.onProgress))
  }

  /**
   * @throws ImagePushFailedError if the push reported an error
   */
  async push(image: string, options: ProgressOptions = {}): Promise<void> {
    const ref = parseImageRef(image)
    const stream = await this.notFound(
      async () =>
        this.progressStreamOf(
          await this.request(
            {
              method: 'POST',
              path: imagePath(ref.repository, '/push'),
              pool: 'bounded',
              query: { tag: ref.tag },
              headers: { 'X-Registry-Auth': registryAuthHeader(this.options.auth) }
            },
            options
          )
        ),
      (error) => new ImageNotFoundError(image, undefined, error)
    )
    await stream.tail(new PushProgressHandler(image, this.logger, options.onProgress))
  }

  async tag(image: string, name: string, force = false, options: CallOptions = {}): Promise<void> {
    const ref = parseImageRef(name)
    await this.notFound(
      async () => {
        const response = await this.request(
          {
            method: 'POST',
            path: imagePath(image, '/tag'),
            pool: 'bounded',
            query: { repo: ref.repository, tag: ref.tag, force }
          },
          options
        )
        await response.discard()
      },
      (error) => new ImageNotFoundError(image, undefined, error)
    )
  }

  /**
   * Build an image from a tar context.
   *
   * @returns Id of the built image, or null if the engine never reported one
   * @throws BuildFailedError if the build reported an error
   */
  async build(context: Readable | Uint8Array, options: BuildOptions = {}): Promise<string | null> {
    try {
      const stream = this.progressStreamOf(
        await this.request(
          {
            method: 'POST',
            path: '/build',
            pool: 'bounded',
            query: {
              t: options.name,
              q: options.quiet,
              nocache: options.noCache,
              rm: options.removeIntermediate
            },
            body:
              context instanceof Uint8Array
                ? { bytes: context, contentType: 'application/tar' }
                : { stream: context, contentType: 'application/tar' }
          },
          options
        )
      )
      const handler = new BuildProgressHandler(this.logger, options.onProgress)
      await stream.tail(handler)
      return handler.imageId
    } finally {
      await this.disposeBuildContext(options.dispose)
    }
  }

  async inspectImage(image: string, options: CallOptions = {}): Promise<EngineRecord> {
    return this.notFound(
      async () => {
        const response = await this.request({ method: 'GET', path: imagePath(image, '/json'), pool: 'bounded' }, options)
        return toRecord(await response.json(), 'image')
      },
      (error) => new ImageNotFoundError(image, undefined, error)
    )
  }

  async removeImage(image: string, options: RemoveImageOptions = {}): Promise<RemovedImage[]> {
    return this.notFound(
      async () => {
        const response = await this.request(
          {
            method: 'DELETE',
            path: imagePath(image),
            pool: 'bounded',
            query: { force: options.force, noprune: options.noPrune }
          },
          options
        )
        return toRemovedImages(await response.json())
      },
      (error) => new ImageNotFoundError(image, undefined, error)
    )
  }

  /**
   * Shut both pools down. In-flight requests fail; idempotent.
   */
  close(): void {
    this.pools.shutdown()
  }

  // ============================================
  // Internals
  // ============================================

  private request(spec: Omit<RequestSpec, 'signal'>, options: CallOptions): Promise<EngineResponse> {
    return this.executor.execute({ ...spec, ...(options.signal !== undefined && { signal: options.signal }) })
  }

  private async containerCall(containerId: string, spec: Omit<RequestSpec, 'signal'>, options: CallOptions): Promise<void> {
    await this.notFound(
      async () => {
        const response = await this.request(spec, options)
        await response.discard()
      },
      (error) => new ContainerNotFoundError(containerId, error)
    )
  }

  private async notFound<T>(work: () => Promise<T>, specialize: (error: DockerRequestError) => DockerError): Promise<T> {
    try {
      return await work()
    } catch (error) {
      if (isNotFound(error)) {
        throw specialize(error)
      }
      throw error
    }
  }

  private streamContext(response: EngineResponse): StreamContext {
    return { ...response.context, release: () => response.release() }
  }

  private progressStreamOf(response: EngineResponse): ProgressStream {
    return new ProgressStream(response.body, this.streamContext(response))
  }

  private logStreamOf(response: EngineResponse): LogStream {
    return new LogStream(response.body, this.streamContext(response))
  }

  private streamOf(response: EngineResponse): Readable {
    response.body.once('close', () => response.release())
    return response.body
  }

  private async disposeBuildContext(dispose: (() => void | Promise<void>) | undefined): Promise<void> {
    if (dispose === undefined) return
    try {
      await dispose()
    } catch (error) {
      this.logger.warn('failed to dispose build context', { error })
    }
  }
}
