/**
 * Progress handlers used by pull, push and build.
 *
 * Each one logs ordinary events at `info` and turns an event carrying
 * `error` into the operation's failure.
 *
 * @module
 */
import {
  BuildFailedError,
  buildImageId,
  describeProgress,
  ImageNotFoundError,
  ImagePullFailedError,
  ImagePushFailedError,
  type ProgressMessage
} from '@dockwire/protocol'
import type { Logger } from './logger.js'
import type { ProgressHandler } from './progress-stream.js'

function looksLikeMissingImage(error: string): boolean {
  return error.includes('404') || error.toLowerCase().includes('not found')
}

export class PullProgressHandler implements ProgressHandler {
  constructor(
    private readonly image: string,
    private readonly logger: Logger,
    private readonly onProgress?: ProgressHandler
  ) {}

  async progress(message: ProgressMessage): Promise<void> {
    if (message.error !== undefined) {
      if (looksLikeMissingImage(message.error)) {
        throw new ImageNotFoundError(this.image, message.error)
      }
      throw new ImagePullFailedError(this.image, message.error)
    }
    this.logger.info(`pull ${this.image}: ${describeProgress(message)}`)
    await this.onProgress?.progress(message)
  }
}

export class PushProgressHandler implements ProgressHandler {
  constructor(
    private readonly image: string,
    private readonly logger: Logger,
    private readonly onProgress?: ProgressHandler
  ) {}

  async progress(message: ProgressMessage): Promise<void> {
    if (message.error !== undefined) {
      throw new ImagePushFailedError(this.image, message.error)
    }
    this.logger.info(`push ${this.image}: ${describeProgress(message)}`)
    await this.onProgress?.progress(message)
  }
}

/**
 * Tracks the id of the built image: the last non-null marker wins.
 */
export class BuildProgressHandler implements ProgressHandler {
  private id: string | null = null

  constructor(
    private readonly logger: Logger,
    private readonly onProgress?: ProgressHandler
  ) {}

  get imageId(): string | null {
    return this.id
  }

  async progress(message: ProgressMessage): Promise<void> {
    if (message.error !== undefined) {
      throw new BuildFailedError(message.error)
    }
    this.id = buildImageId(message) ?? this.id
    this.logger.info(`build: ${describeProgress(message)}`)
    await this.onProgress?.progress(message)
  }
}
