/**
 * dockwire protocol
 *
 * Engine-independent pieces of the client: the error taxonomy and its
 * classifier, and the incremental decoders for progress and multiplexed
 * log streams.
 *
 * @packageDocumentation
 */

// Classification
export { type ClassifiedFailure, causeChain, classifyFailure, rethrowClassified } from './classify.js'
// Errors
export {
  BuildFailedError,
  ConnectTimeoutError,
  ContainerNotFoundError,
  DockerError,
  DockerRequestError,
  DockerTimeoutError,
  ImageNotFoundError,
  ImagePullFailedError,
  ImagePushFailedError,
  InterruptedError,
  ReadTimeoutError,
  ResponseFailure
} from './errors.js'
// Multiplexed stream framing
export { encodeFrame, FrameDecoder, HEADER_SIZE, LENGTH_OFFSET, TruncatedFrameError } from './frame.js'
// JSON record scanning
export { JsonRecordError, JsonRecordScanner } from './json-records.js'
// Log frame types
export { type LogMessage, STREAM_TAGS, type StreamType, streamTypeOf } from './types/log.js'
// Progress event types
export {
  buildImageId,
  describeProgress,
  type ErrorDetail,
  type ProgressDetail,
  type ProgressMessage,
  toProgressMessage
} from './types/progress.js'
