/**
 * Engine payloads.
 *
 * Only the fields the client itself reads are named; everything else is
 * passed through untouched as the engine sent it.
 *
 * @module
 */
import { DockerError } from '@dockwire/protocol'

export type EngineRecord = Readonly<Record<string, unknown>>

export interface VersionInfo extends EngineRecord {
  readonly Version: string
  readonly ApiVersion: string
}

export interface ContainerCreation extends EngineRecord {
  readonly Id: string
  readonly Warnings?: readonly string[]
}

export interface ContainerExit extends EngineRecord {
  readonly StatusCode: number
}

export interface ImageCommit extends EngineRecord {
  readonly Id: string
}

/**
 * One line of an image removal report: `{ Untagged }` or `{ Deleted }`.
 */
export interface RemovedImage extends EngineRecord {
  readonly Untagged?: string
  readonly Deleted?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * @throws DockerError if the payload is not a JSON object
 */
export function toRecord(value: unknown, what: string): EngineRecord {
  if (!isRecord(value)) {
    throw new DockerError(`${what}: expected a JSON object`)
  }
  return value
}

/**
 * @throws DockerError if the payload is not an array of JSON objects
 */
export function toRecordList(value: unknown, what: string): EngineRecord[] {
  if (!Array.isArray(value)) {
    throw new DockerError(`${what}: expected a JSON array`)
  }
  return value.map((item, index) => toRecord(item, `${what}[${index}]`))
}

function requireString(record: EngineRecord, field: string, what: string): string {
  const value = record[field]
  if (typeof value !== 'string') {
    throw new DockerError(`${what}: missing string field ${field}`)
  }
  return value
}

export function toVersionInfo(value: unknown): VersionInfo {
  const record = toRecord(value, 'version')
  return {
    ...record,
    Version: requireString(record, 'Version', 'version'),
    ApiVersion: requireString(record, 'ApiVersion', 'version')
  }
}

export function toContainerCreation(value: unknown): ContainerCreation {
  const record = toRecord(value, 'container creation')
  const warnings = record.Warnings
  return {
    ...record,
    Id: requireString(record, 'Id', 'container creation'),
    ...(Array.isArray(warnings) && { Warnings: warnings.filter((w): w is string => typeof w === 'string') })
  }
}

export function toContainerExit(value: unknown): ContainerExit {
  const record = toRecord(value, 'container exit')
  const status = record.StatusCode
  if (typeof status !== 'number') {
    throw new DockerError('container exit: missing numeric field StatusCode')
  }
  return { ...record, StatusCode: status }
}

export function toImageCommit(value: unknown): ImageCommit {
  const record = toRecord(value, 'commit')
  return { ...record, Id: requireString(record, 'Id', 'commit') }
}

export function toRemovedImages(value: unknown): RemovedImage[] {
  // Older engines answer an empty body
  if (value === null) {
    return []
  }
  return toRecordList(value, 'image removal').map((record) => ({
    ...record,
    ...(typeof record.Untagged === 'string' && { Untagged: record.Untagged }),
    ...(typeof record.Deleted === 'string' && { Deleted: record.Deleted })
  }))
}
