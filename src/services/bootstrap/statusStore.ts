/**
 * Bootstrap status persistence.
 *
 * The JSON status record is the signal between the create and start phases.
 * The zero-byte marker exists exactly when the record is COMPLETED; with no
 * record on disk, a marker alone reads as COMPLETED.
 *
 * A run claim is a lock file beside the status file holding the owner's pid.
 * It is hard-linked into place from a complete temp file, so it never exists
 * without its pid. A claim whose owner is gone is broken by the next claimant.
 */

import { randomUUID } from 'crypto'
import { link, mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { StatusStoreError } from './errors.js'
import { BOOTSTRAP_STATES } from './types.js'
import type { BootstrapState, StatusRecord, StatusStore } from './types.js'

const CLAIM_ATTEMPTS = 3

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

function isNotFound(error: unknown): boolean {
  return hasCode(error, 'ENOENT')
}

function isBootstrapState(value: unknown): value is BootstrapState {
  return typeof value === 'string' && BOOTSTRAP_STATES.some(state => state === value)
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new Error(`"${key}" must be a string`)
  }
  return value
}

/**
 * Validate a parsed status document. Throws on anything that is not a
 * well-formed record; unknown keys are dropped.
 */
export function parseStatusRecord(raw: unknown): StatusRecord {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('status record must be a JSON object')
  }
  const doc: Record<string, unknown> = { ...raw }

  if (!isBootstrapState(doc.state)) {
    throw new Error(`unknown state ${JSON.stringify(doc.state)}`)
  }
  const updatedAt = optionalString(doc, 'updatedAt')
  if (!updatedAt || Number.isNaN(Date.parse(updatedAt))) {
    throw new Error('"updatedAt" must be an ISO-8601 timestamp')
  }

  const record: StatusRecord = { state: doc.state, updatedAt }

  const startedAt = optionalString(doc, 'startedAt')
  if (startedAt) record.startedAt = startedAt
  const completedAt = optionalString(doc, 'completedAt')
  if (completedAt) record.completedAt = completedAt
  const step = optionalString(doc, 'step')
  if (step) record.step = step
  const error = optionalString(doc, 'error')
  if (error) record.error = error

  if (doc.pid !== undefined && doc.pid !== null) {
    if (typeof doc.pid !== 'number' || !Number.isInteger(doc.pid) || doc.pid <= 0) {
      throw new Error('"pid" must be a positive integer')
    }
    record.pid = doc.pid
  }

  return record
}

export class FileStatusStore implements StatusStore {
  private lockFile: string

  constructor(
    private statusFile: string,
    private markerFile: string,
    private now: () => Date = () => new Date()
  ) {
    this.lockFile = `${statusFile}.lock`
  }

  async read(): Promise<StatusRecord> {
    let content: string
    try {
      content = await readFile(this.statusFile, 'utf-8')
    } catch (error) {
      if (isNotFound(error)) {
        return this.readLegacyMarker()
      }
      throw new StatusStoreError(
        `Failed to read status file ${this.statusFile}`,
        this.statusFile,
        error instanceof Error ? error : undefined
      )
    }

    try {
      return parseStatusRecord(JSON.parse(content))
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new StatusStoreError(
        `Malformed status file ${this.statusFile}: ${reason}`,
        this.statusFile,
        error instanceof Error ? error : undefined
      )
    }
  }

  async write(record: StatusRecord): Promise<void> {
    const tmpFile = `${this.statusFile}.${process.pid}.${randomUUID()}.tmp`
    try {
      await mkdir(dirname(this.statusFile), { recursive: true })
      await writeFile(tmpFile, `${JSON.stringify(record)}\n`, 'utf-8')
      await rename(tmpFile, this.statusFile)

      if (record.state === 'COMPLETED') {
        await writeFile(this.markerFile, '')
      } else {
        await rm(this.markerFile, { force: true })
      }
    } catch (error) {
      await rm(tmpFile, { force: true })
      throw new StatusStoreError(
        `Failed to write status file ${this.statusFile}`,
        this.statusFile,
        error instanceof Error ? error : undefined
      )
    }
  }

  async claim(pid: number, isAlive: (pid: number) => boolean): Promise<number | null> {
    const candidate = `${this.lockFile}.${pid}.${randomUUID()}`
    try {
      await mkdir(dirname(this.lockFile), { recursive: true })
      await writeFile(candidate, `${pid}\n`, 'utf-8')
      for (let attempt = 0; attempt < CLAIM_ATTEMPTS; attempt++) {
        try {
          await link(candidate, this.lockFile)
          return null
        } catch (error) {
          if (!hasCode(error, 'EEXIST')) throw error
        }

        const holder = await this.readLockHolder()
        if (holder !== null && isAlive(holder)) {
          return holder
        }
        await rm(this.lockFile, { force: true })
      }
    } catch (error) {
      throw new StatusStoreError(
        `Failed to claim run lock ${this.lockFile}`,
        this.lockFile,
        error instanceof Error ? error : undefined
      )
    } finally {
      await rm(candidate, { force: true })
    }
    throw new StatusStoreError(`Could not claim run lock ${this.lockFile}`, this.lockFile)
  }

  async release(pid: number): Promise<void> {
    try {
      if ((await this.readLockHolder()) === pid) {
        await rm(this.lockFile, { force: true })
      }
    } catch (error) {
      throw new StatusStoreError(
        `Failed to release run lock ${this.lockFile}`,
        this.lockFile,
        error instanceof Error ? error : undefined
      )
    }
  }

  /** Pid in the lock file; null when there is none or it is unreadable */
  private async readLockHolder(): Promise<number | null> {
    let content: string
    try {
      content = await readFile(this.lockFile, 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
    const pid = Number(content.trim())
    return Number.isInteger(pid) && pid > 0 ? pid : null
  }

  private async readLegacyMarker(): Promise<StatusRecord> {
    try {
      const marker = await stat(this.markerFile)
      const completedAt = marker.mtime.toISOString()
      return { state: 'COMPLETED', updatedAt: completedAt, completedAt }
    } catch (error) {
      if (isNotFound(error)) {
        return { state: 'NOT_STARTED', updatedAt: this.now().toISOString() }
      }
      throw new StatusStoreError(
        `Failed to read marker file ${this.markerFile}`,
        this.markerFile,
        error instanceof Error ? error : undefined
      )
    }
  }
}

/**
 * Volatile store for one-off runs and tests.
 */
export class MemoryStatusStore implements StatusStore {
  private records: StatusRecord[] = []
  private holder: number | null = null

  constructor(initial?: StatusRecord) {
    if (initial) this.records.push(initial)
  }

  async read(): Promise<StatusRecord> {
    const latest = this.records[this.records.length - 1]
    return latest ? { ...latest } : { state: 'NOT_STARTED', updatedAt: new Date(0).toISOString() }
  }

  async write(record: StatusRecord): Promise<void> {
    this.records.push({ ...record })
  }

  async claim(pid: number, isAlive: (pid: number) => boolean): Promise<number | null> {
    if (this.holder !== null && isAlive(this.holder)) {
      return this.holder
    }
    this.holder = pid
    return null
  }

  async release(pid: number): Promise<void> {
    if (this.holder === pid) this.holder = null
  }

  /** Every record written, oldest first */
  history(): StatusRecord[] {
    return this.records.map(record => ({ ...record }))
  }
}
