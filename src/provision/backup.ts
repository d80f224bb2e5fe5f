import {cp, mkdir} from 'node:fs/promises'
import {basename, join} from 'node:path'
import {BackupWarning, errorMessage} from '../errors.js'
import type {Reporter} from '../core/reporter.js'
import {compactTimestamp, pathExists} from '../core/utils.js'
import type {BackupSnapshot} from '../types.js'

export type BackupResult =
  | {kind: 'snapshot'; directory: string; snapshots: BackupSnapshot[]}
  | {kind: 'noop'}

/**
 * Copies existing installation state aside before the pipeline may destroy it.
 *
 * Backups are best effort: a failed copy is reported as a warning and never
 * stops the run. Snapshots are never removed by the provisioner.
 */
export class BackupManager {
  constructor(
    /** Directory that receives the `backup_<timestamp>` folders. */
    private readonly installRoot: string,
    private readonly reporter: Reporter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async snapshot(paths: readonly string[]): Promise<BackupResult> {
    const existing: string[] = []
    for (const path of paths) {
      if (await pathExists(path)) {
        existing.push(path)
      }
    }

    if (existing.length === 0) {
      return {kind: 'noop'}
    }

    let directory: string
    try {
      directory = await this.reserveDirectory()
    } catch (error) {
      this.warn(new BackupWarning(this.installRoot, {cause: error}))
      return {kind: 'noop'}
    }

    const snapshots: BackupSnapshot[] = []
    const usedNames = new Set<string>()
    for (const sourcePath of existing) {
      const destinationPath = join(directory, uniqueName(basename(sourcePath), usedNames))
      try {
        await cp(sourcePath, destinationPath, {recursive: true, verbatimSymlinks: true, preserveTimestamps: true})
        snapshots.push(Object.freeze({sourcePath, destinationPath, createdAt: this.clock()}))
      } catch (error) {
        this.warn(new BackupWarning(sourcePath, {cause: error}))
      }
    }

    if (snapshots.length > 0) {
      this.reporter.emit({event: 'BACKUP_CREATED', directory, snapshots})
    }

    return {kind: 'snapshot', directory, snapshots}
  }

  /**
   * Creates `backup_<timestamp>`, or `backup_<timestamp>_<n>` when a run in the
   * same second already took the name. mkdir without `recursive` fails on an
   * existing directory, so a name is never shared.
   */
  private async reserveDirectory(): Promise<string> {
    const base = `backup_${compactTimestamp(this.clock())}`
    for (let attempt = 0; ; attempt++) {
      const directory = join(this.installRoot, attempt === 0 ? base : `${base}_${attempt}`)
      try {
        await mkdir(directory)
        return directory
      } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          continue
        }

        throw error
      }
    }
  }

  private warn(warning: BackupWarning): void {
    const cause = warning.cause === undefined ? '' : `: ${errorMessage(warning.cause)}`
    this.reporter.emit({event: 'WARNING', code: warning.code, message: `${warning.message}${cause}`})
  }
}

function uniqueName(name: string, used: Set<string>): string {
  let candidate = name
  for (let n = 1; used.has(candidate); n++) {
    candidate = `${name}_${n}`
  }

  used.add(candidate)
  return candidate
}
