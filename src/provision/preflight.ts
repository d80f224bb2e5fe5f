import {PreflightBlocker, errorMessage} from '../errors.js'
import type {Confirmer} from '../core/decision.js'
import type {Reporter} from '../core/reporter.js'
import {formatSize, gib} from '../core/utils.js'
import type {HostProbe} from '../engine/index.js'
import type {PipelineContext} from '../types.js'

export type PreflightResult =
  | {status: 'ready'; interpreterVersion: string; freeDiskBytes: number}
  | {status: 'blocked'; blocker: PreflightBlocker}

/**
 * Validates the host before anything is mutated.
 *
 * Checks run in order and stop at the first blocker:
 * 1. interpreter - the configured interpreter answers `--version`
 * 2. disk-space - free space on the filesystem holding the repo root; below
 *    the threshold the operator may still choose to continue
 * 3. network - a single outbound probe
 */
export class PreflightChecker {
  constructor(
    private readonly context: PipelineContext,
    private readonly probe: HostProbe,
    private readonly confirmer: Confirmer,
    private readonly reporter: Reporter
  ) {}

  async check(): Promise<PreflightResult> {
    const {config, hostPaths} = this.context

    const interpreterVersion = await this.probe.interpreterVersion(config.interpreter)
    if (!interpreterVersion) {
      return this.block('interpreter', `${config.interpreter} is required but not installed`)
    }

    this.pass('interpreter', interpreterVersion)

    let freeDiskBytes: number
    try {
      freeDiskBytes = await this.probe.freeDiskBytes(hostPaths.repoRoot)
    } catch (error) {
      return this.block('disk-space', `cannot read free space of ${hostPaths.repoRoot}: ${errorMessage(error)}`)
    }

    const threshold = config.minFreeDiskGiB * gib
    if (freeDiskBytes < threshold) {
      const detail = `less than ${config.minFreeDiskGiB} GiB available (${formatSize(freeDiskBytes)})`
      this.reporter.emit({event: 'WARNING', code: 'LOW_DISK_SPACE', message: `Low disk space: ${detail}`})
      const proceed = await this.confirmer.confirm('Continue anyway?', false)
      if (!proceed) {
        return this.block('disk-space', detail)
      }

      this.pass('disk-space', `${detail}, continuing on operator request`)
    } else {
      this.pass('disk-space', `${formatSize(freeDiskBytes)} available`)
    }

    if (!await this.probe.networkReachable(config.network.probeHost)) {
      return this.block('network', `no internet connection (${config.network.probeHost} unreachable)`)
    }

    this.pass('network', `${config.network.probeHost} reachable`)
    return {status: 'ready', interpreterVersion, freeDiskBytes}
  }

  private pass(check: PreflightBlocker['check'], detail: string): void {
    this.reporter.emit({event: 'PREFLIGHT_CHECK', check, passed: true, detail})
  }

  private block(check: PreflightBlocker['check'], detail: string): PreflightResult {
    this.reporter.emit({event: 'PREFLIGHT_CHECK', check, passed: false, detail})
    return {status: 'blocked', blocker: new PreflightBlocker(check, detail)}
  }
}
