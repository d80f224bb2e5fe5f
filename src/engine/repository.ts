import {mkdir, rm} from 'node:fs/promises'
import {dirname} from 'node:path'
import {pathExists} from '../core/utils.js'
import type {CommandRunner, OnLogLine} from './command-runner.js'

/**
 * Materializes external source repositories on disk.
 */
export type RepoProvider = {
  exists(localPath: string): Promise<boolean>;
  clone(url: string, localPath: string): Promise<void>;
  remove(localPath: string): Promise<void>;
}

export type SdkInstallFlags = {
  /** Sub-component the SDK should not build (already installed from OS packages). */
  skipComponent?: string;
  targetPlatform: string;
}

/**
 * The SDK's own installation procedure. Its internals are opaque.
 */
export type SdkInstaller = {
  install(repoPath: string, flags: SdkInstallFlags): Promise<void>;
}

export class GitRepoProvider implements RepoProvider {
  constructor(
    private readonly runner: CommandRunner,
    private readonly onLogLine?: OnLogLine
  ) {}

  async exists(localPath: string): Promise<boolean> {
    return pathExists(localPath)
  }

  async clone(url: string, localPath: string): Promise<void> {
    await mkdir(dirname(localPath), {recursive: true})
    await this.runner.run({command: 'git', args: ['clone', url, localPath]}, this.onLogLine)
  }

  async remove(localPath: string): Promise<void> {
    await rm(localPath, {recursive: true, force: true})
  }
}

/**
 * Runs `./install.sh` at the root of the SDK checkout.
 */
export class ScriptSdkInstaller implements SdkInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly onLogLine?: OnLogLine
  ) {}

  async install(repoPath: string, flags: SdkInstallFlags): Promise<void> {
    await this.runner.run({
      command: './install.sh',
      args: sdkInstallArgs(flags),
      cwd: repoPath
    }, this.onLogLine)
  }
}

export function sdkInstallArgs(flags: SdkInstallFlags): string[] {
  const args: string[] = []
  if (flags.skipComponent) {
    args.push(`--skip-${flags.skipComponent}`)
  }

  args.push('--target-platform', flags.targetPlatform)
  return args
}
