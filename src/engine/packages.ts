import {join} from 'node:path'
import type {CommandRunner, OnLogLine} from './command-runner.js'

/**
 * OS package manager. Installs are all-or-nothing: any failing package
 * rejects the whole call.
 */
export type SystemPackageManager = {
  refresh(): Promise<void>;
  upgrade(): Promise<void>;
  install(packages: readonly string[]): Promise<void>;
}

/**
 * Package installer of the isolated environment.
 */
export type LanguagePackageInstaller = {
  install(packages: readonly string[], options?: {upgrade?: boolean}): Promise<void>;
  installRequirementsFile(path: string): Promise<void>;
  installEditablePackage(path: string): Promise<void>;
}

export class AptPackageManager implements SystemPackageManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly onLogLine?: OnLogLine
  ) {}

  async refresh(): Promise<void> {
    await this.aptGet(['update'])
  }

  async upgrade(): Promise<void> {
    await this.aptGet(['upgrade', '-y'])
  }

  async install(packages: readonly string[]): Promise<void> {
    if (packages.length === 0) {
      return
    }

    await this.aptGet(['install', '-y', ...packages])
  }

  private async aptGet(args: string[]): Promise<void> {
    await this.runner.run({
      command: 'apt-get',
      args,
      env: {DEBIAN_FRONTEND: 'noninteractive'},
      elevated: true
    }, this.onLogLine)
  }
}

/**
 * Runs pip from inside the virtual environment, so packages land in it
 * without activating it first.
 */
export class PipInstaller implements LanguagePackageInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly environmentRoot: string,
    private readonly onLogLine?: OnLogLine
  ) {}

  async install(packages: readonly string[], options?: {upgrade?: boolean}): Promise<void> {
    if (packages.length === 0) {
      return
    }

    const args = options?.upgrade ? ['install', '--upgrade', ...packages] : ['install', ...packages]
    await this.pip(args)
  }

  async installRequirementsFile(path: string): Promise<void> {
    await this.pip(['install', '-r', path])
  }

  async installEditablePackage(path: string): Promise<void> {
    await this.pip(['install', '-e', path])
  }

  private async pip(args: string[]): Promise<void> {
    await this.runner.run({command: join(this.environmentRoot, 'bin', 'pip'), args}, this.onLogLine)
  }
}
