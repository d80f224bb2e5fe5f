import {join} from 'node:path'
import type {CommandRunner, OnLogLine} from './command-runner.js'

/** A rendered unit file ready to be installed. */
export type ServiceUnit = {
  name: string;
  content: string;
}

/**
 * OS service manager. Every call requires elevated privileges.
 */
export type ServiceManager = {
  /** Installs the unit and returns the path it was written to. */
  write(unit: ServiceUnit): Promise<string>;
  reloadUnits(): Promise<void>;
  enable(name: string): Promise<void>;
  start(name: string): Promise<void>;
}

export class SystemdServiceManager implements ServiceManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly unitDir: string,
    private readonly onLogLine?: OnLogLine
  ) {}

  unitPath(name: string): string {
    return join(this.unitDir, `${name}.service`)
  }

  async write(unit: ServiceUnit): Promise<string> {
    const path = this.unitPath(unit.name)
    // tee echoes the unit back on stdout, which nobody needs to see
    await this.runner.run({command: 'tee', args: [path], input: unit.content, elevated: true})
    return path
  }

  async reloadUnits(): Promise<void> {
    await this.systemctl(['daemon-reload'])
  }

  async enable(name: string): Promise<void> {
    await this.systemctl(['enable', name])
  }

  async start(name: string): Promise<void> {
    await this.systemctl(['start', name])
  }

  private async systemctl(args: string[]): Promise<void> {
    await this.runner.run({command: 'systemctl', args, elevated: true}, this.onLogLine)
  }
}
