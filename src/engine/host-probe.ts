import {statfs} from 'node:fs/promises'
import {CommandError} from '../errors.js'
import type {CommandRunner} from './command-runner.js'

/**
 * Read-only questions about the host, asked before anything is mutated.
 */
export type HostProbe = {
  /** Version banner of the interpreter, or undefined when it cannot be run. */
  interpreterVersion(command: string): Promise<string | undefined>;
  freeDiskBytes(path: string): Promise<number>;
  networkReachable(host: string): Promise<boolean>;
}

export class SystemHostProbe implements HostProbe {
  constructor(private readonly runner: CommandRunner) {}

  async interpreterVersion(command: string): Promise<string | undefined> {
    try {
      const result = await this.runner.run({command, args: ['--version']})
      return result.stdout.trim()
    } catch (error) {
      if (error instanceof CommandError) {
        return undefined
      }

      throw error
    }
  }

  async freeDiskBytes(path: string): Promise<number> {
    const stats = await statfs(path)
    return stats.bavail * stats.bsize
  }

  async networkReachable(host: string): Promise<boolean> {
    try {
      await this.runner.run({command: 'ping', args: ['-c', '1', host]})
      return true
    } catch (error) {
      if (error instanceof CommandError) {
        return false
      }

      throw error
    }
  }
}
