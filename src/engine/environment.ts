import {rm} from 'node:fs/promises'
import {join} from 'node:path'
import {pathExists} from '../core/utils.js'
import type {CommandRunner, OnLogLine} from './command-runner.js'

/**
 * Creates and destroys the isolated execution environment.
 */
export type EnvironmentManager = {
  exists(rootPath: string): Promise<boolean>;
  create(rootPath: string, options: {systemSitePackages: boolean}): Promise<void>;
  remove(rootPath: string): Promise<void>;
}

/**
 * Python virtual environments, created with the host interpreter.
 */
export class VenvEnvironmentManager implements EnvironmentManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly interpreter: string,
    private readonly onLogLine?: OnLogLine
  ) {}

  async exists(rootPath: string): Promise<boolean> {
    return pathExists(rootPath)
  }

  async create(rootPath: string, options: {systemSitePackages: boolean}): Promise<void> {
    const args = ['-m', 'venv', rootPath]
    if (options.systemSitePackages) {
      args.push('--system-site-packages')
    }

    await this.runner.run({command: this.interpreter, args}, this.onLogLine)
  }

  async remove(rootPath: string): Promise<void> {
    await rm(rootPath, {recursive: true, force: true})
  }
}

/** Interpreter inside a virtual environment. */
export function environmentPython(rootPath: string): string {
  return join(rootPath, 'bin', 'python')
}
