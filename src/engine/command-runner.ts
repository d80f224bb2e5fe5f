import process from 'node:process'
import {execa} from 'execa'
import {CommandFailedError, CommandNotFoundError} from '../errors.js'
import type {OutputStream} from '../core/reporter.js'

/**
 * Output line from an external command.
 */
export type LogLine = {
  stream: OutputStream;
  line: string;
}

/**
 * Callback for receiving real-time output while a command runs.
 */
export type OnLogLine = (log: LogLine) => void

export type CommandRequest = {
  command: string;
  args: string[];
  cwd?: string;
  /** Extra variables layered onto the inherited environment. */
  env?: Record<string, string>;
  /** Run through sudo (skipped when already root or when sudo is disabled). */
  elevated?: boolean;
  /** Written to the command's stdin. */
  input?: string;
}

export type CommandResult = {
  exitCode: number;
  stdout: string;
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Abstract interface for running external commands.
 *
 * Implementations:
 * - `ExecaCommandRunner`: spawns real processes
 * - Test fakes recording the requested command lines
 *
 * `run` resolves only when the command exited with code 0 and throws
 * `CommandFailedError` or `CommandNotFoundError` otherwise. There is no
 * timeout: a hanging install blocks the run until the operator interrupts it.
 */
export abstract class CommandRunner {
  abstract run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult>
}

export type ExecaCommandRunnerOptions = {
  /** Prefix elevated commands with sudo when not running as root (default: true). */
  sudo?: boolean;
}

export class ExecaCommandRunner extends CommandRunner {
  private readonly useSudo: boolean

  constructor(options?: ExecaCommandRunnerOptions) {
    super()
    this.useSudo = (options?.sudo ?? true) && process.getuid?.() !== 0
  }

  async run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult> {
    const [file, args] = this.commandLine(request)
    const commandText = [file, ...args].join(' ')
    const startedAt = new Date()

    const proc = execa(file, args, {
      cwd: request.cwd,
      env: request.env,
      input: request.input,
      reject: false
    })

    // Iteration rejects when the process fails; the result below reports that
    const streaming = Promise.allSettled([
      forwardLines(proc.iterable({from: 'stdout'}), 'stdout', onLogLine),
      forwardLines(proc.iterable({from: 'stderr'}), 'stderr', onLogLine)
    ])

    const result = await proc
    await streaming

    // No exit code: either never spawned or killed by a signal
    if (result.exitCode === undefined) {
      throw result.signal
        ? new CommandFailedError(commandText, 1, {cause: result})
        : new CommandNotFoundError(file, {cause: result})
    }

    if (result.exitCode !== 0) {
      throw new CommandFailedError(commandText, result.exitCode)
    }

    return {exitCode: result.exitCode, stdout: result.stdout, startedAt, finishedAt: new Date()}
  }

  private commandLine(request: CommandRequest): [string, string[]] {
    if (request.elevated && this.useSudo) {
      // sudo resets the environment, so extra variables go through env(1)
      const assignments = Object.entries(request.env ?? {}).map(([key, value]) => `${key}=${value}`)
      const prefix = assignments.length > 0 ? ['env', ...assignments] : []
      return ['sudo', [...prefix, request.command, ...request.args]]
    }

    return [request.command, request.args]
  }
}

async function forwardLines(lines: AsyncIterable<unknown>, stream: OutputStream, onLogLine?: OnLogLine): Promise<void> {
  for await (const line of lines) {
    onLogLine?.({stream, line: String(line)})
  }
}
