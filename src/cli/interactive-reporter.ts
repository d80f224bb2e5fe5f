import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {OutputStream, PreflightCheckEvent, ProvisionEvent, Reporter, StepFailedEvent, StepFinishedEvent, StepRef} from '../core/reporter.js'
import {formatDuration, formatProgress} from '../core/utils.js'

export const infoLine = (message: string) => `${chalk.green('[INFO]')} ${message}`
export const warnLine = (message: string) => `${chalk.yellow('[WARN]')} ${message}`
export const errorLine = (message: string) => `${chalk.red('[ERROR]')} ${message}`

/** The failed check; the labeled error line is left to the failure summary. */
export const failedCheckLine = (event: PreflightCheckEvent) => chalk.red(`✗ ${event.check}: ${event.detail}`)

export function stepResultText(step: StepRef, totalSteps: number | undefined, durationMs?: number): string {
  const progress = totalSteps === undefined ? step.label : formatProgress(step.ordinal, totalSteps, step.label)
  return durationMs === undefined ? progress : `${progress} (${formatDuration(durationMs)})`
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for an operator sitting at the device.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private spinner?: Ora
  private totalSteps?: number
  private stderrBuffer: string[] = []

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: ProvisionEvent): void {
    switch (event.event) {
      case 'PREFLIGHT_CHECK': {
        if (!event.passed) {
          this.print(failedCheckLine(event))
        }

        break
      }

      case 'BACKUP_CREATED': {
        this.print(infoLine(`Backed up ${event.snapshots.length} existing item(s) to ${event.directory}`))
        break
      }

      case 'PIPELINE_START': {
        this.totalSteps = event.totalSteps
        console.log(chalk.bold(`\n▶ Provisioning: ${chalk.cyan(`${event.totalSteps} steps`)}\n`))
        break
      }

      case 'STEP_STARTING': {
        this.stderrBuffer = []
        this.spinner = ora({text: event.progress, prefixText: ' '}).start()
        break
      }

      case 'STEP_FINISHED': {
        this.handleStepFinished(event)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'PIPELINE_FINISHED': {
        console.log(chalk.bold.green('\n✓ All steps completed\n'))
        break
      }

      case 'PIPELINE_FAILED': {
        console.log(chalk.bold.red('\n✗ Provisioning stopped\n'))
        break
      }

      case 'SERVICE_REGISTERED': {
        this.print(infoLine(`Service ${event.name} installed at ${event.unitPath}${event.started ? ' and started' : ''}`))
        break
      }

      case 'ARTIFACTS_GENERATED': {
        for (const path of event.paths) {
          this.print(infoLine(`Created ${path}`))
        }

        break
      }

      case 'PROVISION_COMPLETE': {
        console.log(chalk.bold.green('\n✓ Installation completed successfully\n'))
        for (const line of event.followUps) {
          console.log(infoLine(line))
        }

        break
      }

      case 'NOTICE': {
        this.print(infoLine(event.message))
        break
      }

      case 'WARNING': {
        this.print(warnLine(event.message))
        break
      }
    }
  }

  log(stream: OutputStream, line: string): void {
    if (this.verbose) {
      this.print(chalk.gray(`  ${line}`))
    }

    if (stream === 'stderr') {
      this.stderrBuffer.push(line)
      if (this.stderrBuffer.length > InteractiveReporter.maxStderrLines) {
        this.stderrBuffer.shift()
      }
    }
  }

  /** Hands the terminal over, e.g. to a prompt. */
  suspend(): void {
    this.spinner?.stop()
  }

  resume(): void {
    this.spinner?.start()
  }

  private print(line: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear()
      console.log(line)
      this.spinner.render()
    } else {
      console.log(line)
    }
  }

  private handleStepFinished(event: StepFinishedEvent): void {
    const text = stepResultText(event.step, this.totalSteps, event.durationMs)
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol: chalk.green('✓'), text: chalk.green(text)})
      this.spinner = undefined
    } else {
      console.log(`  ${chalk.green('✓')} ${chalk.green(text)}`)
    }
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const text = stepResultText(event.step, this.totalSteps)
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol: chalk.red('✗'), text: chalk.red(text)})
      this.spinner = undefined
    } else {
      console.log(`  ${chalk.red('✗')} ${chalk.red(text)}`)
    }

    if (this.stderrBuffer.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of this.stderrBuffer) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    console.log(chalk.red(`  ${event.reason}`))
  }
}
