import {PipelineDefinitionError, StepFailure, errorMessage} from '../errors.js'
import type {HostPaths, PipelineRun, Step} from '../types.js'
import type {Reporter, StepRef} from './reporter.js'
import {formatProgress} from './utils.js'

export type PipelineResult =
  | {status: 'succeeded'; run: PipelineRun}
  | {status: 'failed'; run: PipelineRun; failure: StepFailure}

/**
 * Executes an ordered list of steps, fail-fast.
 *
 * ## Lifecycle
 *
 * 1. Ordinals are checked to be contiguous from 1, before anything runs
 * 2. For each step, in ordinal order:
 *    a. `currentStep` advances to the step's ordinal
 *    b. `Step n/total: label` is reported
 *    c. The operation runs; a thrown error is the step's failure
 * 3. The first failure sets `failed(label)` and ends the run. Completed steps
 *    are not rolled back and nothing is retried here.
 * 4. When every step completed the status is `succeeded`.
 */
export class StepRunner {
  constructor(private readonly reporter: Reporter) {}

  async run(hostPaths: Readonly<HostPaths>, steps: readonly Step[]): Promise<PipelineResult> {
    StepRunner.validate(steps)

    const run: PipelineRun = {
      hostPaths,
      totalSteps: steps.length,
      currentStep: 0,
      status: {state: 'pending'}
    }

    run.status = {state: 'running'}
    this.reporter.emit({event: 'PIPELINE_START', totalSteps: run.totalSteps, steps: steps.map(s => toRef(s))})

    for (const step of steps) {
      run.currentStep = step.ordinal
      const ref = toRef(step)
      this.reporter.emit({event: 'STEP_STARTING', step: ref, progress: formatProgress(run.currentStep, run.totalSteps, step.label)})

      const startedAt = Date.now()
      try {
        await step.operation()
      } catch (error) {
        const failure = new StepFailure(step.label, step.ordinal, {cause: error})
        run.status = {state: 'failed', stepLabel: step.label}
        this.reporter.emit({event: 'STEP_FAILED', step: ref, recoverable: step.recoverable, reason: errorMessage(error)})
        this.reporter.emit({event: 'PIPELINE_FAILED', run: {...run}, stepLabel: step.label})
        return {status: 'failed', run, failure}
      }

      this.reporter.emit({event: 'STEP_FINISHED', step: ref, durationMs: Date.now() - startedAt})
    }

    run.status = {state: 'succeeded'}
    this.reporter.emit({event: 'PIPELINE_FINISHED', run: {...run}})
    return {status: 'succeeded', run}
  }

  static validate(steps: readonly Step[]): void {
    if (steps.length === 0) {
      throw new PipelineDefinitionError('Pipeline has no steps')
    }

    for (const [index, step] of steps.entries()) {
      if (step.ordinal !== index + 1) {
        throw new PipelineDefinitionError(`Step "${step.label}" has ordinal ${step.ordinal}, expected ${index + 1}`)
      }
    }
  }
}

/**
 * Numbers step definitions in the order given.
 */
export function numberSteps(definitions: ReadonlyArray<Omit<Step, 'ordinal'>>): Step[] {
  return definitions.map((definition, index) => ({...definition, ordinal: index + 1}))
}

function toRef(step: Step): StepRef {
  return {ordinal: step.ordinal, label: step.label}
}
