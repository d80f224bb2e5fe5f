import pino from 'pino'
import type {BackupSnapshot, PipelineRun} from '../types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  ordinal: number;
  label: string;
}

/**
 * Discriminated union of provisioning events.
 *
 * Lifecycle:
 * 1. PREFLIGHT_CHECK - One per host check, in check order
 * 2. BACKUP_CREATED - Existing resources copied aside (absent when nothing existed)
 * 3. PIPELINE_START - Step execution begins
 * 4. For each step:
 *    a. STEP_STARTING - Carries the `Step n/total: label` progress line
 *    b. STEP_FINISHED - Step succeeded
 *       OR STEP_FAILED - Step failed, nothing after it runs
 * 5. PIPELINE_FINISHED OR PIPELINE_FAILED
 * 6. SERVICE_REGISTERED, ARTIFACTS_GENERATED
 * 7. PROVISION_COMPLETE - Follow-up instructions for the operator
 *
 * NOTICE and WARNING may appear anywhere.
 */
export type PreflightCheckEvent = {
  event: 'PREFLIGHT_CHECK';
  check: string;
  passed: boolean;
  detail: string;
}

export type BackupCreatedEvent = {
  event: 'BACKUP_CREATED';
  directory: string;
  snapshots: BackupSnapshot[];
}

export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  totalSteps: number;
  steps: StepRef[];
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  step: StepRef;
  progress: string;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  step: StepRef;
  durationMs: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  step: StepRef;
  recoverable: boolean;
  reason: string;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  run: PipelineRun;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  run: PipelineRun;
  stepLabel: string;
}

export type ServiceRegisteredEvent = {
  event: 'SERVICE_REGISTERED';
  name: string;
  unitPath: string;
  started: boolean;
}

export type ArtifactsGeneratedEvent = {
  event: 'ARTIFACTS_GENERATED';
  paths: string[];
}

export type ProvisionCompleteEvent = {
  event: 'PROVISION_COMPLETE';
  followUps: string[];
}

export type NoticeEvent = {
  event: 'NOTICE';
  message: string;
}

export type WarningEvent = {
  event: 'WARNING';
  code: string;
  message: string;
}

export type ProvisionEvent =
  | PreflightCheckEvent
  | BackupCreatedEvent
  | PipelineStartEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepFailedEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent
  | ServiceRegisteredEvent
  | ArtifactsGeneratedEvent
  | ProvisionCompleteEvent
  | NoticeEvent
  | WarningEvent

export type OutputStream = 'stdout' | 'stderr'

/**
 * Interface for reporting provisioning events.
 */
export type Reporter = {
  /** Reports pipeline state transitions, notices and warnings */
  emit(event: ProvisionEvent): void;
  /** Reports output lines of the external command currently running */
  log(stream: OutputStream, line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for unattended runs where output goes to a log file.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(destination?: pino.DestinationStream) {
    this.logger = destination ? pino({level: 'info'}, destination) : pino({level: 'info'})
  }

  emit(event: ProvisionEvent): void {
    switch (event.event) {
      case 'WARNING': {
        this.logger.warn(event)
        break
      }

      case 'STEP_FAILED':
      case 'PIPELINE_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }

  log(stream: OutputStream, line: string): void {
    this.logger.info({stream, line})
  }
}
