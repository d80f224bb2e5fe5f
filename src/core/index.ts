export {loadConfig, resolveConfig, validateConfig, defaultConfigPath, projectConfigFilename} from './config.js'
export {createPipelineContext, resolveHostPaths, type ContextOptions} from './context.js'
export {decideResourceAction, requestRecreate, type Confirmer, type ResourceAction} from './decision.js'
export {StepRunner, numberSteps, type PipelineResult} from './step-runner.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  OutputStream,
  ProvisionEvent,
  PreflightCheckEvent,
  BackupCreatedEvent,
  PipelineStartEvent,
  StepStartingEvent,
  StepFinishedEvent,
  StepFailedEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent,
  ServiceRegisteredEvent,
  ArtifactsGeneratedEvent,
  ProvisionCompleteEvent,
  NoticeEvent,
  WarningEvent
} from './reporter.js'
export {formatProgress, formatDuration, formatSize, compactTimestamp, pathExists, shellQuote} from './utils.js'
