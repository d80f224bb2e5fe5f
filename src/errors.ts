export class ProvisionError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ProvisionError'
  }

  /** Fatal errors end the run with a non-zero exit code. */
  get fatal(): boolean {
    return true
  }
}

// -- Preflight errors --------------------------------------------------------

export type PreflightCheckName = 'interpreter' | 'disk-space' | 'network'

export class PreflightBlocker extends ProvisionError {
  constructor(
    readonly check: PreflightCheckName,
    detail: string,
    options?: {cause?: unknown}
  ) {
    super('PREFLIGHT_BLOCKED', `Preflight check "${check}" failed: ${detail}`, options)
    this.name = 'PreflightBlocker'
  }
}

// -- Pipeline errors ---------------------------------------------------------

export class StepFailure extends ProvisionError {
  constructor(
    readonly stepLabel: string,
    readonly ordinal: number,
    options?: {cause?: unknown}
  ) {
    super('STEP_FAILED', `${stepLabel} failed`, options)
    this.name = 'StepFailure'
  }
}

export class PipelineDefinitionError extends ProvisionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_PIPELINE', message, options)
    this.name = 'PipelineDefinitionError'
  }
}

export class ConfigError extends ProvisionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}

export class VerificationError extends ProvisionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VERIFICATION_FAILED', message, options)
    this.name = 'VerificationError'
  }
}

// -- Command errors ----------------------------------------------------------

export class CommandError extends ProvisionError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CommandError'
  }
}

export class CommandNotFoundError extends CommandError {
  constructor(readonly command: string, options?: {cause?: unknown}) {
    super('COMMAND_NOT_FOUND', `Command not found: ${command}`, options)
    this.name = 'CommandNotFoundError'
  }
}

export class CommandFailedError extends CommandError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('COMMAND_FAILED', `"${command}" exited with code ${exitCode}`, options)
    this.name = 'CommandFailedError'
  }
}

// -- Service and artifact errors ---------------------------------------------

export type RegistrationPhase = 'write' | 'reload' | 'enable'

export class RegistrationError extends ProvisionError {
  constructor(
    readonly serviceName: string,
    readonly phase: RegistrationPhase,
    options?: {cause?: unknown}
  ) {
    super('REGISTRATION_FAILED', `Service ${serviceName}: ${phase} failed`, options)
    this.name = 'RegistrationError'
  }
}

export class ArtifactError extends ProvisionError {
  constructor(readonly path: string, options?: {cause?: unknown}) {
    super('ARTIFACT_FAILED', `Could not write ${path}`, options)
    this.name = 'ArtifactError'
  }
}

// -- Warnings ----------------------------------------------------------------

export class BackupWarning extends ProvisionError {
  constructor(readonly sourcePath: string, options?: {cause?: unknown}) {
    super('BACKUP_WARNING', `Could not back up ${sourcePath}`, options)
    this.name = 'BackupWarning'
  }

  override get fatal(): boolean {
    return false
  }
}

export class PostStartWarning extends ProvisionError {
  constructor(readonly serviceName: string, options?: {cause?: unknown}) {
    super('POST_START_WARNING', `Service ${serviceName} is enabled but did not start`, options)
    this.name = 'PostStartWarning'
  }

  override get fatal(): boolean {
    return false
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
