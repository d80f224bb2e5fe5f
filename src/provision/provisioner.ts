import {ProvisionError} from '../errors.js'
import type {Reporter} from '../core/reporter.js'
import {StepRunner} from '../core/step-runner.js'
import type {HostProbe, ServiceManager} from '../engine/index.js'
import type {AutostartArtifact, PipelineContext, PipelineRun, Step} from '../types.js'
import {ArtifactGenerator} from './artifact-generator.js'
import {BackupManager, type BackupResult} from './backup.js'
import {PreflightChecker} from './preflight.js'
import {ResourceProvisioner, type ResourceCollaborators} from './resource-provisioner.js'
import {ServiceRegistrar, serviceDefinition, type Registration, type ServiceRegistrarOptions} from './service-registrar.js'
import {buildProvisioningSteps} from './steps.js'

export type Collaborators = ResourceCollaborators & {
  hostProbe: HostProbe;
  services: ServiceManager;
}

export type ProvisionerOptions = ServiceRegistrarOptions & {
  /** Clock used to name backup directories. */
  clock?: () => Date;
}

export type ProvisionOutcome =
  | {
    status: 'succeeded';
    run: PipelineRun;
    backup: BackupResult;
    registration: Registration;
    artifact: AutostartArtifact;
  }
  | {
    status: 'failed';
    error: ProvisionError;
    /** Absent when the run stopped before any step executed. */
    run?: PipelineRun;
    backup?: BackupResult;
    /** What the operator can do next. */
    hints: string[];
  }

/**
 * Takes a bare host to a running, auto-starting service.
 *
 * ## Workflow
 *
 * 1. **Preflight**: interpreter, disk space (operator may override), network
 * 2. **Backup**: existing environment and SDK checkout are copied aside,
 *    unless the `reuse` policy rules out any removal
 * 3. **Steps**: the provisioning steps run fail-fast through the StepRunner
 * 4. **Service**: unit written, units reloaded, enabled and started
 * 5. **Artifacts**: launcher, autostart entry and desktop shortcut
 *
 * Each stage only starts when the previous one succeeded. Nothing is rolled
 * back; the backup of stage 2 is the manual recovery path.
 */
export class Provisioner {
  private readonly resources: ResourceProvisioner

  constructor(
    private readonly context: PipelineContext,
    private readonly collaborators: Collaborators,
    private readonly reporter: Reporter,
    private readonly options?: ProvisionerOptions
  ) {
    this.resources = new ResourceProvisioner(context, collaborators, reporter)
  }

  steps(): Step[] {
    return buildProvisioningSteps(this.context, this.resources)
  }

  async run(): Promise<ProvisionOutcome> {
    const {context, collaborators, reporter} = this

    const preflight = await new PreflightChecker(context, collaborators.hostProbe, collaborators.confirmer, reporter).check()
    if (preflight.status === 'blocked') {
      return {status: 'failed', error: preflight.blocker, hints: []}
    }

    // Under `reuse` nothing is ever removed, so there is nothing to save.
    const backup: BackupResult = context.resourcePolicy === 'reuse'
      ? {kind: 'noop'}
      : await new BackupManager(context.hostPaths.repoRoot, reporter, this.options?.clock).snapshot([context.environmentRoot, context.sdkRoot])

    const steps = this.steps()
    const result = await new StepRunner(reporter).run(context.hostPaths, steps)
    if (result.status === 'failed') {
      const step = steps.find(s => s.ordinal === result.failure.ordinal)
      return {
        status: 'failed',
        error: result.failure,
        run: result.run,
        backup,
        hints: failureHints((step?.recoverable ?? true) || context.resourcePolicy === 'reuse', backup)
      }
    }

    let registration: Registration
    try {
      registration = await new ServiceRegistrar(collaborators.services, reporter, this.options).register(serviceDefinition(context))
    } catch (error) {
      if (error instanceof ProvisionError) {
        return {status: 'failed', error, run: result.run, backup, hints: ['Fix the service manager error and run the provisioner again']}
      }

      throw error
    }

    let artifact: AutostartArtifact
    try {
      artifact = await new ArtifactGenerator(context, reporter).generate(context.hostPaths)
    } catch (error) {
      if (error instanceof ProvisionError) {
        return {
          status: 'failed',
          error,
          run: result.run,
          backup,
          hints: [`The ${registration.name} service is enabled; only the desktop launcher is missing`]
        }
      }

      throw error
    }

    reporter.emit({
      event: 'PROVISION_COMPLETE',
      followUps: [
        `You can now activate the virtual environment with: source ${context.environmentRoot}/bin/activate`,
        `The ${registration.name} service is enabled and the application will start automatically on next boot`
      ]
    })

    return {status: 'succeeded', run: result.run, backup, registration, artifact}
  }
}

function failureHints(recoverable: boolean, backup: BackupResult): string[] {
  if (recoverable) {
    return ['Fix the cause above and run the provisioner again; completed steps are safe to repeat']
  }

  if (backup.kind === 'snapshot' && backup.snapshots.length > 0) {
    return [`Previous installation state is kept in ${backup.directory}`]
  }

  return ['Run the provisioner again to rebuild the removed resources']
}
