import {numberSteps} from '../core/step-runner.js'
import type {PipelineContext, Step} from '../types.js'
import type {ResourceProvisioner} from './resource-provisioner.js'

type StepDefinition = Omit<Step, 'ordinal'>

/**
 * The provisioning pipeline, in execution order. Steps switched off by the
 * configuration are left out, so ordinals stay contiguous.
 *
 * Steps that may remove an existing resource are not recoverable: after
 * they fail, the backup is the way back.
 */
export function buildProvisioningSteps(context: PipelineContext, resources: ResourceProvisioner): Step[] {
  const {packages, models, session} = context.config

  const definitions: Array<StepDefinition | false> = [
    {
      label: 'Updating system packages',
      recoverable: true,
      operation: async () => resources.updateSystem()
    },
    {
      label: 'Setting up Python virtual environment',
      recoverable: false,
      async operation() {
        await resources.ensureEnvironment()
      }
    },
    {
      label: 'Installing Python dependencies',
      recoverable: true,
      operation: async () => resources.installPythonDependencies()
    },
    {
      label: 'Installing accelerator components',
      recoverable: true,
      operation: async () => resources.installSystemPackages(packages.accelerator)
    },
    {
      label: 'Installing system libraries',
      recoverable: true,
      operation: async () => resources.installSystemPackages(packages.systemLibraries)
    },
    {
      label: 'Cloning and setting up repositories',
      recoverable: false,
      operation: async () => resources.installSdk()
    },
    models.length > 0 && {
      label: 'Downloading detection models',
      recoverable: true,
      operation: async () => resources.fetchModels()
    },
    {
      label: 'Performing final setup',
      recoverable: true,
      operation: async () => resources.installApplication()
    },
    {
      label: 'Verifying installation',
      recoverable: true,
      async operation() {
        await resources.verify()
      }
    },
    {
      label: 'Installing window management tools',
      recoverable: true,
      operation: async () => resources.installSystemPackages(packages.windowManagement)
    },
    {
      label: 'Installing Qt and Wayland dependencies',
      recoverable: true,
      operation: async () => resources.installSystemPackages(packages.wayland)
    },
    session.autologin && {
      label: 'Configuring desktop session',
      recoverable: true,
      operation: async () => resources.configureSession()
    },
    {
      label: 'Fixing runtime directory permissions',
      recoverable: true,
      operation: async () => resources.fixRuntimeDirectory()
    }
  ]

  return numberSteps(definitions.filter((definition): definition is StepDefinition => definition !== false))
}
