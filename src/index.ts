/**
 * Provisioning pipeline for programmatic use.
 *
 * Every external tool sits behind an interface (package managers, git, the
 * service manager, host probes), so the pipeline can be driven with other
 * implementations than the execa-backed ones shipped here.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ConsoleReporter, ExecaCommandRunner, Provisioner, createPipelineContext, loadConfig} from 'appliance-provisioner'
 *
 * const config = await loadConfig({appDir: '/home/pi/device/Application'})
 * const context = createPipelineContext({
 *   appDir: '/home/pi/device/Application',
 *   homeDir: '/home/pi',
 *   user: {name: 'pi', uid: 1000},
 *   config,
 *   resourcePolicy: 'reuse'
 * })
 *
 * const outcome = await new Provisioner(context, collaborators, new ConsoleReporter()).run()
 * ```
 */

export {
  CommandRunner,
  ExecaCommandRunner,
  AptPackageManager,
  PipInstaller,
  VenvEnvironmentManager,
  GitRepoProvider,
  ScriptSdkInstaller,
  SystemdServiceManager,
  SystemHostProbe,
  WgetAssetFetcher,
  environmentPython,
  sdkInstallArgs,
  type CommandRequest,
  type CommandResult,
  type LogLine,
  type OnLogLine,
  type SystemPackageManager,
  type LanguagePackageInstaller,
  type EnvironmentManager,
  type RepoProvider,
  type SdkInstaller,
  type SdkInstallFlags,
  type ServiceManager,
  type ServiceUnit,
  type HostProbe,
  type AssetFetcher
} from './engine/index.js'

export {
  StepRunner,
  ConsoleReporter,
  loadConfig,
  resolveConfig,
  createPipelineContext,
  resolveHostPaths,
  decideResourceAction,
  requestRecreate,
  numberSteps,
  formatProgress,
  type Confirmer,
  type ResourceAction,
  type PipelineResult,
  type Reporter,
  type StepRef,
  type ProvisionEvent
} from './core/index.js'

export {
  Provisioner,
  PreflightChecker,
  BackupManager,
  ResourceProvisioner,
  ServiceRegistrar,
  ArtifactGenerator,
  buildProvisioningSteps,
  serviceDefinition,
  renderUnit,
  renderLauncher,
  renderAutostartEntry,
  renderDesktopShortcut,
  type Collaborators,
  type ProvisionOutcome,
  type BackupResult,
  type PreflightResult,
  type Registration
} from './provision/index.js'

export type * from './types.js'

export {
  ProvisionError,
  PreflightBlocker,
  StepFailure,
  PipelineDefinitionError,
  ConfigError,
  VerificationError,
  CommandError,
  CommandNotFoundError,
  CommandFailedError,
  RegistrationError,
  ArtifactError,
  BackupWarning,
  PostStartWarning
} from './errors.js'
