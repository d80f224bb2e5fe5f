export {PreflightChecker, type PreflightResult} from './preflight.js'
export {BackupManager, type BackupResult} from './backup.js'
export {ResourceProvisioner, type ResourceCollaborators} from './resource-provisioner.js'
export {buildProvisioningSteps} from './steps.js'
export {ServiceRegistrar, serviceDefinition, renderUnit, systemdQuote, type Registration, type ServiceRegistrarOptions} from './service-registrar.js'
export {ArtifactGenerator, artifactPaths, renderLauncher, renderAutostartEntry, renderDesktopShortcut, desktopExec} from './artifact-generator.js'
export {Provisioner, type Collaborators, type ProvisionerOptions, type ProvisionOutcome} from './provisioner.js'
