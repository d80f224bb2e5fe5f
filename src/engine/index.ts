export {CommandRunner, ExecaCommandRunner, type CommandRequest, type CommandResult, type ExecaCommandRunnerOptions, type LogLine, type OnLogLine} from './command-runner.js'
export {AptPackageManager, PipInstaller, type LanguagePackageInstaller, type SystemPackageManager} from './packages.js'
export {VenvEnvironmentManager, environmentPython, type EnvironmentManager} from './environment.js'
export {GitRepoProvider, ScriptSdkInstaller, sdkInstallArgs, type RepoProvider, type SdkInstallFlags, type SdkInstaller} from './repository.js'
export {SystemdServiceManager, type ServiceManager, type ServiceUnit} from './service-manager.js'
export {SystemHostProbe, type HostProbe} from './host-probe.js'
export {WgetAssetFetcher, isBzip2, type AssetFetcher} from './assets.js'
