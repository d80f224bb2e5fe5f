import type {Confirmer} from '../core/decision.js'
import type {Reporter} from '../core/reporter.js'
import {
  AptPackageManager,
  ExecaCommandRunner,
  GitRepoProvider,
  PipInstaller,
  ScriptSdkInstaller,
  SystemHostProbe,
  SystemdServiceManager,
  VenvEnvironmentManager,
  WgetAssetFetcher,
  type OnLogLine
} from '../engine/index.js'
import type {Collaborators} from '../provision/index.js'
import type {PipelineContext} from '../types.js'

/**
 * The real host: apt, venv/pip, git, wget and systemd, all run through execa.
 * Command output goes to the reporter line by line.
 */
export function createHostCollaborators(context: PipelineContext, reporter: Reporter, confirmer: Confirmer): Collaborators {
  const {config} = context
  const runner = new ExecaCommandRunner({sudo: config.privilege.sudo})
  const onLogLine: OnLogLine = ({stream, line}) => {
    reporter.log(stream, line)
  }

  return {
    runner,
    confirmer,
    systemPackages: new AptPackageManager(runner, onLogLine),
    pythonPackages: new PipInstaller(runner, context.environmentRoot, onLogLine),
    environments: new VenvEnvironmentManager(runner, config.interpreter, onLogLine),
    repositories: new GitRepoProvider(runner, onLogLine),
    sdkInstaller: new ScriptSdkInstaller(runner, onLogLine),
    assets: new WgetAssetFetcher(runner, onLogLine),
    hostProbe: new SystemHostProbe(runner),
    services: new SystemdServiceManager(runner, config.service.unitDir, onLogLine)
  }
}
