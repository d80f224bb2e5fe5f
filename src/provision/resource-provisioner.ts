import {join} from 'node:path'
import {VerificationError} from '../errors.js'
import {decideResourceAction, requestRecreate, type Confirmer, type ResourceAction} from '../core/decision.js'
import type {Reporter} from '../core/reporter.js'
import {pathExists} from '../core/utils.js'
import {
  environmentPython,
  type AssetFetcher,
  type CommandRunner,
  type EnvironmentManager,
  type LanguagePackageInstaller,
  type OnLogLine,
  type RepoProvider,
  type SdkInstaller,
  type SystemPackageManager
} from '../engine/index.js'
import type {EnvironmentHandle, ExternalRepo, PipelineContext} from '../types.js'

export type ResourceCollaborators = {
  systemPackages: SystemPackageManager;
  pythonPackages: LanguagePackageInstaller;
  environments: EnvironmentManager;
  repositories: RepoProvider;
  sdkInstaller: SdkInstaller;
  assets: AssetFetcher;
  runner: CommandRunner;
  confirmer: Confirmer;
}

/**
 * Owns the environment root and the SDK checkout: nothing else in the
 * pipeline creates or removes them.
 *
 * Existing resources are reused unless the run's resource policy (or the
 * operator, when prompted) asks for them to be recreated.
 */
export class ResourceProvisioner {
  private readonly onLogLine: OnLogLine

  constructor(
    private readonly context: PipelineContext,
    private readonly collaborators: ResourceCollaborators,
    private readonly reporter: Reporter
  ) {
    this.onLogLine = ({stream, line}) => {
      this.reporter.log(stream, line)
    }
  }

  // -- system ------------------------------------------------------------------

  async updateSystem(): Promise<void> {
    const {systemPackages} = this.collaborators
    await systemPackages.refresh()
    await systemPackages.upgrade()
    await systemPackages.install(this.context.config.packages.camera)
  }

  async installSystemPackages(packages: readonly string[]): Promise<void> {
    await this.collaborators.systemPackages.install(packages)
  }

  // -- environment -------------------------------------------------------------

  async inspectEnvironment(): Promise<EnvironmentHandle> {
    const rootPath = this.context.environmentRoot
    const exists = await this.collaborators.environments.exists(rootPath)
    const recreateRequested = exists
      ? await this.askRecreate('Virtual environment', rootPath)
      : false

    return {rootPath, exists, recreateRequested}
  }

  async ensureEnvironment(): Promise<ResourceAction> {
    const {environments} = this.collaborators
    const systemSitePackages = this.context.config.environment.systemSitePackages

    await this.collaborators.systemPackages.install(this.context.config.packages.venv)

    const handle = await this.inspectEnvironment()
    const action = decideResourceAction(handle.exists, handle.recreateRequested)
    switch (action) {
      case 'create': {
        await environments.create(handle.rootPath, {systemSitePackages})
        break
      }

      case 'reuse': {
        this.notice(`Keeping existing virtual environment at ${handle.rootPath}`)
        break
      }

      case 'recreate': {
        await environments.remove(handle.rootPath)
        await environments.create(handle.rootPath, {systemSitePackages})
        break
      }
    }

    return action
  }

  async installPythonDependencies(): Promise<void> {
    const {config, hostPaths} = this.context
    const {pythonPackages} = this.collaborators

    await pythonPackages.install(config.pythonPackages.upgrade, {upgrade: true})
    await pythonPackages.install(config.pythonPackages.bootstrap)
    await this.installSystemPackages([...config.packages.qtBuild, ...config.packages.desktop])
    await pythonPackages.installRequirementsFile(join(hostPaths.appDir, config.requirementsFile))
  }

  async installApplication(): Promise<void> {
    await this.collaborators.pythonPackages.installEditablePackage(this.context.hostPaths.appDir)
  }

  // -- repositories ------------------------------------------------------------

  async inspectRepository(url: string, localPath: string): Promise<ExternalRepo> {
    return {url, localPath, exists: await this.collaborators.repositories.exists(localPath)}
  }

  async ensureRepository(url: string, localPath: string): Promise<ResourceAction> {
    const {repositories} = this.collaborators
    const repo = await this.inspectRepository(url, localPath)
    const recreateRequested = repo.exists ? await this.askRecreate('Repository', localPath) : false
    const action = decideResourceAction(repo.exists, recreateRequested)

    switch (action) {
      case 'create': {
        await repositories.clone(repo.url, repo.localPath)
        break
      }

      case 'reuse': {
        this.notice(`Keeping existing repository at ${repo.localPath}`)
        break
      }

      case 'recreate': {
        await repositories.remove(repo.localPath)
        await repositories.clone(repo.url, repo.localPath)
        break
      }
    }

    return action
  }

  /**
   * Materializes the SDK and its runtime sources, then hands over to the
   * SDK's own installer.
   */
  async installSdk(): Promise<void> {
    const {sdk} = this.context.config
    const {repositories, sdkInstaller} = this.collaborators
    const sdkRoot = this.context.sdkRoot

    await this.ensureRepository(sdk.url, sdkRoot)

    // Lives inside the SDK tree, so it goes away whenever the SDK is recloned
    const runtimeSources = join(sdkRoot, sdk.runtimeSources.dir)
    if (await repositories.exists(runtimeSources)) {
      this.notice(`Keeping existing runtime sources at ${runtimeSources}`)
    } else {
      await repositories.clone(sdk.runtimeSources.url, runtimeSources)
    }

    await sdkInstaller.install(sdkRoot, {skipComponent: sdk.skipComponent, targetPlatform: sdk.targetPlatform})
  }

  // -- assets ------------------------------------------------------------------

  async fetchModels(): Promise<void> {
    for (const model of this.context.config.models) {
      const destination = join(this.context.hostPaths.appDir, model.fileName)
      if (await pathExists(destination)) {
        this.notice(`Keeping existing ${model.fileName}`)
        continue
      }

      await this.collaborators.assets.fetch(model.url, destination)
    }
  }

  // -- verification ------------------------------------------------------------

  /**
   * Imports the vision library inside the environment and returns the
   * version it reports.
   */
  async verify(): Promise<string> {
    const {module, label} = this.context.config.verification
    const result = await this.collaborators.runner.run({
      command: environmentPython(this.context.environmentRoot),
      args: ['-c', `import ${module}; print(${module}.__version__)`]
    }, this.onLogLine)

    const version = result.stdout.trim()
    if (version.length === 0) {
      throw new VerificationError(`${label} did not report a version`)
    }

    this.notice(`${label} version: ${version}`)
    return version
  }

  // -- session -----------------------------------------------------------------

  /** Boots into the desktop with the operating user logged in. */
  async configureSession(): Promise<void> {
    await this.collaborators.runner.run({
      command: 'raspi-config',
      args: ['nonint', 'do_boot_behaviour', 'B4'],
      elevated: true
    }, this.onLogLine)
    await this.installSystemPackages(this.context.config.packages.displayServer)
  }

  async fixRuntimeDirectory(): Promise<void> {
    await this.collaborators.runner.run({
      command: 'chmod',
      args: ['700', `/run/user/${this.context.user.uid}`],
      elevated: true
    }, this.onLogLine)
  }

  private async askRecreate(kind: string, path: string): Promise<boolean> {
    this.reporter.emit({event: 'WARNING', code: 'RESOURCE_EXISTS', message: `${kind} already exists: ${path}`})
    return requestRecreate(this.context.resourcePolicy, this.collaborators.confirmer, 'Do you want to delete and recreate it?')
  }

  private notice(message: string): void {
    this.reporter.emit({event: 'NOTICE', message})
  }
}
