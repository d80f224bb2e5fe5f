// ---------------------------------------------------------------------------
// Shared provisioning domain types.
//
// Used by the step runner, the provisioning components and the CLI. All of
// them receive the same frozen PipelineContext built at process start.
// ---------------------------------------------------------------------------

// -- Host ---------------------------------------------------------------------

/** Directories the pipeline reads from and writes into. */
export type HostPaths = {
  /** Application checkout (the directory the provisioner is started from). */
  appDir: string;
  /** Parent of the application directory; environment and SDK live here. */
  repoRoot: string;
  /** Home directory of the operating user. */
  homeDir: string;
}

export type OperatingUser = {
  name: string;
  uid: number;
}

// -- Configuration ------------------------------------------------------------

export type ResourcePolicy = 'prompt' | 'reuse' | 'recreate'

export type RestartPolicy = 'always' | 'never'

export type ModelAsset = {
  url: string;
  /** File name in the application directory, after decompression. */
  fileName: string;
}

export type PackageGroups = {
  camera: string[];
  venv: string[];
  qtBuild: string[];
  desktop: string[];
  accelerator: string[];
  systemLibraries: string[];
  windowManagement: string[];
  wayland: string[];
  displayServer: string[];
}

export type ProvisionConfig = {
  interpreter: string;
  minFreeDiskGiB: number;
  network: {probeHost: string};
  privilege: {sudo: boolean};
  environment: {dir: string; systemSitePackages: boolean};
  requirementsFile: string;
  packages: PackageGroups;
  pythonPackages: {bootstrap: string[]; upgrade: string[]};
  sdk: {
    url: string;
    dir: string;
    runtimeSources: {url: string; dir: string};
    targetPlatform: string;
    skipComponent: string;
  };
  verification: {module: string; label: string};
  models: ModelAsset[];
  service: {
    name: string;
    description: string;
    launcherModule: string;
    preStartHook: string;
    restartPolicy: RestartPolicy;
    restartDelaySeconds: number;
    wantedBy: string;
    unitDir: string;
  };
  display: {display: string};
  session: {autologin: boolean};
  acceleration: {sdkPath: string; libArch: string};
  launcher: {
    fileName: string;
    startupDelaySeconds: number;
    startCommand: string;
    autostartName: string;
    shortcutName: string;
    displayName: string;
  };
}

/**
 * Everything a component needs to know about the run, built once at process
 * start and frozen.
 */
export type PipelineContext = {
  readonly hostPaths: Readonly<HostPaths>;
  readonly user: Readonly<OperatingUser>;
  readonly config: ProvisionConfig;
  /** Virtual environment root, resolved against `repoRoot`. */
  readonly environmentRoot: string;
  /** SDK checkout, resolved against `repoRoot`. */
  readonly sdkRoot: string;
  readonly resourcePolicy: ResourcePolicy;
}

// -- Pipeline -----------------------------------------------------------------

/**
 * A unit of work in the pipeline. The operation signals failure by throwing.
 */
export type Step = {
  /** 1-based, contiguous across the pipeline. */
  ordinal: number;
  label: string;
  operation: () => Promise<void>;
  /** True when re-running the provisioner repairs a failure of this step. */
  recoverable: boolean;
}

export type PipelineStatus =
  | {state: 'pending'}
  | {state: 'running'}
  | {state: 'failed'; stepLabel: string}
  | {state: 'succeeded'}

export type PipelineRun = {
  hostPaths: Readonly<HostPaths>;
  totalSteps: number;
  currentStep: number;
  status: PipelineStatus;
}

// -- Resources ----------------------------------------------------------------

export type BackupSnapshot = {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly createdAt: Date;
}

export type EnvironmentHandle = {
  rootPath: string;
  exists: boolean;
  recreateRequested: boolean;
}

export type ExternalRepo = {
  url: string;
  localPath: string;
  exists: boolean;
}

export type ServiceDefinition = {
  name: string;
  description: string;
  user: string;
  workingDirectory: string;
  environment: Record<string, string>;
  /** Diagnostic command run before start; its failure never blocks startup. */
  execStartPre?: string;
  execStart: string;
  restartPolicy: RestartPolicy;
  restartDelaySeconds: number;
  wantedBy: string;
}

export type AutostartArtifact = {
  launcherPath: string;
  autostartEntryPath: string;
  desktopShortcutPath: string;
  displayEnv: {DISPLAY: string; XAUTHORITY: string};
}
