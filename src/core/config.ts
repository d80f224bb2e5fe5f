import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {fileURLToPath} from 'node:url'
import {mergeWith} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'
import type {ModelAsset, PackageGroups, ProvisionConfig, RestartPolicy} from '../types.js'

export const defaultConfigPath = fileURLToPath(new URL('../../config/defaults.yml', import.meta.url))

/** Project-level overrides, looked up in the application directory. */
export const projectConfigFilename = 'provision.yml'

type Document = Record<string, unknown>

/**
 * Loads the bundled defaults and merges the project overrides over them.
 * An explicit `configFile` must exist; the implicit `provision.yml` may not.
 */
export async function loadConfig(options: {appDir: string; configFile?: string}): Promise<ProvisionConfig> {
  const defaults = await readDocument(defaultConfigPath)
  let overrides: unknown
  if (options.configFile) {
    overrides = await readOptionalDocument(options.configFile)
    if (overrides === undefined) {
      throw new ConfigError(`Config file not found: ${options.configFile}`)
    }
  } else {
    overrides = await readOptionalDocument(join(options.appDir, projectConfigFilename)) ?? {}
  }

  return resolveConfig(defaults, overrides)
}

/**
 * Deep-merges `overrides` over `defaults` (lists replace, objects merge) and
 * validates the result.
 */
export function resolveConfig(defaults: unknown, overrides: unknown): ProvisionConfig {
  const merged: unknown = mergeWith({}, defaults, overrides, (_target: unknown, source: unknown) => Array.isArray(source) ? source : undefined)
  return validateConfig(merged)
}

async function readDocument(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf8')
  try {
    return parseYaml(content) ?? {}
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}`, {cause: error})
  }
}

/** Undefined when the file does not exist. */
async function readOptionalDocument(path: string): Promise<unknown> {
  try {
    return await readDocument(path)
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

// -- validation ----------------------------------------------------------------

export function validateConfig(input: unknown): ProvisionConfig {
  const root = record(input, 'config')

  const network = section(root, 'network')
  const privilege = section(root, 'privilege')
  const environment = section(root, 'environment')
  const pythonPackages = section(root, 'pythonPackages')
  const sdk = section(root, 'sdk')
  const runtimeSources = section(sdk, 'runtimeSources', 'sdk')
  const verification = section(root, 'verification')
  const service = section(root, 'service')
  const display = section(root, 'display')
  const session = section(root, 'session')
  const acceleration = section(root, 'acceleration')
  const launcher = section(root, 'launcher')

  return {
    interpreter: string(root, 'interpreter'),
    minFreeDiskGiB: number(root, 'minFreeDiskGiB'),
    network: {probeHost: string(network, 'probeHost', 'network')},
    privilege: {sudo: boolean(privilege, 'sudo', 'privilege')},
    environment: {
      dir: string(environment, 'dir', 'environment'),
      systemSitePackages: boolean(environment, 'systemSitePackages', 'environment')
    },
    requirementsFile: string(root, 'requirementsFile'),
    packages: packageGroups(section(root, 'packages')),
    pythonPackages: {
      bootstrap: stringList(pythonPackages, 'bootstrap', 'pythonPackages'),
      upgrade: stringList(pythonPackages, 'upgrade', 'pythonPackages')
    },
    sdk: {
      url: string(sdk, 'url', 'sdk'),
      dir: string(sdk, 'dir', 'sdk'),
      runtimeSources: {
        url: string(runtimeSources, 'url', 'sdk.runtimeSources'),
        dir: string(runtimeSources, 'dir', 'sdk.runtimeSources')
      },
      targetPlatform: string(sdk, 'targetPlatform', 'sdk'),
      skipComponent: string(sdk, 'skipComponent', 'sdk')
    },
    verification: {
      module: string(verification, 'module', 'verification'),
      label: string(verification, 'label', 'verification')
    },
    models: modelAssets(root.models),
    service: {
      name: string(service, 'name', 'service'),
      description: string(service, 'description', 'service'),
      launcherModule: string(service, 'launcherModule', 'service'),
      preStartHook: string(service, 'preStartHook', 'service'),
      restartPolicy: restartPolicy(service.restartPolicy),
      restartDelaySeconds: number(service, 'restartDelaySeconds', 'service'),
      wantedBy: string(service, 'wantedBy', 'service'),
      unitDir: string(service, 'unitDir', 'service')
    },
    display: {display: string(display, 'display', 'display')},
    session: {autologin: boolean(session, 'autologin', 'session')},
    acceleration: {
      sdkPath: string(acceleration, 'sdkPath', 'acceleration'),
      libArch: string(acceleration, 'libArch', 'acceleration')
    },
    launcher: {
      fileName: string(launcher, 'fileName', 'launcher'),
      startupDelaySeconds: number(launcher, 'startupDelaySeconds', 'launcher'),
      startCommand: string(launcher, 'startCommand', 'launcher'),
      autostartName: string(launcher, 'autostartName', 'launcher'),
      shortcutName: string(launcher, 'shortcutName', 'launcher'),
      displayName: string(launcher, 'displayName', 'launcher')
    }
  }
}

function packageGroups(packages: Document): PackageGroups {
  const list = (key: string) => stringList(packages, key, 'packages')
  return {
    camera: list('camera'),
    venv: list('venv'),
    qtBuild: list('qtBuild'),
    desktop: list('desktop'),
    accelerator: list('accelerator'),
    systemLibraries: list('systemLibraries'),
    windowManagement: list('windowManagement'),
    wayland: list('wayland'),
    displayServer: list('displayServer')
  }
}

function modelAssets(value: unknown): ModelAsset[] {
  if (value === undefined || value === null) {
    return []
  }

  if (!Array.isArray(value)) {
    throw new ConfigError('models must be a list')
  }

  return value.map((item, index) => {
    const model = record(item, `models[${index}]`)
    const url = string(model, 'url', `models[${index}]`)
    if (!URL.canParse(url)) {
      throw new ConfigError(`models[${index}].url is not a valid URL: ${url}`)
    }

    const fileName = string(model, 'fileName', `models[${index}]`)
    if (fileName.includes('/')) {
      throw new ConfigError(`models[${index}].fileName must be a bare file name`)
    }

    return {url, fileName}
  })
}

function restartPolicy(value: unknown): RestartPolicy {
  if (value === 'always' || value === 'never') {
    return value
  }

  throw new ConfigError('service.restartPolicy must be "always" or "never"')
}

function isRecord(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function record(value: unknown, path: string): Document {
  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be a mapping`)
  }

  return value
}

function section(parent: Document, key: string, parentPath?: string): Document {
  return record(parent[key], keyPath(key, parentPath))
}

function string(parent: Document, key: string, parentPath?: string): string {
  const value = parent[key]
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${keyPath(key, parentPath)} must be a non-empty string`)
  }

  return value
}

function number(parent: Document, key: string, parentPath?: string): number {
  const value = parent[key]
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${keyPath(key, parentPath)} must be a non-negative number`)
  }

  return value
}

function boolean(parent: Document, key: string, parentPath?: string): boolean {
  const value = parent[key]
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${keyPath(key, parentPath)} must be true or false`)
  }

  return value
}

function stringList(parent: Document, key: string, parentPath?: string): string[] {
  const value = parent[key]
  if (value === undefined || value === null) {
    return []
  }

  if (!Array.isArray(value) || !value.every(item => typeof item === 'string' && item.length > 0)) {
    throw new ConfigError(`${keyPath(key, parentPath)} must be a list of names`)
  }

  return value.map(String)
}

function keyPath(key: string, parentPath?: string): string {
  return parentPath ? `${parentPath}.${key}` : key
}
