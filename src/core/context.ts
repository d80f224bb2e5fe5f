import {dirname, resolve} from 'node:path'
import type {HostPaths, OperatingUser, PipelineContext, ProvisionConfig, ResourcePolicy} from '../types.js'

export type ContextOptions = {
  appDir: string;
  homeDir: string;
  user: OperatingUser;
  config: ProvisionConfig;
  resourcePolicy: ResourcePolicy;
}

/**
 * Application directory plus the two directories derived from the host.
 */
export function resolveHostPaths(appDir: string, homeDir: string): HostPaths {
  const absoluteAppDir = resolve(appDir)
  return {
    appDir: absoluteAppDir,
    repoRoot: dirname(absoluteAppDir),
    homeDir: resolve(homeDir)
  }
}

/**
 * Builds the context every component receives. The result is deeply frozen:
 * nothing may change it once the run has started.
 */
export function createPipelineContext(options: ContextOptions): PipelineContext {
  const hostPaths = resolveHostPaths(options.appDir, options.homeDir)
  return deepFreeze({
    hostPaths,
    user: {...options.user},
    config: structuredClone(options.config),
    environmentRoot: resolve(hostPaths.repoRoot, options.config.environment.dir),
    sdkRoot: resolve(hostPaths.repoRoot, options.config.sdk.dir),
    resourcePolicy: options.resourcePolicy
  })
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }

  return Object.freeze(value)
}
