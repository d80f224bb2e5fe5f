import process from 'node:process'
import {userInfo} from 'node:os'
import type {Command} from 'commander'
import type {ProvisionOutcome} from '../provision/index.js'
import type {OperatingUser, ResourcePolicy} from '../types.js'

export type GlobalOptions = {
  appDir: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  nonInteractive?: boolean;
  reuse?: boolean;
  recreate?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * `--recreate` and `--reuse` win over everything; otherwise an interactive
 * run asks and an unattended one keeps what it finds.
 */
export function resolveResourcePolicy(options: Pick<GlobalOptions, 'reuse' | 'recreate'>, interactive: boolean): ResourcePolicy {
  if (options.recreate) {
    return 'recreate'
  }

  if (options.reuse) {
    return 'reuse'
  }

  return interactive ? 'prompt' : 'reuse'
}

/** Process exit code for a finished run: zero only when provisioning succeeded. */
export function exitCodeFor(outcome: Pick<ProvisionOutcome, 'status'>): number {
  return outcome.status === 'succeeded' ? 0 : 1
}

/** Why the policy flags cannot be used together, if they cannot. */
export function policyFlagConflict(options: Pick<GlobalOptions, 'reuse' | 'recreate'>): string | undefined {
  return options.reuse && options.recreate ? '--reuse and --recreate cannot be combined' : undefined
}

export function isInteractive(options: Pick<GlobalOptions, 'json' | 'nonInteractive'>): boolean {
  return !options.json && !options.nonInteractive && Boolean(process.stdin.isTTY)
}

/** The user the service runs as, and whose home receives the launcher. */
export function operatingUser(): {user: OperatingUser; homeDir: string} {
  const info = userInfo()
  return {
    user: {name: info.username, uid: info.uid},
    homeDir: process.env.HOME ?? info.homedir
  }
}
