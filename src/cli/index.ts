#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {loadConfig} from '../core/config.js'
import {createPipelineContext} from '../core/context.js'
import {ConsoleReporter} from '../core/reporter.js'
import {ProvisionError, errorMessage} from '../errors.js'
import {Provisioner} from '../provision/index.js'
import type {PipelineContext} from '../types.js'
import {createHostCollaborators} from './collaborators.js'
import {InteractiveReporter, errorLine, infoLine} from './interactive-reporter.js'
import {DefaultsConfirmer, ReadlinePrompter} from './prompt.js'
import {type GlobalOptions, exitCodeFor, getGlobalOptions, isInteractive, operatingUser, policyFlagConflict, resolveResourcePolicy} from './utils.js'

async function buildContext(options: GlobalOptions, interactive: boolean): Promise<PipelineContext> {
  const config = await loadConfig({appDir: options.appDir, configFile: options.config})
  const {user, homeDir} = operatingUser()
  return createPipelineContext({
    appDir: options.appDir,
    homeDir,
    user,
    config,
    resourcePolicy: resolveResourcePolicy(options, interactive)
  })
}

async function runProvisioning(options: GlobalOptions): Promise<void> {
  const interactive = isInteractive(options)
  const interactiveReporter = options.json ? undefined : new InteractiveReporter({verbose: options.verbose})
  const reporter = interactiveReporter ?? new ConsoleReporter()
  const confirmer = interactive
    ? new ReadlinePrompter({
      onPrompt: () => interactiveReporter?.suspend(),
      onAnswer: () => interactiveReporter?.resume()
    })
    : new DefaultsConfirmer(reporter)

  const context = await buildContext(options, interactive)
  const provisioner = new Provisioner(context, createHostCollaborators(context, reporter, confirmer), reporter)
  const outcome = await provisioner.run()

  if (outcome.status === 'failed') {
    reportFailure(outcome.error, outcome.hints, options.json)
  }

  process.exitCode = exitCodeFor(outcome)
}

function reportFailure(error: ProvisionError, hints: string[], json?: boolean): void {
  const detail = error.cause === undefined ? error.message : `${error.message}: ${errorMessage(error.cause)}`
  if (json) {
    console.error('Provisioning failed:', detail)
    return
  }

  console.error(errorLine(detail))
  for (const hint of hints) {
    console.error(infoLine(hint))
  }
}

async function main() {
  const program = new Command()

  program
    .name('provision')
    .description('Provision a single-board computer to run the vision application as a service')
    .version('0.1.0')
    .option('--app-dir <path>', 'Application directory', process.env.PROVISION_APP_DIR ?? process.cwd())
    .option('--config <file>', 'Configuration file merged over the defaults')
    .option('--json', 'Output structured JSON logs')
    .option('--verbose', 'Stream the output of every command')
    .option('--non-interactive', 'Never prompt; take the default answer')
    .option('--reuse', 'Keep existing resources without asking')
    .option('--recreate', 'Delete and recreate existing resources without asking')

  program
    .command('run', {isDefault: true})
    .description('Provision this host')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const options = getGlobalOptions(cmd)
      const conflict = policyFlagConflict(options)
      if (conflict) {
        console.error(errorLine(conflict))
        process.exitCode = 1
        return
      }

      try {
        await runProvisioning(options)
      } catch (error: unknown) {
        if (error instanceof ProvisionError) {
          reportFailure(error, [], options.json)
          process.exitCode = exitCodeFor({status: 'failed'})
          return
        }

        throw error
      }
    })

  program
    .command('plan')
    .description('List the provisioning steps without running them')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const options = getGlobalOptions(cmd)
      const reporter = new ConsoleReporter()
      const context = await buildContext(options, false)
      const steps = new Provisioner(context, createHostCollaborators(context, reporter, new DefaultsConfirmer(reporter)), reporter).steps()

      if (options.json) {
        console.log(JSON.stringify(steps.map(({ordinal, label, recoverable}) => ({ordinal, label, recoverable}))))
        return
      }

      for (const step of steps) {
        console.log(`${chalk.gray(String(step.ordinal).padStart(2))}  ${step.label}`)
      }
    })

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
