import {join} from 'node:path'
import {setTimeout} from 'node:timers/promises'
import {PostStartWarning, RegistrationError, errorMessage, type RegistrationPhase} from '../errors.js'
import type {Reporter} from '../core/reporter.js'
import {environmentPython, type ServiceManager} from '../engine/index.js'
import type {PipelineContext, ServiceDefinition} from '../types.js'

const startAttempts = 2

export type Registration = {
  name: string;
  unitPath: string;
  /** False when the unit is enabled but could not be started right away. */
  started: boolean;
}

export type ServiceRegistrarOptions = {
  /** Pause before the single start retry (default: the unit's restart delay). */
  startRetryDelayMs?: number;
}

/**
 * The service definition for the application, running from the
 * environment's interpreter.
 */
export function serviceDefinition(context: PipelineContext): ServiceDefinition {
  const {config, hostPaths, user} = context
  const python = environmentPython(context.environmentRoot)

  return {
    name: config.service.name,
    description: config.service.description,
    user: user.name,
    workingDirectory: hostPaths.appDir,
    environment: {
      DISPLAY: config.display.display,
      XAUTHORITY: join(hostPaths.homeDir, '.Xauthority'),
      PYTHONUNBUFFERED: '1'
    },
    execStartPre: `${systemdQuote(python)} -c ${systemdQuote(config.service.preStartHook)}`,
    execStart: `${systemdQuote(python)} -m ${config.service.launcherModule}`,
    restartPolicy: config.service.restartPolicy,
    restartDelaySeconds: config.service.restartDelaySeconds,
    wantedBy: config.service.wantedBy
  }
}

/**
 * Renders a systemd unit. The pre-start command is prefixed with `-` so a
 * failing diagnostic never keeps the service from starting.
 */
export function renderUnit(definition: ServiceDefinition): string {
  const lines = [
    '[Unit]',
    `Description=${definition.description}`,
    'After=network.target',
    'After=multi-user.target',
    '',
    '[Service]',
    'Type=simple',
    `User=${definition.user}`,
    `WorkingDirectory=${definition.workingDirectory}`
  ]

  for (const [key, value] of Object.entries(definition.environment)) {
    lines.push(`Environment=${environmentQuote(`${key}=${value}`)}`)
  }

  if (definition.execStartPre) {
    lines.push(`ExecStartPre=-${definition.execStartPre}`)
  }

  lines.push(
    `ExecStart=${definition.execStart}`,
    `Restart=${definition.restartPolicy === 'always' ? 'always' : 'no'}`,
    `RestartSec=${definition.restartDelaySeconds}`,
    '',
    '[Install]',
    `WantedBy=${definition.wantedBy}`,
    ''
  )

  return lines.join('\n')
}

/**
 * Quotes a single argument for a unit file. Plain words stay bare; anything
 * else is double-quoted with `\`, `"`, `$` and `%` escaped.
 */
export function systemdQuote(value: string): string {
  if (/^[\w@+=:,./-]+$/.test(value)) {
    return value
  }

  const escaped = value
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('$', () => '$$')
    .replaceAll('%', '%%')
  return `"${escaped}"`
}

/**
 * Quotes an `Environment=` assignment. systemd does not expand `$` there,
 * so only `\`, `"` and `%` are escaped.
 */
export function environmentQuote(assignment: string): string {
  if (/^[\w@+=:,./-]+$/.test(assignment)) {
    return assignment
  }

  const escaped = assignment
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('%', '%%')
  return `"${escaped}"`
}

/**
 * Installs the unit and enables it for every future boot.
 *
 * Write, reload and enable failures are fatal. Starting right away is tried
 * twice; when both attempts fail the service still comes up on the next boot
 * and the failure is only reported as a warning.
 */
export class ServiceRegistrar {
  constructor(
    private readonly services: ServiceManager,
    private readonly reporter: Reporter,
    private readonly options?: ServiceRegistrarOptions
  ) {}

  async register(definition: ServiceDefinition): Promise<Registration> {
    const {name} = definition
    const unitPath = await this.phase(name, 'write', async () => this.services.write({name, content: renderUnit(definition)}))
    await this.phase(name, 'reload', async () => this.services.reloadUnits())
    await this.phase(name, 'enable', async () => this.services.enable(name))

    const started = await this.startWithRetry(definition)
    this.reporter.emit({event: 'SERVICE_REGISTERED', name, unitPath, started})
    return {name, unitPath, started}
  }

  private async startWithRetry(definition: ServiceDefinition): Promise<boolean> {
    const retryDelay = this.options?.startRetryDelayMs ?? definition.restartDelaySeconds * 1000

    for (let attempt = 1; ; attempt++) {
      try {
        await this.services.start(definition.name)
        return true
      } catch (error) {
        if (attempt >= startAttempts) {
          const warning = new PostStartWarning(definition.name, {cause: error})
          this.reporter.emit({event: 'WARNING', code: warning.code, message: `${warning.message}: ${errorMessage(error)}`})
          return false
        }

        await setTimeout(retryDelay)
      }
    }
  }

  private async phase<T>(name: string, phase: RegistrationPhase, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    } catch (error) {
      throw new RegistrationError(name, phase, {cause: error})
    }
  }
}
