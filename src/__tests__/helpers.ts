import {mkdir, mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {Confirmer} from '../core/decision.js'
import type {OutputStream, ProvisionEvent, Reporter} from '../core/reporter.js'
import {loadConfig} from '../core/config.js'
import {createPipelineContext} from '../core/context.js'
import {pathExists} from '../core/utils.js'
import {CommandRunner, type CommandRequest, type CommandResult, type OnLogLine} from '../engine/command-runner.js'
import type {
  AssetFetcher,
  EnvironmentManager,
  HostProbe,
  LanguagePackageInstaller,
  RepoProvider,
  SdkInstaller,
  SdkInstallFlags,
  ServiceManager,
  ServiceUnit,
  SystemPackageManager
} from '../engine/index.js'
import type {Collaborators} from '../provision/provisioner.js'
import type {PipelineContext, ProvisionConfig, ResourcePolicy} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'provision-test-'))
}

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

/**
 * Returns a reporter that records every event and output line for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: ProvisionEvent[]; logs: Array<{stream: OutputStream; line: string}>} {
  const events: ProvisionEvent[] = []
  const logs: Array<{stream: OutputStream; line: string}> = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(stream, line) {
      logs.push({stream, line})
    }
  }

  return {reporter, events, logs}
}

/**
 * Confirmer answering from a script, in order. Once the script runs out it
 * takes the default answer.
 */
export function scriptedConfirmer(answers: boolean[] = []): {confirmer: Confirmer; questions: Array<{question: string; defaultAnswer: boolean}>} {
  const questions: Array<{question: string; defaultAnswer: boolean}> = []
  const remaining = [...answers]
  const confirmer: Confirmer = {
    async confirm(question, defaultAnswer) {
      questions.push({question, defaultAnswer})
      return remaining.shift() ?? defaultAnswer
    }
  }

  return {confirmer, questions}
}

// -- command runner ----------------------------------------------------------

type CommandRule = {
  matches: (request: CommandRequest) => boolean;
  stdout?: string;
  error?: Error;
  lines?: Array<{stream: OutputStream; line: string}>;
}

/**
 * Records every request and answers from configured rules. Requests no rule
 * matches succeed with empty output.
 */
export class FakeCommandRunner extends CommandRunner {
  readonly requests: CommandRequest[] = []
  private readonly rules: CommandRule[] = []

  respond(matches: (request: CommandRequest) => boolean, stdout: string, lines?: Array<{stream: OutputStream; line: string}>): this {
    this.rules.push({matches, stdout, lines})
    return this
  }

  fail(matches: (request: CommandRequest) => boolean, error: Error): this {
    this.rules.push({matches, error})
    return this
  }

  async run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult> {
    this.requests.push(request)
    const rule = this.rules.find(r => r.matches(request))
    for (const line of rule?.lines ?? []) {
      onLogLine?.(line)
    }

    if (rule?.error) {
      throw rule.error
    }

    const now = new Date()
    return {exitCode: 0, stdout: rule?.stdout ?? '', startedAt: now, finishedAt: now}
  }

  commandLines(): string[] {
    return this.requests.map(r => [r.command, ...r.args].join(' '))
  }
}

// -- in-memory host ----------------------------------------------------------

export type FakeHostOptions = {
  interpreterVersion?: string;
  freeDiskBytes?: number;
  networkReachable?: boolean;
  /** Journal entries (see `FakeHost.journal`) whose operation should throw. */
  failOn?: string[];
  /** Number of leading start attempts that fail. */
  failedStarts?: number;
  confirmAnswers?: boolean[];
  /** What the verification import prints (default: a version number). */
  verificationOutput?: string;
}

/**
 * In-memory stand-ins for every collaborator, sharing one journal of the
 * operations they performed, e.g. `apt install rsync` or `env remove /x`.
 *
 * Environments and repositories are real directories, so the backup and
 * existence checks see them.
 */
export class FakeHost {
  readonly journal: string[] = []
  readonly runner = new FakeCommandRunner()
  readonly units = new Map<string, string>()
  readonly questions: Array<{question: string; defaultAnswer: boolean}>
  private startAttempts = 0
  private readonly confirmer: Confirmer

  constructor(private readonly options: FakeHostOptions = {}) {
    const scripted = scriptedConfirmer(options.confirmAnswers)
    this.confirmer = scripted.confirmer
    this.questions = scripted.questions
    this.runner.respond(request => request.args[0] === '-c', options.verificationOutput ?? '4.10.0\n')
  }

  /** Entries that removed something from disk. */
  destructiveOperations(): string[] {
    return this.journal.filter(entry => entry.includes(' remove '))
  }

  collaborators(): Collaborators {
    const systemPackages: SystemPackageManager = {
      refresh: async () => this.record('apt update'),
      upgrade: async () => this.record('apt upgrade'),
      install: async packages => this.record(`apt install ${packages.join(' ')}`)
    }

    const pythonPackages: LanguagePackageInstaller = {
      install: async (packages, options) => this.record(`pip install${options?.upgrade ? ' --upgrade' : ''} ${packages.join(' ')}`),
      installRequirementsFile: async path => this.record(`pip install -r ${path}`),
      installEditablePackage: async path => this.record(`pip install -e ${path}`)
    }

    const environments: EnvironmentManager = {
      exists: async rootPath => pathExists(rootPath),
      create: async rootPath => {
        this.record(`env create ${rootPath}`)
        await mkdir(join(rootPath, 'bin'), {recursive: true})
        await writeFile(join(rootPath, 'pyvenv.cfg'), 'home = /usr/bin\n')
      },
      remove: async rootPath => {
        this.record(`env remove ${rootPath}`)
        await rm(rootPath, {recursive: true, force: true})
      }
    }

    const repositories: RepoProvider = {
      exists: async localPath => pathExists(localPath),
      clone: async (url, localPath) => {
        this.record(`git clone ${url} ${localPath}`)
        await mkdir(localPath, {recursive: true})
        await writeFile(join(localPath, 'README'), url)
      },
      remove: async localPath => {
        this.record(`git remove ${localPath}`)
        await rm(localPath, {recursive: true, force: true})
      }
    }

    const sdkInstaller: SdkInstaller = {
      install: async (repoPath: string, flags: SdkInstallFlags) => this.record(`sdk install ${repoPath} ${flags.targetPlatform}`)
    }

    const assets: AssetFetcher = {
      fetch: async (url, destination) => {
        this.record(`fetch ${url}`)
        await mkdir(dirname(destination), {recursive: true})
        await writeFile(destination, 'model')
      }
    }

    const hostProbe: HostProbe = {
      interpreterVersion: async () => 'interpreterVersion' in this.options ? this.options.interpreterVersion : 'Python 3.11.2',
      freeDiskBytes: async () => this.options.freeDiskBytes ?? 64 * 1024 * 1024 * 1024,
      networkReachable: async () => this.options.networkReachable ?? true
    }

    const services: ServiceManager = {
      write: async (unit: ServiceUnit) => {
        this.record(`service write ${unit.name}`)
        this.units.set(unit.name, unit.content)
        return `/etc/systemd/system/${unit.name}.service`
      },
      reloadUnits: async () => this.record('service reload'),
      enable: async name => this.record(`service enable ${name}`),
      start: async name => {
        this.startAttempts++
        this.record(`service start ${name}`)
        if (this.startAttempts <= (this.options.failedStarts ?? 0)) {
          throw new Error('unit failed to start')
        }
      }
    }

    return {
      systemPackages,
      pythonPackages,
      environments,
      repositories,
      sdkInstaller,
      assets,
      hostProbe,
      services,
      runner: this.runner,
      confirmer: this.confirmer
    }
  }

  private record(entry: string): void {
    this.journal.push(entry)
    if (this.options.failOn?.includes(entry)) {
      throw new Error(`${entry} failed`)
    }
  }
}

// -- context -----------------------------------------------------------------

export type TestLayout = {
  root: string;
  appDir: string;
  homeDir: string;
}

/**
 * `<root>/device/Application` as the application directory and `<root>/home`
 * as the operator's home.
 */
export async function createTestLayout(): Promise<TestLayout> {
  const root = await createTmpDir()
  const appDir = join(root, 'device', 'Application')
  const homeDir = join(root, 'home')
  await mkdir(appDir, {recursive: true})
  await mkdir(homeDir, {recursive: true})
  return {root, appDir, homeDir}
}

export async function createTestContext(
  layout: TestLayout,
  options: {resourcePolicy?: ResourcePolicy; config?: (config: ProvisionConfig) => ProvisionConfig} = {}
): Promise<PipelineContext> {
  const defaults = await loadConfig({appDir: layout.appDir})
  return createPipelineContext({
    appDir: layout.appDir,
    homeDir: layout.homeDir,
    user: {name: 'pi', uid: 1000},
    config: options.config ? options.config(defaults) : defaults,
    resourcePolicy: options.resourcePolicy ?? 'reuse'
  })
}
