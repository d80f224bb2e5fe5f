import {mkdir, readdir, readFile, stat, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {PreflightBlocker, RegistrationError, StepFailure} from '../../errors.js'
import {gib, pathExists} from '../../core/utils.js'
import type {PipelineContext, ResourcePolicy} from '../../types.js'
import {Provisioner} from '../provisioner.js'
import {
  FakeHost,
  createTestContext,
  createTestLayout,
  recordingReporter,
  type FakeHostOptions,
  type TestLayout
} from '../../__tests__/helpers.js'

const fixedClock = () => new Date('2026-10-19T05:50:12Z')
const backupName = 'backup_20261019T055012Z'

async function setup(options: {resourcePolicy?: ResourcePolicy; host?: FakeHostOptions} = {}) {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: options.resourcePolicy ?? 'prompt'})
  const host = new FakeHost(options.host)
  const {reporter, events} = recordingReporter()
  const provisioner = new Provisioner(context, host.collaborators(), reporter, {startRetryDelayMs: 0, clock: fixedClock})
  return {layout, context, host, events, provisioner}
}

async function seedEnvironment(context: PipelineContext): Promise<void> {
  await mkdir(join(context.environmentRoot, 'bin'), {recursive: true})
  await writeFile(join(context.environmentRoot, 'pyvenv.cfg'), 'original\n')
}

async function backups(layout: TestLayout): Promise<string[]> {
  const entries = await readdir(join(layout.root, 'device'))
  return entries.filter(entry => entry.startsWith('backup_'))
}

// -- scenarios ---------------------------------------------------------------

test('fresh host with default answers ends with a running service and launchers', async t => {
  const {layout, context, host, events, provisioner} = await setup()

  const outcome = await provisioner.run()

  t.is(outcome.status, 'succeeded')
  if (outcome.status !== 'succeeded') {
    return
  }

  t.deepEqual(outcome.run.status, {state: 'succeeded'})
  t.is(outcome.run.currentStep, 13)
  t.deepEqual(outcome.backup, {kind: 'noop'})
  t.deepEqual(await backups(layout), [])
  t.true(host.journal.includes(`env create ${context.environmentRoot}`))
  t.true(host.journal.includes(`git clone https://github.com/Aoyamaxx/tappas_gcc12 ${context.sdkRoot}`))
  t.true(host.journal.includes('service enable rpi-control'))
  t.deepEqual(host.destructiveOperations(), [])
  t.deepEqual(host.questions, [])

  for (const path of [outcome.artifact.launcherPath, outcome.artifact.autostartEntryPath, outcome.artifact.desktopShortcutPath]) {
    t.is((await stat(path)).mode & 0o111, 0o111)
  }

  t.deepEqual(events.at(-1), {
    event: 'PROVISION_COMPLETE',
    followUps: [
      `You can now activate the virtual environment with: source ${context.environmentRoot}/bin/activate`,
      'The rpi-control service is enabled and the application will start automatically on next boot'
    ]
  })
})

test('declining to continue on low disk space stops before any step or backup', async t => {
  const {layout, context, host, events, provisioner} = await setup({host: {freeDiskBytes: 2 * gib}})
  await seedEnvironment(context)

  const outcome = await provisioner.run()

  t.is(outcome.status, 'failed')
  if (outcome.status !== 'failed') {
    return
  }

  t.true(outcome.error instanceof PreflightBlocker)
  t.is(outcome.run, undefined)
  t.deepEqual(outcome.hints, [])
  t.deepEqual(host.questions, [{question: 'Continue anyway?', defaultAnswer: false}])
  t.deepEqual(host.journal, [])
  t.deepEqual(await backups(layout), [])
  t.false(events.some(e => e.event === 'PIPELINE_START'))
})

test('a failing package install stops the pipeline and leaves the environment in place', async t => {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: 'prompt'})
  const failing = `apt install ${context.config.packages.systemLibraries.join(' ')}`
  const host = new FakeHost({failOn: [failing]})
  const {reporter, events} = recordingReporter()

  const outcome = await new Provisioner(context, host.collaborators(), reporter, {startRetryDelayMs: 0, clock: fixedClock}).run()

  t.is(outcome.status, 'failed')
  if (outcome.status !== 'failed') {
    return
  }

  t.true(outcome.error instanceof StepFailure)
  t.is(outcome.error.message, 'Installing system libraries failed')
  t.deepEqual(outcome.run?.status, {state: 'failed', stepLabel: 'Installing system libraries'})
  t.is(outcome.run?.currentStep, 5)
  t.deepEqual(outcome.hints, ['Fix the cause above and run the provisioner again; completed steps are safe to repeat'])

  t.is(host.journal.at(-1), failing)
  t.false(host.journal.some(entry => entry.startsWith('service ')))
  t.false(await pathExists(join(layout.homeDir, 'app.sh')))
  t.true(await pathExists(join(context.environmentRoot, 'pyvenv.cfg')))
  t.false(events.some(e => e.event === 'SERVICE_REGISTERED' || e.event === 'ARTIFACTS_GENERATED'))
})

test('recreating an existing environment backs it up before removing it', async t => {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: 'prompt'})
  await seedEnvironment(context)
  const host = new FakeHost({confirmAnswers: [true]})
  const collaborators = host.collaborators()
  const snapshotPath = join(layout.root, 'device', backupName, 'cameo', 'pyvenv.cfg')
  const snapshotBeforeRemoval: boolean[] = []
  const {environments} = collaborators

  const outcome = await new Provisioner(context, {
    ...collaborators,
    environments: {
      ...environments,
      async remove(rootPath) {
        snapshotBeforeRemoval.push(await pathExists(snapshotPath))
        await environments.remove(rootPath)
      }
    }
  }, recordingReporter().reporter, {startRetryDelayMs: 0, clock: fixedClock}).run()

  t.is(outcome.status, 'succeeded')
  t.deepEqual(snapshotBeforeRemoval, [true])
  t.is(await readFile(snapshotPath, 'utf8'), 'original\n')
  t.is(await readFile(join(context.environmentRoot, 'pyvenv.cfg'), 'utf8'), 'home = /usr/bin\n')
  t.deepEqual(host.destructiveOperations(), [`env remove ${context.environmentRoot}`])
})

// -- invariants --------------------------------------------------------------

test('running twice with reuse destroys nothing', async t => {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: 'prompt'})
  const host = new FakeHost({confirmAnswers: [false, false, false, false]})
  const provisioner = new Provisioner(context, host.collaborators(), recordingReporter().reporter, {startRetryDelayMs: 0})

  const first = await provisioner.run()
  const second = await provisioner.run()

  t.is(first.status, 'succeeded')
  t.is(second.status, 'succeeded')
  t.deepEqual(host.destructiveOperations(), [])
  t.is(host.journal.filter(entry => entry.startsWith('env create')).length, 1)
  t.is(host.journal.filter(entry => entry.startsWith(`git clone https://github.com/Aoyamaxx/tappas_gcc12`)).length, 1)
  t.deepEqual(host.questions.map(q => q.question), ['Do you want to delete and recreate it?', 'Do you want to delete and recreate it?'])
})

test('the reuse policy takes no backup however often it runs', async t => {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: 'reuse'})
  await seedEnvironment(context)
  await mkdir(context.sdkRoot, {recursive: true})
  const host = new FakeHost()
  const provisioner = new Provisioner(context, host.collaborators(), recordingReporter().reporter, {startRetryDelayMs: 0, clock: fixedClock})

  const outcomes = [await provisioner.run(), await provisioner.run(), await provisioner.run()]

  t.deepEqual(outcomes.map(o => o.status), ['succeeded', 'succeeded', 'succeeded'])
  t.deepEqual(outcomes.map(o => o.backup), [{kind: 'noop'}, {kind: 'noop'}, {kind: 'noop'}])
  t.deepEqual(await backups(layout), [])
  t.deepEqual(host.destructiveOperations(), [])
})

test('steps start in ordinal order and nothing runs past a failure', async t => {
  const {context, host, events, provisioner} = await setup({host: {failOn: ['pip install cmake']}})

  const outcome = await provisioner.run()

  const started = events.flatMap(e => e.event === 'STEP_STARTING' ? [e.step.ordinal] : [])
  t.deepEqual(started, [1, 2, 3])
  t.is(outcome.status, 'failed')
  t.is(host.journal.at(-1), 'pip install cmake')
  t.false(host.journal.includes(`apt install ${context.config.packages.accelerator.join(' ')}`))
})

test('a failure after a removal points at the backup', async t => {
  const layout = await createTestLayout()
  const context = await createTestContext(layout, {resourcePolicy: 'recreate'})
  await seedEnvironment(context)
  const host = new FakeHost({failOn: [`env create ${context.environmentRoot}`]})

  const outcome = await new Provisioner(context, host.collaborators(), recordingReporter().reporter, {clock: fixedClock}).run()

  t.is(outcome.status, 'failed')
  if (outcome.status === 'failed') {
    t.deepEqual(outcome.hints, [`Previous installation state is kept in ${join(layout.root, 'device', backupName)}`])
  }
})

test('a service manager failure skips the launchers', async t => {
  const {layout, events, provisioner} = await setup({host: {failOn: ['service enable rpi-control']}})

  const outcome = await provisioner.run()

  t.is(outcome.status, 'failed')
  if (outcome.status !== 'failed') {
    return
  }

  t.true(outcome.error instanceof RegistrationError)
  t.deepEqual(outcome.run?.status, {state: 'succeeded'})
  t.false(await pathExists(join(layout.homeDir, 'app.sh')))
  t.false(events.some(e => e.event === 'PROVISION_COMPLETE'))
})

test('a service that does not start still completes with a warning', async t => {
  const {events, provisioner} = await setup({host: {failedStarts: 2}})

  const outcome = await provisioner.run()

  t.is(outcome.status, 'succeeded')
  if (outcome.status === 'succeeded') {
    t.false(outcome.registration.started)
  }

  t.true(events.some(e => e.event === 'WARNING' && e.code === 'POST_START_WARNING'))
})

test('steps() lists the pipeline without running it', async t => {
  const {host, provisioner} = await setup()

  t.is(provisioner.steps().length, 13)
  t.deepEqual(host.journal, [])
})
