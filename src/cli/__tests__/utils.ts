import test from 'ava'
import {gib} from '../../core/utils.js'
import {Provisioner} from '../../provision/index.js'
import type {ResourcePolicy} from '../../types.js'
import {exitCodeFor, isInteractive, policyFlagConflict, resolveResourcePolicy} from '../utils.js'
import {FakeHost, createTestContext, createTestLayout, noopReporter, type FakeHostOptions} from '../../__tests__/helpers.js'

async function provision(host: FakeHostOptions = {}, resourcePolicy: ResourcePolicy = 'reuse') {
  const context = await createTestContext(await createTestLayout(), {resourcePolicy})
  return new Provisioner(context, new FakeHost(host).collaborators(), noopReporter, {startRetryDelayMs: 0}).run()
}

test('explicit flags decide the resource policy', t => {
  t.is(resolveResourcePolicy({recreate: true}, true), 'recreate')
  t.is(resolveResourcePolicy({recreate: true}, false), 'recreate')
  t.is(resolveResourcePolicy({reuse: true}, true), 'reuse')
})

test('without flags interactive runs ask and unattended runs reuse', t => {
  t.is(resolveResourcePolicy({}, true), 'prompt')
  t.is(resolveResourcePolicy({}, false), 'reuse')
})

test('json output and --non-interactive never prompt', t => {
  t.false(isInteractive({json: true}))
  t.false(isInteractive({nonInteractive: true}))
})

test('a successful run exits with zero', async t => {
  const outcome = await provision()

  t.is(outcome.status, 'succeeded')
  t.is(exitCodeFor(outcome), 0)
})

test('a failed step exits non-zero', async t => {
  const outcome = await provision({failOn: ['apt update']})

  t.is(outcome.status, 'failed')
  t.is(exitCodeFor(outcome), 1)
})

test('a blocked preflight exits non-zero', async t => {
  const outcome = await provision({networkReachable: false})

  t.is(outcome.status, 'failed')
  t.is(exitCodeFor(outcome), 1)
})

test('a declined low-disk prompt exits non-zero', async t => {
  const outcome = await provision({freeDiskBytes: gib, confirmAnswers: [false]})

  t.is(exitCodeFor(outcome), 1)
})

test('--reuse and --recreate cannot be combined', t => {
  t.is(policyFlagConflict({reuse: true, recreate: true}), '--reuse and --recreate cannot be combined')
  t.is(policyFlagConflict({reuse: true}), undefined)
  t.is(policyFlagConflict({recreate: true}), undefined)
  t.is(policyFlagConflict({}), undefined)
})
