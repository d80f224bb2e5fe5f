import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import test from 'ava'
import {compactTimestamp, formatDuration, formatProgress, formatSize, pathExists, shellQuote} from '../utils.js'

// -- formatProgress ----------------------------------------------------------

test('formatProgress renders current, total and label', t => {
  t.is(formatProgress(3, 13, 'Installing Python dependencies'), 'Step 3/13: Installing Python dependencies')
})

test('formatProgress renders the last step', t => {
  t.is(formatProgress(9, 9, 'Verifying installation'), 'Step 9/9: Verifying installation')
})

// -- formatSize / formatDuration ----------------------------------------------

test('formatSize picks the largest fitting unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(2048), '2.0 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(9.5 * 1024 * 1024 * 1024), '9.5 GB')
})

test('formatDuration covers milliseconds, seconds and minutes', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

// -- compactTimestamp ---------------------------------------------------------

test('compactTimestamp drops separators and milliseconds', t => {
  t.is(compactTimestamp(new Date('2026-10-19T05:50:12.345Z')), '20261019T055012Z')
})

// -- shellQuote ----------------------------------------------------------------

test('shellQuote leaves plain paths alone', t => {
  t.is(shellQuote('/home/pi/app'), '/home/pi/app')
})

test('shellQuote wraps values with spaces', t => {
  t.is(shellQuote('/home/pi/my app'), '\'/home/pi/my app\'')
})

test('shellQuote escapes embedded single quotes', t => {
  t.is(shellQuote('it\'s'), '\'it\'\\\'\'s\'')
})

// -- pathExists ----------------------------------------------------------------

test('pathExists reports existing and missing paths', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'provision-test-'))
  try {
    t.true(await pathExists(dir))
    t.false(await pathExists(join(dir, 'missing')))
  } finally {
    await rm(dir, {recursive: true})
  }
})
