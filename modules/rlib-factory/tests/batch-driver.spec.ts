import { LOCKFILE_V4_HINT } from 'compat-patches'
import { CrateLists } from 'crate-versions'
import {
  addCrateSource,
  buildsRlib,
  CommandCall,
  createFactoryLayout,
  failsWith,
  FactoryLayout,
  FakeCommandRunner,
  FakeRegistry,
  installRelease,
  RecordingLogger,
} from 'factory-testkit'
import * as fse from 'fs-extra'
import * as path from 'path'
import { RunState, RunStateStore } from 'run-state'

import { BatchDriver, INTERRUPTED_EXIT_CODE } from '../src/batch-driver'
import { Factory } from '../src/factory'
import { FactoryConfig, resolveConfig } from '../src/factory-config'

const NOW = new Date('2024-05-01T10:20:30.123Z')

const LISTS: CrateLists = {
  sbfProgramCrates: ['x', 'spl-memo'],
  anchorSeedCrates: [],
  upstreamManifests: { solana: 'https://upstream.test/Cargo.toml' },
  anchorRoots: [],
}

const inCrate = (dir: string) => (call: CommandCall) => path.basename(call.cwd ?? '') === dir

function harnessAt(layout: FactoryLayout, versions: Record<string, string[]>, overrides: Partial<FactoryConfig> = {}) {
  const logger = new RecordingLogger()
  const runner = new FakeCommandRunner()
  const registry = new FakeRegistry(versions)
  const config = resolveConfig(layout.root, {}, { stream: false, latestOnly: true, ...overrides })
  const factory = new Factory(config, logger, {
    registry,
    runner,
    crateLists: LISTS,
    env: layout.env,
    homeDir: layout.homeDir,
    now: () => NOW,
    console: () => {},
  })
  return { logger, runner, factory, driver: new BatchDriver(factory) }
}

async function newLayout(hostTools?: string[]) {
  const layout = await createFactoryLayout({ hostTools })
  await installRelease(layout, '1.18.16')
  return layout
}

const stateFileOf = (layout: FactoryLayout) => path.join(layout.stateDir, 'latest-build-state.json')

async function readState(layout: FactoryLayout) {
  return RunState.parse(JSON.parse(await fse.readFile(stateFileOf(layout), 'utf-8')))
}

describe('batch-driver', () => {
  test('a second run with the same inputs builds nothing and keeps the recorded crates', async () => {
    const layout = await newLayout()
    const versions = { 'spl-memo': ['1.0.0'], x: ['1.0.0'] }
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    await addCrateSource(layout, 'x', '1.0.0')

    const first = harnessAt(layout, versions)
    first.runner.on(inCrate('spl-memo-1.0.0'), buildsRlib('spl-memo')).on(inCrate('x-1.0.0'), buildsRlib('x'))
    const r1 = await first.driver.run()
    expect(r1.exitCode).toEqual(0)
    expect(r1.totals).toEqual('ok=2 partial=0 no_rlib=0 fail=0 skip=0')
    expect(first.runner.callsOf('cargo-build-sbf')).toHaveLength(2)
    expect(Object.keys((await readState(layout)).crates)).toEqual(['spl-memo', 'x'])

    const second = harnessAt(layout, versions)
    const r2 = await second.driver.run()
    expect(r2.exitCode).toEqual(0)
    expect(r2.totals).toEqual('ok=0 partial=0 no_rlib=0 fail=0 skip=2')
    expect(second.runner.calls).toEqual([])
    expect(second.logger.printed).toContain('[1/2] skip spl-memo: already ok')
    expect(Object.keys((await readState(layout)).crates)).toEqual(['spl-memo', 'x'])
  })
  test('latest-only builds the greatest release and records it', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'x', '1.0.0')
    const h = harnessAt(layout, { x: ['0.9.0', '1.0.0', '1.0.0-beta.1'] }, { include: '^x$' })
    h.runner.on(inCrate('x-1.0.0'), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(h.runner.callsOf('cargo-build-sbf').map(at => path.basename(at.cwd ?? ''))).toEqual(['x-1.0.0'])
    const state = await readState(layout)
    expect(state.crates.x).toMatchObject({
      status: 'ok',
      builtCount: 1,
      totalCount: 1,
      timestamp: '2024-05-01T10:20:30Z',
      requestedVersions: ['1.0.0'],
      logPath: path.join(layout.stateDir, 'logs-latest', 'x.log'),
    })
    expect(await fse.pathExists(path.join(layout.rlibsDir, 'x', 'libx-1.0.0-sbfv1-v1_48.rlib'))).toBe(true)
  })
  test('a lockfile v4 failure is patched once and the crate ends up ok', async () => {
    const layout = await newLayout()
    const crateDir = await addCrateSource(layout, 'x', '1.0.0', { 'Cargo.lock': 'version = 4\n' })
    const h = harnessAt(layout, { x: ['1.0.0'] }, { include: '^x$' })
    h.runner.on(inCrate('x-1.0.0'), failsWith(LOCKFILE_V4_HINT), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(2)
    const state = await readState(layout)
    expect(state.crates.x.status).toEqual('ok')
    expect(state.crates.x.patches).toEqual(['lockfile-downgrade'])
    expect(await fse.readFile(path.join(crateDir, 'Cargo.lock'), 'utf-8')).toEqual('version = 3\n')

    const log = await fse.readFile(path.join(layout.stateDir, 'logs-latest', 'x.log'), 'utf-8')
    expect(log).toContain('[compat] downgrading Cargo.lock version 4 -> 3...\n')
    expect(log.endsWith('Done: 1/1 versions produced rlibs\n')).toBe(true)
  })
  test('a crate without versions is recorded as failed and fails the batch', async () => {
    const layout = await newLayout()
    const h = harnessAt(layout, {}, { include: '^spl-memo$' })

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(1)
    expect(h.logger.warnings).toContain('[1/1] fail spl-memo: no versions found')
    expect((await readState(layout)).crates['spl-memo']).toEqual({
      crate: 'spl-memo',
      status: 'failed',
      builtCount: 0,
      totalCount: 0,
      timestamp: '2024-05-01T10:20:30Z',
      error: 'no versions found',
    })

    expect(result.summaryFile).toEqual(path.join(layout.stateDir, 'run-latest-20240501-102030.summary'))
    expect(await fse.readFile(path.join(layout.stateDir, 'run-latest-20240501-102030.summary'), 'utf-8')).toEqual(
      [
        'selected_crates=1',
        'scope=solana',
        'latest_only=true',
        'solana_version=1.18.16',
        'compiler_solana_version=1.18.16',
        'fallback_compiler_solana_version=1.18.16',
        'platform_tools_version=v1.48',
        'fail=spl-memo reason=no_versions',
        'ok=0',
        'partial=0',
        'no_rlib=0',
        'fail=1',
        'skip=0',
        '',
      ].join('\n'),
    )
  })
  test('some versions failing makes a partial crate, which does not fail the batch', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    await addCrateSource(layout, 'spl-memo', '1.1.0')
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0', '1.1.0'] }, { include: 'memo', latestOnly: false })
    h.runner
      .on(inCrate('spl-memo-1.0.0'), buildsRlib('spl-memo'))
      .on(inCrate('spl-memo-1.1.0'), failsWith('could not compile `spl-memo`'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(result.totals).toEqual('ok=0 partial=1 no_rlib=0 fail=0 skip=0')
    expect((await readState(layout)).crates['spl-memo']).toMatchObject({ status: 'partial', builtCount: 1, totalCount: 2 })
    expect(h.logger.warnings).toContain(
      `[1/1] partial spl-memo: 1/2 (log: ${path.join(layout.stateDir, 'logs-latest', 'spl-memo.log')})`,
    )
  })
  test('an error while building a version is written to the log and the batch goes on', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    await addCrateSource(layout, 'x', '1.0.0')
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] })
    h.runner
      .on(inCrate('spl-memo-1.0.0'), {
        exitCode: 0,
        effect: async () => {
          throw new Error('disk full')
        },
      })
      .on(inCrate('x-1.0.0'), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(1)
    expect(result.totals).toEqual('ok=1 partial=0 no_rlib=0 fail=1 skip=0')
    const state = await readState(layout)
    expect(state.crates['spl-memo']).toMatchObject({ status: 'failed', builtCount: 0, totalCount: 0 })
    expect(state.crates.x.status).toEqual('ok')
    const log = await fse.readFile(path.join(layout.stateDir, 'logs-latest', 'spl-memo.log'), 'utf-8')
    expect(log).toContain('Error building spl-memo:1.0.0: disk full\n')
    expect(log.endsWith('Done: 0/1 versions produced rlibs\n')).toBe(true)
  })
  test('an error in one version does not stop the later versions', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'x', '1.0.0')
    await addCrateSource(layout, 'x', '1.1.0')
    const h = harnessAt(layout, { x: ['1.0.0', '1.1.0'] }, { include: '^x$', latestOnly: false })
    h.runner
      .on(inCrate('x-1.0.0'), {
        exitCode: 0,
        effect: async () => {
          throw new Error('disk hiccup')
        },
      })
      .on(inCrate('x-1.1.0'), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(h.runner.callsOf('cargo-build-sbf').map(at => path.basename(at.cwd ?? ''))).toEqual(['x-1.0.0', 'x-1.1.0'])
    expect((await readState(layout)).crates.x).toMatchObject({ status: 'partial', builtCount: 1, totalCount: 2 })
    expect(await fse.pathExists(path.join(layout.rlibsDir, 'x', 'libx-1.1.0-sbfv1-v1_48.rlib'))).toBe(true)
  })
  test('an error outside the builds is recorded with the crate', async () => {
    const layout = await newLayout()
    // the version cache file cannot be written over a directory
    await fse.ensureDir(path.join(layout.root, 'versions', 'spl-memo.txt', 'blocker'))
    await addCrateSource(layout, 'x', '1.0.0')
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] })
    h.runner.on(inCrate('x-1.0.0'), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(1)
    expect(result.totals).toEqual('ok=1 partial=0 no_rlib=0 fail=1 skip=0')
    const state = await readState(layout)
    expect(state.crates['spl-memo'].status).toEqual('failed')
    expect(state.crates['spl-memo'].error).toMatch(/^EISDIR/)
    expect(h.logger.warnings).toContain('[1/2] failed spl-memo')
  })
  test('retry-failed reruns only the failed crates', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    const store = new RunStateStore(stateFileOf(layout), new RecordingLogger())
    const seeded = store.fresh()
    await store.persist(seeded, { crate: 'spl-memo', status: 'failed', builtCount: 0, totalCount: 0, timestamp: 't0' })
    await store.persist(seeded, { crate: 'x', status: 'ok', builtCount: 1, totalCount: 1, timestamp: 't0' })

    const h = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] }, { retryFailed: true })
    h.runner.on(inCrate('spl-memo-1.0.0'), buildsRlib('spl-memo'))

    const result = await h.driver.run()
    expect(result.totals).toEqual('ok=1 partial=0 no_rlib=0 fail=0 skip=1')
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(1)
    const state = await readState(layout)
    expect(state.crates['spl-memo'].status).toEqual('ok')
    expect(state.crates.x.timestamp).toEqual('t0')
  })
  test('force reruns everything', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'x', '1.0.0')
    const store = new RunStateStore(stateFileOf(layout), new RecordingLogger())
    await store.persist(store.fresh(), { crate: 'x', status: 'ok', builtCount: 1, totalCount: 1, timestamp: 't0' })

    const h = harnessAt(layout, { x: ['1.0.0'] }, { include: '^x$', force: true })
    h.runner.on(inCrate('x-1.0.0'), buildsRlib('x'))

    await h.driver.run()
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(1)
    expect((await readState(layout)).crates.x.timestamp).toEqual('2024-05-01T10:20:30Z')
  })
  test('a dry run prints the plan and writes no state', async () => {
    const layout = await newLayout()
    const h = harnessAt(layout, { x: ['0.9.0', '1.0.0'] }, { include: '^x$', dryRun: true })

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(result.summaryFile).toBeUndefined()
    expect(h.logger.printed).toContain('[1/1] [dry-run] x: versions=1.0.0 compilers=1.18.16')
    expect(h.runner.calls).toEqual([])
    expect(await fse.pathExists(stateFileOf(layout))).toBe(false)
  })
  test('nothing selected is an error', async () => {
    const layout = await newLayout()
    const h = harnessAt(layout, {}, { include: '^nope$' })
    await expect(h.driver.run()).rejects.toThrow('no crates selected after filters')
  })
  test('missing host tools abort the batch before any crate', async () => {
    const layout = await newLayout(['cargo'])
    const h = harnessAt(layout, { x: ['1.0.0'] })
    await expect(h.driver.run()).rejects.toThrow('Missing host tools: rustc')
    expect(h.runner.calls).toEqual([])
    expect(await fse.pathExists(stateFileOf(layout))).toBe(false)
  })
  test('an interrupted crate is not recorded', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    await addCrateSource(layout, 'spl-memo', '1.1.0')
    const controller = new AbortController()
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0', '1.1.0'] }, { include: 'memo', latestOnly: false })
    const build = buildsRlib('spl-memo')
    h.runner.on('cargo-build-sbf', {
      ...build,
      effect: async call => {
        await build.effect?.(call)
        controller.abort()
      },
    })

    const result = await h.driver.run(controller.signal)
    expect(result.exitCode).toEqual(INTERRUPTED_EXIT_CODE)
    expect(result.interrupted).toBe(true)
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(1)
    expect(await fse.pathExists(stateFileOf(layout))).toBe(false)
    const log = await fse.readFile(path.join(layout.stateDir, 'logs-latest', 'spl-memo.log'), 'utf-8')
    expect(log.endsWith('Interrupted before spl-memo:1.1.0\n')).toBe(true)
  })
  test('crates after the interruption point are left alone', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    const controller = new AbortController()
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] })
    const build = buildsRlib('spl-memo')
    h.runner.on(inCrate('spl-memo-1.0.0'), {
      ...build,
      effect: async call => {
        await build.effect?.(call)
        controller.abort()
      },
    })

    const result = await h.driver.run(controller.signal)
    expect(result.exitCode).toEqual(INTERRUPTED_EXIT_CODE)
    expect(Object.keys((await readState(layout)).crates)).toEqual(['spl-memo'])
    expect(h.logger.warnings).toContain('[2/2] interrupted, 1 crate(s) left')
  })
  test('a build killed by the interruption leaves the crate unrecorded', async () => {
    const layout = await newLayout()
    await addCrateSource(layout, 'spl-memo', '1.0.0')
    const controller = new AbortController()
    const h = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] })
    h.runner.on(inCrate('spl-memo-1.0.0'), {
      exitCode: 130,
      output: 'Killed\n',
      effect: async () => {
        controller.abort()
      },
    })

    const result = await h.driver.run(controller.signal)
    expect(result.exitCode).toEqual(INTERRUPTED_EXIT_CODE)
    expect(result.interrupted).toBe(true)
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(1)
    expect(await fse.pathExists(stateFileOf(layout))).toBe(false)
    const log = await fse.readFile(path.join(layout.stateDir, 'logs-latest', 'spl-memo.log'), 'utf-8')
    expect(log.endsWith('Interrupted while building spl-memo:1.0.0\n')).toBe(true)
    expect(log).not.toContain('Done:')

    const resumed = harnessAt(layout, { 'spl-memo': ['1.0.0'], x: ['1.0.0'] })
    resumed.runner.on('cargo-build-sbf', buildsRlib('spl-memo'))
    await resumed.driver.run()
    expect(resumed.runner.callsOf('cargo-build-sbf').map(at => path.basename(at.cwd ?? ''))).toContain('spl-memo-1.0.0')
    expect((await readState(layout)).crates['spl-memo'].status).toEqual('ok')
  })
  test('patches applied under the primary compiler are recorded when the fallback compiler builds', async () => {
    const layout = await newLayout()
    await installRelease(layout, '2.1.0')
    const crateDir = await addCrateSource(layout, 'x', '1.0.0', { 'Cargo.lock': 'version = 4\n' })
    const h = harnessAt(layout, { x: ['1.0.0'] }, { include: '^x$', fallbackCompilerVersion: '2.1.0' })
    const byCompiler = (v: string) => (call: CommandCall) => call.command.includes(`solana-release-${v}`)
    h.runner
      .on(byCompiler('1.18.16'), failsWith(LOCKFILE_V4_HINT), failsWith('package `foo v1.2.0` requires rustc 1.79 or newer'))
      .on(byCompiler('2.1.0'), buildsRlib('x'))

    const result = await h.driver.run()
    expect(result.exitCode).toEqual(0)
    expect(h.runner.callsOf('cargo-build-sbf')).toHaveLength(3)
    expect((await readState(layout)).crates.x).toMatchObject({ status: 'ok', patches: ['lockfile-downgrade'] })
    expect(await fse.readFile(path.join(crateDir, 'Cargo.lock'), 'utf-8')).toEqual('version = 3\n')
  })
})
