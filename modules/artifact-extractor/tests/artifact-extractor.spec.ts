import { CapturingSink } from 'build-orchestrator'
import * as fse from 'fs-extra'
import { createNopLogger } from 'logger'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

import { ArtifactExtractor, ExtractRequest } from '../src/artifact-extractor'

async function builtCrate(root: string, version: string, deps: Record<string, string> = {}) {
  const crateDir = path.join(root, 'crates', `spl-memo-${version}`)
  const releaseDir = path.join(crateDir, 'target', 'sbf-solana-solana', 'release')
  await fse.outputFile(path.join(releaseDir, 'libspl_memo.rlib'), `memo ${version}`)
  for (const [stem, content] of Object.entries(deps)) {
    await fse.outputFile(path.join(releaseDir, 'deps', `${stem}.rlib`), content)
  }
  await fse.outputFile(
    path.join(crateDir, 'Cargo.lock'),
    'version = 3\n\n[[package]]\nname = "arrayref"\nversion = "0.3.9"\n',
  )
  const ret: ExtractRequest = {
    crateName: 'spl-memo',
    version,
    arch: 'sbfv1',
    rlibPath: path.join(releaseDir, 'libspl_memo.rlib'),
    crateDir,
    toolsVersion: 'v1.48',
    extractDeps: true,
  }
  return ret
}

describe('artifact-extractor', () => {
  test('copies the rlib under a versioned name', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const extractor = new ArtifactExtractor(path.join(dir.path, 'rlibs'), createNopLogger())
    const sink = new CapturingSink(createNopLogger())

    const result = await extractor.extract(await builtCrate(dir.path, '4.0.1'), sink)
    const expected = path.join(dir.path, 'rlibs', 'spl-memo', 'libspl_memo-4.0.1-sbfv1-v1_48.rlib')
    expect(result).toEqual({ destination: expected, copied: true, depsCopied: 0 })
    expect(await fse.readFile(expected, 'utf-8')).toEqual('memo 4.0.1')
    expect(sink.lines).toEqual([`Rlib for spl-memo:4.0.1 [sbfv1] saved to ${expected}`])
  })
  test('two versions land in two files', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const extractor = new ArtifactExtractor(path.join(dir.path, 'rlibs'), createNopLogger())
    const sink = new CapturingSink(createNopLogger())

    const a = await extractor.extract(await builtCrate(dir.path, '3.0.1'), sink)
    const b = await extractor.extract(await builtCrate(dir.path, '4.0.1'), sink)
    expect(a.destination).not.toEqual(b.destination)
    expect(await fse.readdir(path.join(dir.path, 'rlibs', 'spl-memo'))).toEqual([
      'libspl_memo-3.0.1-sbfv1-v1_48.rlib',
      'libspl_memo-4.0.1-sbfv1-v1_48.rlib',
    ])
  })
  test('never overwrites', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const extractor = new ArtifactExtractor(path.join(dir.path, 'rlibs'), createNopLogger())
    const request = await builtCrate(dir.path, '4.0.1')
    await fse.outputFile(extractor.destinationOf('spl-memo', '4.0.1', 'sbfv1', 'v1.48'), 'earlier')
    const sink = new CapturingSink(createNopLogger())

    const result = await extractor.extract(request, sink)
    expect(result.copied).toBe(false)
    expect(await fse.readFile(result.destination, 'utf-8')).toEqual('earlier')
    expect(sink.lines).toEqual(['Rlib libspl_memo-4.0.1-sbfv1-v1_48.rlib already exists, skipping'])
  })
  test('copies dependency rlibs into the shared pool', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const extractor = new ArtifactExtractor(path.join(dir.path, 'rlibs'), createNopLogger())
    const request = await builtCrate(dir.path, '4.0.1', {
      'libarrayref-0cbcb299f4d7550d': 'arrayref',
      'libcc-0123456789abcdef': 'cc',
    })
    const sink = new CapturingSink(createNopLogger())

    expect((await extractor.extract(request, sink)).depsCopied).toEqual(2)
    expect(await fse.readdir(extractor.depsDirOf('spl-memo'))).toEqual([
      'libarrayref-0.3.9-sbfv1-v1_48.rlib',
      'libcc-0123456789abcdef-sbfv1-v1_48.rlib',
    ])
    expect(sink.lines[1]).toEqual('  deps: 2 new rlibs from spl-memo:4.0.1')

    expect((await extractor.extract(request, sink)).depsCopied).toEqual(0)
  })
  test('dependency extraction can be turned off', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const extractor = new ArtifactExtractor(path.join(dir.path, 'rlibs'), createNopLogger())
    const request = await builtCrate(dir.path, '4.0.1', { 'libarrayref-0cbcb299f4d7550d': 'arrayref' })

    expect((await extractor.extract({ ...request, extractDeps: false }, new CapturingSink(createNopLogger()))).depsCopied).toEqual(0)
    expect(await fse.pathExists(extractor.depsDirOf('spl-memo'))).toBe(false)
  })
})
