import * as fs from 'fs'
import { createNopLogger } from 'logger'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

import { VersionResolver } from '../src/version-resolver'

function registryOf(versions: string[] | Error) {
  return {
    fetchNonYankedVersions: async () => {
      if (versions instanceof Error) {
        throw versions
      }
      return versions
    },
  }
}

describe('version-resolver', () => {
  test('writes the sorted versions to the cache file', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const resolver = new VersionResolver(registryOf(['1.0.0', '0.9.0', '1.0.0', '1.0.0-beta.1']), dir.path, createNopLogger())

    expect(await resolver.resolveVersions('spl-memo')).toEqual(['1.0.0', '0.9.0', '1.0.0', '1.0.0-beta.1'])
    expect(fs.readFileSync(path.join(dir.path, 'spl-memo.txt'), 'utf8')).toEqual('0.9.0\n1.0.0-beta.1\n1.0.0\n')
  })
  test('falls back to the cache file when the registry is unreachable', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    fs.writeFileSync(path.join(dir.path, 'spl-memo.txt'), '3.0.0\n\n 4.0.0 \n')
    const resolver = new VersionResolver(registryOf(new Error('offline')), dir.path, createNopLogger())

    expect(await resolver.resolveVersions('spl-memo')).toEqual(['3.0.0', '4.0.0'])
  })
  test('a leading "v" in the cache file is dropped', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    fs.writeFileSync(path.join(dir.path, 'spl-memo.txt'), 'v3.0.0\n4.0.0\nv4.0.0\n')
    const resolver = new VersionResolver(registryOf(new Error('offline')), dir.path, createNopLogger())

    expect(await resolver.resolveVersions('spl-memo')).toEqual(['3.0.0', '4.0.0'])
  })
  test('an unreachable registry and no cache file yields no versions', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const resolver = new VersionResolver(registryOf(new Error('offline')), dir.path, createNopLogger())
    expect(await resolver.resolveVersions('spl-memo')).toEqual([])
  })
  test('an empty registry answer leaves the cache untouched', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    fs.writeFileSync(path.join(dir.path, 'spl-memo.txt'), '3.0.0\n')
    const resolver = new VersionResolver(registryOf([]), dir.path, createNopLogger())

    expect(await resolver.resolveVersions('spl-memo')).toEqual([])
    expect(fs.readFileSync(path.join(dir.path, 'spl-memo.txt'), 'utf8')).toEqual('3.0.0\n')
  })
  test('latest-only picks the greatest release', async () => {
    const dir = await Tmp.dir({ unsafeCleanup: true })
    const resolver = new VersionResolver(registryOf(['0.9.0', '1.0.0', '1.0.0-beta.1']), dir.path, createNopLogger())

    expect(await resolver.resolveForBuild('spl-memo', true)).toEqual(['1.0.0'])
    expect(await resolver.resolveForBuild('spl-memo', false)).toEqual(['0.9.0', '1.0.0', '1.0.0-beta.1'])
  })
})
