import * as fse from 'fs-extra'
import * as path from 'path'

/**
 * A file mutation inside a crate's source tree. Resolves to true iff a file was changed.
 */
export type PatchFunction = (crateDir: string) => Promise<boolean>

export const AHASH_PIN = 'ahash = "=0.8.6"'
export const BLAKE3_PIN = 'blake3 = "=1.8.2"'

export const BLAKE3_LOCK_V183 = [
  'name = "blake3"',
  'version = "1.8.3"',
  'source = "registry+https://github.com/rust-lang/crates.io-index"',
  'checksum = "2468ef7d57b3fb7e16b576e8377cdbde2320c60e1491e961d11da40fc4f02a2d"',
  'dependencies = [',
  ' "arrayref",',
  ' "arrayvec",',
  ' "cc",',
  ' "cfg-if",',
  ' "constant_time_eq",',
  ' "cpufeatures",',
  ' "digest 0.10.7",',
  ']',
  '',
].join('\n')

export const BLAKE3_LOCK_V182 = [
  'name = "blake3"',
  'version = "1.8.2"',
  'source = "registry+https://github.com/rust-lang/crates.io-index"',
  'checksum = "3888aaa89e4b2a40fca9848e400f6a658a5a3978de7be858e209cafa8be9a4a0"',
  'dependencies = [',
  ' "arrayref",',
  ' "arrayvec",',
  ' "cc",',
  ' "cfg-if",',
  ' "constant_time_eq",',
  ' "digest 0.10.7",',
  ']',
  '',
].join('\n')

const manifestOf = (crateDir: string) => path.join(crateDir, 'Cargo.toml')
const lockfileOf = (crateDir: string) => path.join(crateDir, 'Cargo.lock')

async function rewrite(file: string, f: (content: string) => string | undefined): Promise<boolean> {
  if (!(await fse.pathExists(file))) {
    return false
  }
  const content = await fse.readFile(file, 'utf-8')
  const updated = f(content)
  if (updated === undefined || updated === content) {
    return false
  }
  await fse.writeFile(file, updated, 'utf-8')
  return true
}

/**
 * Pins ahash to 0.8.6 by appending a dependency table to the manifest. No-op if the pin is already there.
 */
export const pinAhash: PatchFunction = crateDir =>
  rewrite(manifestOf(crateDir), content => (content.includes(AHASH_PIN) ? undefined : `${content}\n[dependencies]\n${AHASH_PIN}\n`))

/**
 * Rewrites the first `version = 4` of the lockfile to `version = 3`.
 */
export const downgradeLockfile: PatchFunction = crateDir =>
  rewrite(lockfileOf(crateDir), content =>
    content.includes('version = 4') ? content.replace('version = 4', 'version = 3') : undefined,
  )

/**
 * Deletes the lockfile so that the toolchain generates one in a format it understands.
 */
export const dropLockfile: PatchFunction = async crateDir => {
  const file = lockfileOf(crateDir)
  if (!(await fse.pathExists(file))) {
    return false
  }
  await fse.remove(file)
  return true
}

/**
 * Replaces the locked blake3 1.8.3 entry (which needs the 2024 edition) with 1.8.2.
 */
export const rewriteBlake3Lock: PatchFunction = crateDir =>
  rewrite(lockfileOf(crateDir), content =>
    content.includes(BLAKE3_LOCK_V183) ? content.split(BLAKE3_LOCK_V183).join(BLAKE3_LOCK_V182) : undefined,
  )

/**
 * Pins blake3 to 1.8.2 under `[patch.crates-io]` in the manifest. The table header is added only when missing.
 */
export const pinBlake3: PatchFunction = crateDir =>
  rewrite(manifestOf(crateDir), content => {
    if (content.includes(BLAKE3_PIN)) {
      return undefined
    }
    const header = content.includes('[patch.crates-io]') ? '' : '[patch.crates-io]\n'
    return `${content}\n${header}${BLAKE3_PIN}\n`
  })
