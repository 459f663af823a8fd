import * as fse from 'fs-extra'
import * as path from 'path'

const PACKAGE_ENTRY = /^\[\[package\]\]\s*\nname\s*=\s*"([^"]+)"\s*\nversion\s*=\s*"([^"]+)"/gm

/**
 * Maps each package of a lockfile to its locked versions. Names are normalized with "-" replaced by "_" (the form
 * used in rlib file names).
 */
export function parseLockVersions(lockfileText: string): Map<string, string[]> {
  const ret = new Map<string, string[]>()
  for (const m of lockfileText.matchAll(PACKAGE_ENTRY)) {
    const name = m[1].replace(/-/g, '_')
    const versions = ret.get(name) ?? []
    versions.push(m[2])
    ret.set(name, versions)
  }
  return ret
}

export async function readLockVersions(crateDir: string): Promise<Map<string, string[]>> {
  const file = path.join(crateDir, 'Cargo.lock')
  if (!(await fse.pathExists(file))) {
    return new Map()
  }
  return parseLockVersions(await fse.readFile(file, 'utf-8'))
}
