import * as fse from 'fs-extra'
import * as path from 'path'

import { sortBy } from './arrays'

/**
 * Recursively lists the regular files under `rootDir`, as paths relative to it (with "/" separators), in a
 * deterministic (sorted, depth-first) order. A missing `rootDir` yields an empty list.
 *
 * @param predicate decides, by relative path, whether a file is included.
 */
export async function listFiles(rootDir: string, predicate: (relativePath: string) => boolean = () => true) {
  const ret: string[] = []
  if (!(await fse.pathExists(rootDir))) {
    return ret
  }

  const scan = async (relativeDir: string) => {
    const entries = await fse.readdir(path.join(rootDir, relativeDir), { withFileTypes: true })
    for (const entry of sortBy(entries, at => at.name)) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        await scan(relativePath)
      } else if (entry.isFile() && predicate(relativePath)) {
        ret.push(relativePath)
      }
    }
  }
  await scan('')
  return ret
}
