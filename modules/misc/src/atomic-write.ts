import * as fse from 'fs-extra'
import * as path from 'path'

let counter = 0

/**
 * Writes `content` to a sibling temp file and renames it over `file`. Readers see either the old or the new content,
 * never a prefix of the new one.
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(file))
  counter += 1
  const temp = `${file}.${process.pid}.${counter}.tmp`
  try {
    await fse.writeFile(temp, content, 'utf-8')
    await fse.rename(temp, file)
  } finally {
    await fse.rm(temp, { force: true })
  }
}
