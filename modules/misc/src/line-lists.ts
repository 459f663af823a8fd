import * as fse from 'fs-extra'

import { writeFileAtomic } from './atomic-write'

/**
 * Reads a newline-delimited list. Entries are trimmed, blank lines are dropped. A missing file is an empty list.
 */
export async function readLines(file: string): Promise<string[]> {
  if (!(await fse.pathExists(file))) {
    return []
  }
  const content = await fse.readFile(file, 'utf-8')
  return content
    .split(/\r?\n/)
    .map(at => at.trim())
    .filter(at => at.length > 0)
}

export async function writeLines(file: string, lines: readonly string[]): Promise<void> {
  await writeFileAtomic(file, lines.length ? `${lines.join('\n')}\n` : '')
}
