import { CrateStatus } from './run-state-schema'

export interface Classification {
  status: CrateStatus
  builtCount: number
  totalCount: number
}

const DONE_LINE = /Done:\s+(\d+)\/(\d+)\s+versions produced rlibs/g

/**
 * Reduces the transcript of a crate run, and its exit code, to an outcome. Counts come from the last
 * "Done: B/T versions produced rlibs" line (0/0 when there is none).
 */
export function classify(logText: string, exitCode: number): Classification {
  const matches = [...logText.matchAll(DONE_LINE)]
  const last = matches.length ? matches[matches.length - 1] : undefined
  const builtCount = last ? Number(last[1]) : 0
  const totalCount = last ? Number(last[2]) : 0
  const rlibMissing = logText.includes('Rlib for') && logText.includes('not found')

  if (exitCode === 0) {
    if (last && builtCount === 0 && rlibMissing) {
      return { status: 'no_rlib', builtCount, totalCount }
    }
    return { status: 'ok', builtCount, totalCount }
  }

  if (last && builtCount > 0) {
    return { status: 'partial', builtCount, totalCount }
  }
  if (rlibMissing) {
    return { status: 'no_rlib', builtCount: 0, totalCount: 0 }
  }
  return { status: 'failed', builtCount: 0, totalCount: 0 }
}
