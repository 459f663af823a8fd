import { z } from 'zod'

export const CrateStatus = z.enum(['ok', 'partial', 'no_rlib', 'failed'])
export type CrateStatus = z.infer<typeof CrateStatus>

/**
 * The outcome of the latest run of one crate. Unknown fields (e.g. written by a newer release) are kept.
 */
export const RunRecord = z
  .object({
    crate: z.string(),
    status: CrateStatus,
    builtCount: z.number().int().nonnegative().default(0),
    totalCount: z.number().int().nonnegative().default(0),
    timestamp: z.string(),
    logPath: z.string().optional(),
    /**
     * The versions the run asked for, shortened to `[first, "...", last]` when long.
     */
    requestedVersions: z.string().array().optional(),
    /**
     * The compatibility patches applied while building (one entry per application).
     */
    patches: z.string().array().optional(),
    error: z.string().optional(),
  })
  .passthrough()
export type RunRecord = z.infer<typeof RunRecord>

const RunMeta = z
  .object({
    createdAt: z.string(),
    updatedAt: z.string().optional(),
    config: z.record(z.unknown()).optional(),
  })
  .passthrough()

export const RunState = z
  .object({
    meta: RunMeta,
    crates: z.record(RunRecord).default({}),
  })
  .passthrough()
export type RunState = z.infer<typeof RunState>

/**
 * The state file as read from disk: the records are checked one by one, so that a single bad record does not
 * invalidate the others.
 */
export const StoredRunState = z
  .object({
    meta: RunMeta,
    crates: z.record(z.unknown()).default({}),
  })
  .passthrough()
export type StoredRunState = z.infer<typeof StoredRunState>

const MAX_LISTED_VERSIONS = 8

export function compressVersions(versions: readonly string[]): string[] {
  if (versions.length <= MAX_LISTED_VERSIONS) {
    return [...versions]
  }
  return [versions[0], '...', versions[versions.length - 1]]
}
