export const AHASH_HINT = "use of unstable library feature 'build_hasher_simple_hash_one'"
export const LOCKFILE_V4_HINT = 'lock file version 4 requires `-Znext-lockfile-bump`'
export const EDITION_2024_HINTS = ['feature `edition2024` is required', 'older than the `2024` edition'] as const

/**
 * Failures that another compiler release may not hit.
 */
export const COMPILER_FALLBACK_HINTS = [
  'requires rustc',
  ...EDITION_2024_HINTS,
  LOCKFILE_V4_HINT,
  'unknown feature `proc_macro_span_shrink`',
] as const

export function hasAhashFailure(output: string) {
  return output.includes(AHASH_HINT)
}

export function hasLockfileV4Failure(output: string) {
  return output.includes(LOCKFILE_V4_HINT)
}

export function hasEdition2024Failure(output: string) {
  return EDITION_2024_HINTS.some(at => output.includes(at))
}

/**
 * Whether a failed build is worth retrying with the fallback compiler.
 */
export function needsCompilerFallback(output: string) {
  return COMPILER_FALLBACK_HINTS.some(at => output.includes(at))
}
