type PrereleaseToken = { numeric: true; value: number } | { numeric: false; value: string }

/**
 * A parsed version, ordered by `compareVersionKeys()`. `prerelease` is undefined for a release.
 */
export interface VersionSortKey {
  readonly core: readonly number[]
  readonly prerelease: readonly PrereleaseToken[] | undefined
}

const CORE_WIDTH = 4

function parseCoreComponent(part: string): number {
  const m = part.match(/^\d+/)
  return m ? Number(m[0]) : 0
}

/**
 * Parses a version string into its sort key. A leading "v" is ignored. The numeric core is padded with zeros to (at
 * least) four components; a non-numeric component contributes its leading digits, or 0. An empty suffix after "-"
 * counts as no suffix.
 */
export function versionSortKey(version: string): VersionSortKey {
  const s = version.trim().replace(/^v+/, '')
  const dash = s.indexOf('-')
  const coreText = dash < 0 ? s : s.slice(0, dash)
  const pre = dash < 0 ? '' : s.slice(dash + 1)

  const core = coreText.split('.').map(parseCoreComponent)
  while (core.length < CORE_WIDTH) {
    core.push(0)
  }

  if (!pre) {
    return { core, prerelease: undefined }
  }

  const prerelease = pre.split('.').map<PrereleaseToken>(t =>
    /^\d+$/.test(t) ? { numeric: true, value: Number(t) } : { numeric: false, value: t },
  )
  return { core, prerelease }
}

function compareNumbers(a: number, b: number) {
  return a < b ? -1 : a > b ? 1 : 0
}

function compareStrings(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0
}

function compareSequences<T>(a: readonly T[], b: readonly T[], comp: (x: T, y: T) => number) {
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; ++i) {
    const d = comp(a[i], b[i])
    if (d !== 0) {
      return d
    }
  }
  return compareNumbers(a.length, b.length)
}

function compareTokens(a: PrereleaseToken, b: PrereleaseToken): number {
  if (a.numeric && b.numeric) {
    return compareNumbers(a.value, b.value)
  }
  if (!a.numeric && !b.numeric) {
    return compareStrings(a.value, b.value)
  }
  // numeric identifiers sort before alphanumeric ones
  return a.numeric ? -1 : 1
}

export function compareVersionKeys(a: VersionSortKey, b: VersionSortKey): number {
  const byCore = compareSequences(a.core, b.core, compareNumbers)
  if (byCore !== 0) {
    return byCore
  }
  if (a.prerelease === undefined || b.prerelease === undefined) {
    // release > prerelease
    return compareNumbers(a.prerelease ? 0 : 1, b.prerelease ? 0 : 1)
  }
  return compareSequences(a.prerelease, b.prerelease, compareTokens)
}

export function compareVersions(a: string, b: string): number {
  return compareVersionKeys(versionSortKey(a), versionSortKey(b))
}

/**
 * Returns a new array, sorted in ascending version order. The sort is stable, so versions with equal keys (e.g.
 * "1.0" and "1.0.0") keep their relative order.
 */
export function sortVersions(versions: readonly string[]): string[] {
  return versions
    .map((v, i) => ({ v, i, k: versionSortKey(v) }))
    .sort((a, b) => compareVersionKeys(a.k, b.k) || a.i - b.i)
    .map(at => at.v)
}

/**
 * Returns the greatest version (the first one, among equals), or undefined for an empty input.
 */
export function latestVersion(versions: readonly string[]): string | undefined {
  let best: { v: string; k: VersionSortKey } | undefined
  for (const v of versions) {
    const k = versionSortKey(v)
    if (!best || compareVersionKeys(k, best.k) > 0) {
      best = { v, k }
    }
  }
  return best?.v
}

/**
 * The major component of a version, or undefined when the version does not start with a number.
 */
export function majorOf(version: string): number | undefined {
  const m = version.trim().match(/^(\d+)(?:\.|$)/)
  return m ? Number(m[1]) : undefined
}
