export function sortBy<T>(input: readonly T[], key: (item: T) => number): T[]
export function sortBy<T>(input: readonly T[], key: (item: T) => string): T[]
export function sortBy<T>(input: readonly T[], key: (item: T) => string | number): T[] {
  return [...input].sort((a, b) => comp(a, b, key))
}

function comp<T, R extends string | number>(a: T, b: T, key: (item: T) => R): number {
  const ak = key(a)
  const bk = key(b)

  if (typeof ak === 'string' && typeof bk === 'string') {
    return ak < bk ? -1 : ak > bk ? 1 : 0
  }

  if (typeof ak === 'number' && typeof bk === 'number') {
    return ak - bk
  }

  throw new Error(`Cannot compare ${ak} and ${bk}`)
}

export function uniqueBy<T, K>(input: ArrayLike<T> | Iterable<T>, key: (item: T) => K): T[] {
  const seen = new Set<K>()
  return Array.from(input).filter(item => {
    const k = key(item)
    if (seen.has(k)) {
      return false
    }
    seen.add(k)
    return true
  })
}

/**
 * Returns a sorted, de-duplicated copy of a list of strings. Ordering is by code unit (not locale) so that the output
 * is identical across machines.
 */
export function sortedUnique(input: Iterable<string>): string[] {
  return sortBy(uniqueBy(input, at => at), at => at)
}
