/**
 * Represents an event that should happen at some point in the future.
 */
export class Timeout {
  constructor(private readonly promise: Promise<void>) {}

  /**
   * Returns a promise that is resolved when the timeout expires.
   */
  hasPassed(): Promise<void> {
    return this.promise
  }
}

export function aTimeoutOf(ms: number): Timeout {
  return new Timeout(new Promise(resolve => setTimeout(resolve, ms)))
}

/**
 * The current time as an ISO-8601 UTC string with second precision (e.g. `2024-05-01T10:20:30Z`).
 */
export function nowIso(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * A compact UTC timestamp usable in file names (e.g. `20240501-102030`).
 */
export function fileTimestamp(now: Date = new Date()): string {
  const iso = nowIso(now)
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`
}
