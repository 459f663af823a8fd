import { writeLines } from 'misc'

import { CrateStatus } from './run-state-schema'

export type FailureReason = 'no_versions' | 'build' | 'error'

export interface SummaryHeader {
  selectedCrates: number
  scope: string
  latestOnly: boolean
  solanaVersion: string
  compilerVersion: string
  fallbackCompilerVersion: string
  toolsVersion: string
}

type Counter = CrateStatus | 'skip'

/**
 * The line-oriented report of a batch run: a header, one line per processed crate, and trailing counters.
 */
export class RunSummary {
  private readonly lines: string[] = []
  private readonly counters: Record<Counter, number> = { ok: 0, partial: 0, no_rlib: 0, failed: 0, skip: 0 }

  constructor(header: SummaryHeader) {
    this.lines.push(
      `selected_crates=${header.selectedCrates}`,
      `scope=${header.scope}`,
      `latest_only=${header.latestOnly}`,
      `solana_version=${header.solanaVersion}`,
      `compiler_solana_version=${header.compilerVersion}`,
      `fallback_compiler_solana_version=${header.fallbackCompilerVersion}`,
      `platform_tools_version=${header.toolsVersion}`,
    )
  }

  ok(crateName: string) {
    this.counters.ok += 1
    this.lines.push(`ok=${crateName}`)
  }

  partial(crateName: string, builtCount: number, totalCount: number) {
    this.counters.partial += 1
    this.lines.push(`partial=${crateName} built=${builtCount} total=${totalCount}`)
  }

  noRlib(crateName: string) {
    this.counters.no_rlib += 1
    this.lines.push(`no_rlib=${crateName}`)
  }

  failed(crateName: string, reason: FailureReason) {
    this.counters.failed += 1
    this.lines.push(`fail=${crateName} reason=${reason}`)
  }

  skipped() {
    this.counters.skip += 1
  }

  count(counter: Counter) {
    return this.counters[counter]
  }

  /**
   * e.g. "ok=3 partial=1 no_rlib=0 fail=0 skip=2"
   */
  totals() {
    const c = this.counters
    return `ok=${c.ok} partial=${c.partial} no_rlib=${c.no_rlib} fail=${c.failed} skip=${c.skip}`
  }

  render(): string[] {
    const c = this.counters
    return [
      ...this.lines,
      `ok=${c.ok}`,
      `partial=${c.partial}`,
      `no_rlib=${c.no_rlib}`,
      `fail=${c.failed}`,
      `skip=${c.skip}`,
    ]
  }

  async write(file: string) {
    await writeLines(file, this.render())
  }
}
