import { Logger } from 'logger'
import { describeError, readLines, sortedUnique, writeLines } from 'misc'
import * as path from 'path'
import { z } from 'zod'

import crateListsJson from '../data/crate-lists.json'
import { CrateRegistry } from './registry-client'
import { latestVersion } from './version-order'

export const CrateScope = z.enum(['solana', 'solana-all', 'anchor', 'all'])
export type CrateScope = z.infer<typeof CrateScope>

const CrateLists = z.object({
  /**
   * Crates known to appear in on-chain program builds. Used by scope "solana" (no network access).
   */
  sbfProgramCrates: z.string().array(),
  anchorSeedCrates: z.string().array(),
  upstreamManifests: z.object({ solana: z.string() }),
  /**
   * Crates whose latest release's `anchor-*` dependencies extend the anchor seed list.
   */
  anchorRoots: z.string().array(),
})
export type CrateLists = z.infer<typeof CrateLists>

export const defaultCrateLists: CrateLists = CrateLists.parse(crateListsJson)

export const SOLANA_LIST_FILE = 'solana-rust-crates.txt'
export const ANCHOR_LIST_FILE = 'anchor-crates.txt'
export const MISSING_LIST_FILE = 'missing-crates.txt'

/**
 * Collects the keys of the `[workspace.dependencies]` table of a manifest that start with `prefix`. Stops at the next
 * table header. Blank lines, comments and lines without "=" are skipped. Matching is case-sensitive.
 */
export function parseWorkspaceDependencyNames(
  manifest: string,
  prefix: string,
  tableHeader = '[workspace.dependencies]',
): string[] {
  let inTable = false
  const out: string[] = []
  for (const raw of manifest.split(/\r?\n/)) {
    const line = raw.trim()
    if (line === tableHeader) {
      inTable = true
      continue
    }
    if (!inTable) {
      continue
    }
    if (line.startsWith('[')) {
      break
    }
    if (!line || line.startsWith('#') || !line.includes('=')) {
      continue
    }
    const name = line.slice(0, line.indexOf('=')).trim()
    if (name.startsWith(prefix)) {
      out.push(name)
    }
  }
  return sortedUnique(out)
}

export interface CrateFilter {
  include?: string
  exclude?: string
  /**
   * Zero (or less) means no limit.
   */
  maxCrates?: number
}

/**
 * Applies the include/exclude regexes (unanchored) and then the count limit.
 */
export function selectCrates(crates: readonly string[], filter: CrateFilter): string[] {
  let ret = [...crates]
  if (filter.include) {
    const re = new RegExp(filter.include)
    ret = ret.filter(at => re.test(at))
  }
  if (filter.exclude) {
    const re = new RegExp(filter.exclude)
    ret = ret.filter(at => !re.test(at))
  }
  if (filter.maxCrates && filter.maxCrates > 0) {
    ret = ret.slice(0, filter.maxCrates)
  }
  return ret
}

export class CrateSetResolver {
  constructor(
    private readonly registry: CrateRegistry,
    private readonly versionsDir: string,
    private readonly logger: Logger,
    private readonly lists: CrateLists = defaultCrateLists,
  ) {}

  /**
   * Returns the sorted crate names of a scope, minus the names listed in `missing-crates.txt`.
   */
  async resolve(scope: CrateScope): Promise<string[]> {
    const crates = new Set<string>()
    if (scope === 'solana') {
      this.lists.sbfProgramCrates.forEach(at => crates.add(at))
      this.logger.print(`Using static whitelist: ${this.lists.sbfProgramCrates.length} crates`)
    }
    if (scope === 'solana-all' || scope === 'all') {
      const discovered = await this.withCachedFallback(SOLANA_LIST_FILE, 'solana', () => this.fetchSolanaCrateList())
      discovered.forEach(at => crates.add(at))
    }
    if (scope === 'anchor' || scope === 'all') {
      const discovered = await this.withCachedFallback(ANCHOR_LIST_FILE, 'anchor', () => this.fetchAnchorCrateList())
      discovered.forEach(at => crates.add(at))
    }

    const missing = await readLines(path.join(this.versionsDir, MISSING_LIST_FILE))
    missing.forEach(at => crates.delete(at))

    const ret = sortedUnique(crates)
    if (!ret.length) {
      throw new Error(`no crates resolved (scope=${scope})`)
    }
    return ret
  }

  async fetchSolanaCrateList(): Promise<string[]> {
    const manifest = await this.registry.fetchText(this.lists.upstreamManifests.solana)
    const ret = parseWorkspaceDependencyNames(manifest, 'solana-')
    if (!ret.length) {
      throw new Error('empty solana crate list from the upstream manifest')
    }
    return ret
  }

  async fetchAnchorCrateList(): Promise<string[]> {
    const ret = new Set(this.lists.anchorSeedCrates)
    for (const root of this.lists.anchorRoots) {
      const latest = latestVersion(await this.registry.fetchNonYankedVersions(root))
      if (latest === undefined) {
        continue
      }
      for (const dep of await this.registry.fetchDependencyIds(root, latest)) {
        if (dep.startsWith('anchor-')) {
          ret.add(dep)
        }
      }
    }
    return sortedUnique(ret)
  }

  private async withCachedFallback(fileName: string, label: string, fetch: () => Promise<string[]>) {
    const file = path.join(this.versionsDir, fileName)
    try {
      const ret = await fetch()
      await writeLines(file, ret)
      return ret
    } catch (e) {
      this.logger.warn(`failed to fetch ${label} crate list online, using local index: ${describeError(e)}`)
      return await readLines(file)
    }
  }
}
