import { Logger } from 'logger'
import { describeError, readLines, uniqueBy, writeLines } from 'misc'
import * as path from 'path'

import { CrateRegistry } from './registry-client'
import { latestVersion, sortVersions } from './version-order'

/**
 * Resolves the versions of a crate, live from the registry when possible, otherwise from the per-crate cache file
 * (`<versionsDir>/<crate>.txt`). Every successful live lookup refreshes the cache.
 */
export class VersionResolver {
  constructor(
    private readonly registry: Pick<CrateRegistry, 'fetchNonYankedVersions'>,
    private readonly versionsDir: string,
    private readonly logger: Logger,
  ) {}

  cacheFileOf(crateName: string) {
    return path.join(this.versionsDir, `${crateName}.txt`)
  }

  /**
   * Returns the non-yanked versions of a crate. An empty result means the crate cannot be resolved.
   */
  async resolveVersions(crateName: string): Promise<string[]> {
    let versions: string[]
    try {
      versions = await this.registry.fetchNonYankedVersions(crateName)
    } catch (e) {
      this.logger.warn(`${crateName}: online versions fetch failed, using local index (${describeError(e)})`)
      return await this.readCache(crateName)
    }

    if (versions.length) {
      await writeLines(this.cacheFileOf(crateName), sortVersions(uniqueBy(versions, at => at)))
    }
    return versions
  }

  /**
   * Hand-edited cache files may carry tag-style entries (`v1.2.3`); the leading `v` is dropped.
   */
  private async readCache(crateName: string): Promise<string[]> {
    const lines = await readLines(this.cacheFileOf(crateName))
    return uniqueBy(
      lines.map(at => at.replace(/^v(?=\d)/, '')),
      at => at,
    )
  }

  /**
   * The versions to build: either all of them, or just the latest.
   */
  async resolveForBuild(crateName: string, latestOnly: boolean): Promise<string[]> {
    const versions = await this.resolveVersions(crateName)
    if (!latestOnly) {
      return versions
    }
    const latest = latestVersion(versions)
    return latest === undefined ? [] : [latest]
  }
}
