import * as fse from 'fs-extra'
import { Logger } from 'logger'
import { listFiles, sortBy } from 'misc'
import * as path from 'path'
import * as stream from 'stream'
import * as TarStream from 'tar-stream'
import * as util from 'util'
import * as zlib from 'zlib'
import { z } from 'zod'

import releaseGroupsJson from '../data/release-groups.json'

const pipeline = util.promisify(stream.pipeline)

const ReleaseGroups = z.object({
  core: z.string().array(),
  crypto: z.string().array(),
  anchor: z.string().array(),
})
export type ReleaseGroups = z.infer<typeof ReleaseGroups>

export const defaultReleaseGroups: ReleaseGroups = ReleaseGroups.parse(releaseGroupsJson)

export const RELEASE_PREFIX = 'solana-sbpf-rlib'
export const ARCHIVE_SUFFIX = '.tar.gz'

export interface PackedArchive {
  archive: string
  crates: string[]
  bytes: number
}

/**
 * Packs the artifact tree (`<rlibsDir>/<crate>/...`) into gzipped tar archives whose entries are rooted at the crate
 * directory.
 */
export class ReleasePacker {
  constructor(
    private readonly rlibsDir: string,
    private readonly logger: Logger,
    private readonly groups: ReleaseGroups = defaultReleaseGroups,
  ) {}

  async crates(): Promise<string[]> {
    if (!(await fse.pathExists(this.rlibsDir))) {
      return []
    }
    const ret: string[] = []
    for (const name of sortBy(await fse.readdir(this.rlibsDir), at => at)) {
      if ((await fse.stat(path.join(this.rlibsDir, name))).isDirectory()) {
        ret.push(name)
      }
    }
    return ret
  }

  /**
   * Writes the core, crypto and anchor bundles, plus an "extra" bundle of every other crate. A bundle none of whose
   * crates are present is not written.
   */
  async packBundles(outDir: string): Promise<PackedArchive[]> {
    const present = await this.crates()
    const grouped = new Set([...this.groups.core, ...this.groups.crypto, ...this.groups.anchor])
    const bundles: [string, string[]][] = [
      ['core', this.groups.core],
      ['crypto', this.groups.crypto],
      ['anchor', this.groups.anchor],
      ['extra', present.filter(at => !grouped.has(at))],
    ]

    const ret: PackedArchive[] = []
    for (const [name, members] of bundles) {
      const crates = members.filter(at => present.includes(at))
      if (!crates.length) {
        this.logger.print(`Skip ${name}: no crates`)
        continue
      }
      this.logger.print(`Packing ${name}...`)
      const packed = await this.pack(path.join(outDir, `${RELEASE_PREFIX}-${name}${ARCHIVE_SUFFIX}`), crates)
      this.logger.print(`    -> ${formatSize(packed.bytes)}`)
      ret.push(packed)
    }
    return ret
  }

  /**
   * Writes one archive per crate, `<outDir>/<crate>.tar.gz`.
   */
  async packEach(outDir: string): Promise<PackedArchive[]> {
    const crates = await this.crates()
    const ret: PackedArchive[] = []
    for (const [i, crateName] of crates.entries()) {
      this.logger.print(`[${i + 1}/${crates.length}] ${crateName}`, 'low')
      ret.push(await this.pack(path.join(outDir, `${crateName}${ARCHIVE_SUFFIX}`), [crateName]))
    }
    return ret
  }

  async pack(archive: string, crates: readonly string[]): Promise<PackedArchive> {
    await fse.ensureDir(path.dirname(archive))
    const pack = TarStream.pack()
    for (const crateName of crates) {
      const crateDir = path.join(this.rlibsDir, crateName)
      for (const rel of await listFiles(crateDir)) {
        const resolved = path.join(crateDir, rel)
        const { mode, mtime } = await fse.stat(resolved)
        pack.entry({ name: `${crateName}/${rel}`, mode, mtime }, await fse.readFile(resolved))
      }
    }
    pack.finalize()

    await pipeline(pack, zlib.createGzip(), fse.createWriteStream(archive))
    const { size } = await fse.stat(archive)
    this.logger.info(`packed ${crates.length} crate(s) into ${archive} (${size} bytes)`)
    return { archive, crates: [...crates], bytes: size }
  }
}

export function formatSize(bytes: number) {
  const units = ['B', 'K', 'M', 'G']
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit += 1
  }
  return unit === 0 ? `${value}${units[unit]}` : `${value.toFixed(1)}${units[unit]}`
}
