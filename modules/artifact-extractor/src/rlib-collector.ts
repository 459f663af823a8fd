import { ALL_ARCHS, targetTripleOf } from 'build-orchestrator'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import { listFiles, sortBy, writeLines } from 'misc'
import * as os from 'os'
import * as path from 'path'

export interface CollectSources {
  cratesDir: string
  rlibsDir: string
  /**
   * The toolchain download cache (holds the platform tools' core/std rlibs). Defaults to `~/.cache/solana`.
   */
  solanaCacheDir?: string
}

export interface CollectResult {
  count: number
  /**
   * `<outDir>/RLIB_PATHS.txt`: the absolute paths of all collected rlibs, sorted.
   */
  listFile: string
}

const SECTIONS = ['toolchain-core', 'crate-builds', 'factory-rlibs'] as const

const CORE_RLIB = /^(v[^/]+)\/(?:.*\/)?platform-tools\/rust\/lib\/rustlib\/(sbf-solana-solana|sbpf[^/]*-solana-solana)\/lib\/(lib[^/]*\.rlib)$/

const isRlib = (p: string) => p.endsWith('.rlib')

/**
 * Gathers rlibs from the toolchain cache, the crate build trees and the artifact tree into one output directory.
 * Each of the three output sections is rebuilt from scratch.
 */
export class RlibCollector {
  constructor(private readonly logger: Logger) {}

  async collect(outDir: string, sources: CollectSources): Promise<CollectResult> {
    for (const section of SECTIONS) {
      await fse.remove(path.join(outDir, section))
      await fse.ensureDir(path.join(outDir, section))
    }

    const cacheDir = sources.solanaCacheDir ?? path.join(os.homedir(), '.cache', 'solana')
    await this.collectToolchainCore(cacheDir, path.join(outDir, 'toolchain-core'))
    await this.collectCrateBuilds(sources.cratesDir, path.join(outDir, 'crate-builds'))
    await this.collectFactoryRlibs(sources.rlibsDir, path.join(outDir, 'factory-rlibs'))

    const collected = sortBy(
      (await listFiles(outDir, isRlib)).map(at => path.join(outDir, at)),
      at => at,
    )
    const listFile = path.join(outDir, 'RLIB_PATHS.txt')
    await writeLines(listFile, collected)
    return { count: collected.length, listFile }
  }

  private async collectToolchainCore(cacheDir: string, dst: string) {
    if (!(await fse.pathExists(cacheDir))) {
      this.logger.print(`Skip: ${cacheDir} not found`)
      return
    }
    for (const rel of await listFiles(cacheDir, isRlib)) {
      const m = rel.match(CORE_RLIB)
      if (m) {
        await fse.copy(path.join(cacheDir, rel), path.join(dst, m[1], m[2], m[3]))
      }
    }
  }

  private async collectCrateBuilds(cratesDir: string, dst: string) {
    if (!(await fse.pathExists(cratesDir))) {
      return
    }
    const crateDirs: string[] = []
    for (const name of (await fse.readdir(cratesDir)).sort()) {
      if ((await fse.stat(path.join(cratesDir, name))).isDirectory()) {
        crateDirs.push(name)
      }
    }

    for (const base of crateDirs) {
      for (const arch of ALL_ARCHS) {
        const triple = targetTripleOf(arch)
        const releaseDir = path.join(cratesDir, base, 'target', triple, 'release')
        if (!(await fse.pathExists(releaseDir))) {
          continue
        }
        await copyFlat(releaseDir, path.join(dst, base, triple, 'release'), at => at.startsWith('lib') && isRlib(at))
        await copyFlat(path.join(releaseDir, 'deps'), path.join(dst, base, triple, 'release-deps'), isRlib)
      }
    }
  }

  private async collectFactoryRlibs(rlibsDir: string, dst: string) {
    for (const rel of await listFiles(rlibsDir, isRlib)) {
      await fse.copy(path.join(rlibsDir, rel), path.join(dst, rel))
    }
  }
}

/**
 * Copies the matching files (not directories) directly under `srcDir`.
 */
async function copyFlat(srcDir: string, dstDir: string, predicate: (name: string) => boolean) {
  await fse.ensureDir(dstDir)
  if (!(await fse.pathExists(srcDir))) {
    return
  }
  for (const name of await fse.readdir(srcDir)) {
    const src = path.join(srcDir, name)
    if (predicate(name) && (await fse.stat(src)).isFile()) {
      await fse.copy(src, path.join(dstDir, name))
    }
  }
}
