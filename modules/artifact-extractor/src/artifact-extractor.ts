import { BuildSink, SbfArch } from 'build-orchestrator'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import * as path from 'path'

import { artifactFileName, depArtifactFileName } from './artifact-names'
import { readLockVersions } from './lockfile'

export interface ExtractRequest {
  crateName: string
  version: string
  arch: SbfArch
  /**
   * The rlib produced by the build (under `target/<triple>/release/`).
   */
  rlibPath: string
  /**
   * The crate's source tree (where Cargo.lock lives).
   */
  crateDir: string
  toolsVersion: string
  extractDeps: boolean
}

export interface ExtractResult {
  destination: string
  /**
   * False when the destination already existed.
   */
  copied: boolean
  depsCopied: number
}

/**
 * Copies built rlibs into `<rlibsDir>/<crate>/`, under names that tell versions, architectures and tools versions
 * apart. Existing files are never overwritten.
 */
export class ArtifactExtractor {
  constructor(
    readonly rlibsDir: string,
    private readonly logger: Logger,
  ) {}

  destinationOf(crateName: string, version: string, arch: SbfArch, toolsVersion: string) {
    return path.join(this.rlibsDir, crateName, artifactFileName(crateName, version, arch, toolsVersion))
  }

  depsDirOf(crateName: string) {
    return path.join(this.rlibsDir, crateName, 'deps')
  }

  async extract(request: ExtractRequest, sink: BuildSink): Promise<ExtractResult> {
    const { crateName, version, arch } = request
    const destination = this.destinationOf(crateName, version, arch, request.toolsVersion)
    const copied = await copyIfAbsent(request.rlibPath, destination)
    if (copied) {
      sink.line(`Rlib for ${crateName}:${version} [${arch}] saved to ${destination}`)
    } else {
      sink.line(`Rlib ${path.basename(destination)} already exists, skipping`)
    }

    const depsCopied = request.extractDeps ? await this.extractDeps(request) : 0
    if (depsCopied) {
      sink.line(`  deps: ${depsCopied} new rlibs from ${crateName}:${version}`)
    }
    return { destination, copied, depsCopied }
  }

  private async extractDeps(request: ExtractRequest) {
    const depsDir = path.join(path.dirname(request.rlibPath), 'deps')
    if (!(await fse.pathExists(depsDir))) {
      return 0
    }
    const lockVersions = await readLockVersions(request.crateDir)
    const stems = (await fse.readdir(depsDir))
      .filter(at => at.endsWith('.rlib'))
      .sort()
      .map(at => at.slice(0, -'.rlib'.length))

    const dst = this.depsDirOf(request.crateName)
    let ret = 0
    for (const stem of stems) {
      const name = depArtifactFileName(stem, lockVersions, request.arch, request.toolsVersion)
      if (await copyIfAbsent(path.join(depsDir, `${stem}.rlib`), path.join(dst, name))) {
        ret += 1
      }
    }
    this.logger.info(`${request.crateName}:${request.version} [${request.arch}]: ${ret}/${stems.length} dependency rlibs copied`)
    return ret
  }
}

async function copyIfAbsent(src: string, dst: string): Promise<boolean> {
  if (await fse.pathExists(dst)) {
    return false
  }
  await fse.ensureDir(path.dirname(dst))
  await fse.copy(src, dst, { overwrite: false, errorOnExist: false })
  return true
}
