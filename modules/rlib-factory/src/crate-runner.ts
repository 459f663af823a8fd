import { CapturingSink } from 'build-orchestrator'
import { PatchName } from 'compat-patches'
import { isFactoryError } from 'factory-errors'
import * as fse from 'fs-extra'
import { describeError } from 'misc'
import * as path from 'path'

import { Factory } from './factory'
import { compilerCandidates } from './factory-config'

export interface CrateRunResult {
  /**
   * 0 iff every version produced an rlib.
   */
  exitCode: number
  logText: string
  logPath: string
  builtCount: number
  totalCount: number
  patches: PatchName[]
  /**
   * The run was aborted before, or while, building a version. The transcript then carries no "Done:" line.
   */
  interrupted: boolean
}

/**
 * Builds the given versions of one crate, in order, extracting every artifact as soon as it is built. An error in one
 * version is written to the transcript and the next version is built. The transcript is written to the crate's log
 * file even when the run throws.
 */
export class CrateRunner {
  constructor(private readonly factory: Factory) {}

  async run(crateName: string, versions: readonly string[], signal?: AbortSignal): Promise<CrateRunResult> {
    const { config, orchestrator, extractor, toolchain } = this.factory
    const logPath = this.factory.logFileOf(crateName)
    const sink = new CapturingSink(this.factory.logger, config.stream ? this.factory.console : undefined)
    const compilers = compilerCandidates(config)
    const patches: PatchName[] = []
    let builtCount = 0
    let interrupted = false

    try {
      for (const version of versions) {
        if (signal?.aborted) {
          interrupted = true
          sink.line(`Interrupted before ${crateName}:${version}`)
          break
        }
        let compilerVersion: string | undefined
        let built = false
        try {
          const outcome = await orchestrator.buildWithFallback(
            { crateName, version, toolsVersion: config.toolsVersion, archs: config.sbfArch },
            compilers,
            sink,
            async artifact => {
              await extractor.extract(
                {
                  crateName,
                  version,
                  arch: artifact.arch,
                  rlibPath: artifact.rlibPath,
                  crateDir: toolchain.crateDirOf(crateName, version),
                  toolsVersion: config.toolsVersion,
                  extractDeps: config.extractDeps,
                },
                sink,
              )
            },
          )
          compilerVersion = outcome.compilerVersion
          patches.push(...outcome.patches.map(p => p.patch))
          built = outcome.success
        } catch (e) {
          if (isFactoryError(e, 'missing-host-toolchain')) {
            throw e
          }
          sink.line(`Error building ${crateName}:${version}: ${describeError(e)}`)
        }

        // a build that fails once the run is aborted is counted as interrupted
        if (!built && signal?.aborted) {
          interrupted = true
          sink.line(`Interrupted while building ${crateName}:${version}`)
          break
        }
        if (built) {
          builtCount += 1
        }

        if (config.cleanupTarget) {
          await fse.remove(path.join(toolchain.crateDirOf(crateName, version), 'target'))
        }
        if (config.cleanupToolchain && compilerVersion) {
          await toolchain.removeRelease(compilerVersion)
        }
      }
      if (!interrupted) {
        sink.line(`Done: ${builtCount}/${versions.length} versions produced rlibs`)
      }
    } finally {
      await fse.outputFile(logPath, sink.text)
    }

    return {
      exitCode: builtCount === versions.length ? 0 : 1,
      logText: sink.text,
      logPath,
      builtCount,
      totalCount: versions.length,
      patches,
      interrupted,
    }
  }
}
