import { ArchSelection, CapturingSink } from 'build-orchestrator'

import { Factory } from './factory'
import { compilerCandidates } from './factory-config'

export interface SingleBuildResult {
  exitCode: number
  destinations: string[]
}

/**
 * Builds one crate version (outside of any batch, without touching the run state) and extracts its artifacts.
 */
export async function buildSingle(
  factory: Factory,
  crateName: string,
  version: string,
  archs: ArchSelection = factory.config.sbfArch,
): Promise<SingleBuildResult> {
  const { config, orchestrator, extractor, toolchain } = factory
  const sink = new CapturingSink(factory.logger, factory.console)
  const destinations: string[] = []
  const outcome = await orchestrator.buildWithFallback(
    { crateName, version, toolsVersion: config.toolsVersion, archs },
    compilerCandidates(config),
    sink,
    async artifact => {
      const extracted = await extractor.extract(
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
      destinations.push(extracted.destination)
    },
  )
  return { exitCode: outcome.success ? 0 : 1, destinations }
}
