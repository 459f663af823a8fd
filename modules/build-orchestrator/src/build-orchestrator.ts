import { needsCompilerFallback, PatchEvent, PatchSession } from 'compat-patches'
import { ArtifactNotFoundError, BuildFailedError, FactoryError } from 'factory-errors'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import * as path from 'path'

import { ArchSelection, resolveArchs, SbfArch, targetTripleOf } from './architectures'
import { BuildSink } from './build-sink'
import { CommandRunner } from './command-runner'
import { Toolchain } from './toolchain'

export interface BuildRequest {
  crateName: string
  version: string
  /**
   * The toolchain release whose `cargo-build-sbf` compiles the crate.
   */
  compilerVersion: string
  /**
   * Passed as `--tools-version`; omitted when undefined.
   */
  toolsVersion?: string
  archs?: ArchSelection
}

export interface BuiltArtifact {
  arch: SbfArch
  rlibPath: string
}

/**
 * Called for every artifact as soon as it is built. Architectures share the `target/` directory, so this is the last
 * moment the artifact is guaranteed to be on disk.
 */
export type ArtifactHandler = (artifact: BuiltArtifact) => Promise<void>

export interface ArchOutcome {
  arch: SbfArch
  attempts: number
  patches: PatchEvent[]
  rlibPath?: string
  error?: FactoryError
}

export interface BuildOutcome {
  success: boolean
  /**
   * The output of the last build command (empty when no build command ran).
   */
  lastStatus: string
  artifacts: BuiltArtifact[]
  archs: ArchOutcome[]
}

export interface FallbackOutcome extends BuildOutcome {
  /**
   * The compiler of the last attempted build.
   */
  compilerVersion: string
  /**
   * The patches applied under every compiler that was tried, in order.
   */
  patches: PatchEvent[]
}

export const BUILD_RUSTFLAGS = '-C overflow-checks=on'

export function rlibFileNameOf(crateName: string) {
  return `lib${crateName.replace(/-/g, '_')}.rlib`
}

/**
 * Builds crate versions with `cargo-build-sbf`, one architecture at a time, answering known failures with
 * compatibility patches.
 */
export class BuildOrchestrator {
  constructor(
    private readonly toolchain: Toolchain,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  /**
   * Builds a crate version with a single compiler, for every requested architecture.
   *
   * @throws MissingHostToolchainError when cargo or rustc are not installed.
   */
  async attemptBuild(request: BuildRequest, sink: BuildSink, onArtifact?: ArtifactHandler): Promise<BuildOutcome> {
    const { crateName, version, compilerVersion } = request
    await this.toolchain.preflight()

    const failed = (message: string): BuildOutcome => {
      sink.line(message)
      return { success: false, lastStatus: '', artifacts: [], archs: [] }
    }
    if (!(await this.toolchain.ensureRelease(compilerVersion, sink))) {
      return failed(`Failed to install solana version ${compilerVersion}`)
    }
    if (!(await this.toolchain.ensureCrate(crateName, version, sink))) {
      return failed(`Failed to fetch crate ${crateName} version ${version}`)
    }
    const cargoBuildSbf = this.toolchain.cargoBuildSbfOf(compilerVersion)
    if (!(await fse.pathExists(cargoBuildSbf))) {
      return failed(`cargo-build-sbf not found at ${cargoBuildSbf}`)
    }

    const crateDir = this.toolchain.crateDirOf(crateName, version)
    const archs: ArchOutcome[] = []
    let lastStatus = ''
    for (const arch of resolveArchs(request.archs ?? 'auto', version)) {
      const outcome = await this.buildArch(request, arch, crateDir, cargoBuildSbf, sink)
      this.logArchOutcome(request, outcome.arch)
      lastStatus = outcome.lastStatus
      archs.push(outcome.arch)
      if (outcome.arch.rlibPath) {
        await onArtifact?.({ arch, rlibPath: outcome.arch.rlibPath })
      }
    }

    const artifacts = archs.flatMap(at => (at.rlibPath ? [{ arch: at.arch, rlibPath: at.rlibPath }] : []))
    return { success: artifacts.length > 0, lastStatus, artifacts, archs }
  }

  /**
   * Tries the compilers in order. Moves on to the next compiler only when the failure looks like a compiler
   * incompatibility.
   */
  async buildWithFallback(
    request: Omit<BuildRequest, 'compilerVersion'>,
    compilerVersions: readonly string[],
    sink: BuildSink,
    onArtifact?: ArtifactHandler,
  ): Promise<FallbackOutcome> {
    if (!compilerVersions.length) {
      throw new Error(`no compiler versions given for ${request.crateName}:${request.version}`)
    }
    let ret: FallbackOutcome | undefined
    const patches: PatchEvent[] = []
    for (const [i, compilerVersion] of compilerVersions.entries()) {
      sink.line(
        `Building ${request.crateName}:${request.version} with compiler Solana ${compilerVersion} (attempt ${i + 1}/${
          compilerVersions.length
        })`,
      )
      const outcome = await this.attemptBuild({ ...request, compilerVersion }, sink, onArtifact)
      patches.push(...outcome.archs.flatMap(at => at.patches))
      ret = { ...outcome, compilerVersion, patches: [...patches] }
      if (outcome.success) {
        break
      }
      if (i + 1 < compilerVersions.length && !needsCompilerFallback(outcome.lastStatus)) {
        this.logger.info(`${request.crateName}:${request.version}: failure is not compiler related, no fallback`)
        break
      }
    }
    if (!ret) {
      throw new Error(`no build was attempted for ${request.crateName}:${request.version}`)
    }
    return ret
  }

  private logArchOutcome({ crateName, version, compilerVersion }: BuildRequest, outcome: ArchOutcome) {
    const what = `${crateName}:${version} [${outcome.arch}] with ${compilerVersion}`
    const patched = outcome.patches.map(at => at.patch).join(', ') || 'none'
    if (outcome.error) {
      this.logger.info(`${what}: ${outcome.error.kind} after ${outcome.attempts} attempt(s) (patches: ${patched})`, {
        reason: outcome.error.message,
      })
    } else {
      this.logger.info(`${what}: built after ${outcome.attempts} attempt(s) (patches: ${patched})`)
    }
  }

  private async buildArch(
    request: BuildRequest,
    arch: SbfArch,
    crateDir: string,
    cargoBuildSbf: string,
    sink: BuildSink,
  ): Promise<{ arch: ArchOutcome; lastStatus: string }> {
    const { crateName, version, compilerVersion } = request
    sink.line(`Building crate ${crateName} version ${version} with toolchain ${compilerVersion} [arch=${arch}]...`)

    // outputs of different architectures share target/
    await fse.remove(path.join(crateDir, 'target'))

    const args = [
      ...(request.toolsVersion ? ['--tools-version', request.toolsVersion] : []),
      ...['--arch', arch],
    ]
    const env = await this.toolchain.envOf({ RUSTFLAGS: BUILD_RUSTFLAGS })
    const session = new PatchSession(crateDir, this.logger)
    let attempts = 0
    let lastStatus = ''
    let built = false
    while (session.shouldAttempt) {
      attempts += 1
      const { exitCode, output } = await this.runner.run(cargoBuildSbf, args, {
        cwd: crateDir,
        env,
        onLine: line => sink.line(line),
      })
      lastStatus = output
      if (exitCode === 0) {
        built = true
        break
      }
      const next = await session.onFailure(output)
      if (next.kind === 'patched') {
        sink.line(`[compat] ${next.event.description}...`)
      }
    }

    const patches = [...session.events]
    if (!built) {
      sink.line(`Crate ${crateName} version ${version} [${arch}] build failed!`)
      const error = new BuildFailedError(`${crateName}:${version} [${arch}] failed after ${attempts} attempt(s)`, lastStatus)
      return { arch: { arch, attempts, patches, error }, lastStatus }
    }

    sink.line(`Crate ${crateName} version ${version} [${arch}] built successfully!`)
    const rlibPath = path.join(crateDir, 'target', targetTripleOf(arch), 'release', rlibFileNameOf(crateName))
    if (!(await fse.pathExists(rlibPath))) {
      sink.line(`Rlib for ${crateName}:${version} [${arch}] not found at ${rlibPath}`)
      return { arch: { arch, attempts, patches, error: new ArtifactNotFoundError(rlibPath) }, lastStatus }
    }
    return { arch: { arch, attempts, patches, rlibPath }, lastStatus }
  }
}
